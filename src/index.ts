#!/usr/bin/env node
import { Command } from 'commander';
import pino from 'pino';

import { buildApp } from './app.js';
import { ConfigError, InitError } from './domain/index.js';
import type { PullEventStore } from './domain/index.js';
import { createStore, loadAppConfig, redactDatabaseUrl } from './infrastructure/index.js';
import type { AppConfig } from './infrastructure/index.js';

interface CliOptions {
  initDb: boolean;
  initOnly: boolean;
}

function parseCli(argv: string[]): CliOptions {
  const program = new Command()
    .name('pull-metrics-exporter')
    .description('Records docker image pull events and exports per-image counters for Zabbix')
    .option('--init-db', 'create the database schema before serving', false)
    .option('--init-only', 'create the database schema and exit', false)
    .parse(argv);

  const opts = program.opts<{ initDb: boolean; initOnly: boolean }>();
  return { initDb: opts.initDb || opts.initOnly, initOnly: opts.initOnly };
}

function loadConfigOrExit(): AppConfig {
  try {
    return loadAppConfig(process.env);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      pino().fatal({ variables: err.variables }, err.message);
      process.exit(1);
    }
    throw err;
  }
}

/**
 * Process entry.
 *
 * Order:
 * 1) Config + lifecycle logger
 * 2) Store (+ schema init when requested; InitError is fatal)
 * 3) Fastify app, shutdown hooks
 * 4) listen()
 */
async function main(): Promise<void> {
  const cli = parseCli(process.argv);

  const config = loadConfigOrExit();
  const log = pino({ level: config.logLevel });
  log.info(
    {
      appEnv: config.appEnv,
      host: config.host,
      port: config.port,
      databaseUrl: redactDatabaseUrl(config.databaseUrl),
      initDb: cli.initDb,
    },
    'Configuration loaded',
  );

  const store: PullEventStore = createStore(config, log);

  if (cli.initDb) {
    try {
      await store.initialize();
    } catch (err: unknown) {
      if (err instanceof InitError) {
        log.fatal({ err }, 'Store initialization failed');
        await store.close().catch((closeErr: unknown) => {
          log.error({ err: closeErr }, 'Failed to close store');
        });
        process.exit(1);
      }
      throw err;
    }
    log.info('Store initialized');
  }

  if (cli.initOnly) {
    await store.close();
    return;
  }

  const app = await buildApp({
    store,
    logger: { level: config.logLevel },
    bodyLimit: config.bodyLimit,
  });

  const initialized = await store.isInitialized().catch((err: unknown) => {
    app.log.warn({ err }, 'Could not probe store schema');
    return false;
  });
  if (!initialized) {
    app.log.warn('Store is not initialized; metric and event endpoints answer 503 until it is (run with --init-db)');
  }

  // Graceful shutdown: app.close() runs the store plugin's onClose hook.
  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    app.log.info({ signal }, 'Shutting down...');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {
  pino().fatal({ err }, 'Fatal: failed to start server');
  process.exit(1);
});
