import { randomUUID } from 'node:crypto';
import { registryOf, ValidationError } from '../domain/index.js';
import type { PullEvent, PullEventStore } from '../domain/index.js';
import { pullReportSchema } from './pull-event-schema.js';

export type IngestResult =
  | { ok: true; event: PullEvent }
  | { ok: false; error: ValidationError };

export interface IngestOptions {
  /** Clock used when the report carries no timestamp. */
  now?: () => Date;
  /** Id generator for new events. */
  generateId?: () => string;
}

/**
 * Names the field a zod issue path points at; `body` when the input
 * itself is not an object.
 */
function fieldOf(path: readonly (string | number)[]): string {
  const head = path[0];
  return head === undefined ? 'body' : String(head);
}

/**
 * Use case: validate a raw pull report and record it.
 *
 * Returns a discriminated result so the caller decides how to surface
 * validation errors. Validation failures never reach the store. Storage
 * failures (`WriteError`, `StoreNotInitializedError`) propagate unchanged.
 */
export async function ingest(
  store: PullEventStore,
  rawReport: unknown,
  options: IngestOptions = {},
): Promise<IngestResult> {
  const parsed = pullReportSchema.safeParse(rawReport);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue === undefined ? 'body' : fieldOf(issue.path);
    return {
      ok: false,
      error: new ValidationError(field, issue?.message ?? 'Invalid pull report'),
    };
  }

  const report = parsed.data;
  const timestamp = report.timestamp !== undefined
    ? new Date(report.timestamp)
    : (options.now ?? (() => new Date()))();

  const event: PullEvent = {
    event_id: (options.generateId ?? randomUUID)(),
    image: report.image,
    registry: registryOf(report.image),
    outcome: report.outcome,
    detail: report.detail ?? null,
    timestamp: timestamp.toISOString(),
    duration_ms: report.duration_ms ?? null,
    bytes: report.bytes ?? null,
  };

  await store.recordEvent(event);

  return { ok: true, event };
}
