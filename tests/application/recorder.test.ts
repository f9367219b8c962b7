import { describe, it, expect, beforeEach } from 'vitest';
import { ingest } from '../../src/application/recorder.js';
import { ValidationError, WriteError } from '../../src/domain/index.js';
import { makeFakeStore, type FakeStore } from '../helpers.js';

const FIXED_NOW = new Date('2026-02-18T12:00:00Z');
const options = {
  now: () => FIXED_NOW,
  generateId: () => '11111111-2222-4333-8444-555555555555',
};

let store: FakeStore;

beforeEach(() => {
  store = makeFakeStore();
});

/** Asserts a validation failure naming `field` and that nothing was written. */
async function expectRejected(raw: unknown, field: string): Promise<void> {
  const result = await ingest(store, raw, options);

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.field).toBe(field);
  }
  expect(store.recordEvent).not.toHaveBeenCalled();
}

// ─── accepted reports ────────────────────────────────────────

describe('ingest — valid reports', () => {
  it('records exactly one well-formed event', async () => {
    const result = await ingest(store, { image: 'nginx:latest', outcome: 'success' }, options);

    const expected = {
      event_id: '11111111-2222-4333-8444-555555555555',
      image: 'nginx:latest',
      registry: 'docker.io',
      outcome: 'success',
      detail: null,
      timestamp: '2026-02-18T12:00:00.000Z',
      duration_ms: null,
      bytes: null,
    };
    expect(result).toEqual({ ok: true, event: expected });
    expect(store.recordEvent).toHaveBeenCalledTimes(1);
    expect(store.recordEvent).toHaveBeenCalledWith(expected);
  });

  it('trims the image identifier', async () => {
    const result = await ingest(store, { image: '  nginx:latest  ', outcome: 'failure' }, options);

    expect(result.ok && result.event.image).toBe('nginx:latest');
  });

  it('derives the registry host', async () => {
    const result = await ingest(store, { image: 'ghcr.io/acme/api:v2', outcome: 'success' }, options);

    expect(result.ok && result.event.registry).toBe('ghcr.io');
  });

  it('keeps the error detail', async () => {
    const result = await ingest(
      store,
      { image: 'redis:7', outcome: 'failure', detail: 'manifest unknown' },
      options,
    );

    expect(result.ok && result.event.detail).toBe('manifest unknown');
  });

  it('normalizes a supplied timestamp to UTC', async () => {
    const result = await ingest(
      store,
      { image: 'redis:7', outcome: 'success', timestamp: '2026-02-18T14:00:00+02:00' },
      options,
    );

    expect(result.ok && result.event.timestamp).toBe('2026-02-18T12:00:00.000Z');
  });

  it('keeps the download measurements', async () => {
    const result = await ingest(
      store,
      { image: 'nginx:latest', outcome: 'success', duration_ms: 1500, bytes: 187_000_000 },
      options,
    );

    expect(result.ok && result.event).toMatchObject({ duration_ms: 1500, bytes: 187_000_000 });
  });

  it('assigns a UUID when no generator is given', async () => {
    const result = await ingest(store, { image: 'redis:7', outcome: 'success' });

    expect(result.ok && result.event.event_id).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });
});

// ─── rejected reports ────────────────────────────────────────

describe('ingest — validation failures', () => {
  it('rejects a missing image', async () => {
    await expectRejected({ outcome: 'success' }, 'image');
  });

  it('rejects an empty image', async () => {
    await expectRejected({ image: '', outcome: 'success' }, 'image');
  });

  it('rejects a whitespace-only image', async () => {
    await expectRejected({ image: '   ', outcome: 'success' }, 'image');
  });

  it('rejects an image that is not a valid reference', async () => {
    await expectRejected({ image: 'Not A Reference', outcome: 'success' }, 'image');
  });

  it('rejects a non-string image', async () => {
    await expectRejected({ image: 42, outcome: 'success' }, 'image');
  });

  it('rejects a missing outcome', async () => {
    await expectRejected({ image: 'nginx:latest' }, 'outcome');
  });

  it('rejects an unknown outcome', async () => {
    await expectRejected({ image: 'nginx:latest', outcome: 'timeout' }, 'outcome');
  });

  it('rejects a non-string detail', async () => {
    await expectRejected({ image: 'nginx:latest', outcome: 'failure', detail: 500 }, 'detail');
  });

  it('rejects a malformed timestamp', async () => {
    await expectRejected({ image: 'nginx:latest', outcome: 'success', timestamp: 'yesterday' }, 'timestamp');
  });

  it.each([
    '2026-02-18T12:00:00+99:99',
    '2026-02-18T12:00:00+24:00',
  ])('rejects the out-of-range offset in %s', async (timestamp) => {
    await expectRejected({ image: 'nginx:latest', outcome: 'success', timestamp }, 'timestamp');
  });

  it.each([
    ['a negative duration', { duration_ms: -1 }, 'duration_ms'],
    ['a fractional duration', { duration_ms: 1.5 }, 'duration_ms'],
    ['a string duration', { duration_ms: '1500' }, 'duration_ms'],
    ['a negative size', { bytes: -10 }, 'bytes'],
    ['an unsafe size', { bytes: 2 ** 60 }, 'bytes'],
  ])('rejects %s', async (_label, extra, field) => {
    await expectRejected({ image: 'nginx:latest', outcome: 'success', ...extra }, field);
  });

  it('names image first when several fields are invalid', async () => {
    await expectRejected({ outcome: 'maybe' }, 'image');
  });

  it.each([
    ['null', null],
    ['a string', 'nginx:latest'],
    ['an array', [{ image: 'nginx:latest', outcome: 'success' }]],
  ])('rejects %s as the body', async (_label, raw) => {
    await expectRejected(raw, 'body');
  });
});

// ─── storage failures ────────────────────────────────────────

describe('ingest — storage failures', () => {
  it('propagates WriteError unchanged', async () => {
    const failure = new WriteError('disk full');
    store.recordEvent.mockRejectedValueOnce(failure);

    await expect(ingest(store, { image: 'nginx:latest', outcome: 'success' }, options)).rejects.toBe(failure);
  });
});
