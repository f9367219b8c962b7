import { vi } from 'vitest';
import type {
  CounterFilter,
  ImageCounter,
  Pagination,
  PullEvent,
  PullEventFilter,
  PullEventStore,
  StoredPullEvent,
} from '../src/domain/index.js';

let counter = 0;

/**
 * Factory for creating test pull events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makePullEvent(overrides: Partial<PullEvent> = {}): PullEvent {
  counter++;
  const suffix = counter.toString(16).padStart(12, '0');
  return {
    event_id: overrides.event_id ?? `00000000-0000-4000-8000-${suffix}`,
    image: overrides.image ?? 'nginx:latest',
    registry: overrides.registry ?? 'docker.io',
    outcome: overrides.outcome ?? 'success',
    detail: overrides.detail ?? null,
    timestamp: overrides.timestamp ?? '2026-02-18T12:00:00.000Z',
    duration_ms: overrides.duration_ms ?? null,
    bytes: overrides.bytes ?? null,
  };
}

/**
 * Store double whose every method is a `vi.fn()`.
 * Tests stub only the methods they exercise.
 */
export function makeFakeStore() {
  return {
    initialize: vi.fn(async () => {}),
    isInitialized: vi.fn(async () => true),
    recordEvent: vi.fn(async (_event: PullEvent) => {}),
    queryCounters: vi.fn(async (_filter?: CounterFilter): Promise<ImageCounter[]> => []),
    listEvents: vi.fn(async (_filter: PullEventFilter, _page: Pagination): Promise<StoredPullEvent[]> => []),
    findEvent: vi.fn(async (_eventId: string): Promise<StoredPullEvent | undefined> => undefined),
    healthCheck: vi.fn(async () => true),
    close: vi.fn(async () => {}),
  } satisfies PullEventStore;
}

export type FakeStore = ReturnType<typeof makeFakeStore>;
