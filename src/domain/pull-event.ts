/**
 * Core domain types for the pull-event model.
 *
 * These types define the canonical shape of a pull event and its per-image
 * aggregate as they flow through the system. They carry no framework
 * dependencies.
 */

/** Every outcome a pull can have. Aggregations switch over this exhaustively. */
export const PULL_OUTCOMES = ['success', 'failure'] as const;

export type PullOutcome = (typeof PULL_OUTCOMES)[number];

/**
 * One observed image pull.
 *
 * `event_id` is assigned at ingestion time. `registry` is derived from
 * `image` and never supplied by the reporter. `duration_ms` and `bytes`
 * are the reporter's download measurements, when it has them.
 */
export interface PullEvent {
  readonly event_id: string;
  readonly image: string;
  readonly registry: string;
  readonly outcome: PullOutcome;
  readonly detail: string | null;
  readonly timestamp: string; // ISO-8601
  readonly duration_ms: number | null;
  readonly bytes: number | null;
}

/** A pull event as read back from the store. */
export interface StoredPullEvent extends PullEvent {
  readonly recorded_at: string; // ISO-8601
  /** Derived from `bytes` and `duration_ms`; null unless both are known. */
  readonly average_speed_mbps: number | null;
}

/**
 * Per-image aggregate derived from pull events.
 *
 * `total === success + failure`; `last_seen` is the latest event timestamp.
 */
export interface ImageCounter {
  readonly image: string;
  readonly total: number;
  readonly success: number;
  readonly failure: number;
  readonly last_seen: string; // ISO-8601
}

export interface CounterFilter {
  image?: string;
}

export interface PullEventFilter {
  image?: string;
  outcome?: PullOutcome;
}

export interface Pagination {
  limit: number;
  offset: number;
}

/** How much a single event moves each outcome column of its counter. */
export interface OutcomeDelta {
  success: number;
  failure: number;
}

export function isPullOutcome(value: string): value is PullOutcome {
  return (PULL_OUTCOMES as readonly string[]).includes(value);
}

export function outcomeDelta(outcome: PullOutcome): OutcomeDelta {
  switch (outcome) {
    case 'success':
      return { success: 1, failure: 0 };
    case 'failure':
      return { success: 0, failure: 1 };
    default: {
      const unreachable: never = outcome;
      throw new Error(`Unhandled pull outcome: ${String(unreachable)}`);
    }
  }
}

/**
 * Folds one event into a counter. `previous` is undefined for the first
 * event of an image.
 */
export function applyEvent(previous: ImageCounter | undefined, event: PullEvent): ImageCounter {
  const delta = outcomeDelta(event.outcome);

  if (previous === undefined) {
    return {
      image: event.image,
      total: 1,
      success: delta.success,
      failure: delta.failure,
      last_seen: event.timestamp,
    };
  }

  return {
    image: previous.image,
    total: previous.total + 1,
    success: previous.success + delta.success,
    failure: previous.failure + delta.failure,
    last_seen: Date.parse(event.timestamp) > Date.parse(previous.last_seen)
      ? event.timestamp
      : previous.last_seen,
  };
}

/**
 * Average download speed in megabits per second.
 * Null when either measurement is missing or the duration is zero.
 */
export function averageSpeedMbps(bytes: number | null, durationMs: number | null): number | null {
  if (bytes === null || durationMs === null || durationMs <= 0) return null;
  return (bytes * 8) / (durationMs / 1000) / 1_000_000;
}

/** Attaches the store-assigned and derived fields to a recorded event. */
export function toStoredPullEvent(event: PullEvent, recordedAt: string): StoredPullEvent {
  return {
    ...event,
    recorded_at: recordedAt,
    average_speed_mbps: averageSpeedMbps(event.bytes, event.duration_ms),
  };
}
