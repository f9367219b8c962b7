import { registryOf } from '../domain/index.js';
import type { CounterFilter, ImageCounter, PullEventStore } from '../domain/index.js';

/** Per-image values exposed to the monitoring system. */
export interface ImageMetric {
  total: number;
  success: number;
  failure: number;
  lastSeen: string;
}

/** Image identifier → metric. Keys are in ascending image order. */
export type MetricPayload = Record<string, ImageMetric>;

/** One entity of a Zabbix low-level discovery document. */
export interface DiscoveryEntry {
  '{#IMAGE}': string;
  '{#REGISTRY}': string;
}

export interface DiscoveryPayload {
  data: DiscoveryEntry[];
}

function byImage(a: ImageCounter, b: ImageCounter): number {
  if (a.image < b.image) return -1;
  if (a.image > b.image) return 1;
  return 0;
}

/** Pure transform from counters to the metric payload. */
export function toMetricPayload(counters: readonly ImageCounter[]): MetricPayload {
  const payload: MetricPayload = {};
  for (const c of [...counters].sort(byImage)) {
    payload[c.image] = {
      total: c.total,
      success: c.success,
      failure: c.failure,
      lastSeen: c.last_seen,
    };
  }
  return payload;
}

/**
 * Use case: current counters in the shape the monitoring API expects.
 *
 * An empty filter returns every tracked image; an unknown image yields `{}`.
 */
export async function report(
  store: PullEventStore,
  filter: CounterFilter = {},
): Promise<MetricPayload> {
  const counters = await store.queryCounters(filter);
  return toMetricPayload(counters);
}

/**
 * Use case: Zabbix low-level discovery of tracked images.
 *
 * Item prototypes keyed on `{#IMAGE}` can then read `/metrics?image=`.
 */
export async function discover(store: PullEventStore): Promise<DiscoveryPayload> {
  const counters = await store.queryCounters();
  return {
    data: [...counters].sort(byImage).map((c) => ({
      '{#IMAGE}': c.image,
      '{#REGISTRY}': registryOf(c.image),
    })),
  };
}
