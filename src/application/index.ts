export { pullReportSchema } from './pull-event-schema.js';
export type { PullReport } from './pull-event-schema.js';
export { ingest } from './recorder.js';
export type { IngestResult, IngestOptions } from './recorder.js';
export { report, discover, toMetricPayload } from './reporter.js';
export type { ImageMetric, MetricPayload, DiscoveryEntry, DiscoveryPayload } from './reporter.js';
export { listPullEvents, getPullEvent } from './query-events.js';
export type { ListPullEventsParams, PullEventPage } from './query-events.js';
