export type {
  PullEvent,
  StoredPullEvent,
  PullOutcome,
  ImageCounter,
  CounterFilter,
  PullEventFilter,
  Pagination,
  OutcomeDelta,
} from './pull-event.js';
export {
  PULL_OUTCOMES,
  isPullOutcome,
  outcomeDelta,
  applyEvent,
  averageSpeedMbps,
  toStoredPullEvent,
} from './pull-event.js';
export type { ImageReference } from './image-reference.js';
export {
  DEFAULT_REGISTRY,
  parseImageReference,
  isValidImageReference,
  registryOf,
} from './image-reference.js';
export {
  InitError,
  WriteError,
  ReadError,
  StoreNotInitializedError,
  ValidationError,
  ConfigError,
} from './errors.js';
export type { PullEventStore } from './store.js';
