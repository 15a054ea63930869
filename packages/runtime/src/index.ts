// @castwatch/runtime
// Model state merging, best-session selection, change events and watchers

// Models (registry → model → sessions → watchers)
export {
  Model,
  ModelRegistry,
  createModelRegistry,
  normalizeModelId,
  applyPayload,
  collectClearedProperties,
  effectiveChanges,
  createDefaultSession,
  decodeSessionFlags,
  isOfflineSession,
  isTruePrivate,
  selectBestSessionId,
  WatcherTable,
  type ModelContext,
  type MergeResult,
  type ModelSnapshot,
  type PropertyChange,
  type WatcherHandle,
  type WatcherPayload,
  type WatcherPredicate,
  type WatcherCallback,
  type WatcherRecord,
} from './models/index.js';

// Events
export {
  ModelEventBus,
  ANY_TOPIC,
  TAGS_TOPIC,
  topicOf,
  type PropertyChangedEvent,
  type AnyEvent,
  type TagsChangedEvent,
  type ModelEvent,
  type ModelEventHandler,
} from './events/index.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  PreconditionError,
  AggregateMergeError,
  LevelMismatchError,
  InvalidTagsError,
  RegistryReentryError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  describeError,
  type Logger,
  type LogEntry,
} from './logging.js';

// Options
export {
  resolveRegistryOptions,
  type ModelRegistryOptions,
  type ResolvedRegistryOptions,
} from './options.js';
