// Models module - per-model state merging, best-session selection and watchers

export {
  Model,
  type ModelContext,
  type MergeResult,
  type ModelSnapshot,
} from './model.js';

export {
  ModelRegistry,
  createModelRegistry,
  normalizeModelId,
} from './registry.js';

export {
  applyPayload,
  collectClearedProperties,
  effectiveChanges,
  type PropertyChange,
} from './merge.js';

export {
  createDefaultSession,
  decodeSessionFlags,
  isOfflineSession,
  isTruePrivate,
  selectBestSessionId,
} from './sessions.js';

export {
  WatcherTable,
  type WatcherHandle,
  type WatcherPayload,
  type WatcherPredicate,
  type WatcherCallback,
  type WatcherRecord,
} from './watchers.js';
