// Model Registry - every model known to one connection
//
// getOrCreate() is the only way models come into existence, so each id
// maps to exactly one Model instance for the registry's lifetime. The
// aggregate model is created with the registry and lives under its
// reserved id.

import { AGGREGATE_MODEL_ID } from '@castwatch/protocol';
import type { Id } from '@castwatch/protocol';
import { RegistryReentryError, ValidationError } from '../errors.js';
import type { Logger } from '../logging.js';
import { resolveRegistryOptions, type ModelRegistryOptions } from '../options.js';
import { Model, type ModelContext } from './model.js';

/**
 * Accept numeric ids as numbers or as the decimal strings some server
 * messages carry.
 */
export function normalizeModelId(id: Id | string): Id {
  if (typeof id === 'number') {
    if (!Number.isSafeInteger(id)) {
      throw new ValidationError(`model id must be an integer, got ${id}`, { field: 'id' });
    }
    return id;
  }

  if (!/^-?\d+$/.test(id.trim())) {
    throw new ValidationError(`model id must be an integer, got "${id}"`, { field: 'id' });
  }
  const parsed = Number.parseInt(id, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new ValidationError(`model id is out of range, got "${id}"`, { field: 'id' });
  }
  return parsed;
}

export class ModelRegistry implements ModelContext {
  readonly all: Model;
  readonly logger: Logger;
  readonly expectedLevel: number;

  private readonly known = new Map<Id, Model>();
  private scanning = false;

  constructor(options: ModelRegistryOptions = {}) {
    const resolved = resolveRegistryOptions(options);
    this.logger = resolved.logger;
    this.expectedLevel = resolved.expectedLevel;
    this.all = new Model(AGGREGATE_MODEL_ID, this);
  }

  /**
   * Get the model for an id, creating it on first sight.
   */
  getOrCreate(id: Id | string): Model {
    this.assertNotScanning('getOrCreate');

    const modelId = normalizeModelId(id);
    if (modelId === AGGREGATE_MODEL_ID) {
      return this.all;
    }

    let model = this.known.get(modelId);
    if (!model) {
      model = new Model(modelId, this);
      this.known.set(modelId, model);
      this.logger.debug('Created model', { modelId });
    }
    return model;
  }

  /**
   * Get the model for an id without creating it.
   */
  get(id: Id | string): Model | undefined {
    this.assertNotScanning('get');

    const modelId = normalizeModelId(id);
    if (modelId === AGGREGATE_MODEL_ID) {
      return this.all;
    }
    return this.known.get(modelId);
  }

  /**
   * All models the predicate holds for. The aggregate model is never
   * included. The predicate must not call back into the registry.
   */
  find(predicate: (model: Model) => boolean): Model[] {
    this.assertNotScanning('find');

    this.scanning = true;
    try {
      return [...this.known.values()].filter(predicate);
    } finally {
      this.scanning = false;
    }
  }

  /**
   * Every concrete model, in creation order.
   */
  models(): IterableIterator<Model> {
    return this.known.values();
  }

  /**
   * Number of concrete models.
   */
  get size(): number {
    return this.known.size;
  }

  /**
   * Take every model offline.
   */
  reset(): void {
    this.logger.info('Resetting all models', { models: this.known.size });
    this.all.reset();
  }

  assertNotScanning(operation: string): void {
    if (this.scanning) {
      throw new RegistryReentryError(operation);
    }
  }
}

/**
 * Create a registry with its own aggregate model.
 *
 * @example
 * ```typescript
 * const registry = createModelRegistry({ logger: silentLogger });
 * registry.all.onProperty('videoState', ({ model, after }) => {
 *   console.log(`${model.name} is now in state ${after}`);
 * });
 * registry.getOrCreate(3101).merge({ sessionId: 1, videoState: VideoState.Online, name: 'Alice' });
 * ```
 */
export function createModelRegistry(options: ModelRegistryOptions = {}): ModelRegistry {
  return new ModelRegistry(options);
}
