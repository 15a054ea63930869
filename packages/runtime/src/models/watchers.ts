// Conditional watchers
//
// A watcher pairs a predicate over a model with two callbacks. onTrue runs
// when the predicate becomes true for a model, onFalseAfterTrue when it
// stops being true. Steady states never call anything.

import type { Id, ModelPayload } from '@castwatch/protocol';
import { describeError, type Logger } from '../logging.js';
import type { Model } from './model.js';

/**
 * Opaque handle returned by Model.when(), used to remove the watcher
 */
export type WatcherHandle = string;

/**
 * What triggered an evaluation: the merged payload, the merged tags,
 * or nothing when the watcher was just registered
 */
export type WatcherPayload = ModelPayload | readonly string[] | undefined;

export type WatcherPredicate = (model: Model) => boolean;

export type WatcherCallback = (model: Model, payload: WatcherPayload) => void;

/**
 * A registered watcher
 */
export type WatcherRecord = {
  predicate: WatcherPredicate;
  onTrue: WatcherCallback;
  onFalseAfterTrue?: WatcherCallback;

  /**
   * Ids of the models the predicate is currently true for.
   * A watcher on a concrete model only ever holds that model's id; one on
   * the aggregate model holds every matching model.
   */
  matched: Set<Id>;
};

/**
 * The watchers registered on one model.
 */
export class WatcherTable {
  private records = new Map<WatcherHandle, WatcherRecord>();
  private nextId = 0;

  constructor(
    private readonly ownerId: Id,
    private readonly logger: Logger
  ) {}

  /**
   * Register a watcher.
   *
   * @returns Handle for remove()
   */
  add(predicate: WatcherPredicate, onTrue: WatcherCallback, onFalseAfterTrue?: WatcherCallback): WatcherHandle {
    const handle = `when_${this.ownerId}_${++this.nextId}`;
    this.records.set(handle, { predicate, onTrue, onFalseAfterTrue, matched: new Set() });
    return handle;
  }

  /**
   * Remove a watcher.
   *
   * @returns true if a watcher was removed, false if none existed
   */
  remove(handle: WatcherHandle): boolean {
    return this.records.delete(handle);
  }

  has(handle: WatcherHandle): boolean {
    return this.records.has(handle);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Re-evaluate every watcher against a model and fire the callbacks of
   * those whose predicate changed value for it.
   */
  evaluate(model: Model, payload: WatcherPayload): void {
    for (const [handle, record] of [...this.records]) {
      let matches: boolean;
      try {
        matches = record.predicate(model);
      } catch (error) {
        this.logger.error('Watcher predicate failed', { handle, modelId: model.id, ...describeError(error) });
        continue;
      }

      if (matches && !record.matched.has(model.id)) {
        record.matched.add(model.id);
        this.invoke(handle, record.onTrue, model, payload);
      } else if (!matches && record.matched.has(model.id)) {
        record.matched.delete(model.id);
        if (record.onFalseAfterTrue) {
          this.invoke(handle, record.onFalseAfterTrue, model, payload);
        }
      }
    }
  }

  private invoke(handle: WatcherHandle, callback: WatcherCallback, model: Model, payload: WatcherPayload): void {
    try {
      callback(model, payload);
    } catch (error) {
      this.logger.error('Watcher callback failed', { handle, modelId: model.id, ...describeError(error) });
    }
  }
}
