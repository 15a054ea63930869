// Model - one tracked broadcaster and every session we know for it
//
// Payloads are merged into sessions; whichever session is best decides
// what observers are told. Every event is published on the model's own
// bus and mirrored to the aggregate model's bus.
//
// All operations are synchronous and run to completion, so a merge is
// never observed half-applied.

import { AGGREGATE_MODEL_ID, VideoState, isPropertyGroup } from '@castwatch/protocol';
import type { Id, ModelPayload, Session } from '@castwatch/protocol';
import { AggregateMergeError, InvalidTagsError, LevelMismatchError, ValidationError } from '../errors.js';
import { ModelEventBus } from '../events/bus.js';
import {
  ANY_TOPIC,
  TAGS_TOPIC,
  type AnyEvent,
  type ModelEvent,
  type ModelEventHandler,
  type PropertyChangedEvent,
  type TagsChangedEvent,
} from '../events/types.js';
import type { Logger } from '../logging.js';
import { applyPayload, collectClearedProperties, effectiveChanges, type PropertyChange } from './merge.js';
import { createDefaultSession, isOfflineSession, isTruePrivate, selectBestSessionId } from './sessions.js';
import {
  WatcherTable,
  type WatcherCallback,
  type WatcherHandle,
  type WatcherPayload,
  type WatcherPredicate,
} from './watchers.js';

/**
 * What a model needs from the registry that owns it
 */
export type ModelContext = {
  /** The aggregate model of the same registry */
  readonly all: Model;
  readonly logger: Logger;
  readonly expectedLevel: number;
  /** Every concrete model in the registry */
  models(): Iterable<Model>;
  /** Throws when called from inside a find() predicate */
  assertNotScanning(operation: string): void;
};

/**
 * Result of a merge
 */
export type MergeResult = {
  /** Whether observers were notified */
  visible: boolean;

  /** Session the payload was written into */
  sessionId: Id;

  /** Best session after the merge */
  bestSessionId: Id;

  /** Property changes that were announced (empty when not visible) */
  changes: PropertyChange[];
};

/**
 * JSON form of a model
 */
export type ModelSnapshot = {
  id: Id;
  name: string | null;
  tags: string[];
  bestSession: Session;
};

export class Model {
  readonly id: Id;

  private _name: string | null = null;
  private readonly _tags = new Set<string>();
  private readonly _sessions = new Map<Id, Session>();
  private readonly watchers: WatcherTable;
  private readonly bus: ModelEventBus;

  constructor(
    id: Id,
    private readonly context: ModelContext
  ) {
    this.id = id;
    this.watchers = new WatcherTable(id, context.logger);
    this.bus = new ModelEventBus(context.logger);
  }

  get isAggregate(): boolean {
    return this.id === AGGREGATE_MODEL_ID;
  }

  /**
   * Display name, taken from the best session's `name` property
   */
  get name(): string | null {
    return this._name;
  }

  get tags(): ReadonlySet<string> {
    return this._tags;
  }

  /**
   * Copies of the known sessions. Writing to them does not change the model.
   */
  get sessions(): ReadonlyMap<Id, Session> {
    return new Map([...this._sessions].map(([sessionId, session]): [Id, Session] => [sessionId, { ...session }]));
  }

  /**
   * Id of the authoritative session, 0 when none qualifies.
   * Recomputed on every read.
   */
  get bestSessionId(): Id {
    return selectBestSessionId(this._sessions);
  }

  /**
   * A copy of the authoritative session, or a default offline row (not stored)
   */
  get bestSession(): Session {
    const session = this._sessions.get(this.bestSessionId);
    return session ? { ...session } : createDefaultSession(this.id);
  }

  get inTruePrivate(): boolean {
    return isTruePrivate(this.bestSession);
  }

  // --- Observers ---

  /**
   * Subscribe to a topic: a property name, ANY_TOPIC or TAGS_TOPIC.
   *
   * @returns Unsubscribe function
   */
  on(topic: string, handler: ModelEventHandler): () => void {
    return this.bus.subscribe(topic, handler);
  }

  onProperty(property: string, handler: (event: PropertyChangedEvent) => void): () => void {
    return this.bus.subscribe(property, (event) => {
      if (event.type === 'property') handler(event);
    });
  }

  onAny(handler: (event: AnyEvent) => void): () => void {
    return this.bus.subscribe(ANY_TOPIC, (event) => {
      if (event.type === 'any') handler(event);
    });
  }

  onTags(handler: (event: TagsChangedEvent) => void): () => void {
    return this.bus.subscribe(TAGS_TOPIC, (event) => {
      if (event.type === 'tags') handler(event);
    });
  }

  /**
   * Number of handlers subscribed to a topic, or to any topic when omitted.
   */
  listenerCount(topic?: string): number {
    return topic === undefined ? this.bus.totalSubscriptions() : this.bus.subscriberCount(topic);
  }

  /**
   * Drop the handlers of one topic, or every handler when omitted.
   */
  removeAllListeners(topic?: string): void {
    this.bus.clear(topic);
  }

  // --- Merging ---

  /**
   * Merge a state update into this model.
   *
   * The payload is written into its session. Observers are only told about
   * it when that session is (or becomes) the best session, or when the model
   * had no best session before. Offline sessions are purged afterwards
   * either way.
   *
   * @throws AggregateMergeError when called on the aggregate model
   * @throws LevelMismatchError when the payload declares the wrong level
   * @throws ValidationError when the payload is not an object
   */
  merge(payload: ModelPayload): MergeResult {
    this.context.assertNotScanning('merge');

    if (this.isAggregate) {
      throw new AggregateMergeError();
    }
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new ValidationError('payload must be an object', { field: 'payload' });
    }
    if (payload.level !== undefined && payload.level !== this.context.expectedLevel) {
      throw new LevelMismatchError(this.context.expectedLevel, payload.level);
    }

    const baselineId = this.bestSessionId;
    const baseline = this.bestSession;

    const sessionId = payload.sessionId ?? 0;
    let target = this._sessions.get(sessionId);
    if (!target) {
      target = createDefaultSession(this.id, sessionId);
      this._sessions.set(sessionId, target);
    }

    this.warnOnIgnoredFlags(payload);
    const changes = applyPayload(target, baseline, payload);
    if (sessionId !== baselineId) {
      changes.push(...collectClearedProperties(baseline, target));
    }

    const bestSessionId = this.bestSessionId;
    const visible = bestSessionId === sessionId || (baselineId === 0 && sessionId !== 0);

    let announced: PropertyChange[] = [];
    if (visible) {
      this.refreshName();
      announced = effectiveChanges(changes);
      for (const change of announced) {
        this.emit({ type: 'property', model: this, ...change });
      }
      this.emit({ type: 'any', model: this, payload });
      this.processWatchers(payload);
    }

    this.purgeOfflineSessions();

    this.context.logger.debug('Merged model update', {
      modelId: this.id,
      sessionId,
      bestSessionId,
      visible,
      changes: announced.length,
    });

    return { visible, sessionId, bestSessionId, changes: announced };
  }

  /**
   * Add tags to this model.
   * The tag event is raised on every call, even when nothing was added.
   *
   * @throws InvalidTagsError when tags is not a list of strings
   */
  mergeTags(tags: readonly string[]): void {
    this.context.assertNotScanning('mergeTags');

    const input: unknown = tags;
    if (!Array.isArray(input)) {
      throw new InvalidTagsError(input, 'tags must be an array');
    }
    const invalid = input.findIndex((tag: unknown) => typeof tag !== 'string');
    if (invalid !== -1) {
      throw new InvalidTagsError(input, `tag at index ${invalid} is not a string`);
    }

    const before = new Set(this._tags);
    for (const tag of tags) {
      this._tags.add(tag);
    }

    this.emit({ type: 'tags', model: this, before, after: new Set(this._tags) });
    this.processWatchers(tags);
  }

  /**
   * Take this model offline.
   *
   * Every session except the best is marked offline, then the best session
   * is taken offline by an ordinary merge so observers, watchers and the
   * purge all behave as for a server update. On the aggregate model this
   * resets every model in the registry instead.
   */
  reset(): void {
    if (this.isAggregate) {
      for (const model of [...this.context.models()]) {
        model.reset();
      }
      return;
    }

    const bestSessionId = this.bestSessionId;
    for (const [sessionId, session] of this._sessions) {
      if (sessionId !== bestSessionId && !isOfflineSession(session)) {
        session.videoState = VideoState.Offline;
      }
    }

    this.merge({ sessionId: bestSessionId, modelId: this.id, videoState: VideoState.Offline });
  }

  // --- Watchers ---

  /**
   * Watch for a condition on this model. On the aggregate model the
   * condition is watched on every model.
   *
   * onTrue runs each time the predicate becomes true, onFalseAfterTrue
   * each time it becomes false again. The predicate is evaluated once
   * right away.
   *
   * @returns Handle for removeWhen()
   */
  when(predicate: WatcherPredicate, onTrue: WatcherCallback, onFalseAfterTrue?: WatcherCallback): WatcherHandle {
    const handle = this.watchers.add(predicate, onTrue, onFalseAfterTrue);
    this.processWatchers(undefined);
    return handle;
  }

  removeWhen(handle: WatcherHandle): boolean {
    return this.watchers.remove(handle);
  }

  // --- Presentation ---

  toJSON(): ModelSnapshot {
    return {
      id: this.id,
      name: this._name,
      tags: [...this._tags],
      bestSession: this.bestSession,
    };
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }

  // --- Internals ---

  private emit(event: ModelEvent): void {
    this.bus.publish(event);
    if (!this.isAggregate) {
      this.context.all.bus.publish(event);
    }
  }

  private processWatchers(payload: WatcherPayload): void {
    // The aggregate is never the subject of a watcher
    if (this.isAggregate) {
      return;
    }
    this.watchers.evaluate(this, payload);
    this.context.all.watchers.evaluate(this, payload);
  }

  private warnOnIgnoredFlags(payload: ModelPayload): void {
    for (const [group, value] of Object.entries(payload)) {
      if (value !== undefined && isPropertyGroup(value) && value.flags !== undefined && typeof value.flags !== 'number') {
        this.context.logger.warn('Ignoring non-numeric flags', { modelId: this.id, group, flags: value.flags });
      }
    }
  }

  private refreshName(): void {
    const name = this.bestSession.name;
    if (name === undefined || name === this._name) {
      return;
    }
    this._name = name === null ? null : String(name);
  }

  private purgeOfflineSessions(): void {
    for (const [sessionId, session] of [...this._sessions]) {
      if (isOfflineSession(session)) {
        this._sessions.delete(sessionId);
      }
    }
  }
}
