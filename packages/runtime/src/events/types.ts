// Event types raised by models
//
// Observers subscribe to a topic: a property name, or one of the two
// reserved topics for the catch-all and tag events.

import type { ModelPayload, PropertyValue } from '@castwatch/protocol';
import type { Model } from '../models/model.js';

/**
 * Topic of the catch-all event raised once per visible merge
 */
export const ANY_TOPIC = '$any';

/**
 * Topic of the event raised on every tag merge
 */
export const TAGS_TOPIC = '$tags';

/**
 * Raised when a property of the model's best session changes value.
 */
export type PropertyChangedEvent = {
  type: 'property';
  model: Model;
  property: string;
  before: PropertyValue;
  after: PropertyValue;
};

/**
 * Raised once for every visible merge, changed or not.
 */
export type AnyEvent = {
  type: 'any';
  model: Model;
  /** The payload exactly as it was merged */
  payload: ModelPayload;
};

/**
 * Raised on every tag merge, even when no new tag was added.
 */
export type TagsChangedEvent = {
  type: 'tags';
  model: Model;
  before: ReadonlySet<string>;
  after: ReadonlySet<string>;
};

/**
 * Union of all model events.
 */
export type ModelEvent = PropertyChangedEvent | AnyEvent | TagsChangedEvent;

/**
 * Handler function for events.
 */
export type ModelEventHandler = (event: ModelEvent) => void;

/**
 * The topic an event is published under.
 */
export function topicOf(event: ModelEvent): string {
  switch (event.type) {
    case 'property':
      return event.property;
    case 'any':
      return ANY_TOPIC;
    case 'tags':
      return TAGS_TOPIC;
  }
}
