// Events module - typed model events and their bus

export { ModelEventBus } from './bus.js';
export {
  ANY_TOPIC,
  TAGS_TOPIC,
  topicOf,
  type PropertyChangedEvent,
  type AnyEvent,
  type TagsChangedEvent,
  type ModelEvent,
  type ModelEventHandler,
} from './types.js';
