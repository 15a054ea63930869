// In-memory event pub/sub for model observers
//
// Each model owns one bus. Delivery is synchronous: publish() returns after
// every handler has run, so observers see events in merge order.

import { describeError, type Logger } from '../logging.js';
import { topicOf, type ModelEvent, type ModelEventHandler } from './types.js';

/**
 * In-memory event bus for one model.
 *
 * A handler that throws is logged and skipped; the remaining handlers
 * still run and the publisher never sees the error.
 */
export class ModelEventBus {
  private subscriptions: Map<string, Set<ModelEventHandler>> = new Map();

  constructor(private readonly logger: Logger) {}

  /**
   * Subscribe to events for a topic.
   *
   * @param topic Property name, ANY_TOPIC or TAGS_TOPIC
   * @param handler Callback invoked when events occur
   * @returns Unsubscribe function
   */
  subscribe(topic: string, handler: ModelEventHandler): () => void {
    let handlers = this.subscriptions.get(topic);
    if (!handlers) {
      handlers = new Set();
      this.subscriptions.set(topic, handlers);
    }
    handlers.add(handler);

    return () => {
      const subs = this.subscriptions.get(topic);
      if (subs) {
        subs.delete(handler);
        if (subs.size === 0) {
          this.subscriptions.delete(topic);
        }
      }
    };
  }

  /**
   * Publish an event to all subscribers of its topic.
   */
  publish(event: ModelEvent): void {
    const topic = topicOf(event);
    const subs = this.subscriptions.get(topic);
    if (!subs || subs.size === 0) {
      return;
    }

    // Copy so handlers may unsubscribe while we iterate
    for (const handler of [...subs]) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error('Model event handler failed', {
          modelId: event.model.id,
          topic,
          ...describeError(error),
        });
      }
    }
  }

  /**
   * Get the number of subscribers for a topic.
   */
  subscriberCount(topic: string): number {
    return this.subscriptions.get(topic)?.size ?? 0;
  }

  /**
   * Get total number of subscriptions across all topics.
   */
  totalSubscriptions(): number {
    let total = 0;
    for (const subs of this.subscriptions.values()) {
      total += subs.size;
    }
    return total;
  }

  /**
   * Remove every subscription, or only those of one topic.
   */
  clear(topic?: string): void {
    if (topic === undefined) {
      this.subscriptions.clear();
      return;
    }
    this.subscriptions.delete(topic);
  }
}
