import type { InstallEventMap, InstallEventName } from '../../types/install-events.types.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('InstallEventBus');

/**
 * Event payload that includes the emitting component
 */
export interface InstallEventPayload<K extends InstallEventName> {
  /** The component that emitted the event */
  source: string;
  /** The event data */
  data: InstallEventMap[K];
  /** Timestamp when the event was emitted */
  timestamp: Date;
}

/**
 * Event handler function type
 */
export type InstallEventHandler<K extends InstallEventName> = (
  payload: InstallEventPayload<K>
) => void | Promise<void>;

/**
 * Subscription handle for unsubscribing
 */
export interface EventSubscription {
  unsubscribe(): void;
}

/**
 * Internal subscription tracking
 */
interface Subscription<K extends InstallEventName = InstallEventName> {
  subscriberId: string;
  eventName: K;
  handler: InstallEventHandler<K>;
}

type SubscriptionTable = {
  [K in InstallEventName]: Set<Subscription<K>>;
};

/**
 * Typed publish/subscribe hub between the core and its observers.
 *
 * The state store and orchestrator publish here; the UI (or CLI) subscribes.
 * Handler errors are logged and never reach the publisher, so a faulty
 * observer cannot break an install.
 *
 * ```typescript
 * bus.on('voice:changed', 'cli', ({ data }) => {
 *   console.log(data.voiceRef, data.status.kind);
 * });
 * ```
 */
export class InstallEventBus {
  private handlers: SubscriptionTable = {
    'voice:changed': new Set(),
    'catalog:updated': new Set(),
    'provider:refreshed': new Set(),
  };

  /** Map of subscriber ID to its subscriptions (for cleanup) */
  private subscriberSubscriptions: Map<string, Set<() => void>> = new Map();

  /**
   * Subscribe to an event
   * @param eventName The event to listen for
   * @param subscriberId Who is subscribing (used for bulk cleanup and logs)
   */
  on<K extends InstallEventName>(
    eventName: K,
    subscriberId: string,
    handler: InstallEventHandler<K>
  ): EventSubscription {
    const subscription: Subscription<K> = { subscriberId, eventName, handler };
    const table: Set<Subscription<K>> = this.handlers[eventName];
    table.add(subscription);

    const remove = () => {
      table.delete(subscription);
      const owned = this.subscriberSubscriptions.get(subscriberId);
      if (owned) {
        owned.delete(remove);
        if (owned.size === 0) {
          this.subscriberSubscriptions.delete(subscriberId);
        }
      }
      logger.debug(`${subscriberId} unsubscribed from event: ${eventName}`);
    };

    let owned = this.subscriberSubscriptions.get(subscriberId);
    if (!owned) {
      owned = new Set();
      this.subscriberSubscriptions.set(subscriberId, owned);
    }
    owned.add(remove);

    logger.debug(`${subscriberId} subscribed to event: ${eventName}`);

    return { unsubscribe: remove };
  }

  /**
   * Emit an event and wait for async handlers
   */
  async emit<K extends InstallEventName>(
    eventName: K,
    source: string,
    data: InstallEventMap[K]
  ): Promise<void> {
    const subscriptions: Set<Subscription<K>> = this.handlers[eventName];
    if (subscriptions.size === 0) {
      return;
    }

    const payload: InstallEventPayload<K> = {
      source,
      data,
      timestamp: new Date(),
    };

    const promises: Promise<void>[] = [];

    // Copy so handlers may unsubscribe while we iterate
    for (const subscription of [...subscriptions]) {
      try {
        const result = subscription.handler(payload);
        if (result instanceof Promise) {
          promises.push(
            result.catch((error: unknown) => {
              logger.error(
                `Error in event handler for ${eventName} (subscriber: ${subscription.subscriberId}):`,
                error
              );
            })
          );
        }
      } catch (error) {
        logger.error(
          `Error in event handler for ${eventName} (subscriber: ${subscription.subscriberId}):`,
          error
        );
      }
    }

    if (promises.length > 0) {
      await Promise.all(promises);
    }
  }

  /**
   * Emit an event without waiting for handlers (fire-and-forget).
   * Synchronous handlers still run before this returns.
   */
  publish<K extends InstallEventName>(eventName: K, source: string, data: InstallEventMap[K]): void {
    this.emit(eventName, source, data).catch((error: unknown) => {
      logger.error(`Error emitting event ${eventName}:`, error);
    });
  }

  /**
   * Remove all subscriptions for a subscriber
   */
  unsubscribeAll(subscriberId: string): void {
    const owned = this.subscriberSubscriptions.get(subscriberId);
    if (!owned) return;

    for (const remove of [...owned]) {
      remove();
    }
  }

  hasSubscribers(eventName: InstallEventName): boolean {
    return this.handlers[eventName].size > 0;
  }

  getSubscriberCount(eventName: InstallEventName): number {
    return this.handlers[eventName].size;
  }

  /**
   * Clear all subscriptions (for testing or shutdown)
   */
  clear(): void {
    for (const set of Object.values(this.handlers)) {
      set.clear();
    }
    this.subscriberSubscriptions.clear();
  }
}
