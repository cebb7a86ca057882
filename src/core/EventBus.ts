/**
 * Typed Event Bus for application-wide event handling
 * Implements a pub/sub pattern with full TypeScript support
 */
import { EventEmitter } from 'events';
import { logger } from './Logger.js';

/**
 * Event type constants
 */
export const EventTypes = {
  // Race events
  RACE_STARTED: 'race:started',
  RACE_COMPLETED: 'race:completed',

  // Page cache events
  PAGE_CACHED: 'page:cached',
  PAGE_SKIPPED: 'page:skipped',

  // System events
  SYSTEM_STARTED: 'system:started',
  SYSTEM_SHUTDOWN: 'system:shutdown',
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

/**
 * Event payload type mapping
 */
export interface EventPayloadMap {
  [EventTypes.RACE_STARTED]: { start: string; finish: string; depth: number };
  [EventTypes.RACE_COMPLETED]: {
    start: string;
    finish: string;
    path: string[];
    pagesVisited: number;
    durationMs: number;
  };
  [EventTypes.PAGE_CACHED]: { title: string; linkCount: number; backlinkCount: number };
  [EventTypes.PAGE_SKIPPED]: { title: string; reason: string };
  [EventTypes.SYSTEM_STARTED]: { version: string };
  [EventTypes.SYSTEM_SHUTDOWN]: { reason: string };
}

type EventHandler<T extends EventType> = (data: EventPayloadMap[T]) => void | Promise<void>;

const validEventTypes: readonly string[] = Object.values(EventTypes);

/**
 * Typed Event Bus implementation
 */
export class EventBus {
  private emitter: EventEmitter;
  private subscriberCounts: Map<EventType, number>;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(50);
    this.subscriberCounts = new Map();
  }

  /**
   * Subscribe to an event with type-safe handler
   */
  subscribe<T extends EventType>(eventType: T, handler: EventHandler<T>): () => void {
    if (!validEventTypes.includes(eventType)) {
      logger.warn({ eventType }, 'Subscribing to unknown event type');
    }

    const listener = (data: EventPayloadMap[T]): void => {
      Promise.resolve(handler(data)).catch((error: unknown) => {
        logger.error({ error, eventType }, 'Event handler failed');
      });
    };
    this.emitter.on(eventType, listener);

    const currentCount = this.subscriberCounts.get(eventType) ?? 0;
    this.subscriberCounts.set(eventType, currentCount + 1);
    logger.trace({ eventType, subscribers: currentCount + 1 }, 'Subscribed to event');

    return (): void => {
      this.emitter.off(eventType, listener);
      const count = this.subscriberCounts.get(eventType) ?? 1;
      this.subscriberCounts.set(eventType, count - 1);
    };
  }

  /**
   * Subscribe to an event once
   */
  once<T extends EventType>(eventType: T, handler: EventHandler<T>): void {
    const currentCount = this.subscriberCounts.get(eventType) ?? 0;
    this.subscriberCounts.set(eventType, currentCount + 1);

    const wrappedHandler = (data: EventPayloadMap[T]): void => {
      const count = this.subscriberCounts.get(eventType) ?? 1;
      this.subscriberCounts.set(eventType, count - 1);
      Promise.resolve(handler(data)).catch((error: unknown) => {
        logger.error({ error, eventType }, 'Event handler failed');
      });
    };

    this.emitter.once(eventType, wrappedHandler);
  }

  /**
   * Publish an event with type-safe payload
   */
  publish<T extends EventType>(eventType: T, data: EventPayloadMap[T]): void {
    const subscriberCount = this.subscriberCounts.get(eventType) ?? 0;
    if (subscriberCount > 0) {
      logger.trace({ eventType, subscribers: subscriberCount }, 'Publishing event');
      this.emitter.emit(eventType, data);
    }
  }

  /**
   * Get the number of subscribers for an event
   */
  getSubscriberCount(eventType: EventType): number {
    return this.subscriberCounts.get(eventType) ?? 0;
  }

  /**
   * Remove all listeners for an event or all events
   */
  removeAllListeners(eventType?: EventType): void {
    if (eventType) {
      this.emitter.removeAllListeners(eventType);
      this.subscriberCounts.set(eventType, 0);
    } else {
      this.emitter.removeAllListeners();
      this.subscriberCounts.clear();
    }
  }
}

// Export singleton instance
export const eventBus = new EventBus();
