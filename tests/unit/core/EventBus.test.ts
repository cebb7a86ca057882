/**
 * EventBus unit tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus, EventTypes } from '../../../src/core/EventBus.js';

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  describe('subscribe', () => {
    it('should return an unsubscribe function', () => {
      const unsubscribe = eventBus.subscribe(EventTypes.RACE_STARTED, vi.fn());

      expect(eventBus.getSubscriberCount(EventTypes.RACE_STARTED)).toBe(1);

      unsubscribe();

      expect(eventBus.getSubscriberCount(EventTypes.RACE_STARTED)).toBe(0);
    });

    it('should count every subscriber', () => {
      eventBus.subscribe(EventTypes.PAGE_CACHED, vi.fn());
      eventBus.subscribe(EventTypes.PAGE_CACHED, vi.fn());

      expect(eventBus.getSubscriberCount(EventTypes.PAGE_CACHED)).toBe(2);
    });
  });

  describe('publish', () => {
    it('should call handlers with the payload', () => {
      const handler = vi.fn();
      eventBus.subscribe(EventTypes.RACE_STARTED, handler);

      const payload = { start: 'Дружба', finish: 'Рим', depth: 2 };
      eventBus.publish(EventTypes.RACE_STARTED, payload);

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(payload);
    });

    it('should not call handlers of other events', () => {
      const handler = vi.fn();
      eventBus.subscribe(EventTypes.RACE_STARTED, handler);

      eventBus.publish(EventTypes.SYSTEM_SHUTDOWN, { reason: 'test' });

      expect(handler).not.toHaveBeenCalled();
    });

    it('should stop calling a handler after unsubscribe', () => {
      const handler = vi.fn();
      const unsubscribe = eventBus.subscribe(EventTypes.SYSTEM_SHUTDOWN, handler);

      unsubscribe();
      eventBus.publish(EventTypes.SYSTEM_SHUTDOWN, { reason: 'test' });

      expect(handler).not.toHaveBeenCalled();
    });

    it('should keep delivering when an async handler rejects', async () => {
      const failing = vi.fn().mockRejectedValue(new Error('handler failed'));
      const healthy = vi.fn();
      eventBus.subscribe(EventTypes.PAGE_SKIPPED, failing);
      eventBus.subscribe(EventTypes.PAGE_SKIPPED, healthy);

      expect(() =>
        eventBus.publish(EventTypes.PAGE_SKIPPED, { title: 'Файл:Map.png', reason: 'invalid' })
      ).not.toThrow();
      await Promise.resolve();

      expect(failing).toHaveBeenCalledTimes(1);
      expect(healthy).toHaveBeenCalledTimes(1);
    });
  });

  describe('once', () => {
    it('should call the handler a single time', () => {
      const handler = vi.fn();
      eventBus.once(EventTypes.SYSTEM_STARTED, handler);

      expect(eventBus.getSubscriberCount(EventTypes.SYSTEM_STARTED)).toBe(1);

      eventBus.publish(EventTypes.SYSTEM_STARTED, { version: '1.0.0' });
      eventBus.publish(EventTypes.SYSTEM_STARTED, { version: '1.0.0' });

      expect(handler).toHaveBeenCalledTimes(1);
      expect(eventBus.getSubscriberCount(EventTypes.SYSTEM_STARTED)).toBe(0);
    });
  });

  describe('removeAllListeners', () => {
    it('should clear one event type', () => {
      eventBus.subscribe(EventTypes.RACE_STARTED, vi.fn());
      eventBus.subscribe(EventTypes.RACE_COMPLETED, vi.fn());

      eventBus.removeAllListeners(EventTypes.RACE_STARTED);

      expect(eventBus.getSubscriberCount(EventTypes.RACE_STARTED)).toBe(0);
      expect(eventBus.getSubscriberCount(EventTypes.RACE_COMPLETED)).toBe(1);
    });

    it('should clear every event type', () => {
      eventBus.subscribe(EventTypes.RACE_STARTED, vi.fn());
      eventBus.subscribe(EventTypes.RACE_COMPLETED, vi.fn());

      eventBus.removeAllListeners();

      expect(eventBus.getSubscriberCount(EventTypes.RACE_STARTED)).toBe(0);
      expect(eventBus.getSubscriberCount(EventTypes.RACE_COMPLETED)).toBe(0);
    });
  });
});
