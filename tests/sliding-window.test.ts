import { InMemoryStore } from '../src/storage.js';
import type { AnalyticsEvent } from '../src/types.js';
import { MAX_CLOCK_SKEW_SEC, MAX_RETENTION_SEC } from '../src/utils.js';

const eventAt = (eventId: string, sec: number, name = 'Budget Created'): AnalyticsEvent => ({
  event_id: eventId,
  session_id: 's-1',
  name,
  properties: {},
  ts: new Date(sec * 1000).toISOString(),
});

describe('Sliding Window Logic', () => {
  let store: InMemoryStore;

  beforeEach(() => {
    store = new InMemoryStore();
  });

  describe('updateRingBuffer', () => {
    it('should add event to appropriate bucket', () => {
      const now = Math.floor(Date.now() / 1000);
      const event = eventAt('uuid-1', now);

      store.updateRingBuffer(event, now);

      const lookbackWindow = store.getLookbackWindow(1, now);
      expect(lookbackWindow).toHaveLength(1);
      expect(lookbackWindow[0].events).toContainEqual(event);
    });

    it('should handle multiple events in the same second', () => {
      const now = Math.floor(Date.now() / 1000);
      const event1 = eventAt('uuid-1', now);
      const event2 = eventAt('uuid-2', now, 'CSV Uploaded');

      store.updateRingBuffer(event1, now);
      store.updateRingBuffer(event2, now);

      const lookbackWindow = store.getLookbackWindow(1, now);
      expect(lookbackWindow[0].events).toEqual([event1, event2]);
    });

    it('should handle out-of-order inserts', () => {
      const now = Math.floor(Date.now() / 1000);
      const event1 = eventAt('uuid-1', now - 1);
      const event2 = eventAt('uuid-2', now - 2); // out-of-order, event2 is older than event1
      const event3 = eventAt('uuid-3', now);

      store.updateRingBuffer(event1, now);
      store.updateRingBuffer(event2, now);
      store.updateRingBuffer(event3, now);

      const lookbackWindow = store.getLookbackWindow(3, now);
      expect(lookbackWindow).toHaveLength(3);
      expect(lookbackWindow[0].events).toEqual([event2]);
      expect(lookbackWindow[1].events).toEqual([event1]);
      expect(lookbackWindow[2].events).toEqual([event3]);
    });

    it(`should throw error if event timestamp is ${MAX_RETENTION_SEC} seconds or more away`, () => {
      const now = Math.floor(Date.now() / 1000);
      const event = eventAt('uuid-1', now - MAX_RETENTION_SEC);

      expect(() => {
        store.updateRingBuffer(event, now);
      }).toThrow(`Event timestamp is more than ${MAX_RETENTION_SEC} seconds away from current time`);
    });

    it('should not let an event stamped ahead of the clock move the window forward', () => {
      const now = Math.floor(Date.now() / 1000);
      store.updateRingBuffer(eventAt('uuid-1', now + 60), now);

      expect(() => store.advanceSlidingWindow(now + 1)).not.toThrow();
      expect(store.getLookbackWindow(1, now + 60)[0].events).toHaveLength(1);
    });

    it('should keep the oldest second of a full window when an event arrives stamped ahead of the clock', () => {
      const t0 = Math.floor(Date.now() / 1000);
      const oldest = eventAt('uuid-1', t0);
      const early = eventAt('uuid-2', t0 + MAX_RETENTION_SEC);
      const clock = t0 + MAX_RETENTION_SEC - MAX_CLOCK_SKEW_SEC;

      store.updateRingBuffer(oldest, t0);
      store.updateRingBuffer(early, clock);

      expect(store.getLookbackWindow(MAX_RETENTION_SEC, clock).flatMap(b => b.events)).toEqual([oldest]);
      expect(store.getLookbackWindow(1, t0 + MAX_RETENTION_SEC)[0].events).toEqual([early]);
    });

    it(`should throw error if event timestamp is more than ${MAX_CLOCK_SKEW_SEC} seconds ahead`, () => {
      const now = Math.floor(Date.now() / 1000);

      expect(() => {
        store.updateRingBuffer(eventAt('uuid-1', now + MAX_CLOCK_SKEW_SEC + 1), now);
      }).toThrow(`Event timestamp is more than ${MAX_CLOCK_SKEW_SEC} seconds ahead of current time`);
    });
  });

  describe('advanceSlidingWindow', () => {
    it('should keep events retrievable within retention window', () => {
      const startTime = Math.floor(Date.now() / 1000);
      store.updateRingBuffer(eventAt('uuid-1', startTime), startTime);

      const futureTime = startTime + 10;
      store.advanceSlidingWindow(futureTime);

      const lookbackWindow = store.getLookbackWindow(11, futureTime);
      expect(lookbackWindow.flatMap(b => b.events)).toHaveLength(1);
    });

    it('should clear stale buckets when advancing', () => {
      const startTime = Math.floor(Date.now() / 1000);
      store.updateRingBuffer(eventAt('uuid-1', startTime), startTime);

      // Advance beyond retention window
      const futureTime = startTime + MAX_RETENTION_SEC + 100;
      store.advanceSlidingWindow(futureTime);

      expect(store.getLookbackWindow(100, futureTime)).toHaveLength(0);
      expect(store.getLookbackWindow(MAX_RETENTION_SEC, futureTime)).toHaveLength(0);
    });

    it('should throw error if target time is less than current time', () => {
      const now = Math.floor(Date.now() / 1000);
      store.updateRingBuffer(eventAt('uuid-1', now), now);

      expect(() => {
        store.advanceSlidingWindow(now - 10);
      }).toThrow('Cannot advance sliding window backwards');
    });

    it('should do nothing if target time equals current time', () => {
      const now = Math.floor(Date.now() / 1000);
      store.updateRingBuffer(eventAt('uuid-1', now), now);

      store.advanceSlidingWindow(now);

      expect(store.getLookbackWindow(1, now)[0].events).toHaveLength(1);
    });
  });

  describe('getLookbackWindow', () => {
    it('should return empty window when no events exist', () => {
      const now = Math.floor(Date.now() / 1000);
      expect(store.getLookbackWindow(300, now)).toHaveLength(0);
    });

    it('should only return events within specified window', () => {
      const now = Math.floor(Date.now() / 1000);
      const event1 = eventAt('uuid-1', now - 5);
      const event2 = eventAt('uuid-2', now - 10);

      store.updateRingBuffer(event1, now);
      store.updateRingBuffer(event2, now);

      const allEvents = store.getLookbackWindow(6, now).flatMap(b => b.events);
      expect(allEvents).toEqual([event1]);
    });

    it(`should throw error when window request exceeds maximum lookback window size of ${MAX_RETENTION_SEC} seconds`, () => {
      const now = Math.floor(Date.now() / 1000);

      expect(() => {
        store.getLookbackWindow(MAX_RETENTION_SEC + 1, now);
      }).toThrow(`Window parameter exceeds maximum lookback window of ${MAX_RETENTION_SEC}s`);
    });

    it('should handle ring buffer wrap-around correctly', () => {
      const startTime = Math.floor(Date.now() / 1000);
      const event1 = eventAt('uuid-1', startTime);
      store.updateRingBuffer(event1, startTime);

      // Advance past ring buffer size to cause wrap-around
      const wrapTime = startTime + MAX_RETENTION_SEC + 10;
      const event2 = eventAt('uuid-2', wrapTime);
      store.updateRingBuffer(event2, wrapTime);

      const allEvents = store.getLookbackWindow(10, wrapTime).flatMap(b => b.events);
      expect(allEvents).toEqual([event2]);
    });
  });
});
