import { assertPrivacySafe } from './privacy.js';
import type { AnalyticsEvent, Bucket, FunnelStep } from './types.js';
import { isObject, normalizeEventName, parseTimestamp, LATENESS_SEC, MAX_CLOCK_SKEW_SEC, MAX_RETENTION_SEC, RING_SIZE_SEC } from './utils.js';

/**
 * InMemoryStore holds collected events in a ring buffer with 1s buckets for efficient sliding window queries.
 * The ring spans the longest lookback window plus the allowed clock skew, so a future-stamped event never
 * shares a slot with a second still inside the window. Event ids are forgotten once their bucket expires.
 * @method validateEvent: checks shape, privacy, clock and duplicates, and returns the normalized event
 * @method updateRingBuffer: ingests a validated event
 * @method advanceSlidingWindow: advances the sliding window
 * @method getLookbackWindow: returns the lookback window
 * @method computeFunnel: session-level step conversion over a set of buckets
 */
export class InMemoryStore {
  private ringBuffer: Bucket[];
  private currentSec: number = 0; // second the sliding window has advanced to

  // ids of events still held in the ring; older duplicates fail the lateness check anyway
  private seenEventIds: Set<string> = new Set();

  constructor() {
    this.ringBuffer = Array.from({ length: RING_SIZE_SEC }, () => ({
      sec: 0,
      events: [],
    }));
  }

  /**
   * Validates an incoming event against shape, privacy, clock and duplicate checks
   * @param clockSec - timestamp in seconds to compare event timestamp against, defaults to current time
   * @returns the event with a trimmed name and cleaned properties, @throws Error otherwise
   */
  validateEvent = (event: unknown, clockSec?: number): AnalyticsEvent => {
    if (!isObject(event)) {
      throw new Error('Event must be an object');
    }

    const { event_id, session_id, name, ts, properties } = event;
    if (typeof event_id !== 'string' || !event_id
      || typeof session_id !== 'string' || !session_id
      || typeof ts !== 'string' || !ts
      || name === undefined) {
      throw new Error(`Event ${String(event_id)} is missing required fields`);
    }

    const eventName = normalizeEventName(name);
    if (properties !== undefined && !isObject(properties)) {
      throw new Error(`Event ${event_id} properties must be an object`);
    }
    const cleanProperties = assertPrivacySafe(properties ?? {});

    if (this.seenEventIds.has(event_id)) {
      throw new Error(`Event ${event_id} already seen`);
    }

    const eventTs = parseTimestamp(ts);
    const now = clockSec ?? Math.floor(Date.now() / 1000);
    if ((eventTs - now) > MAX_CLOCK_SKEW_SEC) {
      throw new Error(`Event ${event_id} timestamp is more than ${MAX_CLOCK_SKEW_SEC} seconds in the future.`);
    }
    if (eventTs < now - LATENESS_SEC) {
      throw new Error(`Event ${event_id} timestamp is outside the ${LATENESS_SEC} second lateness threshold.`);
    }

    this.seenEventIds.add(event_id);
    return { event_id, session_id, name: eventName, properties: cleanProperties, ts };
  }

  /**
   * Ingests an event and advances the sliding window if necessary
   * @param clockSec - timestamp in seconds to compare event timestamp against, defaults to current time
   * @throws Error if event timestamp is older than the retention window or further ahead than the allowed skew
   */
  updateRingBuffer = (event: AnalyticsEvent, clockSec?: number): void => {
    const eventSec = parseTimestamp(event.ts);
    const now = clockSec ?? Math.floor(Date.now() / 1000);

    // Initialize on first event from the clock, not the event, so an early event cannot push the window ahead
    if (this.currentSec === 0) {
      this.currentSec = now;
    }

    if (now > this.currentSec) {
      this.advanceSlidingWindow(now);
    }

    if (this.currentSec - eventSec >= MAX_RETENTION_SEC) {
      throw new Error(`Event timestamp is more than ${MAX_RETENTION_SEC} seconds away from current time`);
    }
    if (eventSec - this.currentSec > MAX_CLOCK_SKEW_SEC) {
      throw new Error(`Event timestamp is more than ${MAX_CLOCK_SKEW_SEC} seconds ahead of current time`);
    }

    const index = eventSec % RING_SIZE_SEC;
    const bucket = this.ringBuffer[index];
    if (!bucket) {
      throw new Error(`Bucket at index ${index} is undefined`);
    }

    // stale bucket from a previous lap
    if (bucket.sec !== eventSec) {
      this.forgetEventIds(bucket);
      bucket.sec = eventSec;
      bucket.events = [];
    }

    bucket.events.push(event);
  }

  /**
   * Advances the sliding window to the target second
   * @param targetSec - timestamp to advance to in seconds, defaults to current time
   * @throws Error if targetSec is less than the sliding window timestamp
   */
  advanceSlidingWindow = (targetSec?: number): void => {
    const advanceTo = targetSec ?? Math.floor(Date.now() / 1000);

    if (this.currentSec === 0) {
      this.currentSec = advanceTo;
      return;
    }

    if (advanceTo < this.currentSec) {
      throw new Error(`Cannot advance sliding window backwards: ${this.currentSec} -> ${advanceTo}. Current time is ${new Date(this.currentSec * 1000).toISOString()}`);
    }
    if (advanceTo === this.currentSec) {
      return;
    }

    // Clear the seconds that just fell out of retention, or the entire ring if jumping far forward
    // (eg. after long idle period). Buckets stamped ahead of the clock are kept.
    const oldestRetained = advanceTo - MAX_RETENTION_SEC + 1;
    const dropStart = Math.max(this.currentSec - MAX_RETENTION_SEC + 1, oldestRetained - RING_SIZE_SEC);

    for (let sec = dropStart; sec < oldestRetained; sec++) {
      const index = sec % RING_SIZE_SEC;
      const bucket = this.ringBuffer[index];
      if (bucket && bucket.sec < oldestRetained) {
        this.forgetEventIds(bucket);
        this.ringBuffer[index] = { sec: 0, events: [] };
      }
    }

    this.currentSec = advanceTo;
  }

  /**
   * Returns the lookback window for a given window size and query end timestamp
   * @param windowSec - size of the lookback window in seconds
   * @param queryEndSec - timestamp to query up to in seconds
   * @returns Array of buckets within specified window, oldest first
   */
  getLookbackWindow = (windowSec: number, queryEndSec: number): Bucket[] => {
    if (windowSec > MAX_RETENTION_SEC) {
      throw new Error(
        `Window parameter exceeds maximum lookback window of ${MAX_RETENTION_SEC}s`
      );
    }

    const windowStart = queryEndSec - windowSec + 1;
    const buckets: Bucket[] = [];
    for (let sec = windowStart; sec <= queryEndSec; sec++) {
      const bucket = this.ringBuffer[sec % RING_SIZE_SEC];
      if (bucket && bucket.sec === sec) {
        buckets.push(bucket);
      }
    }

    return buckets;
  }

  hasSeen = (eventId: string): boolean => this.seenEventIds.has(eventId);

  private forgetEventIds = (bucket: Bucket): void => {
    for (const event of bucket.events) {
      this.seenEventIds.delete(event.event_id);
    }
  }

  /**
   * Counts, per funnel step, the sessions that reached it having completed every earlier step in order
   * @param steps - ordered event names
   */
  computeFunnel = (steps: readonly string[], buckets: Bucket[]): FunnelStep[] => {
    const sessions = new Map<string, AnalyticsEvent[]>();
    for (const bucket of buckets) {
      for (const event of bucket.events) {
        const sessionEvents = sessions.get(event.session_id) ?? [];
        sessionEvents.push(event);
        sessions.set(event.session_id, sessionEvents);
      }
    }

    const reached: number[] = steps.map(() => 0);
    for (const events of sessions.values()) {
      // stable sort keeps arrival order for events in the same instant
      const ordered = [...events].sort((a, b) => Date.parse(a.ts) - Date.parse(b.ts));
      let next = 0;
      for (const event of ordered) {
        if (next < steps.length && event.name === steps[next]) {
          reached[next] = (reached[next] ?? 0) + 1;
          next++;
        }
      }
    }

    const entered = reached[0] ?? 0;
    return steps.map((name, i) => {
      const count = reached[i] ?? 0;
      const previous = i === 0 ? entered : (reached[i - 1] ?? 0);
      return {
        name,
        sessions: count,
        conversion_from_previous: previous ? count / previous : 0,
        conversion_from_start: entered ? count / entered : 0,
      };
    });
  }
}
