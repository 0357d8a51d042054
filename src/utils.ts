import type { AnalyticsEvent } from './types.js'

export const isObject = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
};
export const parseTimestamp = (ts: string): number => {
  const timestamp = Math.floor(new Date(ts).getTime() / 1000);
  if (isNaN(timestamp)) {
    throw new Error('Invalid timestamp');
  }
  return timestamp;
}

export const normalizeToArray = (events: unknown): unknown[] | null => {
  if (isObject(events)) {
    return [events];
  }

  if (Array.isArray(events)) {
    return events;
  }

  return null;
};

/**
 * Trims and checks an event name
 * @throws Error if the name is empty or longer than MAX_EVENT_NAME_LENGTH
 */
export const normalizeEventName = (name: unknown): string => {
  if (typeof name !== 'string' || !name.trim()) {
    throw new Error('Event name must be a non-empty string');
  }
  const trimmed = name.trim();
  if (trimmed.length > MAX_EVENT_NAME_LENGTH) {
    throw new Error(`Event name exceeds ${MAX_EVENT_NAME_LENGTH} characters`);
  }
  return trimmed;
}

export const isAnalyticsEvent = (value: unknown): value is AnalyticsEvent => {
  return isObject(value)
    && typeof value.event_id === 'string'
    && typeof value.session_id === 'string'
    && typeof value.name === 'string'
    && typeof value.ts === 'string'
    && isObject(value.properties);
}

// constants
export const MAX_EVENT_NAME_LENGTH = 64;
export const MAX_STRING_VALUE_LENGTH = 40; // longer strings are treated as free text
export const DEFAULT_BATCH_SIZE = 10;
export const BUFFER_STORAGE_KEY = 'finplan.analytics.buffer';
export const LATENESS_SEC = 3600; // buffered clients may flush up to an hour late
export const MAX_CLOCK_SKEW_SEC = 120;
export const MAX_RETENTION_SEC = 3900; // longest lookback window: lateness plus slack
export const RING_SIZE_SEC = MAX_RETENTION_SEC + MAX_CLOCK_SKEW_SEC; // room for events stamped ahead of the clock
