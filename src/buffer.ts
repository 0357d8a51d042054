import type { AnalyticsEvent, Logger } from './types.js';
import { BUFFER_STORAGE_KEY, isAnalyticsEvent } from './utils.js';

/** The part of the browser's localStorage the buffer relies on */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export class InMemoryStorage implements KeyValueStorage {
  private items: Map<string, string> = new Map();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }

  removeItem(key: string): void {
    this.items.delete(key);
  }
}

/**
 * EventBuffer keeps pending events as a JSON array under a single storage key.
 * Oldest events come first.
 */
export class EventBuffer {
  constructor(
    private storage: KeyValueStorage,
    private logger: Logger = console,
    private key: string = BUFFER_STORAGE_KEY,
  ) {}

  /**
   * @returns buffered events, or an empty list when nothing is stored or storage is unreadable
   */
  read = (): AnalyticsEvent[] => {
    let raw: string | null;
    try {
      raw = this.storage.getItem(this.key);
    } catch (error) {
      this.logger.warn(`[analytics] could not read buffer: ${(error as Error).message}`);
      return [];
    }
    if (raw === null) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`[analytics] discarding unreadable buffer: ${(error as Error).message}`);
      this.clear();
      return [];
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn('[analytics] discarding unreadable buffer: not an array');
      this.clear();
      return [];
    }
    return parsed.filter(isAnalyticsEvent);
  }

  /** @returns the number of buffered events after appending, or null when storage refused the write */
  append = (event: AnalyticsEvent): number | null => {
    const events = this.read();
    events.push(event);
    return this.write(events) ? events.length : null;
  }

  // Removes the oldest `count` events
  drop = (count: number): void => {
    const remaining = this.read().slice(count);
    if (!remaining.length) {
      this.clear();
      return;
    }
    this.write(remaining);
  }

  clear = (): void => {
    try {
      this.storage.removeItem(this.key);
    } catch (error) {
      this.logger.warn(`[analytics] could not clear buffer: ${(error as Error).message}`);
    }
  }

  // full or blocked storage (QuotaExceededError, SecurityError) throws on write
  private write = (events: AnalyticsEvent[]): boolean => {
    try {
      this.storage.setItem(this.key, JSON.stringify(events));
      return true;
    } catch (error) {
      this.logger.warn(`[analytics] could not write buffer: ${(error as Error).message}`);
      return false;
    }
  }
}
