import type { AnalyticsConfig } from './config.js';
import { inspectProperties } from './privacy.js';
import type { EventProperties, Logger } from './types.js';
import { normalizeEventName } from './utils.js';
import { getVendorAdapter, type VendorAdapter } from './vendors.js';

export type TrackerOptions = {
  vendor: VendorAdapter;
  host?: object; // where the vendor snippet installs its global, defaults to globalThis
  logger?: Logger;
  debug?: boolean;
}

/**
 * Validates the name and strips unsafe properties before an event goes anywhere.
 * @returns null when the event has to be dropped
 */
export const sanitizeEvent = (
  name: string,
  properties: EventProperties,
  logger: Logger,
): { name: string, properties: EventProperties } | null => {
  let eventName: string;
  try {
    eventName = normalizeEventName(name);
  } catch (error) {
    logger.warn(`[analytics] dropped event: ${(error as Error).message}`);
    return null;
  }

  const { clean, violations } = inspectProperties(properties);
  for (const violation of violations) {
    logger.warn(`[analytics] stripped property "${violation.key}" from "${eventName}" (${violation.reason})`);
  }
  return { name: eventName, properties: clean };
}

/**
 * Tracker forwards events to whichever vendor snippet is on the page, or to the debug log when none is.
 * Tracking is fire-and-forget: track never throws and reports nothing back.
 */
export class Tracker {
  private readonly vendor: VendorAdapter;
  private readonly host: object;
  private readonly logger: Logger;
  private readonly debug: boolean;

  constructor(options: TrackerOptions) {
    this.vendor = options.vendor;
    this.host = options.host ?? globalThis;
    this.logger = options.logger ?? console;
    this.debug = options.debug ?? true;
  }

  track = (name: string, properties: EventProperties = {}): void => {
    const event = sanitizeEvent(name, properties, this.logger);
    if (!event) return;

    try {
      if (this.vendor.forward(this.host, event.name, event.properties)) {
        return;
      }
    } catch (error) {
      // blocked or broken snippets lose the event
      this.logger.warn(`[analytics] ${this.vendor.vendor} failed to track "${event.name}": ${(error as Error).message}`);
      return;
    }

    if (this.debug) {
      this.logger.debug(`[analytics] ${event.name} ${JSON.stringify(event.properties)}`);
    }
  }
}

export const createTracker = (
  config: Pick<AnalyticsConfig, 'vendor' | 'debug'>,
  options: Omit<TrackerOptions, 'vendor' | 'debug'> = {},
): Tracker => {
  return new Tracker({
    ...options,
    vendor: getVendorAdapter(config.vendor),
    debug: config.debug,
  });
}
