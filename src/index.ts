export * from './types.js';
export { bucketValue, bucketProperties, SUCCESS_RATE_SCALE, DOLLAR_AMOUNT_SCALE, ROW_COUNT_SCALE, YEARS_SCALE } from './bucketing.js';
export { inspectProperties, assertPrivacySafe, PrivacyViolationError } from './privacy.js';
export { getVendorAdapter, isVendorName, VENDOR_NAMES, type VendorAdapter, type VendorName } from './vendors.js';
export { Tracker, createTracker, sanitizeEvent, type TrackerOptions } from './tracker.js';
export { BufferedTracker, createBufferedTracker, createFetchTransport, type BufferedTrackerOptions } from './buffered-tracker.js';
export { EventBuffer, InMemoryStorage, type KeyValueStorage } from './buffer.js';
export { loadConfig, type AnalyticsConfig } from './config.js';
export { createApp } from './app.js';
export { InMemoryStore } from './storage.js';
