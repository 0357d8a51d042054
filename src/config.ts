import dotenv from 'dotenv';
import { isVendorName, type VendorName } from './vendors.js';
import { DEFAULT_BATCH_SIZE } from './utils.js';

export type AnalyticsConfig = {
  port: number;
  vendor: VendorName;
  collectorEndpoint: string;
  batchSize: number;
  debug: boolean;
}

const parsePositiveInt = (name: string, raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

const loadEnv = (): NodeJS.ProcessEnv => {
  dotenv.config();
  return process.env;
}

/**
 * Reads configuration from the environment
 * @param env - defaults to process.env after loading .env
 * @throws Error on an unknown vendor or a malformed number
 */
export const loadConfig = (env: NodeJS.ProcessEnv = loadEnv()): AnalyticsConfig => {
  const vendor = env.ANALYTICS_VENDOR ?? 'mixpanel';
  if (!isVendorName(vendor)) {
    throw new Error(`Unknown analytics vendor: ${vendor}`);
  }

  return {
    port: parsePositiveInt('PORT', env.PORT, 3000),
    vendor,
    collectorEndpoint: env.COLLECTOR_ENDPOINT ?? 'http://localhost:3000/events',
    batchSize: parsePositiveInt('ANALYTICS_BATCH_SIZE', env.ANALYTICS_BATCH_SIZE, DEFAULT_BATCH_SIZE),
    debug: env.ANALYTICS_DEBUG !== 'false',
  };
}
