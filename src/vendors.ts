import type { EventProperties } from './types.js';
import { isObject } from './utils.js';

export type VendorName = 'mixpanel' | 'amplitude' | 'posthog' | 'plausible' | 'gtag';

/**
 * Knows which global a vendor's snippet installs on the page and how to hand it an event.
 */
export interface VendorAdapter {
  readonly vendor: VendorName;
  /** Forwards the event, @returns false when the vendor's global is not present */
  forward(host: object, name: string, properties: EventProperties): boolean;
}

type VendorCall = (...args: unknown[]) => unknown;

const isCallable = (value: unknown): value is VendorCall => typeof value === 'function';

// Snippets installed as an object with a method, e.g. window.mixpanel.track(...)
const methodAdapter = (vendor: VendorName, globalName: string, method: string): VendorAdapter => ({
  vendor,
  forward: (host, name, properties) => {
    const client: unknown = Reflect.get(host, globalName);
    if (!isObject(client)) return false;

    const fn = client[method];
    if (!isCallable(fn)) return false;

    fn.call(client, name, properties);
    return true;
  },
});

// Snippets installed as a bare function, e.g. window.plausible(...)
const functionAdapter = (
  vendor: VendorName,
  globalName: string,
  toArgs: (name: string, properties: EventProperties) => unknown[],
): VendorAdapter => ({
  vendor,
  forward: (host, name, properties) => {
    const fn: unknown = Reflect.get(host, globalName);
    if (!isCallable(fn)) return false;

    fn(...toArgs(name, properties));
    return true;
  },
});

export const VENDOR_NAMES: readonly VendorName[] = ['mixpanel', 'amplitude', 'posthog', 'plausible', 'gtag'];

export const isVendorName = (value: string): value is VendorName => {
  return VENDOR_NAMES.some((vendor) => vendor === value);
}

export function getVendorAdapter(vendor: string): VendorAdapter {
  switch (vendor) {
    case 'mixpanel':
      return methodAdapter('mixpanel', 'mixpanel', 'track');
    case 'amplitude':
      return methodAdapter('amplitude', 'amplitude', 'track');
    case 'posthog':
      return methodAdapter('posthog', 'posthog', 'capture');
    case 'plausible':
      return functionAdapter('plausible', 'plausible', (name, properties) => [name, { props: properties }]);
    case 'gtag':
      return functionAdapter('gtag', 'gtag', (name, properties) => ['event', name, properties]);
    default:
      throw new Error(`Unknown analytics vendor: ${vendor}`);
  }
}
