export type PropertyValue = string | number | boolean;
export type EventProperties = Record<string, PropertyValue>;

// Wire shape shared by the buffered tracker and the collector
export type AnalyticsEvent = {
  event_id: string;
  session_id: string;
  name: string;
  properties: EventProperties;
  ts: string; // ISO datetime string
}

export type Logger = Pick<Console, 'debug' | 'warn'>;

export type BucketThreshold = {
  min: number; // inclusive lower bound
  label: string;
}
export type BucketScale = readonly BucketThreshold[];

export type ViolationReason =
  | 'sensitive-key'
  | 'unsupported-type'
  | 'currency-value'
  | 'email-value'
  | 'identifier-value'
  | 'free-text';

export type PrivacyViolation = {
  key: string;
  reason: ViolationReason;
}

export type Inspection = {
  clean: EventProperties;
  violations: PrivacyViolation[];
}

// Collector keeps per-second buckets for expiry math
export type Bucket = {
  sec: number; // epoch second this bucket represents
  events: AnalyticsEvent[];
}

export type FunnelStep = {
  name: string;
  sessions: number;
  conversion_from_previous: number;
  conversion_from_start: number;
}

export type Transport = (batch: AnalyticsEvent[]) => Promise<void>;

export const SUITE_EVENTS = [
  'Signup Completed',
  'CSV Uploaded',
  'Budget Created',
  'Budget Updated',
  'Goal Added',
  'Scenario Simulated',
  'Report Exported',
  'Account Linked',
] as const;
export type SuiteEvent = typeof SUITE_EVENTS[number];

export const ONBOARDING_FUNNEL: readonly SuiteEvent[] = [
  'Signup Completed',
  'CSV Uploaded',
  'Budget Created',
  'Scenario Simulated',
];
