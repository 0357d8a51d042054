import type { BucketScale, EventProperties } from './types.js';

export const SUCCESS_RATE_SCALE: BucketScale = [
  { min: 0, label: '0-49%' },
  { min: 50, label: '50-69%' },
  { min: 70, label: '70-89%' },
  { min: 90, label: '90-100%' },
];

export const DOLLAR_AMOUNT_SCALE: BucketScale = [
  { min: 0, label: 'under-1k' },
  { min: 1_000, label: '1k-10k' },
  { min: 10_000, label: '10k-50k' },
  { min: 50_000, label: '50k-100k' },
  { min: 100_000, label: '100k-500k' },
  { min: 500_000, label: '500k+' },
];

export const ROW_COUNT_SCALE: BucketScale = [
  { min: 0, label: '0' },
  { min: 1, label: '1-99' },
  { min: 100, label: '100-999' },
  { min: 1_000, label: '1000-9999' },
  { min: 10_000, label: '10000+' },
];

export const YEARS_SCALE: BucketScale = [
  { min: 0, label: '0-4' },
  { min: 5, label: '5-9' },
  { min: 10, label: '10-19' },
  { min: 20, label: '20+' },
];

const assertAscending = (scale: BucketScale): void => {
  for (let i = 1; i < scale.length; i++) {
    const previous = scale[i - 1];
    const current = scale[i];
    if (previous && current && current.min <= previous.min) {
      throw new Error('Bucket scale thresholds must be strictly ascending');
    }
  }
}

/**
 * Maps a figure to the label of the range it falls into, so the exact value never leaves the page.
 * @returns the label of the last threshold not above value, or null when value is not finite or below the scale
 */
export const bucketValue = (value: number, scale: BucketScale): string | null => {
  assertAscending(scale);
  if (!Number.isFinite(value)) {
    return null;
  }

  for (let i = scale.length - 1; i >= 0; i--) {
    const threshold = scale[i];
    if (threshold && value >= threshold.min) {
      return threshold.label;
    }
  }
  return null;
}

/**
 * Buckets several named figures at once. Figures without a scale, or outside their scale, are omitted.
 */
export const bucketProperties = (
  values: Record<string, number>,
  scales: Record<string, BucketScale>,
): EventProperties => {
  const properties: EventProperties = {};
  for (const [key, value] of Object.entries(values)) {
    const scale = scales[key];
    if (!scale) continue;

    const label = bucketValue(value, scale);
    if (label !== null) {
      properties[key] = label;
    }
  }
  return properties;
}
