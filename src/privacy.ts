import type { EventProperties, Inspection, PrivacyViolation, ViolationReason } from './types.js';
import { isObject, MAX_STRING_VALUE_LENGTH } from './utils.js';

// Words that mark a property key as carrying money, identity or free text
const SENSITIVE_KEY_WORDS = new Set([
  'amount', 'balance', 'salary', 'income', 'price', 'cost', 'payment', 'paid', 'dollars', 'usd',
  'email', 'phone', 'ssn', 'name', 'address', 'dob', 'birthdate',
  'description', 'memo', 'payee', 'merchant', 'note',
  'iban', 'card', 'routing', 'id', 'uuid', 'ip',
]);

const EMAIL_PATTERN = /[^\s@]+@[^\s@]+\.[^\s@]+/;
const CURRENCY_PATTERNS = [
  /^[-+]?\s*[$€£¥]/, // $1,200
  /\d[\d,]*\.\d{2}$/, // 1200.50
  /^\d{1,3}(,\d{3})+$/, // 1,200
];
const IDENTIFIER_PATTERN = /\d{6,}/; // account, card or phone numbers

export class PrivacyViolationError extends Error {
  constructor(readonly violations: PrivacyViolation[]) {
    super(`Event properties violate privacy rules: ${violations.map((v) => `${v.key} (${v.reason})`).join(', ')}`);
    this.name = 'PrivacyViolationError';
  }
}

export const splitKeyWords = (key: string): string[] => {
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[\s_\-.]+/)
    .filter(Boolean)
    .map((word) => word.toLowerCase());
}

const inspectValue = (value: unknown): ViolationReason | null => {
  if (typeof value === 'boolean') return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? null : 'unsupported-type';
  }
  if (typeof value !== 'string') return 'unsupported-type';

  const text = value.trim();
  if (EMAIL_PATTERN.test(text)) return 'email-value';
  if (CURRENCY_PATTERNS.some((pattern) => pattern.test(text))) return 'currency-value';
  if (IDENTIFIER_PATTERN.test(text)) return 'identifier-value';
  if (text.length > MAX_STRING_VALUE_LENGTH) return 'free-text';
  return null;
}

/**
 * Splits properties into the ones safe to send and the ones that are not.
 * Key checks run before value checks, so a key is reported with at most one reason.
 */
export const inspectProperties = (properties: unknown): Inspection => {
  const clean: EventProperties = {};
  const violations: PrivacyViolation[] = [];
  if (!isObject(properties)) {
    return { clean, violations };
  }

  for (const [key, value] of Object.entries(properties)) {
    if (splitKeyWords(key).some((word) => SENSITIVE_KEY_WORDS.has(word))) {
      violations.push({ key, reason: 'sensitive-key' });
      continue;
    }

    const reason = inspectValue(value);
    if (reason) {
      violations.push({ key, reason });
      continue;
    }

    if (typeof value === 'string') {
      clean[key] = value.trim();
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      clean[key] = value;
    }
  }
  return { clean, violations };
}

/**
 * @returns the cleaned properties, @throws PrivacyViolationError if any property is unsafe
 */
export const assertPrivacySafe = (properties: unknown): EventProperties => {
  const { clean, violations } = inspectProperties(properties);
  if (violations.length) {
    throw new PrivacyViolationError(violations);
  }
  return clean;
}
