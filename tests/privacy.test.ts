import { assertPrivacySafe, inspectProperties, PrivacyViolationError, splitKeyWords } from '../src/privacy.js';

describe('Privacy Guard', () => {
  describe('splitKeyWords', () => {
    it('should split camelCase, snake_case and kebab-case keys', () => {
      expect(splitKeyWords('accountBalance')).toEqual(['account', 'balance']);
      expect(splitKeyWords('monthly_income')).toEqual(['monthly', 'income']);
      expect(splitKeyWords('payee-name')).toEqual(['payee', 'name']);
    });
  });

  describe('inspectProperties', () => {
    it('should pass through non-sensitive primitives', () => {
      const result = inspectProperties({ rows: 1234, has_header: true, file_type: 'csv', success_rate: '70-89%' });

      expect(result).toEqual({
        clean: { rows: 1234, has_header: true, file_type: 'csv', success_rate: '70-89%' },
        violations: [],
      });
    });

    it('should flag keys that name money, identity or free text', () => {
      const result = inspectProperties({
        balance: 10,
        userEmail: 'x',
        transaction_description: 'x',
        accountId: 'x',
        rows: 3,
      });

      expect(result.clean).toEqual({ rows: 3 });
      expect(result.violations).toEqual([
        { key: 'balance', reason: 'sensitive-key' },
        { key: 'userEmail', reason: 'sensitive-key' },
        { key: 'transaction_description', reason: 'sensitive-key' },
        { key: 'accountId', reason: 'sensitive-key' },
      ]);
    });

    it('should not flag words that merely contain a sensitive word', () => {
      expect(inspectProperties({ provider: 'ofx', valid: true }).violations).toEqual([]);
    });

    it('should flag values that look like money', () => {
      const result = inspectProperties({ a: '$1,200', b: '1200.50', c: '12,000', d: '€30' });

      expect(result.violations).toEqual([
        { key: 'a', reason: 'currency-value' },
        { key: 'b', reason: 'currency-value' },
        { key: 'c', reason: 'currency-value' },
        { key: 'd', reason: 'currency-value' },
      ]);
    });

    it('should flag emails, long digit runs and free text', () => {
      const result = inspectProperties({
        contact: 'someone@example.com',
        ref: 'acct 12345678',
        comment: 'paid the landlord early this month because of travel',
      });

      expect(result.violations).toEqual([
        { key: 'contact', reason: 'email-value' },
        { key: 'ref', reason: 'identifier-value' },
        { key: 'comment', reason: 'free-text' },
      ]);
    });

    it('should flag values that are not primitives', () => {
      const result = inspectProperties({ tags: ['a'], nested: { x: 1 }, missing: null, ratio: NaN });

      expect(result.violations.map((v) => v.reason)).toEqual([
        'unsupported-type',
        'unsupported-type',
        'unsupported-type',
        'unsupported-type',
      ]);
    });

    it('should trim string values', () => {
      expect(inspectProperties({ plan: '  pro ' }).clean).toEqual({ plan: 'pro' });
    });
  });

  describe('assertPrivacySafe', () => {
    it('should return the cleaned properties when safe', () => {
      expect(assertPrivacySafe({ goals: 2 })).toEqual({ goals: 2 });
    });

    it('should throw a PrivacyViolationError listing every violation', () => {
      let thrown: unknown;
      try {
        assertPrivacySafe({ salary: 90000, memo: 'rent' });
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(PrivacyViolationError);
      expect(thrown).toMatchObject({
        violations: [
          { key: 'salary', reason: 'sensitive-key' },
          { key: 'memo', reason: 'sensitive-key' },
        ],
        message: 'Event properties violate privacy rules: salary (sensitive-key), memo (sensitive-key)',
      });
    });
  });
});
