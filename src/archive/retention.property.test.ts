/**
 * Property-based tests for the retention boundaries.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { MS_PER_DAY } from '../logging/clock.js';
import { createRetentionPolicy } from './retention.js';
import { ageMsArb, dayThresholdArb } from '../test/arbitraries.js';

const NOW = new Date('2025-01-15T12:00:00Z');

describe('RetentionPolicy (property)', () => {
  it('should select a file exactly when its age exceeds the threshold', () => {
    fc.assert(
      fc.property(dayThresholdArb, ageMsArb, (days, ageMs) => {
        const policy = createRetentionPolicy({ compressAfterDays: days, deleteAfterDays: days });
        const modifiedAt = new Date(NOW.getTime() - ageMs);
        const expected = ageMs > days * MS_PER_DAY;

        expect(policy.isCompressible(modifiedAt, NOW)).toBe(expected);
        expect(policy.isExpired(modifiedAt, NOW)).toBe(expected);
      }),
      { numRuns: 300 },
    );
  });

  it('should be monotonic: an older file is selected whenever a newer one is', () => {
    fc.assert(
      fc.property(dayThresholdArb, ageMsArb, ageMsArb, (days, a, b) => {
        const policy = createRetentionPolicy({ deleteAfterDays: days });
        const [younger, older] = a <= b ? [a, b] : [b, a];
        if (policy.isExpired(new Date(NOW.getTime() - younger), NOW)) {
          expect(policy.isExpired(new Date(NOW.getTime() - older), NOW)).toBe(true);
        }
      }),
      { numRuns: 300 },
    );
  });

  it('should always keep a file at exactly the threshold and drop it 1 ms later', () => {
    fc.assert(
      fc.property(dayThresholdArb, (days) => {
        const policy = createRetentionPolicy({ deleteAfterDays: days });
        const boundary = new Date(NOW.getTime() - days * MS_PER_DAY);
        expect(policy.isExpired(boundary, NOW)).toBe(false);
        expect(policy.isExpired(new Date(boundary.getTime() - 1), NOW)).toBe(true);
      }),
    );
  });
});
