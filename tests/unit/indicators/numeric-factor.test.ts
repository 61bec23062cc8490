import { describe, expect, it } from 'vitest';

import { extractMagnitude, extractNumericFactor } from '@/modules/indicators/core/numeric-factor.js';

describe('extractNumericFactor', () => {
  describe('multiplicative', () => {
    it('reads numbers introduced by per, pour or par', () => {
      expect(extractNumericFactor('per 1000', true)).toBe(1000);
      expect(extractNumericFactor('Décès pour 100 000 naissances', true)).toBe(100000);
      expect(extractNumericFactor('Cas par 10', true)).toBe(10);
    });

    it('strips thousands separators and whitespace', () => {
      expect(extractNumericFactor('per 10,000', true)).toBe(10000);
    });

    it('reads numbers around multiplication and division signs', () => {
      expect(extractNumericFactor('Visits / 100', true)).toBe(100);
      expect(extractNumericFactor('Coverage * 100', true)).toBe(100);
      expect(extractNumericFactor('100 * coverage', true)).toBe(100);
    });

    it('matches keywords regardless of case', () => {
      expect(extractNumericFactor('Deaths PER 1000 births', true)).toBe(1000);
    });

    it('ignores bare numbers', () => {
      expect(extractNumericFactor('Children under 5', true)).toBeNull();
    });

    it('returns null without any number or magnitude word', () => {
      expect(extractNumericFactor('no numbers here', true)).toBeNull();
    });

    it('falls back to magnitude words', () => {
      expect(extractNumericFactor('Coverage percent', true)).toBe(100);
    });
  });

  describe('non-multiplicative', () => {
    it('reads the first integer', () => {
      expect(extractNumericFactor('Per 1000 population', false)).toBe(1000);
      expect(extractNumericFactor('Children under 5', false)).toBe(5);
    });

    it('reads magnitude words', () => {
      expect(extractNumericFactor('percent', false)).toBe(100);
      expect(extractNumericFactor('ten thousand', false)).toBe(10000);
    });
  });
});

describe('extractMagnitude', () => {
  it('multiplies every magnitude word', () => {
    expect(extractMagnitude('Per Ten-Thousand')).toBe(10000);
    expect(extractMagnitude('one hundred million')).toBe(100_000_000);
  });

  it('only matches whole words', () => {
    expect(extractMagnitude('tenants')).toBeNull();
    expect(extractMagnitude('percentage')).toBeNull();
  });

  it('does not match object prototype keys', () => {
    expect(extractMagnitude('constructor toString')).toBeNull();
  });
});
