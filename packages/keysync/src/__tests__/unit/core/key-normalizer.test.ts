/**
 * KeyNormalizer Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { KeyNormalizer } from '../../../core/key-normalizer.js';
import { ConfigurationError } from '../../../core/errors.js';
import type { NormalizerConfig } from '../../../core/config.js';

describe('KeyNormalizer', () => {
  let normalizer: KeyNormalizer;

  beforeEach(() => {
    normalizer = new KeyNormalizer();
  });

  // ==========================================================================
  // Default rules
  // ==========================================================================

  describe('normalize (defaults)', () => {
    it('trims, upper-cases and pads digit runs', () => {
      expect(normalizer.normalize('  cust-123  ')).toBe('CUST-000123');
    });

    it('makes case variants compare equal', () => {
      expect(normalizer.normalize('KEY-001')).toBe('KEY-000001');
      expect(normalizer.normalize('key-001')).toBe('KEY-000001');
    });

    it('collapses whitespace, underscore and hyphen runs into one delimiter', () => {
      expect(normalizer.normalize('cust_ _-123')).toBe('CUST-000123');
      expect(normalizer.normalize('a  b')).toBe('A-B');
    });

    it('strips characters outside the alphanumeric set and the delimiter', () => {
      expect(normalizer.normalize('k#e@y.7')).toBe('KEY000007');
    });

    it('re-collapses delimiters left adjacent by stripping', () => {
      expect(normalizer.normalize('A-!-B')).toBe('A-B');
    });

    it('pads every digit run and leaves long runs intact', () => {
      expect(normalizer.normalize('A1B22')).toBe('A000001B000022');
      expect(normalizer.normalize('1234567')).toBe('1234567');
    });

    it('returns an empty string for empty input', () => {
      expect(normalizer.normalize('')).toBe('');
    });

    it('returns an empty string when nothing survives stripping', () => {
      expect(normalizer.normalize('!!!')).toBe('');
    });

    it('is idempotent', () => {
      for (const raw of ['  cust-123  ', 'A-!-B', 'x__y  z', 'k#e@y.7', 'ab12cd345']) {
        const once = normalizer.normalize(raw);
        expect(normalizer.normalize(once)).toBe(once);
      }
    });
  });

  // ==========================================================================
  // Configuration
  // ==========================================================================

  describe('configuration', () => {
    it('does not pad when a config object omits leftPadNumbers', () => {
      const custom = new KeyNormalizer({});
      expect(custom.normalize('cust-123')).toBe('CUST-123');
    });

    it('pads when a config object sets leftPadNumbers', () => {
      const custom = new KeyNormalizer({ leftPadNumbers: true, padLength: 4 });
      expect(custom.normalize('cust-12')).toBe('CUST-0012');
    });

    it('keeps case when uppercase is disabled', () => {
      const custom = new KeyNormalizer({ uppercase: false });
      expect(custom.normalize('Cust-1')).toBe('Cust-1');
    });

    it('leaves delimiters alone when collapsing is disabled', () => {
      const custom = new KeyNormalizer({ collapseDelims: false, stripNonAlnum: false });
      expect(custom.normalize('a__b')).toBe('A__B');
    });

    it('uses a custom delimiter', () => {
      const custom = new KeyNormalizer({ collapseDelims: '.' });
      expect(custom.normalize('a b_c')).toBe('A.B.C');
    });

    it('rejects a multi-character delimiter', () => {
      expect(() => new KeyNormalizer({ collapseDelims: '--' })).toThrow(ConfigurationError);
    });

    it('rejects a letter or digit delimiter', () => {
      expect(() => new KeyNormalizer({ collapseDelims: 'x' })).toThrow(ConfigurationError);
      expect(() => new KeyNormalizer({ collapseDelims: 'X' })).toThrow(ConfigurationError);
      expect(() => new KeyNormalizer({ collapseDelims: '0' })).toThrow(ConfigurationError);
    });

    it('rejects a non-positive pad length', () => {
      expect(() => new KeyNormalizer({ padLength: 0 })).toThrow(ConfigurationError);
    });
  });

  describe('idempotency across configurations', () => {
    const RAW_KEYS = [
      '  cust-123  ',
      'A-!-B',
      'x__y  z',
      'k#e@y.7',
      'ab12cd345',
      'a..b_c',
      '_lead 9',
      'Mixed-Case_42',
    ];

    it.each<[string, Partial<NormalizerConfig>]>([
      ['a custom delimiter', { collapseDelims: '_' }],
      ['a dot delimiter', { collapseDelims: '.' }],
      ['case preserved', { uppercase: false }],
      ['delimiters left alone', { collapseDelims: false }],
      ['punctuation kept', { stripNonAlnum: false }],
      ['nothing collapsed or stripped', { collapseDelims: false, stripNonAlnum: false }],
      ['explicit padding', { leftPadNumbers: true, padLength: 4 }],
      ['no trimming', { trimWhitespace: false }],
    ])('is idempotent with %s', (_label, config) => {
      const custom = new KeyNormalizer(config);
      for (const raw of RAW_KEYS) {
        const once = custom.normalize(raw);
        expect(custom.normalize(once)).toBe(once);
      }
    });
  });

  // ==========================================================================
  // Batch helpers and statistics
  // ==========================================================================

  describe('batch helpers', () => {
    it('normalizes a batch in order', () => {
      expect(normalizer.normalizeBatch(['a1', ' b2 '])).toEqual(['A000001', 'B000002']);
    });

    it('maps originals to normalized keys', () => {
      const mapping = normalizer.normalizeWithMapping(['key-1', 'KEY_1']);
      expect(mapping.get('key-1')).toBe('KEY-000001');
      expect(mapping.get('KEY_1')).toBe('KEY-000001');
    });
  });

  describe('statistics', () => {
    it('counts normalizations and the steps that changed the key', () => {
      normalizer.normalize('  cust-123  ');
      normalizer.normalize('CUST_1');

      const stats = normalizer.getStatistics();
      expect(stats.totalNormalized).toBe(2);
      expect(stats.transformations).toEqual({
        trim: 1,
        uppercase: 1,
        collapse_delims: 1,
        strip_non_alnum: 0,
        pad_numbers: 2,
      });
      expect(stats.configuration.padNumbersEnabled).toBe(true);
    });

    it('resets counters', () => {
      normalizer.normalize('a');
      normalizer.resetStatistics();
      expect(normalizer.getStatistics().totalNormalized).toBe(0);
    });
  });
});
