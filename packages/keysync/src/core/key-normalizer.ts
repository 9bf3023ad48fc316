/**
 * Key Normalizer
 *
 * Deterministic, config-driven string transform that makes equivalent key
 * spellings compare equal ("  cust_123 " and "CUST-123" both become
 * "CUST-000123" under defaults).
 *
 * Steps run in a fixed order, each feeding the next:
 *   1. trim surrounding whitespace
 *   2. upper-case
 *   3. collapse whitespace/underscore/hyphen runs into the delimiter
 *   4. strip characters that are not alphanumeric or the delimiter
 *   5. left-pad digit runs with zeros
 *
 * Padding asymmetry: with no config object at all, padding is on (default).
 * With any config object, padding is on only when that object sets
 * `leftPadNumbers: true`. Existing registries were built under this rule.
 */

import { DEFAULT_NORMALIZER_CONFIG, DELIMITER_PATTERN, type NormalizerConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { createLogger } from './utils/logger.js';

const log = createLogger({ module: 'normalizer' });

export type TransformationKind =
  | 'trim'
  | 'uppercase'
  | 'collapse_delims'
  | 'strip_non_alnum'
  | 'pad_numbers';

export interface NormalizerStatistics {
  readonly totalNormalized: number;
  /** Normalizations in which the step actually changed the key */
  readonly transformations: Readonly<Record<TransformationKind, number>>;
  readonly configuration: NormalizerConfig & { readonly padNumbersEnabled: boolean };
}

const DELIMITER_RUN = /[\s_-]+/g;
const DIGIT_RUN = /\d+/g;

function emptyTransformationCounts(): Record<TransformationKind, number> {
  return {
    trim: 0,
    uppercase: 0,
    collapse_delims: 0,
    strip_non_alnum: 0,
    pad_numbers: 0,
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\-]/g, '\\$&');
}

export class KeyNormalizer {
  private readonly config: NormalizerConfig;
  private readonly padNumbersEnabled: boolean;
  private readonly disallowed: RegExp;
  private readonly repeatedDelimiter: RegExp | null;

  private totalNormalized = 0;
  private transformations = emptyTransformationCounts();

  constructor(config?: Partial<NormalizerConfig>) {
    this.config = {
      trimWhitespace: config?.trimWhitespace ?? DEFAULT_NORMALIZER_CONFIG.trimWhitespace,
      uppercase: config?.uppercase ?? DEFAULT_NORMALIZER_CONFIG.uppercase,
      collapseDelims: config?.collapseDelims ?? DEFAULT_NORMALIZER_CONFIG.collapseDelims,
      stripNonAlnum: config?.stripNonAlnum ?? DEFAULT_NORMALIZER_CONFIG.stripNonAlnum,
      leftPadNumbers: config?.leftPadNumbers ?? DEFAULT_NORMALIZER_CONFIG.leftPadNumbers,
      padLength: config?.padLength ?? DEFAULT_NORMALIZER_CONFIG.padLength,
    };

    this.padNumbersEnabled =
      config === undefined ? this.config.leftPadNumbers : config.leftPadNumbers === true;

    const delimiter = this.config.collapseDelims;
    if (delimiter !== false && !DELIMITER_PATTERN.test(delimiter)) {
      throw new ConfigurationError(
        `collapseDelims must be a single punctuation character, got ${JSON.stringify(delimiter)}`
      );
    }
    if (!Number.isInteger(this.config.padLength) || this.config.padLength < 1) {
      throw new ConfigurationError(`padLength must be a positive integer, got ${this.config.padLength}`);
    }

    const kept = escapeRegExp(delimiter === false ? '-' : delimiter);
    this.disallowed = new RegExp(`[^A-Za-z0-9${kept}]`, 'g');
    this.repeatedDelimiter = delimiter === false ? null : new RegExp(`(?:${kept}){2,}`, 'g');
  }

  /**
   * Apply normalization rules to a single key
   */
  normalize(raw: string): string {
    if (!raw) {
      return '';
    }

    const applied: TransformationKind[] = [];
    let key = raw;

    const apply = (kind: TransformationKind, next: string): void => {
      if (next !== key) {
        applied.push(kind);
        key = next;
      }
    };

    if (this.config.trimWhitespace) {
      apply('trim', key.trim());
    }

    if (this.config.uppercase) {
      apply('uppercase', key.toUpperCase());
    }

    const delimiter = this.config.collapseDelims;
    if (delimiter !== false) {
      apply('collapse_delims', key.replace(DELIMITER_RUN, delimiter));
    }

    if (this.config.stripNonAlnum) {
      let stripped = key.replace(this.disallowed, '');
      // Removing characters can leave delimiters adjacent ("A-!-B")
      if (this.repeatedDelimiter !== null && delimiter !== false) {
        stripped = stripped.replace(this.repeatedDelimiter, delimiter);
      }
      apply('strip_non_alnum', stripped);
    }

    if (this.padNumbersEnabled) {
      const padLength = this.config.padLength;
      apply('pad_numbers', key.replace(DIGIT_RUN, (digits) => digits.padStart(padLength, '0')));
    }

    this.totalNormalized++;
    for (const kind of applied) {
      this.transformations[kind]++;
    }

    if (applied.length > 0) {
      log.debug('Normalized key', { original: raw, normalized: key, transforms: applied });
    }

    return key;
  }

  normalizeBatch(keys: readonly string[]): string[] {
    return keys.map((key) => this.normalize(key));
  }

  /**
   * Normalize keys and return original -> normalized
   */
  normalizeWithMapping(keys: readonly string[]): Map<string, string> {
    const mapping = new Map<string, string>();
    for (const key of keys) {
      mapping.set(key, this.normalize(key));
    }
    return mapping;
  }

  getStatistics(): NormalizerStatistics {
    return {
      totalNormalized: this.totalNormalized,
      transformations: { ...this.transformations },
      configuration: { ...this.config, padNumbersEnabled: this.padNumbersEnabled },
    };
  }

  resetStatistics(): void {
    this.totalNormalized = 0;
    this.transformations = emptyTransformationCounts();
  }
}
