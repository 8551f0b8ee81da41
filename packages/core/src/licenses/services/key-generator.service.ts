/**
 * License Key Generation Service
 *
 * Produces candidate license keys from the platform CSPRNG. Keys are
 * credentials: they must not be guessable or reproducible from a seed.
 */

import { randomInt } from 'crypto';
import type { KeyFormat } from '../../database/types/license.types.js';
import { ConfigurationError } from '../../errors/base.error.js';
import { maskSensitiveString } from '../../logging/utils/sanitizer.js';

export const DEFAULT_KEY_FORMAT: KeyFormat = {
  alphabet: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789',
  segments: 4,
  segmentLength: 5,
  separator: '-',
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\-]/g, '\\$&');
}

export class KeyGeneratorService {
  private readonly format: KeyFormat;
  private readonly pattern: RegExp;

  constructor(format: KeyFormat = DEFAULT_KEY_FORMAT) {
    KeyGeneratorService.assertValidFormat(format);
    this.format = { ...format };

    const charClass = `[${escapeRegExp(format.alphabet)}]{${format.segmentLength}}`;
    const separator = escapeRegExp(format.separator);
    this.pattern = new RegExp(
      `^${charClass}(?:${separator}${charClass}){${format.segments - 1}}$`
    );
  }

  /**
   * Generate a candidate key. Each character is an unbiased draw
   * from the alphabet.
   */
  generate(): string {
    const { alphabet, segments, segmentLength, separator } = this.format;
    const groups: string[] = [];

    for (let i = 0; i < segments; i++) {
      let group = '';
      for (let j = 0; j < segmentLength; j++) {
        group += alphabet[randomInt(alphabet.length)];
      }
      groups.push(group);
    }

    return groups.join(separator);
  }

  /**
   * Check that a key has this generator's alphabet, length and grouping
   */
  matchesFormat(key: string): boolean {
    return this.pattern.test(key);
  }

  /**
   * Number of distinct keys this format can produce
   */
  keySpaceSize(): number {
    return Math.pow(this.format.alphabet.length, this.format.segments * this.format.segmentLength);
  }

  /**
   * Obfuscate key for logs: keep the outer groups, mask the rest
   */
  obfuscate(key: string): string {
    const parts = this.format.separator ? key.split(this.format.separator) : [key];

    if (parts.length > 2) {
      return parts
        .map((part, index) =>
          index === 0 || index === parts.length - 1 ? part : '*'.repeat(part.length)
        )
        .join(this.format.separator);
    }

    return maskSensitiveString(key, 2, 2);
  }

  getFormat(): KeyFormat {
    return { ...this.format };
  }

  private static assertValidFormat(format: KeyFormat): void {
    const problems: string[] = [];

    if (format.alphabet.length < 1) {
      problems.push('alphabet must not be empty');
    }
    if (!/^[A-Z0-9]*$/.test(format.alphabet)) {
      problems.push('alphabet may only contain uppercase letters and digits');
    }
    if (new Set(format.alphabet).size !== format.alphabet.length) {
      problems.push('alphabet must not repeat characters');
    }
    if (!Number.isInteger(format.segments) || format.segments < 1) {
      problems.push('segments must be a positive integer');
    }
    if (!Number.isInteger(format.segmentLength) || format.segmentLength < 1) {
      problems.push('segmentLength must be a positive integer');
    }
    if (format.separator.length > 1) {
      problems.push('separator must be a single character');
    }
    if (format.separator && format.alphabet.includes(format.separator)) {
      problems.push('separator must not be part of the alphabet');
    }

    if (problems.length > 0) {
      throw new ConfigurationError(`Invalid key format: ${problems.join('; ')}`, {
        problems,
      });
    }
  }
}
