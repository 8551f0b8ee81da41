/**
 * Uniqueness Guard
 *
 * Bounded generate-and-check loop. A candidate collides when it was
 * already reserved earlier in the same request or already exists in the
 * store. The store's own constraint still decides at commit time.
 */

import { CollisionExhaustedError } from '../../errors/base.error.js';
import { logger } from '../../logging/logger.js';
import type { LicenseStore } from '../stores/license-store.js';
import type { KeyGeneratorService } from './key-generator.service.js';

export const DEFAULT_MAX_ATTEMPTS = 10;

export class UniquenessGuard {
  constructor(
    private readonly generator: KeyGeneratorService,
    private readonly store: Pick<LicenseStore, 'exists'>,
    private readonly maxAttempts: number = DEFAULT_MAX_ATTEMPTS
  ) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
  }

  /**
   * Reserve a key that is neither in `reserved` nor in the store, and add
   * it to `reserved`. Rejects with CollisionExhaustedError once
   * `maxAttempts` candidates have collided.
   */
  async reserve(reserved: Set<string> = new Set()): Promise<string> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const candidate = this.generator.generate();

      if (reserved.has(candidate) || (await this.store.exists(candidate))) {
        logger.debug('License key candidate collided', {
          attempt,
          candidate: this.generator.obfuscate(candidate),
        });
        continue;
      }

      reserved.add(candidate);
      return candidate;
    }

    logger.warn('License key space exhausted for this request', {
      attempts: this.maxAttempts,
      reserved: reserved.size,
      keySpace: this.generator.keySpaceSize(),
    });
    throw new CollisionExhaustedError(this.maxAttempts);
  }

  getMaxAttempts(): number {
    return this.maxAttempts;
  }
}
