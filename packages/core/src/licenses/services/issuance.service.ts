/**
 * License Issuance Service
 *
 * Public entry point for issuing, listing and rendering licenses. Every
 * request reserves all of its keys first and then commits them with a
 * single insertAll, so a request either lands completely or not at all.
 */

import type {
  LicenseHolder,
  LicenseRecord,
  NewLicenseRecord,
} from '../../database/types/license.types.js';
import { InternalError, NotFoundError } from '../../errors/base.error.js';
import { logger, AuditEventType } from '../../logging/logger.js';
import { runWithCorrelationAsync } from '../../logging/context/correlation.js';
import type { LicenseStore } from '../stores/license-store.js';
import type { ArtifactDestination, LicenseArtifact } from '../artifacts/artifact.types.js';
import type { ArtifactRendererService } from './artifact-renderer.service.js';
import type { KeyGeneratorService } from './key-generator.service.js';
import type { UniquenessGuard } from './uniqueness-guard.service.js';
import { parseBatchSize, parseHolder, type HolderInput } from '../validation/holder.schema.js';

export const DEFAULT_MAX_BATCH_SIZE = 1000;

export interface IssuanceServiceDeps {
  store: LicenseStore;
  generator: KeyGeneratorService;
  guard: UniquenessGuard;
  renderer: ArtifactRendererService;
  maxBatchSize?: number;
  clock?: () => Date;
}

/**
 * Build a record with every field set explicitly
 */
export function newLicenseRecord(
  key: string,
  createdAt: Date,
  holder?: LicenseHolder
): NewLicenseRecord {
  return holder ? { key, createdAt, holder } : { key, createdAt };
}

export class IssuanceService {
  private readonly store: LicenseStore;
  private readonly generator: KeyGeneratorService;
  private readonly guard: UniquenessGuard;
  private readonly renderer: ArtifactRendererService;
  private readonly maxBatchSize: number;
  private readonly clock: () => Date;

  constructor(deps: IssuanceServiceDeps) {
    this.store = deps.store;
    this.generator = deps.generator;
    this.guard = deps.guard;
    this.renderer = deps.renderer;
    this.maxBatchSize = deps.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Issue a single license, optionally bound to a holder
   */
  async issueOne(holder?: HolderInput): Promise<LicenseRecord> {
    return runWithCorrelationAsync('license.issue', async () => {
      const parsedHolder = holder === undefined ? undefined : parseHolder(holder);

      const [issued] = await this.commit(async () => {
        const key = await this.guard.reserve();
        return [newLicenseRecord(key, this.clock(), parsedHolder)];
      });

      if (!issued) {
        throw new InternalError('License store returned no record for a single issuance');
      }

      logger.audit(AuditEventType.LICENSE_ISSUED, {
        licenseId: issued.id,
        key: this.generator.obfuscate(issued.key),
        holderName: issued.holder?.name,
      });

      return issued;
    });
  }

  /**
   * Issue `count` anonymous licenses in one atomic commit
   */
  async issueBatch(count: number): Promise<LicenseRecord[]> {
    return runWithCorrelationAsync('license.issueBatch', async () => {
      const size = parseBatchSize(count, this.maxBatchSize);

      const issued = await this.commit(async () => {
        // Keys reserved here are discarded if a later reservation fails
        const reserved = new Set<string>();
        for (let i = 0; i < size; i++) {
          await this.guard.reserve(reserved);
        }

        const createdAt = this.clock();
        return [...reserved].map(key => newLicenseRecord(key, createdAt));
      });

      logger.audit(AuditEventType.LICENSE_BATCH_ISSUED, {
        count: issued.length,
        firstId: issued[0]?.id,
        lastId: issued[issued.length - 1]?.id,
      });

      return issued;
    });
  }

  async listAll(): Promise<LicenseRecord[]> {
    return this.store.listAll();
  }

  async getByKey(key: string): Promise<LicenseRecord> {
    const record = await this.store.findByKey(key);
    if (!record) {
      throw new NotFoundError('License', this.generator.obfuscate(key));
    }
    return record;
  }

  async render(record: Pick<LicenseRecord, 'key'>): Promise<LicenseArtifact> {
    return this.renderer.render(record);
  }

  /**
   * Render a record and hand it to the caller's destination
   */
  async exportArtifact(
    record: Pick<LicenseRecord, 'id' | 'key'>,
    destination: ArtifactDestination
  ): Promise<string> {
    const artifact = await this.renderer.render(record);
    const location = await this.renderer.export(artifact, destination);

    logger.audit(AuditEventType.ARTIFACT_EXPORTED, {
      licenseId: record.id,
      key: this.generator.obfuscate(record.key),
      location,
    });

    return location;
  }

  /**
   * Reserve keys, then persist them with exactly one insertAll
   */
  private async commit(
    reserve: () => Promise<NewLicenseRecord[]>
  ): Promise<LicenseRecord[]> {
    return logger.measureAsync('license.commit', async () => {
      try {
        const records = await reserve();
        return await this.store.insertAll(records);
      } catch (error) {
        logger.warn('License issuance failed', {
          error: error instanceof Error ? error.message : String(error),
          code: error instanceof Error && 'code' in error ? error.code : undefined,
        });
        throw error;
      }
    });
  }
}
