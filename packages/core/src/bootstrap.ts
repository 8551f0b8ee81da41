/**
 * Issuance Runtime
 *
 * Wires one database handle, store, generator, guard and renderer into an
 * IssuanceService. Front ends build a runtime once at startup and close it
 * on exit.
 */

import type { Config } from './config/config.js';
import { openDatabase, closeDatabase, type DatabaseHandle } from './database/client.js';
import { logger } from './logging/logger.js';
import { KeyGeneratorService } from './licenses/services/key-generator.service.js';
import { UniquenessGuard } from './licenses/services/uniqueness-guard.service.js';
import { ArtifactRendererService } from './licenses/services/artifact-renderer.service.js';
import { IssuanceService } from './licenses/services/issuance.service.js';
import { SqliteLicenseStore } from './licenses/stores/sqlite-license-store.js';
import type { LicenseStore } from './licenses/stores/license-store.js';

export interface IssuanceRuntime {
  service: IssuanceService;
  store: LicenseStore;
  config: Config;
  close(): void;
}

export interface RuntimeOptions {
  clock?: () => Date;
}

export async function createIssuanceRuntime(
  config: Config,
  options: RuntimeOptions = {}
): Promise<IssuanceRuntime> {
  const db: DatabaseHandle = await openDatabase(config.database);
  const store = new SqliteLicenseStore(db);
  const generator = new KeyGeneratorService(config.issuance.keyFormat);
  const guard = new UniquenessGuard(generator, store, config.issuance.maxAttempts);
  const renderer = new ArtifactRendererService(
    { title: config.artifact.title, issuer: config.artifact.issuer },
    config.artifact.qr
  );

  const service = new IssuanceService({
    store,
    generator,
    guard,
    renderer,
    maxBatchSize: config.issuance.maxBatchSize,
    clock: options.clock,
  });

  logger.debug('Issuance runtime ready', {
    database: config.database.path,
    keySpace: generator.keySpaceSize(),
    maxAttempts: config.issuance.maxAttempts,
  });

  return {
    service,
    store,
    config,
    close: () => closeDatabase(db),
  };
}
