/**
 * License Issuance Module Exports
 *
 * Central export file for all license-related functionality
 */

// Services
export {
  KeyGeneratorService,
  DEFAULT_KEY_FORMAT,
} from './services/key-generator.service.js';

export {
  UniquenessGuard,
  DEFAULT_MAX_ATTEMPTS,
} from './services/uniqueness-guard.service.js';

export {
  ArtifactRendererService,
  DEFAULT_QR_OPTIONS,
  artifactFileName,
  escapeXml,
} from './services/artifact-renderer.service.js';

export {
  IssuanceService,
  DEFAULT_MAX_BATCH_SIZE,
  newLicenseRecord,
  type IssuanceServiceDeps,
} from './services/issuance.service.js';

// Stores
export { compareNewestFirst, type LicenseStore } from './stores/license-store.js';
export { SqliteLicenseStore } from './stores/sqlite-license-store.js';
export { InMemoryLicenseStore } from './stores/memory-license-store.js';

// Artifacts
export { FileDestination } from './artifacts/file-destination.js';
export type {
  ArtifactDestination,
  ArtifactTemplate,
  LicenseArtifact,
  QrOptions,
} from './artifacts/artifact.types.js';

// Validation
export {
  holderSchema,
  parseHolder,
  parseBatchSize,
  isValidPhone,
  countPhoneDigits,
  PHONE_MIN_DIGITS,
  PHONE_MAX_DIGITS,
  type HolderInput,
} from './validation/holder.schema.js';

// Re-export types
export * from '../database/types/license.types.js';
