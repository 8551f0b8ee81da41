/**
 * Configuration Module Public Exports
 */

// Main configuration
export { config, configManager, configSchema, ConfigManager } from './config.js';

// Configuration schemas
export { appConfigSchema } from './schemas/app.schema.js';
export { databaseConfigSchema } from './schemas/database.schema.js';
export { issuanceConfigSchema, keyFormatSchema } from './schemas/issuance.schema.js';
export { artifactConfigSchema } from './schemas/artifact.schema.js';

// Loaders
export { envLoader, EnvLoader } from './loaders/env.loader.js';

// Types
export type {
  Config,
  AppConfig,
  DatabaseConfig,
  IssuanceConfig,
  KeyFormatConfig,
  ArtifactConfig,
  Environment,
} from './types.js';
