/**
 * Configuration TypeScript Type Definitions
 *
 * Re-exports all configuration types for convenient imports.
 */

export type { AppConfig } from './schemas/app.schema.js';
export type { DatabaseConfig } from './schemas/database.schema.js';
export type { IssuanceConfig, KeyFormatConfig } from './schemas/issuance.schema.js';
export type { ArtifactConfig } from './schemas/artifact.schema.js';
export type { Config } from './config.js';

export type Environment = 'development' | 'test' | 'staging' | 'production';
