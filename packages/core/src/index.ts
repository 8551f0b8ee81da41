/**
 * Keymint Core
 *
 * License key issuance: generation, uniqueness, append-only storage and
 * printable artifacts, plus the configuration, logging and error handling
 * shared by every front end.
 */

// Runtime
export { createIssuanceRuntime } from './bootstrap.js';
export type { IssuanceRuntime, RuntimeOptions } from './bootstrap.js';

// Database exports
export { openDatabase, closeDatabase, MEMORY_DATABASE } from './database/client.js';
export type { DatabaseHandle } from './database/client.js';

// License exports
export * from './licenses/index.js';

// Configuration exports
export {
  config,
  configManager,
  configSchema,
  ConfigManager,
  appConfigSchema,
  databaseConfigSchema,
  issuanceConfigSchema,
  keyFormatSchema,
  artifactConfigSchema,
  envLoader,
  EnvLoader,
} from './config/index.js';
export type {
  Config,
  AppConfig,
  DatabaseConfig,
  IssuanceConfig,
  KeyFormatConfig,
  ArtifactConfig,
  Environment,
} from './config/index.js';

// Logging exports
export {
  logger,
  Logger,
  AuditEventType,
  getCorrelationId,
  runWithCorrelationAsync,
  sanitizeString,
} from './logging/index.js';
export type { CorrelationContext, LogMetadata, LoggerOptions } from './logging/index.js';

// Error exports
export {
  BaseError,
  ValidationError,
  CollisionExhaustedError,
  PersistenceError,
  RenderError,
  NotFoundError,
  InternalError,
  ConfigurationError,
  isOperationalError,
  extractErrorDetails,
  setupGlobalErrorHandlers,
} from './errors/index.js';
export type { ErrorDetails, FieldIssue, PersistenceFailureReason } from './errors/index.js';
