/**
 * Configuration Manager
 *
 * Combines all config schemas, loads values from the environment and
 * .env files, and provides type-safe access to the validated result.
 */

import { z } from 'zod';
import chalk from 'chalk';
import { appConfigSchema } from './schemas/app.schema.js';
import { databaseConfigSchema } from './schemas/database.schema.js';
import { issuanceConfigSchema } from './schemas/issuance.schema.js';
import { artifactConfigSchema } from './schemas/artifact.schema.js';
import { EnvLoader } from './loaders/env.loader.js';
import { ConfigurationError } from '../errors/base.error.js';

// Combine all schemas into a single configuration schema
export const configSchema = z.object({
  app: appConfigSchema,
  database: databaseConfigSchema,
  issuance: issuanceConfigSchema,
  artifact: artifactConfigSchema,
});

export type Config = z.infer<typeof configSchema>;

export class ConfigManager {
  private config: Config | null = null;
  private readonly environment: string;

  constructor(private readonly envLoader: EnvLoader = new EnvLoader()) {
    this.environment = envLoader.getEnvironment();
  }

  /**
   * Initialize and load configuration
   */
  initialize(): Config {
    if (this.config) {
      return this.config;
    }

    this.envLoader.load();

    const parseResult = configSchema.safeParse(this.buildConfig());
    if (!parseResult.success) {
      this.handleValidationError(parseResult.error);
    }

    this.config = parseResult.data;
    return this.config;
  }

  /**
   * Build configuration object from environment variables
   */
  private buildConfig(): unknown {
    const env = this.envLoader;

    return {
      app: {
        name: env.get('APP_NAME'),
        version: env.get('APP_VERSION'),
        environment: this.environment,
        logging: {
          level: env.get('LOG_LEVEL'),
          format: env.get('LOG_FORMAT'),
          directory: env.get('LOG_DIRECTORY'),
          maxFiles: env.getNumber('LOG_MAX_FILES'),
          maxSize: env.get('LOG_MAX_SIZE'),
          toFile: env.getBoolean('LOG_TO_FILE'),
        },
      },
      database: {
        path: env.get('DATABASE_PATH'),
        busyTimeout: env.getNumber('DATABASE_BUSY_TIMEOUT'),
      },
      issuance: {
        keyFormat: {
          alphabet: env.get('LICENSE_KEY_ALPHABET'),
          segments: env.getNumber('LICENSE_KEY_SEGMENTS'),
          segmentLength: env.getNumber('LICENSE_KEY_SEGMENT_LENGTH'),
          separator: env.get('LICENSE_KEY_SEPARATOR'),
        },
        maxAttempts: env.getNumber('ISSUANCE_MAX_ATTEMPTS'),
        maxBatchSize: env.getNumber('ISSUANCE_MAX_BATCH_SIZE'),
      },
      artifact: {
        title: env.get('ARTIFACT_TITLE'),
        issuer: env.get('ARTIFACT_ISSUER'),
        qr: {
          errorCorrectionLevel: env.get('ARTIFACT_QR_ERROR_CORRECTION'),
          margin: env.getNumber('ARTIFACT_QR_MARGIN'),
          width: env.getNumber('ARTIFACT_QR_WIDTH'),
        },
        outputDirectory: env.get('ARTIFACT_OUTPUT_DIR'),
      },
    };
  }

  /**
   * Turn zod issues into a single readable configuration error
   */
  private handleValidationError(error: z.ZodError): never {
    const issues = error.issues.map(issue => ({
      path: issue.path.join('.') || 'General',
      message: issue.message,
    }));

    const errorMessage = [
      chalk.red.bold('Configuration validation failed:'),
      ...issues.map(issue => `  ${chalk.yellow(issue.path)}: ${issue.message}`),
      '',
      chalk.gray('Please check your environment variables and .env files.'),
    ].join('\n');

    throw new ConfigurationError(errorMessage, { issues });
  }

  /**
   * Get a specific configuration section
   */
  get<K extends keyof Config>(key: K): Config[K] {
    return this.initialize()[key];
  }

  getLoadedFiles(): string[] {
    return this.envLoader.getLoadedFiles();
  }

  isProduction(): boolean {
    return this.environment === 'production';
  }

  isTest(): boolean {
    return this.environment === 'test';
  }

  getEnvironment(): string {
    return this.environment;
  }
}

// Export singleton instance
export const configManager = new ConfigManager();

// Initialize and export config
export const config = configManager.initialize();
