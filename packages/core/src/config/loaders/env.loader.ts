/**
 * Environment Variable Loader
 *
 * Loads configuration from environment variables and .env files
 * with support for per-environment overrides and variable expansion.
 */

import * as dotenv from 'dotenv';
import { expand } from 'dotenv-expand';
import { existsSync } from 'fs';
import { resolve } from 'path';

export class EnvLoader {
  private readonly environment: string;
  private loadedFiles: string[] = [];
  private failedFiles: string[] = [];

  constructor(environment?: string) {
    this.environment = environment || process.env.NODE_ENV || 'development';
  }

  /**
   * Load environment files, most specific first. dotenv never overwrites a
   * variable that is already set, so the first file to define it wins.
   */
  load(rootDir: string = process.cwd()): void {
    for (const envFile of this.getEnvFiles(rootDir).reverse()) {
      if (!existsSync(envFile)) {
        continue;
      }

      const result = dotenv.config({ path: envFile });
      if (result.error) {
        this.failedFiles.push(envFile);
        continue;
      }

      expand(result);
      this.loadedFiles.push(envFile);
    }
  }

  /**
   * Get list of environment files to load, least specific first
   */
  private getEnvFiles(rootDir: string): string[] {
    const files = [resolve(rootDir, '.env')];

    if (this.environment !== 'production') {
      files.push(resolve(rootDir, `.env.${this.environment}`));
    }

    // Local overrides are never loaded under test
    if (this.environment !== 'test') {
      files.push(resolve(rootDir, '.env.local'));
      if (this.environment !== 'production') {
        files.push(resolve(rootDir, `.env.${this.environment}.local`));
      }
    }

    return files;
  }

  get(key: string, defaultValue?: string): string | undefined {
    const value = process.env[key];
    return value === undefined || value === '' ? defaultValue : value;
  }

  /**
   * Parse environment variable as boolean; unset yields undefined so the
   * schema default applies
   */
  getBoolean(key: string, defaultValue?: boolean): boolean | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  /**
   * Parse environment variable as number. Unparseable values are passed
   * through as-is so validation reports them.
   */
  getNumber(key: string, defaultValue?: number): number | string | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const parsed = Number(value);
    return Number.isNaN(parsed) ? value : parsed;
  }

  getLoadedFiles(): string[] {
    return [...this.loadedFiles];
  }

  getFailedFiles(): string[] {
    return [...this.failedFiles];
  }

  getEnvironment(): string {
    return this.environment;
  }
}

// Export singleton instance
export const envLoader = new EnvLoader();
