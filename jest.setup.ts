import chalk from 'chalk';

// Environment variables for testing
process.env.NODE_ENV = 'test';
process.env.DATABASE_PATH = ':memory:';
process.env.LOG_TO_FILE = 'false';
process.env.ARTIFACT_ISSUER = 'Test Issuer';

// Plain output so assertions can compare text
chalk.level = 0;

// Global test utilities
global.beforeEach(() => {
  jest.clearAllMocks();
});

// Increase test timeout for CI/CD environments
jest.setTimeout(30000);
