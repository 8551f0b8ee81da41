#!/usr/bin/env node
/**
 * keymint CLI entry point
 */

import chalk from 'chalk';
import {
  config,
  configManager,
  createIssuanceRuntime,
  logger,
  setupGlobalErrorHandlers,
} from '@keymint/core';
import { consoleOutput, run } from './cli.js';

async function main(): Promise<number> {
  setupGlobalErrorHandlers();
  logger.debug('Configuration loaded', {
    environment: configManager.getEnvironment(),
    files: configManager.getLoadedFiles(),
  });

  const runtime = await createIssuanceRuntime(config);
  try {
    return await run(process.argv.slice(2), {
      service: runtime.service,
      config,
      output: consoleOutput,
    });
  } finally {
    runtime.close();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
    logger.error('keymint failed to start', error);
    process.exitCode = 1;
  });
