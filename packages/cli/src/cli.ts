/**
 * keymint command runner
 *
 * Dispatches argv to a subcommand and maps the outcome to an exit code.
 */

import chalk from 'chalk';
import { ValidationError, isOperationalError, logger } from '@keymint/core';
import type { CommandContext, CommandOutput } from './types/command.js';
import { findCommand, getCommands, parseCommandArgs } from './handlers/command-handler.js';

export const consoleOutput: CommandOutput = {
  log: line => console.log(line),
  error: line => console.error(line),
};

export function printUsage(output: CommandOutput): void {
  output.log(chalk.bold('Usage: keymint <command> [options]'));
  output.log('');
  output.log('Commands:');

  const commands = getCommands();
  const width = Math.max(...commands.map(command => command.name.length));
  for (const command of commands) {
    output.log(`  ${command.name.padEnd(width)}  ${command.description}`);
  }
}

function reportError(error: unknown, commandName: string, output: CommandOutput): void {
  const message = error instanceof Error ? error.message : String(error);
  output.error(`${chalk.red('✗')} ${message}`);

  if (error instanceof ValidationError) {
    for (const issue of error.fields) {
      output.error(`  ${chalk.yellow(issue.field)}: ${issue.message}`);
    }
  }

  if (isOperationalError(error)) {
    logger.warn('Command failed', { command: commandName, error: message });
  } else {
    logger.error('Command failed unexpectedly', error, { command: commandName });
  }
}

/**
 * Run one command. Resolves to the process exit code.
 */
export async function run(argv: string[], context: CommandContext): Promise<number> {
  const [name, ...rest] = argv;

  if (name === undefined || name === 'help' || name === '--help' || name === '-h') {
    printUsage(context.output);
    return 0;
  }

  const command = findCommand(name);
  if (!command) {
    context.output.error(`${chalk.red('✗')} Unknown command: ${name}`);
    printUsage(context.output);
    return 1;
  }

  try {
    await command.execute(parseCommandArgs(command, rest), context);
    return 0;
  } catch (error) {
    reportError(error, command.name, context.output);
    return 1;
  }
}
