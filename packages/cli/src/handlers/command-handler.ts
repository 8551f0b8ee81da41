/**
 * Command Handler
 *
 * Registers the `keymint` subcommands and turns raw argv into their
 * parsed arguments
 */

import { parseArgs } from 'util';
import { ValidationError, logger } from '@keymint/core';
import type { Command, CommandArgs } from '../types/command.js';
import { command as issue } from '../commands/issue.js';
import { command as batch } from '../commands/batch.js';
import { command as list } from '../commands/list.js';
import { command as render } from '../commands/render.js';

const commands = new Map<string, Command>();

for (const command of [issue, batch, list, render]) {
  commands.set(command.name, command);
  logger.debug(`Registered command: ${command.name}`);
}

export function getCommands(): Command[] {
  return [...commands.values()];
}

export function findCommand(name: string): Command | undefined {
  return commands.get(name);
}

/**
 * Parse the arguments that follow the command name
 */
export function parseCommandArgs(command: Command, argv: string[]): CommandArgs {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: command.options ?? {},
      allowPositionals: true,
      strict: true,
    });

    return { values, positionals: [...positionals] };
  } catch (error) {
    throw new ValidationError(error instanceof Error ? error.message : String(error), [
      { field: 'arguments', message: `Usage: ${command.usage}` },
    ]);
  }
}
