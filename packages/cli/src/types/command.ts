/**
 * Command Type Definitions
 *
 * Types for `keymint` subcommands
 */

import type { Config, IssuanceService } from '@keymint/core';

export interface CommandOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface CommandContext {
  service: IssuanceService;
  config: Config;
  output: CommandOutput;
}

export interface OptionSpec {
  type: 'string' | 'boolean';
  short?: string;
  description: string;
}

export interface CommandArgs {
  positionals: string[];
  values: Record<string, unknown>;
}

export interface Command {
  name: string;
  description: string;
  usage: string;
  options?: Record<string, OptionSpec>;
  execute: (args: CommandArgs, context: CommandContext) => Promise<void>;
}
