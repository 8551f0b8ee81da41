/**
 * Render Artifact Command
 *
 * Writes the printable artifact of an issued key to a directory
 */

import chalk from 'chalk';
import { FileDestination, ValidationError } from '@keymint/core';
import type { Command } from '../types/command.js';
import { getStringOption } from '../utils/format.js';

export const command: Command = {
  name: 'render',
  description: 'Render the printable artifact for an issued key',
  usage: 'keymint render <key> [--out <directory>]',
  options: {
    out: { type: 'string', short: 'o', description: 'Output directory' },
  },

  async execute(args, { service, config, output }) {
    const [key] = args.positionals;
    if (!key) {
      throw new ValidationError('A license key is required', [
        { field: 'key', message: 'Pass the key to render' },
      ]);
    }

    const record = await service.getByKey(key.trim());
    const directory = getStringOption(args, 'out') ?? config.artifact.outputDirectory;
    const location = await service.exportArtifact(record, new FileDestination(directory));

    output.log(`${chalk.green('✓')} Artifact written: ${location}`);
  },
};
