/**
 * Batch Issue Command
 *
 * Issues several anonymous licenses in one atomic request
 */

import chalk from 'chalk';
import { ValidationError } from '@keymint/core';
import type { Command } from '../types/command.js';

export const command: Command = {
  name: 'batch',
  description: 'Issue several license keys at once',
  usage: 'keymint batch <count>',

  async execute(args, { service, output }) {
    const [raw] = args.positionals;
    if (raw === undefined || !/^\d+$/.test(raw)) {
      throw new ValidationError('Invalid batch size', [
        { field: 'count', message: 'Count must be a positive whole number' },
      ]);
    }

    const records = await service.issueBatch(Number(raw));

    output.log(`${chalk.green('✓')} Issued ${records.length} licenses:`);
    for (const record of records) {
      output.log(`  ${record.key}`);
    }
  },
};
