/**
 * List Licenses Command
 *
 * Prints every issued license, newest first
 */

import chalk from 'chalk';
import type { Command } from '../types/command.js';
import { formatTable, formatTimestamp } from '../utils/format.js';

export const LIST_HEADERS = ['Name', 'Phone', 'License Key', 'Created (UTC)'];

export const command: Command = {
  name: 'list',
  description: 'List issued licenses',
  usage: 'keymint list',

  async execute(_args, { service, output }) {
    const records = await service.listAll();

    if (records.length === 0) {
      output.log(chalk.gray('No licenses issued yet.'));
      return;
    }

    const rows = records.map(record => [
      record.holder?.name ?? '-',
      record.holder?.phone ?? '-',
      record.key,
      formatTimestamp(record.createdAt),
    ]);

    for (const line of formatTable(LIST_HEADERS, rows)) {
      output.log(line);
    }
    output.log(chalk.gray(`${records.length} license${records.length === 1 ? '' : 's'}`));
  },
};
