/**
 * Issue License Command
 *
 * Issues a single license, optionally bound to a holder
 */

import chalk from 'chalk';
import { holderSchema, ValidationError, type HolderInput } from '@keymint/core';
import type { Command } from '../types/command.js';
import { formatTimestamp, getStringOption } from '../utils/format.js';

/**
 * Same checks the issuance form ran before saving: both fields or neither,
 * a non-empty name and a phone of 7-15 digits
 */
export function readHolder(name: string | undefined, phone: string | undefined): HolderInput | undefined {
  if (name === undefined && phone === undefined) {
    return undefined;
  }

  if (name === undefined || phone === undefined) {
    throw new ValidationError('Both --name and --phone are required to bind a holder', [
      { field: name === undefined ? 'name' : 'phone', message: 'Required when the other is given' },
    ]);
  }

  const result = holderSchema.safeParse({ name, phone });
  if (!result.success) {
    throw new ValidationError(
      'Invalid license holder',
      result.error.issues.map(issue => ({
        field: issue.path.join('.') || 'holder',
        message: issue.message,
      }))
    );
  }

  return { name, phone };
}

export const command: Command = {
  name: 'issue',
  description: 'Issue a new license key',
  usage: 'keymint issue [--name <full name> --phone <phone>]',
  options: {
    name: { type: 'string', short: 'n', description: 'Holder full name' },
    phone: { type: 'string', short: 'p', description: 'Holder phone number' },
  },

  async execute(args, { service, output }) {
    const holder = readHolder(getStringOption(args, 'name'), getStringOption(args, 'phone'));
    const record = await service.issueOne(holder);

    output.log(`${chalk.green('✓')} License issued: ${chalk.bold(record.key)}`);
    if (record.holder) {
      output.log(`  Holder: ${record.holder.name} (${record.holder.phone})`);
    }
    output.log(`  Created: ${formatTimestamp(record.createdAt)} UTC`);
  },
};
