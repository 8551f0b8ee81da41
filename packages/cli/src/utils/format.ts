/**
 * Terminal formatting helpers
 */

import type { CommandArgs } from '../types/command.js';

/**
 * UTC timestamp as `YYYY-MM-DD HH:mm:ss`
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Lay out rows as left-aligned columns separated by two spaces
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map(row => (row[column] ?? '').length))
  );

  const line = (cells: string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join('  ')
      .trimEnd();

  return [
    line(headers),
    widths.map(width => '─'.repeat(width)).join('  '),
    ...rows.map(line),
  ];
}

export function getStringOption(args: CommandArgs, name: string): string | undefined {
  const value = args.values[name];
  return typeof value === 'string' ? value : undefined;
}
