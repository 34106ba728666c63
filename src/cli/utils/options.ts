/**
 * Commander argument parsers shared by the remote commands
 */

import { InvalidArgumentError } from 'commander';

export function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return count;
}

/**
 * Comma-separated values; repeating the flag appends
 */
export function collectList(value: string, previous: string[] = []): string[] {
  return [
    ...previous,
    ...value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== ''),
  ];
}
