import { InvalidArgumentError } from 'commander';

/**
 * Commander parser for positive integer options such as --top-k
 */
export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}
