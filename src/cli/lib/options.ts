import { InvalidArgumentError } from 'commander';

/**
 * Option parser for counts. The whole value must be a positive integer ("5abc" and "2.5" are rejected).
 */
export function parsePositiveInt(value: string): number {
  const trimmed = value.trim();
  const parsed = trimmed === '' ? Number.NaN : Number(trimmed);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}
