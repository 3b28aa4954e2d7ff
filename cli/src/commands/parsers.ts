import { InvalidArgumentError } from 'commander';

/** Commander parser for a ratio in [0, 1], e.g. `--threshold 0.8`. */
export function parseRatio(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0 || n > 1) {
    throw new InvalidArgumentError('Must be a number between 0 and 1.');
  }
  return n;
}

/** Commander parser for a comma-separated list; empty entries are dropped. */
export function parseList(value: string): string[] {
  const items = value.split(',').map((s) => s.trim()).filter(Boolean);
  if (items.length === 0) {
    throw new InvalidArgumentError('Provide at least one comma-separated value.');
  }
  return items;
}
