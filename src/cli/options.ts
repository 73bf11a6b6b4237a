import { InvalidArgumentError } from 'commander';

/** Commander argument parser for `--limit`. */
export function parseRowLimit(value: string): number {
    const limit = Number(value);
    if (!Number.isInteger(limit) || limit < 1) {
        throw new InvalidArgumentError('Expected a positive whole number.');
    }
    return limit;
}
