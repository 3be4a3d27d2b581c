import { InvalidArgumentError } from 'commander';

export function parsePositiveInt(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Not a positive integer.');
    }
    return parsed;
}

export function parseScore(value: string): number {
    const parsed = Number.parseFloat(value);
    if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
        throw new InvalidArgumentError('Not a number between 0 and 1.');
    }
    return parsed;
}
