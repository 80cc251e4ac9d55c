// src/cli/parsers.ts

import type { RgbaColor } from '../@types';
import { InvalidArgumentError } from 'commander';
import { parseHexColor } from '../utils/misc/colorUtils';

export function parseInteger(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

export function parseDecimal(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isFinite(parsed)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return parsed;
}

export function parseColor(value: string): RgbaColor {
    try {
        return parseHexColor(value);
    } catch (error) {
        throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
}

/**
 * Repeatable `--key-color`: every occurrence appends to the list.
 */
export function collectColor(value: string, previous: RgbaColor[] = []): RgbaColor[] {
    return [...previous, parseColor(value)];
}

/**
 * Comma separated list of positive integer sizes, e.g. `16,32,256`.
 */
export function parseSizeList(value: string): number[] {
    return value
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .map((part) => {
            const size = parseInteger(part);
            if (size <= 0) {
                throw new InvalidArgumentError(`Size must be positive, got ${size}.`);
            }
            return size;
        });
}

/**
 * Builds a parser that accepts only the given values, keeping the literal type of the match.
 */
export function choiceParser<T extends string>(allowed: readonly T[]): (value: string) => T {
    return (value: string): T => {
        const match = allowed.find((candidate) => candidate === value);
        if (match === undefined) {
            throw new InvalidArgumentError(`Allowed choices are ${allowed.join(', ')}.`);
        }
        return match;
    };
}
