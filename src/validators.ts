/**
 * Input validation guards.
 *
 * Each guard returns its input unchanged when it passes and throws a
 * CalculatorError subclass when it does not.
 */

import { InvalidInputError, OutOfRangeError } from './errors';

export const MAX_SAFE_VALUE = 1e308;
export const MIN_SAFE_VALUE = -1e308;

/**
 * Validates that a value is a finite number.
 *
 * @param value - Anything; callers outside TypeScript may pass strings or bigints
 * @returns The value, narrowed to number
 * @throws InvalidInputError if the value is not a number, is NaN or is infinite
 */
export function validateNumber(value: unknown): number {
    if (typeof value !== 'number') {
        const kind = value === null ? 'null' : typeof value;
        throw new InvalidInputError(value, `Expected number, got ${kind}`);
    }
    if (Number.isNaN(value)) {
        throw new InvalidInputError(value, 'NaN is not allowed');
    }
    if (!Number.isFinite(value)) {
        throw new InvalidInputError(value, 'Infinity is not allowed');
    }
    return value;
}

/**
 * Validates that a value is positive.
 *
 * @param allowZero - Whether zero passes; negatives never do
 */
export function validatePositive(value: number, allowZero: boolean = false): number {
    validateNumber(value);

    if (allowZero) {
        if (value < 0) {
            throw new InvalidInputError(value, 'Value must be non-negative');
        }
    } else if (value <= 0) {
        throw new InvalidInputError(value, 'Value must be positive');
    }

    return value;
}

/**
 * Validates that a value is not exactly zero. No epsilon is applied,
 * so 1e-300 passes.
 */
export function validateNonZero(value: number): number {
    validateNumber(value);

    if (value === 0) {
        throw new InvalidInputError(value, 'Value must not be zero');
    }

    return value;
}

/**
 * Validates that a value lies within bounds.
 *
 * @param min - Lower bound; null or undefined leaves that side open
 * @param max - Upper bound; null or undefined leaves that side open
 * @param inclusive - Applies to both bounds
 * @throws OutOfRangeError if the value is outside the range
 */
export function validateRange(
    value: number,
    min?: number | null,
    max?: number | null,
    inclusive: boolean = true
): number {
    validateNumber(value);

    const lower = min ?? undefined;
    const upper = max ?? undefined;

    if (lower !== undefined) {
        if (inclusive ? value < lower : value <= lower) {
            throw new OutOfRangeError(value, lower, upper);
        }
    }

    if (upper !== undefined) {
        if (inclusive ? value > upper : value >= upper) {
            throw new OutOfRangeError(value, lower, upper);
        }
    }

    return value;
}
