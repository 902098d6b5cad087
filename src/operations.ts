/**
 * Arithmetic operations with overflow and division-by-zero guards
 */

import { DivisionByZeroError, InvalidInputError, OverflowError } from './errors';
import { validateNumber } from './validators';

/** Bound used by the multiplication pre-check. */
export const OVERFLOW_THRESHOLD = 1e307;

/**
 * Adds two numbers
 * @param a - First number
 * @param b - Second number
 * @returns Sum of a and b
 * @throws OverflowError if the sum is not finite
 */
export function add(a: number, b: number): number {
  validateNumber(a);
  validateNumber(b);

  const result = a + b;
  if (!Number.isFinite(result)) {
    throw new OverflowError('addition', [a, b]);
  }
  return result;
}

/**
 * Subtracts second number from first
 * @param a - Number to subtract from
 * @param b - Number to subtract
 * @returns Difference of a and b
 * @throws OverflowError if the difference is not finite
 */
export function subtract(a: number, b: number): number {
  validateNumber(a);
  validateNumber(b);

  const result = a - b;
  if (!Number.isFinite(result)) {
    throw new OverflowError('subtraction', [a, b]);
  }
  return result;
}

/**
 * Multiplies two numbers
 *
 * Rejects products whose magnitude would pass OVERFLOW_THRESHOLD before
 * computing them, then checks the computed product as well. The pre-check
 * can refuse some products that would still be representable.
 *
 * @param a - First number
 * @param b - Second number
 * @returns Product of a and b
 */
export function multiply(a: number, b: number): number {
  validateNumber(a);
  validateNumber(b);

  if (a !== 0 && b !== 0 && Math.abs(a) > OVERFLOW_THRESHOLD / Math.abs(b)) {
    throw new OverflowError('multiplication', [a, b]);
  }

  const result = a * b;
  if (!Number.isFinite(result)) {
    throw new OverflowError('multiplication', [a, b]);
  }
  return result;
}

/**
 * Divides first number by second
 * @param a - Dividend
 * @param b - Divisor
 * @returns Quotient of a divided by b
 * @throws DivisionByZeroError if divisor is zero
 * @throws OverflowError if the quotient is not finite
 */
export function divide(a: number, b: number): number {
  validateNumber(a);
  validateNumber(b);

  if (b === 0) {
    throw new DivisionByZeroError(a);
  }

  const result = a / b;
  if (!Number.isFinite(result)) {
    throw new OverflowError('division', [a, b]);
  }
  return result;
}

/**
 * Divides first number by second, returning a fallback instead of throwing
 * when the divisor is zero or the quotient overflows.
 * @param defaultValue - Returned on zero divisor or overflow; must itself be finite
 */
export function safeDivide(a: number, b: number, defaultValue: number = 0): number {
  validateNumber(a);
  validateNumber(b);
  validateNumber(defaultValue);

  if (b === 0) {
    return defaultValue;
  }

  const result = a / b;
  if (!Number.isFinite(result)) {
    return defaultValue;
  }
  return result;
}

/**
 * Raises base to exponent
 * @param base - The base
 * @param exponent - The exponent
 * @returns base ** exponent
 * @throws InvalidInputError if the result is undefined or complex
 * @throws OverflowError if the result is not finite
 */
export function power(base: number, exponent: number): number {
  validateNumber(base);
  validateNumber(exponent);

  if (base === 0 && exponent < 0) {
    throw new InvalidInputError([base, exponent], '0 cannot be raised to negative power');
  }
  if (base < 0 && !Number.isInteger(exponent)) {
    throw new InvalidInputError([base, exponent], 'Negative base with non-integer exponent');
  }

  const result = base ** exponent;
  if (Number.isNaN(result)) {
    throw new InvalidInputError([base, exponent], 'math domain error');
  }
  if (!Number.isFinite(result)) {
    throw new OverflowError('exponentiation', [base, exponent]);
  }
  return result;
}

/**
 * Floored modulo: the result takes the divisor's sign, so
 * `0 <= modulo(a, b) < b` for positive b.
 * @param a - Dividend
 * @param b - Divisor
 * @throws DivisionByZeroError if divisor is zero
 */
export function modulo(a: number, b: number): number {
  validateNumber(a);
  validateNumber(b);

  if (b === 0) {
    throw new DivisionByZeroError(a);
  }

  // % truncates toward zero; shift into the divisor's sign
  let result = a % b;
  if (result === 0) {
    return b < 0 ? -0 : 0;
  }
  if ((result < 0) !== (b < 0)) {
    result += b;
  }
  return result;
}
