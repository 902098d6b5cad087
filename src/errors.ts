/**
 * Error taxonomy for the arithmetic engine.
 *
 * Every failure raised by the validators, the operations and the Calculator
 * is a CalculatorError, so callers can catch the whole family with a single
 * instanceof check and narrow further when they care about the kind.
 */

/**
 * Renders an offending value for an error message.
 * Tuples of operands print as `(a, b)`.
 */
export function formatValue(value: unknown): string {
    if (Array.isArray(value)) {
        return `(${value.map(v => formatValue(v)).join(', ')})`;
    }
    if (typeof value === 'string') {
        return JSON.stringify(value);
    }
    return String(value);
}

// ------------------------------------------------------------
// Base error
// ------------------------------------------------------------
export class CalculatorError extends Error {
    constructor(
        public readonly detail: string,
        public readonly value?: unknown
    ) {
        super(value === undefined ? detail : `${detail}: ${formatValue(value)}`);
        this.name = new.target.name;
    }
}

// ------------------------------------------------------------
// Kinds
// ------------------------------------------------------------

/** Operand is not a finite number, or breaks a domain precondition. */
export class InvalidInputError extends CalculatorError {
    constructor(value: unknown, public readonly reason: string = 'invalid input') {
        super(reason, value);
    }
}

/** Value falls outside caller-supplied bounds. */
export class OutOfRangeError extends CalculatorError {
    constructor(
        value: number,
        public readonly min?: number,
        public readonly max?: number
    ) {
        super(`Value out of range [${min ?? -Infinity}, ${max ?? Infinity}]`, value);
    }
}

export class DivisionByZeroError extends CalculatorError {
    constructor(public readonly numerator: number) {
        super('Division by zero', numerator);
    }
}

/**
 * A computed (or pre-checked) result would not be finite.
 *
 * @param operation - Name of the arithmetic step, e.g. `multiplication`
 * @param operands - Inputs that produced the overflow, in call order
 */
export class OverflowError extends CalculatorError {
    public readonly operands: readonly number[];

    constructor(public readonly operation: string, operands: readonly number[]) {
        const frozen = Object.freeze([...operands]);
        super(`Overflow in ${operation}`, frozen);
        this.operands = frozen;
    }
}

export function isCalculatorError(error: unknown): error is CalculatorError {
    return error instanceof CalculatorError;
}
