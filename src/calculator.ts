/**
 * Calculator - stateful arithmetic with chained calls and undo
 *
 * Each mutating method validates its operand, computes the new value with
 * the free functions from ./operations and only then commits it together
 * with a history record. A failed call leaves value and history untouched.
 *
 * @example
 * const calc = new Calculator(10);
 * calc.add(5).multiply(2).value; // 30
 * calc.undo().value;             // 15
 */

import { CalculatorError } from './errors';
import { add, divide, multiply, power, subtract } from './operations';
import { createRecord } from './types';
import type { ArithmeticOperation, OperationName, OperationRecord } from './types';
import { validateNumber } from './validators';

const OPERATIONS: Record<ArithmeticOperation, (a: number, b: number) => number> = {
    add,
    subtract,
    multiply,
    divide,
    power,
};

export class Calculator {
    private current: number;
    private records: OperationRecord[] = [];

    /**
     * @param initialValue - Starting value (default: 0)
     * @throws InvalidInputError if initialValue is not a finite number
     */
    constructor(initialValue: number = 0) {
        this.current = validateNumber(initialValue);
        this.record('init');
    }

    get value(): number {
        return this.current;
    }

    /**
     * Snapshot of every recorded step, oldest first. The array is a copy;
     * the records themselves are frozen.
     */
    get history(): readonly OperationRecord[] {
        return [...this.records];
    }

    add(operand: number): this {
        return this.apply('add', operand);
    }

    subtract(operand: number): this {
        return this.apply('subtract', operand);
    }

    multiply(operand: number): this {
        return this.apply('multiply', operand);
    }

    divide(operand: number): this {
        return this.apply('divide', operand);
    }

    power(exponent: number): this {
        return this.apply('power', exponent);
    }

    /**
     * Replaces the current value without arithmetic.
     */
    set(value: number): this {
        this.current = validateNumber(value);
        this.record('set', value);
        return this;
    }

    /**
     * Resets to zero and drops all history except a fresh `clear` record.
     */
    clear(): this {
        this.current = 0;
        this.records = [];
        this.record('clear');
        return this;
    }

    /**
     * Removes the latest record and restores the value before it.
     * The first record can never be undone.
     *
     * @throws CalculatorError if only the first record remains
     */
    undo(): this {
        if (this.records.length <= 1) {
            throw new CalculatorError('Nothing to undo');
        }

        this.records.pop();
        this.current = this.records[this.records.length - 1].value;
        return this;
    }

    /**
     * Independent copy: later mutations on either instance do not affect the other.
     */
    copy(): Calculator {
        const clone = new Calculator(this.current);
        clone.records = [...this.records];
        return clone;
    }

    /**
     * Two calculators are equal when their values are; history is ignored.
     */
    equals(other: unknown): boolean {
        return other instanceof Calculator && this.current === other.current;
    }

    /**
     * 32-bit hash of the value's IEEE bits, consistent with equals().
     */
    hashCode(): number {
        const view = new DataView(new ArrayBuffer(8));
        // -0 === 0, so both must hash the same
        view.setFloat64(0, this.current === 0 ? 0 : this.current);
        return (view.getInt32(0) ^ view.getInt32(4)) | 0;
    }

    toString(): string {
        return `Calculator(value=${this.current}, historyLength=${this.records.length})`;
    }

    private apply(operation: ArithmeticOperation, operand: number): this {
        validateNumber(operand);
        this.current = OPERATIONS[operation](this.current, operand);
        this.record(operation, operand);
        return this;
    }

    private record(operation: OperationName, ...operands: number[]): void {
        this.records.push(createRecord(this.current, operation, operands));
    }
}
