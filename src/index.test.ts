import { describe, it, expect } from 'vitest';
import {
    Calculator,
    DivisionByZeroError,
    InvalidInputError,
    OverflowError,
    divide,
    modulo,
    multiply,
    power,
    safeDivide,
    validateNumber,
} from './index';

describe('public surface', () => {
    it('should run the documented scenarios', () => {
        const calc = new Calculator(10);
        expect(calc.add(5).multiply(2).value).toBe(30);
        expect(calc.undo().value).toBe(15);
        expect(calc.undo().value).toBe(10);
        expect(() => calc.undo()).toThrow('Nothing to undo');

        expect(() => divide(10, 0)).toThrow(DivisionByZeroError);
        expect(() => multiply(1e308, 10)).toThrow(OverflowError);
        expect(() => power(0, -1)).toThrow(InvalidInputError);
        expect(() => power(-2, 0.5)).toThrow(InvalidInputError);
        expect(power(2, -1)).toBe(0.5);
        expect(modulo(-10, 3)).toBe(2);
        expect(modulo(10, 3)).toBe(1);
        expect(safeDivide(10, 0)).toBe(0);
        expect(safeDivide(10, 0, -1)).toBe(-1);
        expect(validateNumber(3.5)).toBe(3.5);
    });
});
