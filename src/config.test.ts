import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from './config';
import { InvalidInputError, OutOfRangeError } from './errors';

describe('loadConfig', () => {
    it('should fall back to defaults', () => {
        expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
        expect(loadConfig({ CALC_INITIAL_VALUE: '  ', CALC_PROMPT: '' })).toEqual(DEFAULT_CONFIG);
    });

    it('should read values from the environment', () => {
        expect(loadConfig({ CALC_INITIAL_VALUE: '2.5', CALC_PRECISION: '6', CALC_PROMPT: ' acc ' })).toEqual({
            initialValue: 2.5,
            precision: 6,
            prompt: 'acc',
        });
    });

    it('should reject a non-numeric initial value', () => {
        expect(() => loadConfig({ CALC_INITIAL_VALUE: 'abc' })).toThrow(InvalidInputError);
        expect(() => loadConfig({ CALC_INITIAL_VALUE: 'abc' })).toThrow(
            'CALC_INITIAL_VALUE must be a finite number: "abc"'
        );
        expect(() => loadConfig({ CALC_INITIAL_VALUE: 'Infinity' })).toThrow(InvalidInputError);
    });

    it('should require an integer precision between 1 and 17', () => {
        expect(() => loadConfig({ CALC_PRECISION: '2.5' })).toThrow('CALC_PRECISION must be an integer');
        expect(() => loadConfig({ CALC_PRECISION: '0' })).toThrow(OutOfRangeError);
        expect(() => loadConfig({ CALC_PRECISION: '18' })).toThrow('Value out of range [1, 17]: 18');
        expect(loadConfig({ CALC_PRECISION: '17' }).precision).toBe(17);
    });
});
