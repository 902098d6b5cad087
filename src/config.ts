// ============================================================
// Config - environment settings for the terminal front end
// ============================================================

import * as dotenv from 'dotenv';
import { InvalidInputError } from './errors';
import { validateNumber, validateRange } from './validators';

export interface CalculatorConfig {
    initialValue: number;
    precision: number;     // Significant digits when printing values
    prompt: string;
}

export const DEFAULT_CONFIG: CalculatorConfig = {
    initialValue: 0,
    precision: 12,
    prompt: 'calc',
};

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    try {
        return validateNumber(Number(raw));
    } catch (error) {
        if (error instanceof InvalidInputError) {
            throw new InvalidInputError(raw, `${key} must be a finite number`);
        }
        throw error;
    }
}

/**
 * Reads CALC_INITIAL_VALUE, CALC_PRECISION and CALC_PROMPT.
 *
 * @param env - Defaults to process.env after loading .env from the working directory
 */
export function loadConfig(env?: NodeJS.ProcessEnv): CalculatorConfig {
    if (!env) {
        dotenv.config();
        env = process.env;
    }

    const precision = readNumber(env, 'CALC_PRECISION', DEFAULT_CONFIG.precision);
    if (!Number.isInteger(precision)) {
        throw new InvalidInputError(precision, 'CALC_PRECISION must be an integer');
    }
    validateRange(precision, 1, 17);

    return {
        initialValue: readNumber(env, 'CALC_INITIAL_VALUE', DEFAULT_CONFIG.initialValue),
        precision,
        prompt: env.CALC_PROMPT?.trim() || DEFAULT_CONFIG.prompt,
    };
}
