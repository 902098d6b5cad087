// ============================================================
// Prompt line handling for the calc CLI
// ============================================================

import { isCalculatorError } from './errors';
import { CalculatorSession } from './session';

// ============================================================
// ANSI Colors
// ============================================================
export const c = {
    reset: '\x1b[0m',
    bold: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    cyan: '\x1b[36m',
};

export const EXIT_COMMANDS = new Set(['exit', 'quit']);

export type PromptStep =
    | { done: true }
    | { done: false; output: string };   // Empty output prints nothing

/**
 * Runs one prompt line against the session and renders what to print.
 * CalculatorErrors become a red `Error: <message>` line; anything else is rethrown.
 */
export function processLine(session: CalculatorSession, line: string): PromptStep {
    if (EXIT_COMMANDS.has(line.trim().toLowerCase())) {
        return { done: true };
    }

    try {
        const output = session.execute(line);
        if (!output) {
            return { done: false, output: '' };
        }
        return { done: false, output: `  ${c.green}${output.split('\n').join('\n  ')}${c.reset}` };
    } catch (error) {
        if (!isCalculatorError(error)) {
            throw error;
        }
        return { done: false, output: `  ${c.red}Error: ${error.message}${c.reset}` };
    }
}
