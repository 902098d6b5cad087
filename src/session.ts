// ============================================================
// CalculatorSession - line commands against a Calculator
// One command per line: `<name> [operand]`. No expression parsing.
// ============================================================

import { Calculator } from './calculator';
import { CalculatorError } from './errors';
import { formatRecord } from './types';
import type { ArithmeticOperation } from './types';

type UnaryCommand = ArithmeticOperation | 'set';
type NullaryCommand = 'clear' | 'undo' | 'value' | 'history' | 'help';

const UNARY_ALIASES = new Map<string, UnaryCommand>([
    ['add', 'add'], ['+', 'add'],
    ['sub', 'subtract'], ['subtract', 'subtract'], ['-', 'subtract'],
    ['mul', 'multiply'], ['multiply', 'multiply'], ['*', 'multiply'],
    ['div', 'divide'], ['divide', 'divide'], ['/', 'divide'],
    ['pow', 'power'], ['power', 'power'], ['^', 'power'],
    ['set', 'set'],
]);

const NULLARY_COMMANDS: readonly NullaryCommand[] = ['clear', 'undo', 'value', 'history', 'help'];

export const HELP_TEXT = [
    'add|+ <n>       add n',
    'sub|- <n>       subtract n',
    'mul|* <n>       multiply by n',
    'div|/ <n>       divide by n',
    'pow|^ <n>       raise to the power n',
    'set <n>         replace the value',
    'clear           reset to 0 and drop history',
    'undo            revert the last step',
    'value           show the value',
    'history         list recorded steps',
].join('\n');

function isNullary(name: string): name is NullaryCommand {
    return (NULLARY_COMMANDS as readonly string[]).includes(name);
}

export class CalculatorSession {
    constructor(
        public readonly calculator: Calculator,
        private readonly precision: number = 12
    ) {}

    /**
     * Formats a value with the session's significant digits, dropping
     * trailing noise such as 0.30000000000000004.
     */
    formatValue(value: number): string {
        return String(Number(value.toPrecision(this.precision)));
    }

    /**
     * Runs one command line and returns what should be printed.
     *
     * @throws CalculatorError for unknown commands, bad arity, or any
     * failure raised by the calculator itself
     */
    execute(line: string): string {
        const [rawName, ...args] = line.trim().split(/\s+/).filter(Boolean);
        if (rawName === undefined) {
            return '';
        }
        const name = rawName.toLowerCase();

        const unary = UNARY_ALIASES.get(name);
        if (unary !== undefined) {
            if (args.length === 0) {
                throw new CalculatorError(`Missing operand for ${name}`);
            }
            if (args.length > 1) {
                throw new CalculatorError(`Too many arguments for ${name}`);
            }
            this.calculator[unary](Number(args[0]));
            return this.formatValue(this.calculator.value);
        }

        if (!isNullary(name)) {
            throw new CalculatorError('Unknown command', rawName);
        }
        if (args.length > 0) {
            throw new CalculatorError(`Too many arguments for ${name}`);
        }

        switch (name) {
            case 'clear':
                this.calculator.clear();
                return this.formatValue(this.calculator.value);
            case 'undo':
                this.calculator.undo();
                return this.formatValue(this.calculator.value);
            case 'value':
                return this.formatValue(this.calculator.value);
            case 'history':
                return this.calculator.history
                    .map((record, i) => `${i + 1}. ${formatRecord(record)}`)
                    .join('\n');
            case 'help':
                return HELP_TEXT;
        }
    }
}
