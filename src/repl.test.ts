import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Calculator } from './calculator';
import { c, processLine } from './repl';
import { CalculatorSession } from './session';

describe('processLine', () => {
    let session: CalculatorSession;

    beforeEach(() => {
        session = new CalculatorSession(new Calculator(10));
    });

    it('should stop on exit and quit in any case', () => {
        expect(processLine(session, 'exit')).toEqual({ done: true });
        expect(processLine(session, '  QUIT ')).toEqual({ done: true });
        expect(session.calculator.history).toHaveLength(1);
    });

    it('should print command output in green', () => {
        expect(processLine(session, 'add 5')).toEqual({
            done: false,
            output: `  ${c.green}15${c.reset}`,
        });
    });

    it('should indent every line of multi-line output', () => {
        session.execute('add 5');
        expect(processLine(session, 'history')).toEqual({
            done: false,
            output: `  ${c.green}1. init() = 10\n  2. add(5) = 15${c.reset}`,
        });
    });

    it('should print nothing for blank lines', () => {
        expect(processLine(session, '   ')).toEqual({ done: false, output: '' });
    });

    it('should render calculator errors in red and keep going', () => {
        expect(processLine(session, 'div 0')).toEqual({
            done: false,
            output: `  ${c.red}Error: Division by zero: 10${c.reset}`,
        });
        expect(processLine(session, 'exit now')).toEqual({
            done: false,
            output: `  ${c.red}Error: Unknown command: "exit"${c.reset}`,
        });
        expect(session.calculator.value).toBe(10);
    });

    it('should rethrow errors that are not calculator errors', () => {
        vi.spyOn(session, 'execute').mockImplementation(() => {
            throw new TypeError('stdin closed');
        });
        expect(() => processLine(session, 'value')).toThrow(TypeError);
    });
});
