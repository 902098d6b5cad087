#!/usr/bin/env node
// ============================================================
// calc - interactive terminal front end for the Calculator
// ============================================================

import * as readline from 'readline';
import { Calculator } from './calculator';
import { loadConfig } from './config';
import type { CalculatorConfig } from './config';
import { isCalculatorError } from './errors';
import { c, processLine } from './repl';
import { CalculatorSession } from './session';

// ============================================================
// CLI Class
// ============================================================
class CalculatorCLI {
    private rl: readline.Interface;
    private session: CalculatorSession;

    constructor(private config: CalculatorConfig) {
        this.session = new CalculatorSession(new Calculator(config.initialValue), config.precision);
        this.rl = readline.createInterface({
            input: process.stdin,
            output: process.stdout,
        });
    }

    private println(msg: string = '') {
        console.log(msg);
    }

    private header() {
        this.println();
        this.println(`${c.cyan}${c.bold}  ╭──────────────────────────────╮${c.reset}`);
        this.println(`${c.cyan}${c.bold}  │${c.reset}  ${c.bold}Calculator${c.reset}  ${c.dim}v0.1.0${c.reset}          ${c.cyan}${c.bold}│${c.reset}`);
        this.println(`${c.cyan}${c.bold}  ╰──────────────────────────────╯${c.reset}`);
        this.println();
        this.println(`${c.dim}  Value: ${this.session.formatValue(this.session.calculator.value)}${c.reset}`);
        this.println(`${c.dim}  Type 'help' for commands or 'exit'/'quit' to leave${c.reset}`);
        this.println();
    }

    async run(): Promise<void> {
        this.header();
        this.rl.setPrompt(`${c.bold}${this.config.prompt}>${c.reset} `);
        this.rl.prompt();

        try {
            for await (const line of this.rl) {
                const step = processLine(this.session, line);
                if (step.done) {
                    break;
                }
                if (step.output) {
                    this.println(step.output);
                }
                this.rl.prompt();
            }
        } finally {
            this.rl.close();
        }
    }
}

// ============================================================
// Entry Point
// ============================================================
async function main() {
    let config: CalculatorConfig;
    try {
        config = loadConfig();
    } catch (error) {
        if (!isCalculatorError(error)) {
            throw error;
        }
        console.error(`[Config] ${error.message}`);
        process.exitCode = 1;
        return;
    }

    const cli = new CalculatorCLI(config);
    await cli.run();
}

main().catch(err => {
    console.error(err);
    process.exitCode = 1;
});
