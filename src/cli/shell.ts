/**
 * Interactive session shell
 * Reads one command per line and keeps the batches until exit
 */

import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import chalk from 'chalk';
import ora from 'ora';
import { CarbonCalculatorError } from '../errors.js';
import { parseProviderId } from '../providers/provider-names.js';
import type { CalculatorSession } from '../session/calculator-session.js';
import { STORAGE_USAGE, VM_USAGE, parseStorageTokens, parseVmTokens } from './entry-parser.js';
import { renderCatalog, renderItems, renderReport } from './render.js';

const HELP = [
    chalk.bold('Commands:'),
    `  ${VM_USAGE}`,
    `  ${STORAGE_USAGE}`,
    '  items                 list pending entries',
    '  calculate             submit all entries and show the breakdown',
    '  reset                 clear all entries',
    '  catalog [provider]    list regions and instance types',
    '  help                  show this help',
    '  exit                  leave the session',
    '',
    chalk.dim('Quote storage labels with spaces, e.g. "Solid-state Drive".'),
].join('\n');

export interface ShellOutcome {
    output: string;
    exit: boolean;
}

/**
 * Split a command line on whitespace, keeping double-quoted words together
 */
export function tokenize(line: string): string[] {
    const tokens: string[] = [];
    for (const match of line.matchAll(/"([^"]*)"|(\S+)/g)) {
        tokens.push(match[1] ?? match[2] ?? '');
    }
    return tokens;
}

export async function executeCommand(session: CalculatorSession, line: string): Promise<ShellOutcome> {
    const [command, ...args] = tokenize(line);

    switch (command?.toLowerCase()) {
        case undefined:
            return { output: '', exit: false };

        case 'vm': {
            const request = session.addVm(parseVmTokens(args));
            return { output: chalk.green(`Added VM instance ${request.instance} to calculation`), exit: false };
        }

        case 'storage': {
            const request = session.addStorage(parseStorageTokens(args));
            return { output: chalk.green(`Added ${request.storage_type} storage to calculation`), exit: false };
        }

        case 'items':
            return { output: renderItems(session.items()), exit: false };

        case 'calculate': {
            if (session.itemCount === 0) {
                return { output: chalk.yellow('Please add at least one item to calculate emissions'), exit: false };
            }
            const spinner = ora('Calculating emissions...').start();
            try {
                const report = await session.calculate();
                spinner.stop();
                return { output: renderReport(report), exit: false };
            } catch (error) {
                spinner.fail('Calculation failed');
                throw error;
            }
        }

        case 'reset':
            session.reset();
            return { output: chalk.green('All calculation entries have been reset'), exit: false };

        case 'catalog': {
            const providers = args[0] ? [parseProviderId(args[0])] : session.catalog.providers();
            return { output: renderCatalog(session.catalog, providers), exit: false };
        }

        case 'help':
            return { output: HELP, exit: false };

        case 'exit':
        case 'quit':
            return { output: '', exit: true };

        default:
            return { output: chalk.red(`Unknown command '${command}'. Type 'help' for a list of commands.`), exit: false };
    }
}

export async function runShell(session: CalculatorSession): Promise<void> {
    const rl = createInterface({ input: stdin, output: stdout, terminal: stdin.isTTY });
    console.log(chalk.bold('☁️  Cloud Carbon Emissions Calculator'));
    console.log(chalk.dim("Type 'help' for a list of commands.\n"));

    rl.setPrompt('carbon> ');
    rl.prompt();

    try {
        for await (const line of rl) {
            try {
                const outcome = await executeCommand(session, line);
                if (outcome.output) console.log(outcome.output);
                if (outcome.exit) break;
            } catch (error) {
                if (!(error instanceof CarbonCalculatorError)) throw error;
                console.error(chalk.red(error.message));
            }
            rl.prompt();
        }
    } finally {
        rl.close();
    }
}
