#!/usr/bin/env node
/**
 * CLI for the Cloud Carbon Calculator
 */

import { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { config } from '../config/index.js';
import { EmissionsClient } from '../api/emissions-client.js';
import { ResultAggregator } from '../aggregation/result-aggregator.js';
import { CarbonCalculatorError, MissingCredentialError } from '../errors.js';
import { MetadataStore } from '../metadata/metadata-store.js';
import { parseProviderId } from '../providers/provider-names.js';
import { CalculatorSession } from '../session/calculator-session.js';
import { logger } from '../utils/logger.js';
import { parseStorageEntry, parseVmEntry, readEntriesFile } from './entry-parser.js';
import { renderCatalog, renderReport } from './render.js';
import { runShell } from './shell.js';

interface EstimateOptions {
    vm: string[];
    storage: string[];
    file?: string;
}

interface SessionCommandOptions {
    metadata: string;
}

async function createSession(metadataPath: string): Promise<CalculatorSession> {
    const client = EmissionsClient.fromConfig();
    if (!client.hasCredential) {
        throw new MissingCredentialError();
    }

    const metadata = await MetadataStore.load(metadataPath);
    return new CalculatorSession(metadata, new ResultAggregator(client));
}

function fail(error: unknown): never {
    if (error instanceof CarbonCalculatorError) {
        console.error(chalk.red(`⚠️  ${error.message}`));
    } else {
        logger.error({ err: error }, 'CLI error');
        console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    }
    process.exit(1);
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

const program = new Command();

program
    .name('carbon-calc')
    .description('Estimate CO2e emissions of cloud VMs and storage on AWS, Azure and GCP')
    .version('1.0.0');

program
    .command('catalog')
    .description('List the regions and instance types available per provider')
    .argument('[provider]', 'aws, azure or gcp')
    .option('-m, --metadata <path>', 'Metadata catalog file', config.metadata.path)
    .action(async (provider: string | undefined, options: SessionCommandOptions) => {
        try {
            const metadata = await MetadataStore.load(options.metadata);
            const providers = provider ? [parseProviderId(provider)] : metadata.providers();
            console.log(renderCatalog(metadata, providers));
        } catch (error) {
            fail(error);
        }
    });

program
    .command('estimate')
    .description('Calculate emissions for the given entries in one go')
    .option('--vm <entry>', 'VM entry provider:region:instance:duration[:unit[:utilization]]', collect, [])
    .option('--storage <entry>', 'Storage entry provider:region:type:duration:data:dataUnit[:unit]', collect, [])
    .option('-f, --file <path>', 'JSON file with { "vm": [...], "storage": [...] } entries')
    .option('-m, --metadata <path>', 'Metadata catalog file', config.metadata.path)
    .action(async (options: EstimateOptions & SessionCommandOptions) => {
        try {
            const session = await createSession(options.metadata);

            if (options.file) {
                const entries = await readEntriesFile(options.file);
                entries.vm.forEach((input) => session.addVm(input));
                entries.storage.forEach((input) => session.addStorage(input));
            }
            options.vm.forEach((entry) => session.addVm(parseVmEntry(entry)));
            options.storage.forEach((entry) => session.addStorage(parseStorageEntry(entry)));

            if (session.itemCount === 0) {
                console.log(chalk.yellow('Please add at least one item to calculate emissions (see --help).'));
                return;
            }

            const spinner = ora(`Calculating emissions for ${session.itemCount} items...`).start();
            try {
                const report = await session.calculate();
                spinner.succeed('Calculation complete');
                console.log(renderReport(report));
                if (report.failures.length > 0) process.exitCode = 2;
            } catch (error) {
                spinner.fail('Calculation failed');
                throw error;
            }
        } catch (error) {
            fail(error);
        }
    });

program
    .command('session')
    .description('Start an interactive calculation session')
    .option('-m, --metadata <path>', 'Metadata catalog file', config.metadata.path)
    .action(async (options: SessionCommandOptions) => {
        try {
            const session = await createSession(options.metadata);
            await runShell(session);
        } catch (error) {
            fail(error);
        }
    });

await program.parseAsync();
