import chalk from 'chalk';
import type { BatchFailure } from '../api/emissions-client.js';
import type { BatchEntry } from '../batches/batch-store.js';
import type { MetadataStore } from '../metadata/metadata-store.js';
import {
    CHART_TITLE,
    NO_DATA_LABEL,
    formatCo2e,
} from '../presentation/breakdown-presenter.js';
import { displayName } from '../providers/provider-names.js';
import type { CalculationReport } from '../session/calculator-session.js';
import { ENDPOINT_KINDS, type ChartDatum, type ProviderId, type ResourceKind } from '../types/carbon.js';

const RULE = '═'.repeat(43);
const BAR_WIDTH = 30;

const KIND_LABELS: Record<ResourceKind, string> = {
    vm: 'VM',
    storage: 'Storage',
};

export function heading(title: string): string {
    return [chalk.bold(RULE), chalk.bold(`  ${title}`), chalk.bold(RULE)].join('\n');
}

export function renderCatalog(metadata: MetadataStore, providers: readonly ProviderId[]): string {
    const lines: string[] = [];
    if (metadata.loadError) {
        lines.push(chalk.yellow(`${metadata.loadError.message}; showing the built-in default catalog.`));
    }
    for (const provider of providers) {
        lines.push('', chalk.bold(`${displayName(provider)} (${provider})`));
        lines.push(`  Regions:        ${metadata.regions(provider).join(', ')}`);
        lines.push(`  Instance types: ${metadata.instances(provider).join(', ')}`);
    }
    return lines.join('\n');
}

export function renderItems(entries: readonly BatchEntry[]): string {
    if (entries.length === 0) {
        return chalk.dim('No items added to calculation yet.');
    }

    const lines = [chalk.bold('Current Items in Calculation')];
    for (const entry of entries) {
        lines.push(`  ${chalk.cyan(`${displayName(entry.provider)} ${KIND_LABELS[entry.kind]}`)}: ${entry.items.length} items`);
        for (const [index, item] of entry.items.entries()) {
            lines.push(chalk.dim(`    Item ${index + 1}: ${JSON.stringify(item)}`));
        }
    }
    return lines.join('\n');
}

export function renderChart(chart: readonly ChartDatum[]): string {
    const lines = [chalk.bold(CHART_TITLE)];
    if (chart.length === 1 && chart[0]?.label === NO_DATA_LABEL) {
        lines.push(chalk.dim('  No emissions to display in chart'));
        return lines.join('\n');
    }

    const total = chart.reduce((sum, datum) => sum + datum.value, 0);
    const labelWidth = Math.max(...chart.map((datum) => datum.label.length));
    for (const datum of chart) {
        const share = total > 0 ? datum.value / total : 0;
        const bar = '█'.repeat(Math.max(1, Math.round(share * BAR_WIDTH)));
        lines.push(
            `  ${datum.label.padEnd(labelWidth)}  ${chalk.blue(bar)} ${formatCo2e(datum.value)} (${(share * 100).toFixed(1)}%)`
        );
    }
    return lines.join('\n');
}

export function describeFailure(failure: BatchFailure): string {
    const where = `${displayName(failure.provider)} ${KIND_LABELS[ENDPOINT_KINDS[failure.endpoint]]} item ${failure.itemIndex + 1}`;
    return `${where}: ${failure.error.message}`;
}

export function renderReport(report: CalculationReport): string {
    const { summary } = report;
    const lines = ['', heading('CALCULATION RESULTS'), ''];

    lines.push(chalk.green(`Total CO2 (kg): ${formatCo2e(summary.total)}`));
    if (summary.vm > 0) lines.push(`Virtual Machines CO2 (kg): ${formatCo2e(summary.vm)}`);
    if (summary.storage > 0) lines.push(`Storage CO2 (kg): ${formatCo2e(summary.storage)}`);
    if (summary.largest) {
        lines.push(
            `The largest contributor was ${summary.largest.label} with ${formatCo2e(summary.largest.value)} kg CO2e.`
        );
    }

    lines.push('', renderChart(report.chart));

    if (report.failures.length > 0) {
        lines.push('', chalk.red.bold('Failed Items:'));
        for (const failure of report.failures) {
            lines.push(chalk.red(`  • ${describeFailure(failure)}`));
        }
    }

    lines.push('', renderItems(report.items), '', chalk.dim('Powered by Climatiq API'));
    return lines.join('\n');
}
