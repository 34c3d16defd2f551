import { breakdownKey } from '../aggregation/result-aggregator.js';
import { displayName } from '../providers/provider-names.js';
import {
    PROVIDER_IDS,
    RESOURCE_KINDS,
    type Breakdown,
    type ChartDatum,
    type ProviderId,
    type ResourceKind,
} from '../types/carbon.js';

export const CHART_TITLE = 'CO2e Emissions by Service (kg)';
export const NO_DATA_LABEL = 'No Data';
export const DISPLAY_PRECISION = 5;

export interface Contributor {
    provider: ProviderId;
    kind: ResourceKind;
    label: string;
    value: number;
}

export interface BreakdownSummary {
    total: number;
    vm: number;
    storage: number;
    // null when nothing was emitted
    largest: Contributor | null;
}

function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

export function bucketLabel(provider: ProviderId, kind: ResourceKind): string {
    return `${displayName(provider)} ${capitalize(kind)}`;
}

function contributors(breakdown: Breakdown): Contributor[] {
    return RESOURCE_KINDS.flatMap((kind) =>
        PROVIDER_IDS.map((provider) => ({
            provider,
            kind,
            label: bucketLabel(provider, kind),
            value: breakdown[breakdownKey(provider, kind)],
        }))
    );
}

/**
 * Chart entries for every bucket with a positive value. Never empty: with
 * nothing to show, a single "No Data" entry is returned.
 */
export function toChartData(breakdown: Breakdown): ChartDatum[] {
    const data = contributors(breakdown)
        .filter((entry) => entry.value > 0)
        .map(({ label, value }) => ({ label, value }));

    return data.length > 0 ? data : [{ label: NO_DATA_LABEL, value: 1 }];
}

export function summarize(breakdown: Breakdown): BreakdownSummary {
    const entries = contributors(breakdown);
    const sumOf = (kind: ResourceKind) =>
        entries.filter((entry) => entry.kind === kind).reduce((sum, entry) => sum + entry.value, 0);

    const vm = sumOf('vm');
    const storage = sumOf('storage');
    const total = vm + storage;

    let largest: Contributor | null = null;
    if (total > 0) {
        for (const entry of entries) {
            if (largest === null || entry.value > largest.value) largest = entry;
        }
    }

    return { total, vm, storage, largest };
}

export function formatCo2e(value: number): string {
    return value.toFixed(DISPLAY_PRECISION);
}
