/**
 * Result Aggregator
 * Submits every non-empty batch and folds the responses into a breakdown
 */

import type { BatchFailure, EmissionsSender } from '../api/emissions-client.js';
import type { BatchSource } from '../batches/batch-store.js';
import { createComponentLogger, type Logger } from '../utils/logger.js';
import {
    BUCKET_SUFFIXES,
    CO2E_FIELDS,
    PROVIDER_IDS,
    RESOURCE_KIND_ENDPOINTS,
    type Breakdown,
    type BreakdownKey,
    type ProviderId,
    type RawEmissionsResult,
    type ResourceKind,
} from '../types/carbon.js';

export interface KindCalculation {
    kind: ResourceKind;
    totals: Record<ProviderId, number>;
    failures: BatchFailure[];
}

export interface BreakdownCalculation {
    breakdown: Breakdown;
    failures: BatchFailure[];
}

export function breakdownKey(provider: ProviderId, kind: ResourceKind): BreakdownKey {
    return `${provider}_${BUCKET_SUFFIXES[kind]}`;
}

export function emptyBreakdown(): Breakdown {
    return {
        aws_vm: 0,
        azure_vm: 0,
        gcp_vm: 0,
        aws_store: 0,
        azure_store: 0,
        gcp_store: 0,
    };
}

/**
 * Read the CO2e value of one result; a missing or non-numeric field counts as 0
 */
export function extractCo2e(rawResult: RawEmissionsResult, kind: ResourceKind): number {
    if (typeof rawResult !== 'object' || rawResult === null) return 0;
    const value: unknown = Reflect.get(rawResult, CO2E_FIELDS[kind]);
    return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function sumBatch(rawResults: readonly RawEmissionsResult[], kind: ResourceKind): number {
    return rawResults.reduce<number>((total, result) => total + extractCo2e(result, kind), 0);
}

export class ResultAggregator {
    private readonly log: Logger;

    constructor(
        private readonly client: EmissionsSender,
        logger?: Logger
    ) {
        this.log = createComponentLogger('aggregator', logger);
    }

    /**
     * Total CO2e per provider for one resource kind. Providers with an empty
     * batch are skipped without a request; a missing credential propagates.
     */
    async calculateAll(kind: ResourceKind, batches: BatchSource): Promise<KindCalculation> {
        const endpoint = RESOURCE_KIND_ENDPOINTS[kind];

        const outcomes = await Promise.all(
            PROVIDER_IDS.map(async (provider) => {
                const requests = batches.snapshot(provider, kind);
                if (requests.length === 0) {
                    return { provider, total: 0, failures: [] };
                }

                this.log.info({ provider, kind, items: requests.length }, `Calculating ${provider} ${kind} emissions`);
                const response = await this.client.sendBatch(provider, requests, endpoint);
                return { provider, total: sumBatch(response.results, kind), failures: response.failures };
            })
        );

        const totals: Record<ProviderId, number> = { aws: 0, azure: 0, gcp: 0 };
        const failures: BatchFailure[] = [];
        for (const outcome of outcomes) {
            totals[outcome.provider] = outcome.total;
            failures.push(...outcome.failures);
        }

        return { kind, totals, failures };
    }

    /**
     * Run the vm and storage calculations and merge them into one breakdown
     */
    async calculateBreakdown(batches: BatchSource): Promise<BreakdownCalculation> {
        const breakdown = emptyBreakdown();
        const failures: BatchFailure[] = [];

        for (const calculation of [
            await this.calculateAll('vm', batches),
            await this.calculateAll('storage', batches),
        ]) {
            for (const provider of PROVIDER_IDS) {
                breakdown[breakdownKey(provider, calculation.kind)] = calculation.totals[provider];
            }
            failures.push(...calculation.failures);
        }

        if (failures.length > 0) {
            this.log.warn({ failures: failures.length }, 'Some calculation items failed');
        }

        return { breakdown, failures };
    }
}
