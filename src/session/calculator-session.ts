/**
 * Calculator Session
 *
 * What the calculator front end talks to: collects entries for one user,
 * runs the calculation and hands back everything needed to render results.
 */

import type { BatchFailure } from '../api/emissions-client.js';
import type { ResultAggregator } from '../aggregation/result-aggregator.js';
import { BatchStore, type BatchEntry } from '../batches/batch-store.js';
import { ValidationError } from '../errors.js';
import type { MetadataStore } from '../metadata/metadata-store.js';
import { summarize, toChartData, type BreakdownSummary } from '../presentation/breakdown-presenter.js';
import { displayName } from '../providers/provider-names.js';
import { buildStorageRequest, buildVmRequest } from '../requests/request-builder.js';
import { createComponentLogger, type Logger } from '../utils/logger.js';
import type {
    Breakdown,
    ChartDatum,
    ProviderId,
    StorageRequest,
    VmRequest,
} from '../types/carbon.js';

export type SessionPhase = 'empty' | 'accumulating' | 'calculated';

export interface VmInput {
    provider: ProviderId;
    region: string;
    instance: string;
    duration: unknown;
    durationUnit?: unknown;
    vcpuUtilization?: unknown;
}

export interface StorageInput {
    provider: ProviderId;
    region: string;
    storageType: unknown;
    duration: unknown;
    dataStored: unknown;
    dataUnit: unknown;
    durationUnit?: unknown;
}

export interface CalculationReport {
    breakdown: Breakdown;
    summary: BreakdownSummary;
    chart: ChartDatum[];
    failures: BatchFailure[];
    items: BatchEntry[];
    itemCount: number;
}

interface SessionOptions {
    batches?: BatchStore;
    logger?: Logger;
}

export class CalculatorSession {
    private readonly batches: BatchStore;
    private readonly log: Logger;
    private calculated = false;

    constructor(
        private readonly metadata: MetadataStore,
        private readonly aggregator: ResultAggregator,
        options: SessionOptions = {}
    ) {
        this.batches = options.batches ?? new BatchStore();
        this.log = createComponentLogger('session', options.logger);
    }

    get phase(): SessionPhase {
        if (this.batches.totalCount() === 0) return 'empty';
        return this.calculated ? 'calculated' : 'accumulating';
    }

    get catalog(): MetadataStore {
        return this.metadata;
    }

    addVm(input: VmInput): VmRequest {
        this.requireRegion(input.provider, input.region);
        if (!this.metadata.hasInstance(input.provider, input.instance)) {
            throw new ValidationError(
                `Instance type '${input.instance}' is not available for ${displayName(input.provider)}.`
            );
        }

        const request = buildVmRequest(
            input.region,
            input.instance,
            input.duration,
            input.durationUnit,
            input.vcpuUtilization
        );
        this.batches.append(input.provider, 'vm', request);
        this.calculated = false;
        this.log.debug({ provider: input.provider, instance: request.instance }, 'VM added to calculation');
        return request;
    }

    addStorage(input: StorageInput): StorageRequest {
        this.requireRegion(input.provider, input.region);

        const request = buildStorageRequest(
            input.region,
            input.storageType,
            input.duration,
            input.dataStored,
            input.dataUnit,
            input.durationUnit
        );
        this.batches.append(input.provider, 'storage', request);
        this.calculated = false;
        this.log.debug({ provider: input.provider, storageType: request.storage_type }, 'Storage added to calculation');
        return request;
    }

    reset(): void {
        this.batches.clear();
        this.calculated = false;
        this.log.info('All calculation entries have been reset');
    }

    items(): BatchEntry[] {
        return this.batches.entries();
    }

    get itemCount(): number {
        return this.batches.totalCount();
    }

    async calculate(): Promise<CalculationReport> {
        const itemCount = this.batches.totalCount();
        if (itemCount === 0) {
            throw new ValidationError('Please add at least one item to calculate emissions.');
        }

        const { breakdown, failures } = await this.aggregator.calculateBreakdown(this.batches);
        this.calculated = true;

        return {
            breakdown,
            summary: summarize(breakdown),
            chart: toChartData(breakdown),
            failures,
            items: this.batches.entries(),
            itemCount,
        };
    }

    private requireRegion(provider: ProviderId, region: string): void {
        if (!this.metadata.hasRegion(provider, region)) {
            throw new ValidationError(`Region '${region}' is not available for ${displayName(provider)}.`);
        }
    }
}
