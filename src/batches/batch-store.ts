/**
 * Batch Store
 *
 * Pending calculation entries for one session, keyed by provider and resource
 * kind. One instance per session; never shared between sessions.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import {
    PROVIDER_IDS,
    RESOURCE_KINDS,
    type ProviderId,
    type RequestByKind,
    type ResourceKind,
} from '../types/carbon.js';

export type ProviderBatches = {
    readonly [K in ResourceKind]: readonly RequestByKind[K][];
};

export type BatchState = Readonly<Record<ProviderId, ProviderBatches>>;

export interface BatchEntry<K extends ResourceKind = ResourceKind> {
    provider: ProviderId;
    kind: K;
    items: readonly RequestByKind[K][];
}

/**
 * Read-only view used by the aggregator
 */
export interface BatchSource {
    snapshot<K extends ResourceKind>(provider: ProviderId, kind: K): readonly RequestByKind[K][];
}

function emptyBatches(): BatchState {
    return {
        aws: { vm: [], storage: [] },
        azure: { vm: [], storage: [] },
        gcp: { vm: [], storage: [] },
    };
}

export class BatchStore implements BatchSource {
    private readonly store: StoreApi<BatchState> = createStore<BatchState>()(() => emptyBatches());

    append<K extends ResourceKind>(provider: ProviderId, kind: K, request: RequestByKind[K]): void {
        this.store.setState((state) => {
            const next: Record<ProviderId, ProviderBatches> = { ...state };
            next[provider] = appendToProvider(state[provider], kind, request);
            return next;
        });
    }

    /**
     * Empty all six batches in a single state transition
     */
    clear(): void {
        this.store.setState(emptyBatches(), true);
    }

    snapshot<K extends ResourceKind>(provider: ProviderId, kind: K): readonly RequestByKind[K][] {
        const batches: ProviderBatches = this.store.getState()[provider];
        return batches[kind];
    }

    count(provider: ProviderId, kind: ResourceKind): number {
        return this.snapshot(provider, kind).length;
    }

    totalCount(): number {
        return this.entries().reduce((sum, entry) => sum + entry.items.length, 0);
    }

    /**
     * Non-empty batches, vm batches first, providers in canonical order
     */
    entries(): BatchEntry[] {
        const entries: BatchEntry[] = [];
        for (const kind of RESOURCE_KINDS) {
            for (const provider of PROVIDER_IDS) {
                const items = this.snapshot(provider, kind);
                if (items.length > 0) {
                    entries.push({ provider, kind, items });
                }
            }
        }
        return entries;
    }

    subscribe(listener: (state: BatchState, previous: BatchState) => void): () => void {
        return this.store.subscribe(listener);
    }
}

function appendToProvider<K extends ResourceKind>(
    batches: ProviderBatches,
    kind: K,
    request: RequestByKind[K]
): ProviderBatches {
    const next: { -readonly [P in ResourceKind]: readonly RequestByKind[P][] } = { ...batches };
    const current: readonly RequestByKind[K][] = batches[kind];
    next[kind] = [...current, request];
    return next;
}
