/**
 * Metadata Store
 * Catalog of valid regions and VM instance types per provider
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { MetadataLoadError, errorMessage } from '../errors.js';
import { createComponentLogger, type Logger } from '../utils/logger.js';
import { PROVIDER_IDS, type MetadataCatalog, type ProviderId } from '../types/carbon.js';

const ProviderCatalogSchema = z.object({
    regions: z.array(z.string()).min(1),
    virtual_machine_instances: z.array(z.string()).min(1),
});

const MetadataCatalogSchema = z.object({
    cloud_providers: z.object({
        aws: ProviderCatalogSchema,
        azure: ProviderCatalogSchema,
        gcp: ProviderCatalogSchema,
    }),
});

export const DEFAULT_CATALOG: MetadataCatalog = {
    cloud_providers: {
        aws: { regions: ['us-east-1'], virtual_machine_instances: ['t2.micro'] },
        azure: { regions: ['eastus'], virtual_machine_instances: ['Standard_B1s'] },
        gcp: { regions: ['us-central1'], virtual_machine_instances: ['e2-micro'] },
    },
};

interface LoadOptions {
    logger?: Logger;
}

export class MetadataStore {
    private constructor(
        readonly catalog: MetadataCatalog,
        readonly loadError: MetadataLoadError | null
    ) {}

    /**
     * Read the catalog from a JSON file, falling back to the built-in default.
     * Never throws: the cause of a fallback is logged and kept on `loadError`.
     */
    static async load(source: string, options: LoadOptions = {}): Promise<MetadataStore> {
        const log = createComponentLogger('metadata', options.logger);

        try {
            const catalog = await readCatalog(source);
            log.debug({ source }, 'Metadata catalog loaded');
            return new MetadataStore(catalog, null);
        } catch (error) {
            const loadError =
                error instanceof MetadataLoadError
                    ? error
                    : new MetadataLoadError('unreadable', source, errorMessage(error), { cause: error });
            log.error({ source, reason: loadError.reason }, loadError.message);
            log.warn('Using built-in default metadata catalog');
            return new MetadataStore(DEFAULT_CATALOG, loadError);
        }
    }

    static fromCatalog(catalog: MetadataCatalog): MetadataStore {
        return new MetadataStore(catalog, null);
    }

    get isFallback(): boolean {
        return this.loadError !== null;
    }

    providers(): readonly ProviderId[] {
        return PROVIDER_IDS;
    }

    regions(provider: ProviderId): readonly string[] {
        return this.catalog.cloud_providers[provider].regions;
    }

    instances(provider: ProviderId): readonly string[] {
        return this.catalog.cloud_providers[provider].virtual_machine_instances;
    }

    hasRegion(provider: ProviderId, region: string): boolean {
        return this.regions(provider).includes(region);
    }

    hasInstance(provider: ProviderId, instance: string): boolean {
        return this.instances(provider).includes(instance);
    }
}

async function readCatalog(source: string): Promise<MetadataCatalog> {
    let raw: string;
    try {
        raw = await readFile(source, 'utf-8');
    } catch (error) {
        const reason = isNotFound(error) ? 'not_found' : 'unreadable';
        throw new MetadataLoadError(reason, source, errorMessage(error), { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new MetadataLoadError('malformed', source, errorMessage(error), { cause: error });
    }

    const result = MetadataCatalogSchema.safeParse(parsed);
    if (!result.success) {
        const detail = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('; ');
        throw new MetadataLoadError('malformed', source, detail);
    }
    return result.data;
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
