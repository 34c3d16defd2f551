/**
 * Shared types for the carbon calculator
 */

export const PROVIDER_IDS = ['aws', 'azure', 'gcp'] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

export const PROVIDER_DISPLAY_NAMES = {
    aws: 'Amazon Web Services',
    azure: 'Microsoft Azure',
    gcp: 'Google Cloud Platform',
} as const satisfies Record<ProviderId, string>;

export type ProviderDisplayName = (typeof PROVIDER_DISPLAY_NAMES)[ProviderId];

export const RESOURCE_KINDS = ['vm', 'storage'] as const;
export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export const DURATION_UNITS = ['ms', 's', 'm', 'h', 'day', 'year'] as const;
export type DurationUnit = (typeof DURATION_UNITS)[number];

export const DATA_UNITS = ['MB', 'GB', 'TB'] as const;
export type DataUnit = (typeof DATA_UNITS)[number];

export type Endpoint = 'instance' | 'storage';

// Per-kind wiring: remote endpoint, CO2e field in the response, breakdown key suffix
export const RESOURCE_KIND_ENDPOINTS: Record<ResourceKind, Endpoint> = {
    vm: 'instance',
    storage: 'storage',
};

export const ENDPOINT_KINDS: Record<Endpoint, ResourceKind> = {
    instance: 'vm',
    storage: 'storage',
};

export const CO2E_FIELDS = {
    vm: 'total_co2e',
    storage: 'co2e',
} as const satisfies Record<ResourceKind, string>;

export const BUCKET_SUFFIXES = {
    vm: 'vm',
    storage: 'store',
} as const satisfies Record<ResourceKind, string>;

export type BucketSuffix = (typeof BUCKET_SUFFIXES)[ResourceKind];

export interface VmRequest {
    readonly region: string;
    readonly instance: string;
    readonly duration: number;
    readonly duration_unit: DurationUnit;
    readonly average_vcpu_utilization: number;
}

export interface StorageRequest {
    readonly region: string;
    readonly storage_type: string;
    readonly data: number;
    readonly data_unit: DataUnit;
    readonly duration: number;
    readonly duration_unit: DurationUnit;
}

export interface RequestByKind {
    vm: VmRequest;
    storage: StorageRequest;
}

export type RequestBody = VmRequest | StorageRequest;

/**
 * Raw per-item API response; only the CO2e field is ever read
 */
export type RawEmissionsResult = unknown;

export type BreakdownKey = `${ProviderId}_${BucketSuffix}`;

/**
 * kg CO2e per provider and service bucket
 */
export type Breakdown = Record<BreakdownKey, number>;

export interface ProviderCatalog {
    regions: string[];
    virtual_machine_instances: string[];
}

export interface MetadataCatalog {
    cloud_providers: Record<ProviderId, ProviderCatalog>;
}

export interface ChartDatum {
    label: string;
    value: number;
}
