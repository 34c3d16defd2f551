/**
 * Cloud Carbon Calculator
 * Estimate CO2e emissions of cloud VMs and storage on AWS, Azure and GCP
 */

export * from './types/carbon.js';
export * from './errors.js';
export { convertProviderName, parseProviderId, isProviderId, displayName } from './providers/provider-names.js';
export { buildVmRequest, buildStorageRequest, normalizeStorageType, STORAGE_TYPE_LABELS } from './requests/request-builder.js';
export { MetadataStore, DEFAULT_CATALOG } from './metadata/metadata-store.js';
export { BatchStore, type BatchEntry, type BatchSource, type BatchState } from './batches/batch-store.js';
export { createApiClient, classifyRequestError, type ApiClientOptions } from './api/client.js';
export {
    EmissionsClient,
    type BatchFailure,
    type BatchResponse,
    type EmissionsClientOptions,
    type EmissionsSender,
} from './api/emissions-client.js';
export {
    ResultAggregator,
    breakdownKey,
    emptyBreakdown,
    extractCo2e,
    sumBatch,
    type BreakdownCalculation,
    type KindCalculation,
} from './aggregation/result-aggregator.js';
export {
    toChartData,
    summarize,
    bucketLabel,
    formatCo2e,
    CHART_TITLE,
    NO_DATA_LABEL,
    type BreakdownSummary,
    type Contributor,
} from './presentation/breakdown-presenter.js';
export {
    CalculatorSession,
    type CalculationReport,
    type SessionPhase,
    type StorageInput,
    type VmInput,
} from './session/calculator-session.js';
