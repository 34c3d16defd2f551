import { ValidationError } from '../errors.js';
import {
    PROVIDER_DISPLAY_NAMES,
    PROVIDER_IDS,
    type ProviderDisplayName,
    type ProviderId,
} from '../types/carbon.js';

const PROVIDER_NAME_LOOKUP = new Map<string, ProviderId | ProviderDisplayName>(
    PROVIDER_IDS.flatMap((id): Array<[string, ProviderId | ProviderDisplayName]> => [
        [id, PROVIDER_DISPLAY_NAMES[id]],
        [PROVIDER_DISPLAY_NAMES[id], id],
    ])
);

export function isProviderId(value: string): value is ProviderId {
    return PROVIDER_IDS.some((id) => id === value);
}

export function displayName(provider: ProviderId): ProviderDisplayName {
    return PROVIDER_DISPLAY_NAMES[provider];
}

/**
 * Convert a provider id to its display name and vice versa
 */
export function convertProviderName(provider: ProviderId): ProviderDisplayName;
export function convertProviderName(provider: ProviderDisplayName): ProviderId;
export function convertProviderName(provider: string): ProviderId | ProviderDisplayName;
export function convertProviderName(provider: string): ProviderId | ProviderDisplayName {
    const converted = PROVIDER_NAME_LOOKUP.get(provider);
    if (converted === undefined) {
        throw new ValidationError(`Invalid provider name: ${provider}`);
    }
    return converted;
}

/**
 * Parse user input naming a provider, by id or by display name
 */
export function parseProviderId(value: string): ProviderId {
    const trimmed = value.trim();
    if (isProviderId(trimmed)) return trimmed;

    const converted = convertProviderName(trimmed);
    if (!isProviderId(converted)) {
        throw new ValidationError(`Invalid provider name: ${value}`);
    }
    return converted;
}
