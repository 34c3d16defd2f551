/**
 * Turns command-line and file input into session entries
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError, errorMessage } from '../errors.js';
import { parseProviderId } from '../providers/provider-names.js';
import type { StorageInput, VmInput } from '../session/calculator-session.js';
import { PROVIDER_IDS } from '../types/carbon.js';

export const VM_USAGE = 'vm <provider> <region> <instance> <duration> [unit] [vcpu-utilization]';
export const STORAGE_USAGE = 'storage <provider> <region> <storage-type> <duration> <data> <data-unit> [unit]';

const ENTRY_SEPARATOR = ':';

// Non-numeric text becomes NaN and is rejected by the request builder
function toNumber(token: string): number {
    return token.trim() === '' ? Number.NaN : Number(token);
}

export function parseVmTokens(tokens: readonly string[]): VmInput {
    const [provider, region, instance, duration, durationUnit, utilization] = tokens;
    if (provider === undefined || region === undefined || instance === undefined || duration === undefined) {
        throw new ValidationError(`Usage: ${VM_USAGE}`);
    }

    return {
        provider: parseProviderId(provider),
        region,
        instance,
        duration: toNumber(duration),
        ...(durationUnit !== undefined ? { durationUnit } : {}),
        ...(utilization !== undefined ? { vcpuUtilization: toNumber(utilization) } : {}),
    };
}

export function parseStorageTokens(tokens: readonly string[]): StorageInput {
    const [provider, region, storageType, duration, dataStored, dataUnit, durationUnit] = tokens;
    if (
        provider === undefined ||
        region === undefined ||
        storageType === undefined ||
        duration === undefined ||
        dataStored === undefined ||
        dataUnit === undefined
    ) {
        throw new ValidationError(`Usage: ${STORAGE_USAGE}`);
    }

    return {
        provider: parseProviderId(provider),
        region,
        storageType,
        duration: toNumber(duration),
        dataStored: toNumber(dataStored),
        dataUnit,
        ...(durationUnit !== undefined ? { durationUnit } : {}),
    };
}

/**
 * `aws:us-east-1:t2.micro:10:h:0.5`
 */
export function parseVmEntry(entry: string): VmInput {
    return parseVmTokens(entry.split(ENTRY_SEPARATOR));
}

/**
 * `gcp:us-central1:ssd:24:500:GB:h`
 */
export function parseStorageEntry(entry: string): StorageInput {
    return parseStorageTokens(entry.split(ENTRY_SEPARATOR));
}

const providerSchema = z.enum(PROVIDER_IDS);

const EntriesFileSchema = z.object({
    vm: z
        .array(
            z.object({
                provider: providerSchema,
                region: z.string(),
                instance: z.string(),
                duration: z.number(),
                durationUnit: z.string().optional(),
                vcpuUtilization: z.number().optional(),
            })
        )
        .default([]),
    storage: z
        .array(
            z.object({
                provider: providerSchema,
                region: z.string(),
                storageType: z.string(),
                duration: z.number(),
                dataStored: z.number(),
                dataUnit: z.string(),
                durationUnit: z.string().optional(),
            })
        )
        .default([]),
});

export interface EntriesFile {
    vm: VmInput[];
    storage: StorageInput[];
}

export function parseEntriesFile(content: string, source = 'entries file'): EntriesFile {
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        throw new ValidationError(`Invalid JSON in ${source}: ${errorMessage(error)}`);
    }

    const result = EntriesFileSchema.safeParse(parsed);
    if (!result.success) {
        const issues = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
        throw new ValidationError(`Invalid ${source}: ${issues.join('; ')}`, issues);
    }
    return result.data;
}

export async function readEntriesFile(path: string): Promise<EntriesFile> {
    const content = await readFile(path, 'utf-8');
    return parseEntriesFile(content, path);
}
