/**
 * Request Body Builder
 *
 * Validates user input and builds the payloads sent to the estimation API.
 * Inputs are `unknown` because they arrive from forms, files and the command line.
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import {
    DATA_UNITS,
    DURATION_UNITS,
    type StorageRequest,
    type VmRequest,
} from '../types/carbon.js';

// Display labels offered by the storage form, mapped to API values
export const STORAGE_TYPE_LABELS: ReadonlyMap<string, string> = new Map([
    ['Solid-state Drive', 'ssd'],
    ['Hard Disk Drive', 'hdd'],
]);

const durationSchema = z
    .number({ invalid_type_error: 'Duration must be an integer.', required_error: 'Duration is required.' })
    .int('Duration must be an integer.')
    .positive('Duration must be at least 1.');

const durationUnitSchema = z.enum(DURATION_UNITS, {
    errorMap: () => ({ message: `Duration unit must be one of ${DURATION_UNITS.join(', ')}.` }),
});

const VmRequestSchema = z.object({
    region: z.string({ invalid_type_error: 'Region must be a string.', required_error: 'Region is required.' }),
    instance: z.string({
        invalid_type_error: 'Instance must be a string.',
        required_error: 'Instance is required.',
    }),
    duration: durationSchema,
    duration_unit: durationUnitSchema,
    average_vcpu_utilization: z
        .number({ invalid_type_error: 'vCPU utilization must be a number.' })
        .finite('vCPU utilization must be a number.')
        .min(0, 'vCPU utilization must be between 0 and 1.')
        .max(1, 'vCPU utilization must be between 0 and 1.'),
});

const StorageRequestSchema = z.object({
    region: z.string({ invalid_type_error: 'Region must be a string.', required_error: 'Region is required.' }),
    storage_type: z
        .string({ invalid_type_error: 'Storage type must be a string.', required_error: 'Storage type is required.' })
        .transform(normalizeStorageType),
    data: z
        .number({ invalid_type_error: 'Data stored must be a number.', required_error: 'Data stored is required.' })
        .finite('Data stored must be a number.')
        .positive('Data stored must be greater than 0.'),
    data_unit: z.enum(DATA_UNITS, {
        errorMap: () => ({ message: `Data unit must be one of ${DATA_UNITS.join(', ')}.` }),
    }),
    duration: durationSchema,
    duration_unit: durationUnitSchema,
});

/**
 * Map a storage form label to its API value; unknown labels pass through unchanged
 */
export function normalizeStorageType(storageType: string): string {
    return STORAGE_TYPE_LABELS.get(storageType) ?? storageType;
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.errors.map((err) => err.message);
        throw new ValidationError(`Invalid ${what}: ${issues.join(' ')}`, issues);
    }
    return result.data;
}

/**
 * Create a valid body object for VM batch requests
 */
export function buildVmRequest(
    region: unknown,
    instance: unknown,
    duration: unknown,
    durationUnit: unknown = 'h',
    vcpuUtilization: unknown = 0.5
): VmRequest {
    const body = parseOrThrow(
        VmRequestSchema,
        {
            region,
            instance,
            duration,
            duration_unit: durationUnit,
            average_vcpu_utilization: vcpuUtilization,
        },
        'VM request'
    );
    return Object.freeze(body);
}

/**
 * Create a valid body object for storage batch requests
 */
export function buildStorageRequest(
    region: unknown,
    storageType: unknown,
    duration: unknown,
    dataStored: unknown,
    dataUnit: unknown,
    durationUnit: unknown = 'h'
): StorageRequest {
    const body = parseOrThrow(
        StorageRequestSchema,
        {
            region,
            storage_type: storageType,
            data: dataStored,
            data_unit: dataUnit,
            duration,
            duration_unit: durationUnit,
        },
        'storage request'
    );
    return Object.freeze(body);
}
