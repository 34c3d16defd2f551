/**
 * Configuration Management
 * All configuration loaded from environment variables with sensible defaults
 */

import { fileURLToPath } from 'node:url';
import { config as loadEnv } from 'dotenv';

// Load .env file
loadEnv();

export interface Config {
    // Carbon estimation API
    api: {
        apiKey: string | undefined;
        baseUrl: string;
        requestTimeout: number;
    };

    metadata: {
        path: string;
    };

    logging: {
        level: string;
        pretty: boolean;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] ?? defaultValue;
}

function getOptionalEnv(key: string): string | undefined {
    const value = process.env[key]?.trim();
    return value ? value : undefined;
}

export function getEnvInt(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (value === undefined) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
}

// Zero or negative values would disable the request timeout
export function getEnvPositiveInt(key: string, defaultValue: number): number {
    const value = getEnvInt(key, defaultValue);
    return value > 0 ? value : defaultValue;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
}

// Bundled catalog, resolved the same way from src/ and dist/
const BUNDLED_METADATA_PATH = fileURLToPath(new URL('../../data/metadata.json', import.meta.url));

export const config: Config = {
    api: {
        // Read once; an empty value counts as missing
        apiKey: getOptionalEnv('API_KEY'),
        baseUrl: getEnv('CARBON_API_BASE_URL', 'https://api.climatiq.io/compute/v1'),
        requestTimeout: getEnvPositiveInt('CARBON_API_TIMEOUT', 15000),
    },

    metadata: {
        path: getEnv('METADATA_PATH', BUNDLED_METADATA_PATH),
    },

    logging: {
        level: getEnv('LOG_LEVEL', 'info'),
        pretty: getEnvBool('LOG_PRETTY', true),
    },
};
