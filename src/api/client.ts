import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import { ConnectivityError, HttpError, PermissionError, UnexpectedError } from '../errors.js';

export interface ApiClientOptions {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
    // In-process stand-in for the HTTP transport
    adapter?: AxiosAdapter;
}

const CONNECTIVITY_CODES = new Set<string>([
    AxiosError.ECONNABORTED,
    AxiosError.ETIMEDOUT,
    AxiosError.ERR_NETWORK,
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EHOSTUNREACH',
    'ENETUNREACH',
]);

/**
 * Create the axios instance for the estimation API.
 * Rejections are mapped onto the error taxonomy in a response interceptor.
 */
export function createApiClient(options: ApiClientOptions): AxiosInstance {
    const apiClient = axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: {
            Accept: 'application/json',
            'Content-Type': 'application/json',
            Authorization: `Bearer ${options.apiKey}`,
        },
        ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    apiClient.interceptors.response.use(
        (response) => response,
        (error: unknown) => Promise.reject(classifyRequestError(error))
    );

    return apiClient;
}

export function classifyRequestError(error: unknown): Error {
    if (!axios.isAxiosError(error)) {
        return new UnexpectedError(error instanceof Error ? error.message : String(error), { cause: error });
    }

    const url = requestUrl(error);

    if (error.response) {
        if (error.response.status === 403) {
            return new PermissionError(url, { cause: error });
        }
        return new HttpError(error.response.status, url, error.response.statusText || error.message, {
            cause: error,
        });
    }

    if ((error.code !== undefined && CONNECTIVITY_CODES.has(error.code)) || error.request !== undefined) {
        return new ConnectivityError(url, error.message, { cause: error });
    }

    return new UnexpectedError(error.message, { cause: error });
}

function requestUrl(error: AxiosError): string {
    const baseURL = error.config?.baseURL;
    const url = error.config?.url;
    if (!url) return baseURL ?? 'unknown URL';
    if (!baseURL || /^https?:\/\//.test(url)) return url;
    return `${baseURL.replace(/\/+$/, '')}/${url.replace(/^\/+/, '')}`;
}
