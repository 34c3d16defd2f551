/**
 * Emissions Client
 * Sends one provider's batch to the estimation API, one request per item
 */

import type { AxiosAdapter, AxiosInstance } from 'axios';
import { createApiClient } from './client.js';
import { config } from '../config/index.js';
import {
    CarbonCalculatorError,
    ConnectivityError,
    HttpError,
    MissingCredentialError,
    UnexpectedError,
    errorMessage,
} from '../errors.js';
import { createComponentLogger, type Logger } from '../utils/logger.js';
import type { Endpoint, ProviderId, RawEmissionsResult, RequestBody } from '../types/carbon.js';

export interface BatchFailure {
    provider: ProviderId;
    endpoint: Endpoint;
    // Zero-based position of the item in the batch
    itemIndex: number;
    error: CarbonCalculatorError;
}

export interface BatchResponse {
    results: RawEmissionsResult[];
    failures: BatchFailure[];
}

/**
 * Anything that can submit a batch; the aggregator depends on this only
 */
export interface EmissionsSender {
    sendBatch(provider: ProviderId, requests: readonly RequestBody[], endpoint: Endpoint): Promise<BatchResponse>;
}

export interface EmissionsClientOptions {
    apiKey: string | undefined;
    baseUrl: string;
    timeoutMs: number;
    adapter?: AxiosAdapter;
    logger?: Logger;
}

export class EmissionsClient implements EmissionsSender {
    private readonly http: AxiosInstance | null;
    private readonly log: Logger;

    constructor(options: EmissionsClientOptions) {
        this.log = createComponentLogger('emissions-client', options.logger);
        this.http = options.apiKey
            ? createApiClient({
                  baseUrl: options.baseUrl,
                  apiKey: options.apiKey,
                  timeoutMs: options.timeoutMs,
                  ...(options.adapter ? { adapter: options.adapter } : {}),
              })
            : null;
    }

    static fromConfig(overrides: Partial<EmissionsClientOptions> = {}): EmissionsClient {
        return new EmissionsClient({
            apiKey: config.api.apiKey,
            baseUrl: config.api.baseUrl,
            timeoutMs: config.api.requestTimeout,
            ...overrides,
        });
    }

    get hasCredential(): boolean {
        return this.http !== null;
    }

    /**
     * Submit each request in order. HTTP errors drop that item and continue;
     * connectivity and unclassified errors abort the batch with no results.
     */
    async sendBatch(
        provider: ProviderId,
        requests: readonly RequestBody[],
        endpoint: Endpoint
    ): Promise<BatchResponse> {
        if (!this.http) {
            throw new MissingCredentialError();
        }

        const path = `/${provider}/${endpoint}`;
        const results: RawEmissionsResult[] = [];
        const failures: BatchFailure[] = [];

        this.log.debug({ provider, endpoint, items: requests.length }, 'Sending batch');

        for (const [itemIndex, body] of requests.entries()) {
            try {
                const response = await this.http.post<RawEmissionsResult>(path, body);
                results.push(response.data);
            } catch (error) {
                const failure: BatchFailure = {
                    provider,
                    endpoint,
                    itemIndex,
                    error:
                        error instanceof CarbonCalculatorError
                            ? error
                            : new UnexpectedError(errorMessage(error), { cause: error }),
                };
                failures.push(failure);

                if (failure.error instanceof HttpError) {
                    this.log.warn(
                        { provider, endpoint, itemIndex, status: failure.error.status },
                        failure.error.message
                    );
                    continue;
                }

                const failureClass = failure.error instanceof ConnectivityError ? 'connectivity' : 'unexpected';
                this.log.error(
                    { provider, endpoint, itemIndex, failureClass },
                    `Batch aborted: ${failure.error.message}`
                );
                return { results: [], failures };
            }
        }

        this.log.debug({ provider, endpoint, received: results.length }, 'Batch complete');
        return { results, failures };
    }
}
