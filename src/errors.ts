/**
 * Error taxonomy
 *
 * Core functions throw or return these; turning them into user-facing text with
 * provider names is left to the caller.
 */

export type ErrorCode =
    | 'VALIDATION_ERROR'
    | 'MISSING_CREDENTIAL'
    | 'PERMISSION_DENIED'
    | 'HTTP_ERROR'
    | 'CONNECTIVITY_ERROR'
    | 'UNEXPECTED_ERROR'
    | 'METADATA_LOAD_ERROR';

export abstract class CarbonCalculatorError extends Error {
    abstract readonly code: ErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ValidationError extends CarbonCalculatorError {
    readonly code = 'VALIDATION_ERROR';

    constructor(
        message: string,
        readonly issues: string[] = [message]
    ) {
        super(message);
    }
}

export class MissingCredentialError extends CarbonCalculatorError {
    readonly code = 'MISSING_CREDENTIAL';

    constructor() {
        super('API_KEY environment variable not set. Add it to your environment or .env file.');
    }
}

export class HttpError extends CarbonCalculatorError {
    readonly code: ErrorCode = 'HTTP_ERROR';

    constructor(
        readonly status: number,
        readonly url: string,
        detail?: string,
        options?: { cause?: unknown }
    ) {
        super(`HTTP error ${status} from ${url}${detail ? `: ${detail}` : ''}`, options);
    }
}

export class PermissionError extends HttpError {
    readonly code: ErrorCode = 'PERMISSION_DENIED';

    constructor(url: string, options?: { cause?: unknown }) {
        super(403, url, undefined, options);
        this.message = 'Forbidden: check your API key permissions for cloud computing endpoints.';
    }
}

export class ConnectivityError extends CarbonCalculatorError {
    readonly code = 'CONNECTIVITY_ERROR';

    constructor(
        readonly url: string,
        readonly reason: string,
        options?: { cause?: unknown }
    ) {
        super(
            `Network failure reaching ${url}: ${reason}. Verify your internet connection and DNS configuration.`,
            options
        );
    }
}

export class UnexpectedError extends CarbonCalculatorError {
    readonly code = 'UNEXPECTED_ERROR';

    constructor(detail: string, options?: { cause?: unknown }) {
        super(`Unexpected error: ${detail}`, options);
    }
}

export type MetadataFailureReason = 'not_found' | 'unreadable' | 'malformed';

export class MetadataLoadError extends CarbonCalculatorError {
    readonly code = 'METADATA_LOAD_ERROR';

    constructor(
        readonly reason: MetadataFailureReason,
        readonly path: string,
        detail: string,
        options?: { cause?: unknown }
    ) {
        super(`${describeMetadataFailure(reason)}: ${path} (${detail})`, options);
    }
}

function describeMetadataFailure(reason: MetadataFailureReason): string {
    switch (reason) {
        case 'not_found':
            return 'Metadata file not found';
        case 'unreadable':
            return 'Metadata file could not be read';
        case 'malformed':
            return 'Invalid metadata file';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
