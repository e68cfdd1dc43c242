import type { OutputError } from './types.js';

/**
 * Base class for every failure surfaced by the Quick Stats client and the normalizer
 */
export class QuickStatsError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The request never produced a response (DNS, refused connection, timeout)
 */
export class TransportError extends QuickStatsError {}

/**
 * The API answered with a status other than 200
 */
export class RequestFailedError extends QuickStatsError {
    readonly statusCode: number;
    readonly detail?: string;

    constructor(statusCode: number, detail?: string) {
        super(`Quick Stats request failed with status ${statusCode}${detail ? `: ${detail}` : ''}`);
        this.statusCode = statusCode;
        this.detail = detail;
    }
}

/**
 * The response body was not the expected JSON envelope
 */
export class DecodeError extends QuickStatsError {}

/**
 * A field value was neither a redaction code nor parseable.
 * Usually means the upstream format changed.
 */
export class MalformedValueError extends QuickStatsError {
    readonly rawValue: string;
    readonly field: string;

    constructor(rawValue: string, field = 'Value') {
        super(`Malformed ${field}: "${rawValue}"`);
        this.rawValue = rawValue;
        this.field = field;
    }
}

/**
 * The get_counts pre-check found more records than one query may return.
 * No records request was made.
 */
export class RecordLimitExceededError extends QuickStatsError {
    readonly count: number;
    readonly limit: number;

    constructor(count: number, limit: number) {
        super(`Query matches ${count} records, above the limit of ${limit}; narrow it with state or extraFilters`);
        this.count = count;
        this.limit = limit;
    }
}

/**
 * The Actor input failed validation
 */
export class InvalidInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidInputError';
    }
}

/**
 * Shapes a failure into the error item pushed to the dataset
 */
export function toOutputError(error: unknown): OutputError {
    return {
        error: 'Failed to collect irrigation data',
        errorType: error instanceof Error ? error.name : 'UnknownError',
        statusCode: error instanceof RequestFailedError ? error.statusCode : undefined,
        errorMessage: error instanceof Error ? error.message : String(error),
        scrapedTimestamp: new Date().toISOString(),
    };
}
