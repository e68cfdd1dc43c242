import log from '@apify/log';
import { z } from 'zod';
import { DecodeError, RequestFailedError, TransportError } from './errors.js';
import type { QueryParameters, RawRecord } from './types.js';

export const RECORDS_PATH = '/api/api_GET/';
export const COUNTS_PATH = '/api/get_counts/';

// Quick Stats rejects any query that would return more rows than this
export const MAX_RECORDS_PER_QUERY = 50_000;

// Numbers and nulls show up in some fields; everything downstream expects text
const fieldValueSchema = z
    .union([z.string(), z.number(), z.boolean(), z.null()])
    .transform((value) => (value === null ? '' : String(value)));

const recordsEnvelopeSchema = z.object({
    data: z.array(z.record(z.string(), fieldValueSchema)),
});

const countEnvelopeSchema = z.object({
    count: z.union([z.number(), z.string()]).pipe(z.coerce.number().int().nonnegative()),
});

const errorEnvelopeSchema = z.object({
    error: z.union([z.array(z.string()), z.string()]),
});

/**
 * Builds a Quick Stats request URL for the given endpoint path
 */
export function buildQueryUrl(params: QueryParameters, path: string = RECORDS_PATH): string {
    const query = new URLSearchParams();
    query.set('key', params.apiKey);
    query.set('commodity_desc', params.commodity);
    query.set('year__GE', String(params.minYear));
    if (params.regionFilter) {
        query.set('state_alpha', params.regionFilter);
    }
    query.set('format', 'JSON');

    for (const [name, value] of Object.entries(params.extraFilters)) {
        if (!query.has(name)) {
            query.set(name, value);
        }
    }

    return `${params.baseUrl.replace(/\/+$/, '')}${path}?${query.toString()}`;
}

/**
 * Masks the API key so a URL can be logged
 */
export function redactUrl(url: string): string {
    return url.replace(/([?&]key=)[^&]*/, '$1***');
}

/**
 * Pulls the message out of a Quick Stats error body, e.g. {"error": ["exceeds limit=50000"]}
 */
async function readErrorDetail(response: Response): Promise<string | undefined> {
    const text = await response.text().catch(() => '');
    if (!text) return undefined;

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch {
        return text.slice(0, 200);
    }

    const parsed = errorEnvelopeSchema.safeParse(json);
    if (parsed.success) {
        return Array.isArray(parsed.data.error) ? parsed.data.error.join('; ') : parsed.data.error;
    }
    return text.slice(0, 200);
}

/**
 * Issues one GET and returns the decoded JSON body. No retries.
 */
async function requestJson(params: QueryParameters, path: string): Promise<unknown> {
    const url = buildQueryUrl(params, path);
    log.debug('Requesting Quick Stats', { url: redactUrl(url), timeoutMs: params.timeoutMs });

    let response: Response;
    try {
        response = await fetch(url, {
            method: 'GET',
            headers: {
                'Accept': 'application/json',
            },
            signal: AbortSignal.timeout(params.timeoutMs),
        });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.error('Quick Stats request did not complete', { path, error: message });
        throw new TransportError(`Quick Stats request to ${path} did not complete: ${message}`, { cause: error });
    }

    if (response.status !== 200) {
        const detail = await readErrorDetail(response);
        log.error('Quick Stats request failed', { path, status: response.status, detail });
        throw new RequestFailedError(response.status, detail);
    }

    // The timeout signal still covers the body download
    let text: string;
    try {
        text = await response.text();
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.error('Quick Stats response body did not arrive', { path, error: message });
        throw new TransportError(`Quick Stats response from ${path} was cut off: ${message}`, { cause: error });
    }

    try {
        return JSON.parse(text);
    } catch (error) {
        throw new DecodeError(`Quick Stats response from ${path} is not valid JSON`, { cause: error });
    }
}

/**
 * Fetches the raw records matching the query parameters
 */
export async function fetchRecords(params: QueryParameters): Promise<RawRecord[]> {
    const body = await requestJson(params, RECORDS_PATH);

    const parsed = recordsEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
        throw new DecodeError(`Quick Stats response does not hold a list of flat records: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
    }

    log.info(`Fetched ${parsed.data.data.length} records`, {
        commodity: params.commodity,
        minYear: params.minYear,
        state: params.regionFilter ?? 'ALL',
    });
    return parsed.data.data;
}

/**
 * Asks Quick Stats how many records the query would return
 */
export async function fetchRecordCount(params: QueryParameters): Promise<number> {
    const body = await requestJson(params, COUNTS_PATH);

    const parsed = countEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
        throw new DecodeError('Quick Stats count response does not hold a numeric count');
    }
    return parsed.data.count;
}
