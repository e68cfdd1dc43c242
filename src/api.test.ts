import { describe, it, expect, vi, afterEach, type MockInstance } from 'vitest';
import { buildQueryUrl, COUNTS_PATH, fetchRecordCount, fetchRecords, redactUrl } from './api.js';
import { DecodeError, RequestFailedError, TransportError } from './errors.js';
import type { QueryParameters } from './types.js';

const params: QueryParameters = {
    apiKey: 'test-secret',
    baseUrl: 'https://quickstats.example.test/',
    commodity: 'AG LAND',
    minYear: 2007,
    regionFilter: 'NE',
    extraFilters: { agg_level_desc: 'COUNTY' },
    timeoutMs: 1000,
};

let fetchSpy: MockInstance<typeof fetch> | undefined;

function respondWith(body: string, status = 200) {
    fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async () => new Response(body, { status }));
    return fetchSpy;
}

afterEach(() => {
    fetchSpy?.mockRestore();
    fetchSpy = undefined;
});

describe('buildQueryUrl', () => {
    it('encodes key, commodity, year and state', () => {
        expect(buildQueryUrl(params)).toBe(
            'https://quickstats.example.test/api/api_GET/?key=test-secret&commodity_desc=AG+LAND&year__GE=2007&state_alpha=NE&format=JSON&agg_level_desc=COUNTY',
        );
    });

    it('omits state_alpha without a region filter', () => {
        const url = new URL(buildQueryUrl({ ...params, regionFilter: undefined }));
        expect(url.searchParams.has('state_alpha')).toBe(false);
    });

    it('does not let extra filters replace the core parameters', () => {
        const url = new URL(buildQueryUrl({ ...params, extraFilters: { key: 'other', year__GE: '1990' } }));
        expect(url.searchParams.get('key')).toBe('test-secret');
        expect(url.searchParams.get('year__GE')).toBe('2007');
    });

    it('targets the counts endpoint', () => {
        expect(new URL(buildQueryUrl(params, COUNTS_PATH)).pathname).toBe('/api/get_counts/');
    });
});

describe('redactUrl', () => {
    it('masks the key', () => {
        expect(redactUrl('https://q.test/api/api_GET/?key=test-secret&year__GE=2007')).toBe(
            'https://q.test/api/api_GET/?key=***&year__GE=2007',
        );
    });
});

describe('fetchRecords', () => {
    it('returns the data array with every value as text', async () => {
        const spy = respondWith(JSON.stringify({
            data: [{ county_code: '001', year: 2007, Value: '1,000', asd_code: null }],
        }));

        const records = await fetchRecords(params);

        expect(records).toEqual([{ county_code: '001', year: '2007', Value: '1,000', asd_code: '' }]);
        expect(spy).toHaveBeenCalledTimes(1);
        const call = spy.mock.calls[0];
        expect(String(call?.[0])).toContain('/api/api_GET/?key=test-secret');
        expect(call?.[1]?.method).toBe('GET');
    });

    it('raises RequestFailedError with the status code', async () => {
        respondWith('Service Unavailable', 503);

        await expect(fetchRecords(params)).rejects.toBeInstanceOf(RequestFailedError);
        await expect(fetchRecords(params)).rejects.toMatchObject({ statusCode: 503 });
    });

    it('carries the API error message', async () => {
        respondWith(JSON.stringify({ error: ['exceeds limit=50000'] }), 400);

        await expect(fetchRecords(params)).rejects.toMatchObject({ statusCode: 400, detail: 'exceeds limit=50000' });
        await expect(fetchRecords(params)).rejects.toThrow('Quick Stats request failed with status 400: exceeds limit=50000');
    });

    it('raises TransportError when the request does not complete', async () => {
        const cause = new TypeError('fetch failed');
        fetchSpy = vi.spyOn(globalThis, 'fetch').mockRejectedValue(cause);

        await expect(fetchRecords(params)).rejects.toBeInstanceOf(TransportError);
        await expect(fetchRecords(params)).rejects.toHaveProperty('cause', cause);
    });

    it('raises TransportError when the body breaks off after a 200', async () => {
        const cause = new Error('socket hang up');
        fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async () => {
            const body = new ReadableStream<Uint8Array>({
                start(controller) {
                    controller.enqueue(new TextEncoder().encode('{"data": ['));
                    controller.error(cause);
                },
            });
            return new Response(body, { status: 200 });
        });

        await expect(fetchRecords(params)).rejects.toBeInstanceOf(TransportError);
        await expect(fetchRecords(params)).rejects.toThrow('Quick Stats response from /api/api_GET/ was cut off');
    });

    it('raises TransportError when the timeout fires during the download', async () => {
        fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async (_input, init) => {
            const signal = init?.signal;
            const body = new ReadableStream<Uint8Array>({
                start(controller) {
                    controller.enqueue(new TextEncoder().encode('{"data": ['));
                    if (signal) {
                        signal.addEventListener('abort', () => controller.error(signal.reason));
                    }
                },
            });
            return new Response(body, { status: 200 });
        });

        await expect(fetchRecords({ ...params, timeoutMs: 50 })).rejects.toBeInstanceOf(TransportError);
    });

    it('raises DecodeError for a body that is not JSON', async () => {
        respondWith('<html>maintenance</html>');

        await expect(fetchRecords(params)).rejects.toBeInstanceOf(DecodeError);
    });

    it('raises DecodeError when the data array is missing', async () => {
        respondWith(JSON.stringify({ rows: [] }));

        await expect(fetchRecords(params)).rejects.toBeInstanceOf(DecodeError);
    });

    it('raises DecodeError for nested record values', async () => {
        respondWith(JSON.stringify({ data: [{ county_code: { code: '001' } }] }));

        await expect(fetchRecords(params)).rejects.toBeInstanceOf(DecodeError);
    });
});

describe('fetchRecordCount', () => {
    it('returns the count from get_counts', async () => {
        const spy = respondWith(JSON.stringify({ count: 1234 }));

        expect(await fetchRecordCount(params)).toBe(1234);
        expect(String(spy.mock.calls[0]?.[0])).toContain('/api/get_counts/?');
    });

    it('raises DecodeError without a count', async () => {
        respondWith(JSON.stringify({ total: 5 }));

        await expect(fetchRecordCount(params)).rejects.toBeInstanceOf(DecodeError);
    });
});
