import { z } from 'zod';
import { InvalidInputError } from './errors.js';
import type { IrrigationInput, QueryParameters } from './types.js';

export const DEFAULT_BASE_URL = 'https://quickstats.nass.usda.gov';
export const DEFAULT_COMMODITY = 'AG LAND';
const DEFAULT_TIMEOUT_SECS = 60;

// Narrows the response to county acreage before it leaves the API
const DEFAULT_EXTRA_FILTERS: Record<string, string> = {
    agg_level_desc: 'COUNTY',
    unit_desc: 'ACRES',
    statisticcat_desc: 'AREA',
    class_desc: 'ALL CLASSES',
};

const inputSchema = z.object({
    apiKey: z.string().trim().optional(),
    commodity: z.string().trim().min(1).default(DEFAULT_COMMODITY),
    minYear: z.number({ required_error: 'minYear is required' }).int().min(1000).max(9999),
    state: z.string().trim().regex(/^[A-Za-z]{2}$/, 'state must be a two-letter postal code').optional(),
    domainCategory: z.string().trim().min(1).optional(),
    extraFilters: z.record(z.string(), z.string()).optional(),
    timeoutSecs: z.number().positive().default(DEFAULT_TIMEOUT_SECS),
    baseUrl: z.string().url().default(DEFAULT_BASE_URL),
    checkCount: z.boolean().default(true),
});

/**
 * Validates the Actor input and turns it into query parameters.
 * The API key falls back to NASS_API_KEY so it can stay out of the input.
 */
export function parseInput(
    input: IrrigationInput,
    env: Record<string, string | undefined> = process.env,
): { params: QueryParameters; domainCategory?: string; checkCount: boolean } {
    const result = inputSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`);
        throw new InvalidInputError(`Invalid input: ${issues.join('; ')}`);
    }
    const parsed = result.data;

    const apiKey = parsed.apiKey || env.NASS_API_KEY?.trim();
    if (!apiKey) {
        throw new InvalidInputError('Invalid input: apiKey is required (or set NASS_API_KEY)');
    }

    const params: QueryParameters = Object.freeze({
        apiKey,
        baseUrl: parsed.baseUrl.replace(/\/+$/, ''),
        commodity: parsed.commodity,
        minYear: parsed.minYear,
        regionFilter: parsed.state?.toUpperCase(),
        extraFilters: Object.freeze({ ...DEFAULT_EXTRA_FILTERS, ...parsed.extraFilters }),
        timeoutMs: Math.round(parsed.timeoutSecs * 1000),
    });

    return { params, domainCategory: parsed.domainCategory, checkCount: parsed.checkCount };
}
