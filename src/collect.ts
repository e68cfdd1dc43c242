import log from '@apify/log';
import { fetchRecordCount, fetchRecords, MAX_RECORDS_PER_QUERY } from './api.js';
import { RecordLimitExceededError } from './errors.js';
import { normalize } from './normalizer.js';
import type { NormalizedRow, NormalizeOptions, QueryParameters } from './types.js';

export interface CollectOptions extends NormalizeOptions {
    checkCount?: boolean;
}

export interface CollectResult {
    rows: NormalizedRow[];
    recordsFetched: number;
}

/**
 * Fetches the records for one query and normalizes them.
 * Any failure propagates before normalization starts.
 */
export async function collectIrrigationRows(
    params: QueryParameters,
    options: CollectOptions = {},
): Promise<CollectResult> {
    if (options.checkCount) {
        const count = await fetchRecordCount(params);
        log.info(`Query matches ${count} records`);
        if (count > MAX_RECORDS_PER_QUERY) {
            throw new RecordLimitExceededError(count, MAX_RECORDS_PER_QUERY);
        }
    }

    const records = await fetchRecords(params);
    const rows = normalize(records, { domainCategory: options.domainCategory });

    log.info(`Normalized ${records.length} records into ${rows.length} county rows`);
    return { rows, recordsFetched: records.length };
}
