/**
 * Live smoke test against the Quick Stats API (needs NASS_API_KEY)
 * Run with: npx tsx test-simple.ts
 */

import { fetchRecordCount, fetchRecords } from './src/api.js';
import { parseInput } from './src/input.js';
import { normalize } from './src/normalizer.js';

const { params } = parseInput({ minYear: 2017, state: 'NE' });

async function testCount() {
    console.log('\n=== Testing Count ===');
    try {
        const count = await fetchRecordCount(params);
        console.log(`✅ Query matches ${count} records`);
    } catch (error) {
        console.error('❌ Count failed:', error);
    }
}

async function testFetchAndNormalize() {
    console.log('\n=== Testing Fetch + Normalize ===');
    try {
        const records = await fetchRecords(params);
        console.log(`✅ Fetched ${records.length} records`);
        const rows = normalize(records);
        console.log(`✅ Normalized into ${rows.length} rows`);
        if (rows.length > 0) {
            console.log('First row:', JSON.stringify(rows[0], null, 2));
        }
    } catch (error) {
        console.error('❌ Fetch failed:', error);
    }
}

async function main() {
    console.log('🧪 Starting Quick Stats smoke tests...\n');

    await testCount();
    await testFetchAndNormalize();

    console.log('\n✅ All smoke tests completed!');
}

main().catch(console.error);
