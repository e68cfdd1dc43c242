// Apify SDK - toolkit for building Apify Actors (Read more at https://docs.apify.com/sdk/js/).
import { Actor } from 'apify';
import log from '@apify/log';
import { collectIrrigationRows } from './collect.js';
import { toOutputError } from './errors.js';
import { parseInput } from './input.js';
import type { IrrigationInput } from './types.js';

await Actor.init();

async function main() {
    // Structure of input is defined in .actor/input_schema.json
    const input = await Actor.getInput<IrrigationInput>();
    if (!input) {
        log.error('❌ Input is missing!');
        await Actor.pushData([{ error: 'Input is missing!' }]);
        return;
    }

    try {
        const { params, domainCategory, checkCount } = parseInput(input);

        // Never log params.apiKey
        log.info('🚀 Starting county irrigation data collection...', {
            commodity: params.commodity,
            minYear: params.minYear,
            state: params.regionFilter ?? 'ALL',
            domainCategory: domainCategory ?? 'default',
            extraFilters: params.extraFilters,
            timeoutMs: params.timeoutMs,
        });

        const startTime = Date.now();
        const { rows, recordsFetched } = await collectIrrigationRows(params, { domainCategory, checkCount });

        if (rows.length === 0) {
            log.warning('⚠️ No county had both irrigated and all-practices acreage for this query.');
            log.info('💡 Tip: Check domainCategory against the domaincat_desc values Quick Stats returns.');
        } else if (Actor.getChargingManager().getPricingInfo().isPayPerEvent) {
            await Actor.pushData(rows, 'result-item');
        } else {
            await Actor.pushData(rows);
        }

        log.info('📦 Done!', {
            recordsFetched,
            rowsPushed: rows.length,
            duration: `${Date.now() - startTime}ms`,
        });
    } catch (error) {
        const output = toOutputError(error);
        log.error('❌ Error during irrigation data collection', {
            errorType: output.errorType,
            statusCode: output.statusCode,
            error: output.errorMessage,
        });
        // Errors should NEVER use second argument, regardless of pricing model
        await Actor.pushData([output]);
    }
}

await main();

// Gracefully exit the Actor process. It's recommended to call Actor.exit() when the Actor is finished.
await Actor.exit();
