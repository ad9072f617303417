/**
 * AVWAP Signal Radar - Main Entry Point
 * Runs the AVWAP signal scan on a fixed interval
 */

import { config, validateConfig } from './config/index.js';
import { EarningsCalendarClient } from './services/earningsCalendar.js';
import { YahooChartBarSource } from './services/marketData.js';
import { runOnce, RunDependencies } from './services/runner.js';
import logger from './utils/logger.js';
import { formatError, sleep, WatchlistError } from './utils/errorHandler.js';

/**
 * Run `cycle`, wait `intervalMs`, repeat. A cycle never starts before the
 * previous one has finished. Stops when `cycle` rejects.
 */
export async function startPolling(cycle: () => Promise<unknown>, intervalMs: number): Promise<never> {
    for (;;) {
        await cycle();
        logger.info(`Sleeping ${Math.round(intervalMs / 60000)}m...`);
        await sleep(intervalMs);
    }
}

/**
 * Main execution function
 */
async function main(): Promise<void> {
    logger.info('🚀 AVWAP Signal Radar starting...');

    try {
        validateConfig();

        const deps: RunDependencies = {
            barSource: new YahooChartBarSource(),
            calendar: new EarningsCalendarClient(),
        };

        if (config.runOnce) {
            await runOnce(deps);
            return;
        }

        await startPolling(() => runOnce(deps), config.fetchIntervalMinutes * 60 * 1000);
    } catch (error) {
        if (error instanceof WatchlistError) {
            logger.error(`❌ ${error.message}`);
        } else {
            logger.error('❌ Fatal error:', formatError(error));
        }
        process.exit(1);
    }
}

if (require.main === module) {
    void main();
}
