/**
 * One-off script: pick one earnings anchor per symbol and write `SYMBOL,YYYY-MM-DD` lines
 *
 * Usage: npm run find-earnings -- [symbolsFile] [outputFile]
 */
import fs from 'node:fs';
import { config, loadTickerFile } from '../src/config/index.js';
import { EarningsCalendarClient, collectCalendarDates } from '../src/services/earningsCalendar.js';
import { formatAnchorDateLines, selectFinalAnchor } from '../src/services/anchorResolver.js';
import { toIsoDate } from '../src/utils/formatters.js';
import logger from '../src/utils/logger.js';

const FINDER_LOOKBACK_DAYS = 150;

async function main() {
    const [symbolsFile = 'symbols.txt', outputFile = 'earnings_date.txt'] = process.argv.slice(2);
    const symbols = loadTickerFile(symbolsFile);
    if (symbols.length === 0) {
        throw new Error(`No symbols in ${symbolsFile}`);
    }

    const today = toIsoDate(new Date());
    const found = await collectCalendarDates(new EarningsCalendarClient(), symbols, {
        today,
        lookbackDays: FINDER_LOOKBACK_DAYS,
        minCount: config.minAnchorCount,
        throttleMs: config.calendarThrottleMs,
    });

    const finalDates = new Map<string, string>();
    for (const symbol of symbols) {
        const anchor = selectFinalAnchor(found[symbol] ?? [], today, config.recentDays);
        if (anchor) finalDates.set(symbol, anchor);
    }

    fs.writeFileSync(outputFile, formatAnchorDateLines(finalDates), 'utf-8');
    logger.info(`Wrote ${finalDates.size} entries to '${outputFile}'.`);

    const missing = symbols.filter((symbol) => !finalDates.has(symbol)).sort();
    if (missing.length > 0) {
        logger.warn(`No earnings date found for: ${missing.join(', ')}`);
    }
}

main().catch((err) => {
    console.error(err);
    process.exit(1);
});
