/**
 * AVWAP Signal Radar - Earnings Anchor Resolver
 * Merges cached, calendar-scanned and fallback report dates into anchor lists
 */

import { EarningsCalendarSource, IsoDate } from '../types/index.js';
import { AnchorCache, getCachedDates, serializeDates } from './earningsCache.js';
import { collectCalendarDates } from './earningsCalendar.js';
import { formatError, sleep } from '../utils/errorHandler.js';
import { daysBetween } from '../utils/formatters.js';
import logger from '../utils/logger.js';

export const DEFAULT_MIN_ANCHOR_COUNT = 2;

export interface ResolveOptions {
    today: IsoDate;
    minCount?: number;
    /** Per-symbol historical source, consulted only when still short of minCount */
    fallback?: EarningsCalendarSource;
    /** Pause after each fallback request */
    throttleMs?: number;
}

/**
 * Union of date lists, distinct, most recent first
 */
export function mergeDates(...collections: IsoDate[][]): IsoDate[] {
    const seen = new Set<IsoDate>();
    for (const collection of collections) {
        for (const date of collection) seen.add(date);
    }
    return Array.from(seen).sort().reverse();
}

/**
 * Up to `minCount` past report dates for `symbol`, most recent first.
 *
 * Lookup order: cache → external candidates → fallback source. The cache entry
 * is replaced in place whenever any date is known.
 */
export async function resolveAnchorDates(
    symbol: string,
    cache: AnchorCache,
    externalCandidates: IsoDate[] | undefined,
    options: ResolveOptions
): Promise<IsoDate[]> {
    const { today, minCount = DEFAULT_MIN_ANCHOR_COUNT, fallback, throttleMs = 0 } = options;
    const isPast = (date: IsoDate): boolean => date <= today;

    const cached = getCachedDates(cache, symbol).filter(isPast);
    const external = (externalCandidates ?? []).filter(isPast);
    let merged = mergeDates(cached, external);

    if (merged.length < minCount && fallback) {
        let history: IsoDate[] = [];
        try {
            history = await fallback.fetchReportDates(symbol);
        } catch (error) {
            logger.warn(`Earnings fallback failed for ${symbol}: ${formatError(error)}`);
        }
        if (throttleMs > 0) await sleep(throttleMs);
        merged = mergeDates(merged, history.filter(isPast));
    }

    const entry = serializeDates(merged);
    if (entry) cache[symbol] = entry;

    return merged.slice(0, minCount);
}

export interface WatchlistResolveOptions extends ResolveOptions {
    lookbackDays: number;
    throttleMs: number;
}

/**
 * Resolve anchors for every symbol, scanning the date-batch calendar only for
 * symbols whose cache is short of `minCount` dates.
 */
export async function resolveWatchlistAnchors(
    symbols: string[],
    cache: AnchorCache,
    calendar: EarningsCalendarSource,
    options: WatchlistResolveOptions
): Promise<Map<string, IsoDate[]>> {
    const { today, minCount = DEFAULT_MIN_ANCHOR_COUNT, lookbackDays, throttleMs } = options;

    const missing = symbols.filter((symbol) => getCachedDates(cache, symbol).length < minCount);
    let scanned: Record<string, IsoDate[]> = {};
    if (missing.length > 0) {
        logger.info(`Fetching Nasdaq earnings for ${missing.length} symbols...`);
        scanned = await collectCalendarDates(calendar, missing, { today, lookbackDays, minCount, throttleMs });
    }

    const anchors = new Map<string, IsoDate[]>();
    for (const symbol of symbols) {
        anchors.set(
            symbol,
            await resolveAnchorDates(symbol, cache, scanned[symbol], { today, minCount, fallback: calendar, throttleMs })
        );
    }
    return anchors;
}

/**
 * Single anchor per symbol: the previous report when the latest is within
 * `recentDays` of today and a previous one exists, else the latest.
 */
export function selectFinalAnchor(dates: IsoDate[], today: IsoDate, recentDays: number): IsoDate | undefined {
    const [latest, prior] = dates;
    if (latest === undefined) return undefined;
    if (daysBetween(latest, today) <= recentDays && prior !== undefined) return prior;
    return latest;
}

/**
 * `SYMBOL,YYYY-MM-DD` lines sorted by symbol
 */
export function formatAnchorDateLines(anchors: Map<string, IsoDate>): string {
    return Array.from(anchors.entries())
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([symbol, date]) => `${symbol},${date}\n`)
        .join('');
}
