/**
 * AVWAP Signal Radar - Earnings Calendar Service
 * Nasdaq date-batch calendar and Finnhub per-symbol report history
 */

import { CalendarRow, EarningsCalendarSource, IsoDate } from '../types/index.js';
import { config } from '../config/index.js';
import { formatError, isRecord, sleep, SourceFailureError } from '../utils/errorHandler.js';
import { addDays, parseIsoDate, toIsoDate } from '../utils/formatters.js';
import logger from '../utils/logger.js';

const NASDAQ_CALENDAR_URL = 'https://api.nasdaq.com/api/calendar/earnings?date={date}';
const FINNHUB_CALENDAR_URL = 'https://finnhub.io/api/v1/calendar/earnings';

const NASDAQ_HEADERS = {
    'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    Accept: 'application/json, text/plain, */*',
    Referer: 'https://www.nasdaq.com/',
};

/** Report history window for the per-symbol fallback */
const FINNHUB_HISTORY_DAYS = 730;

/** Most recent past reports kept from the fallback */
const FALLBACK_LIMIT = 8;

export interface EarningsCalendarOptions {
    finnhubApiKey?: string;
    /** Pause after a failed date request */
    errorDelayMs?: number;
    /** Abort a request that has not answered within this many ms */
    timeoutMs?: number;
    now?: () => Date;
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
    const value = record[key];
    return typeof value === 'string' ? value : undefined;
}

/**
 * Extract rows from a Nasdaq calendar payload (`data.rows`, or `data.calendar.rows`)
 */
export function parseNasdaqRows(payload: unknown): CalendarRow[] {
    const data = isRecord(payload) ? payload.data : undefined;
    if (!isRecord(data)) return [];
    const calendar = data.calendar;
    let rows: unknown = data.rows;
    if (!Array.isArray(rows) && isRecord(calendar)) rows = calendar.rows;
    if (!Array.isArray(rows)) return [];

    const out: CalendarRow[] = [];
    for (const row of rows) {
        if (!isRecord(row)) continue;
        const symbol = stringField(row, 'symbol');
        if (!symbol) continue;
        out.push({
            symbol: symbol.trim().toUpperCase(),
            company: stringField(row, 'name') ?? stringField(row, 'company'),
            time: stringField(row, 'time') ?? stringField(row, 'when'),
        });
    }
    return out;
}

/**
 * Extract report dates from a Finnhub earnings calendar payload, most recent first
 */
export function parseFinnhubDates(payload: unknown, symbol: string): IsoDate[] {
    const items = isRecord(payload) ? payload.earningsCalendar : undefined;
    if (!Array.isArray(items)) return [];
    const dates = new Set<IsoDate>();
    for (const item of items) {
        if (!isRecord(item)) continue;
        const itemSymbol = stringField(item, 'symbol');
        const date = parseIsoDate(stringField(item, 'date') ?? '');
        if (date && (!itemSymbol || itemSymbol.toUpperCase() === symbol.toUpperCase())) {
            dates.add(date);
        }
    }
    return Array.from(dates).sort().reverse();
}

/**
 * HTTP calendar client. Every failure degrades to an empty result.
 */
export class EarningsCalendarClient implements EarningsCalendarSource {
    private readonly finnhubApiKey: string;
    private readonly errorDelayMs: number;
    private readonly timeoutMs: number;
    private readonly now: () => Date;

    constructor(options: EarningsCalendarOptions = {}) {
        this.finnhubApiKey = options.finnhubApiKey ?? config.finnhubApiKey;
        this.errorDelayMs = options.errorDelayMs ?? config.calendarErrorDelayMs;
        this.timeoutMs = options.timeoutMs ?? config.calendarTimeoutMs;
        this.now = options.now ?? (() => new Date());
    }

    async fetchByDate(date: IsoDate): Promise<CalendarRow[]> {
        try {
            const response = await fetch(NASDAQ_CALENDAR_URL.replace('{date}', date), {
                headers: NASDAQ_HEADERS,
                signal: AbortSignal.timeout(this.timeoutMs),
            });
            if (!response.ok) {
                throw new SourceFailureError('Nasdaq calendar', `HTTP ${response.status} for ${date}`);
            }
            const payload: unknown = await response.json();
            return parseNasdaqRows(payload);
        } catch (error) {
            logger.warn(`Failed to fetch earnings for ${date}: ${formatError(error)}`);
            if (this.errorDelayMs > 0) await sleep(this.errorDelayMs);
            return [];
        }
    }

    async fetchReportDates(symbol: string): Promise<IsoDate[]> {
        if (!this.finnhubApiKey) {
            logger.debug(`Skipping earnings fallback for ${symbol}: No Finnhub API key`);
            return [];
        }

        const today = toIsoDate(this.now());
        const from = addDays(today, -FINNHUB_HISTORY_DAYS);
        const url = `${FINNHUB_CALENDAR_URL}?from=${from}&to=${today}&symbol=${encodeURIComponent(symbol)}&token=${this.finnhubApiKey}`;

        try {
            const response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
            if (!response.ok) {
                throw new SourceFailureError('Finnhub calendar', `HTTP ${response.status} for ${symbol}`);
            }
            const payload: unknown = await response.json();
            return parseFinnhubDates(payload, symbol)
                .filter((date) => date < today)
                .slice(0, FALLBACK_LIMIT);
        } catch (error) {
            logger.warn(`Earnings fallback lookup failed for ${symbol}: ${formatError(error)}`);
            return [];
        }
    }
}

export interface CalendarScanOptions {
    today: IsoDate;
    lookbackDays: number;
    minCount: number;
    throttleMs: number;
}

/**
 * Walk the date-batch calendar backwards from `today`, one request at a time.
 * Stops early once every symbol has `minCount` dates.
 *
 * @returns symbol → past report dates, most recent first
 */
export async function collectCalendarDates(
    source: EarningsCalendarSource,
    symbols: string[],
    options: CalendarScanOptions
): Promise<Record<string, IsoDate[]>> {
    const { today, lookbackDays, minCount, throttleMs } = options;
    const results: Record<string, IsoDate[]> = {};
    for (const symbol of symbols) results[symbol.toUpperCase()] = [];

    const wanted = Object.keys(results);
    if (wanted.length === 0) return results;

    for (let delta = 0; delta < lookbackDays; delta++) {
        const date = addDays(today, -delta);
        if (delta % 15 === 0) {
            logger.info(`Checking earnings calendar for ${date} (back ${delta} days)...`);
        }

        let rows: CalendarRow[] = [];
        try {
            rows = await source.fetchByDate(date);
        } catch (error) {
            logger.warn(`Calendar lookup for ${date} failed: ${formatError(error)}`);
        }
        if (throttleMs > 0) await sleep(throttleMs);

        for (const row of rows) {
            const dates = results[row.symbol.toUpperCase()];
            if (dates && !dates.includes(date)) dates.push(date);
        }

        if (wanted.every((symbol) => results[symbol].length >= minCount)) {
            logger.info(`Collected ≥${minCount} dates for all symbols; stopping calendar scan.`);
            break;
        }
    }

    for (const symbol of wanted) {
        results[symbol] = results[symbol].filter((date) => date <= today).sort().reverse();
    }
    return results;
}
