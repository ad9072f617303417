/**
 * AVWAP Signal Radar - Market Data Service
 * Daily bars over direct HTTP requests to the Yahoo Finance chart API
 */

import { BarSource, DailyBar, IsoDate } from '../types/index.js';
import { config } from '../config/index.js';
import { formatError, isRecord, SourceFailureError, withRetry } from '../utils/errorHandler.js';
import logger from '../utils/logger.js';

const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart/{symbol}';

const DEFAULT_EXCHANGE_TIMEZONE = 'America/New_York';

const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * Sort ascending by date, keep the last row for a repeated date, drop rows
 * with non-finite prices or negative volume.
 */
export function normalizeBars(bars: DailyBar[]): DailyBar[] {
    const byDate = new Map<IsoDate, DailyBar>();
    for (const bar of bars) {
        const prices = [bar.open, bar.high, bar.low, bar.close];
        if (!prices.every(Number.isFinite) || !Number.isFinite(bar.volume) || bar.volume < 0) continue;
        byDate.set(bar.date, bar);
    }
    return Array.from(byDate.values()).sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/**
 * Calendar date of an epoch-seconds timestamp in the exchange's timezone
 */
export function exchangeDate(epochSeconds: number, timeZone: string): IsoDate {
    const parts = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
    }).formatToParts(new Date(epochSeconds * 1000));
    const part = (type: Intl.DateTimeFormatPartTypes): string => parts.find((p) => p.type === type)?.value ?? '';
    return `${part('year')}-${part('month')}-${part('day')}`;
}

function numberAt(values: unknown, index: number): number | undefined {
    if (!Array.isArray(values)) return undefined;
    const value: unknown = values[index];
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Extract daily bars from a chart API payload
 */
export function parseYahooChart(payload: unknown): DailyBar[] {
    const chart = isRecord(payload) ? payload.chart : undefined;
    const results = isRecord(chart) ? chart.result : undefined;
    const result: unknown = Array.isArray(results) ? results[0] : undefined;
    if (!isRecord(result)) return [];

    const meta = result.meta;
    const timeZone =
        isRecord(meta) && typeof meta.exchangeTimezoneName === 'string'
            ? meta.exchangeTimezoneName
            : DEFAULT_EXCHANGE_TIMEZONE;

    const timestamps = result.timestamp;
    const indicators = result.indicators;
    const quotes = isRecord(indicators) ? indicators.quote : undefined;
    const quote: unknown = Array.isArray(quotes) ? quotes[0] : undefined;
    if (!Array.isArray(timestamps) || !isRecord(quote)) return [];

    const bars: DailyBar[] = [];
    timestamps.forEach((ts: unknown, i: number) => {
        if (typeof ts !== 'number') return;
        const open = numberAt(quote.open, i);
        const high = numberAt(quote.high, i);
        const low = numberAt(quote.low, i);
        const close = numberAt(quote.close, i);
        if (open === undefined || high === undefined || low === undefined || close === undefined) return;
        bars.push({
            date: exchangeDate(ts, timeZone),
            open,
            high,
            low,
            close,
            volume: numberAt(quote.volume, i) ?? 0,
        });
    });
    return normalizeBars(bars);
}

export interface YahooChartOptions {
    maxRetries?: number;
    retryDelayMs?: number;
    /** Abort an attempt that has not answered within this many ms */
    timeoutMs?: number;
    now?: () => Date;
}

/**
 * Bar source backed by the Yahoo chart API. No data and failures both yield [].
 */
export class YahooChartBarSource implements BarSource {
    private readonly maxRetries: number;
    private readonly retryDelayMs: number;
    private readonly timeoutMs: number;
    private readonly now: () => Date;

    constructor(options: YahooChartOptions = {}) {
        this.maxRetries = options.maxRetries ?? config.maxRetries;
        this.retryDelayMs = options.retryDelayMs ?? config.retryDelayMs;
        this.timeoutMs = options.timeoutMs ?? config.barTimeoutMs;
        this.now = options.now ?? (() => new Date());
    }

    async fetchDailyBars(symbol: string, lookbackDays: number): Promise<DailyBar[]> {
        const period2 = Math.floor(this.now().getTime() / 1000);
        const period1 = period2 - (lookbackDays + 1) * SECONDS_PER_DAY;
        const url =
            `${YAHOO_CHART_URL.replace('{symbol}', encodeURIComponent(symbol))}` +
            `?interval=1d&period1=${period1}&period2=${period2}`;

        try {
            return await withRetry(
                async () => {
                    const response = await fetch(url, {
                        headers: {
                            'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
                            Accept: 'application/json',
                        },
                        signal: AbortSignal.timeout(this.timeoutMs),
                    });

                    if (response.status === 404) {
                        logger.warn(`No chart data for ${symbol}`);
                        return [];
                    }
                    if (!response.ok) {
                        if (response.status === 429) {
                            logger.warn(`Yahoo Chart API rate limited for ${symbol}`);
                        }
                        throw new SourceFailureError('Yahoo chart', `HTTP ${response.status} for ${symbol}`);
                    }

                    const payload: unknown = await response.json();
                    return parseYahooChart(payload);
                },
                this.maxRetries,
                this.retryDelayMs,
                `Chart fetch for ${symbol}`
            );
        } catch (error) {
            logger.error(`Chart fetch failed for ${symbol}: ${formatError(error)}`);
            return [];
        }
    }
}
