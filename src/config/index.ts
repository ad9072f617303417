/**
 * AVWAP Signal Radar - Configuration Loader
 * Loads environment variables and the long/short ticker lists
 */

import * as dotenv from 'dotenv';
import fs from 'node:fs';
import logger from '../utils/logger.js';

// Load environment variables
dotenv.config();

/**
 * Application configuration with sensible defaults
 */
export const config = {
    // Watchlist and output files
    longsFile: process.env.LONGS_FILE || 'longs.txt',
    shortsFile: process.env.SHORTS_FILE || 'shorts.txt',
    signalLogFile: process.env.SIGNAL_LOG_FILE || 'combined_avwap.txt',
    earningsCacheFile: process.env.EARNINGS_CACHE_FILE || 'earnings_cache.json',

    // Polling
    fetchIntervalMinutes: parseFloat(process.env.FETCH_INTERVAL_MINUTES || '45'),
    runOnce: process.env.RUN_ONCE === 'true',

    // Anchors
    recentDays: parseInt(process.env.RECENT_DAYS || '10', 10), // latest earnings younger than this → use previous
    minAnchorCount: parseInt(process.env.MIN_ANCHOR_COUNT || '2', 10),

    // Bounce sensitivity: eps/push = atrMult * ATR(atrLength)
    atrLength: parseInt(process.env.ATR_LENGTH || '20', 10),
    atrMult: parseFloat(process.env.ATR_MULT || '0.05'),

    // Earnings calendar scan
    calendarLookbackDays: parseInt(process.env.CALENDAR_LOOKBACK_DAYS || '250', 10),
    calendarThrottleMs: parseInt(process.env.CALENDAR_THROTTLE_MS || '1000', 10),
    calendarErrorDelayMs: 500,
    calendarTimeoutMs: parseInt(process.env.CALENDAR_TIMEOUT_MS || '10000', 10),

    // Bar requests
    barTimeoutMs: parseInt(process.env.BAR_TIMEOUT_MS || '15000', 10),

    // API Keys
    finnhubApiKey: process.env.FINNHUB_API_KEY || '',

    // Retry settings
    maxRetries: 3,
    retryDelayMs: 2000,
} as const;

/** Header line TC2000 puts at the top of exported lists */
const TICKER_FILE_HEADER = 'SYMBOLS FROM TC2000';

/**
 * Parse a newline-delimited ticker list.
 * - Blank lines skipped
 * - Header line ("Symbols from TC2000...") skipped, case-insensitive
 * - Symbols uppercased
 */
export function parseTickerList(text: string): string[] {
    const tickers: string[] = [];
    for (const line of text.split(/\r?\n/)) {
        const value = line.trim();
        if (!value || value.toUpperCase().startsWith(TICKER_FILE_HEADER)) continue;
        tickers.push(value.toUpperCase());
    }
    return tickers;
}

/**
 * Read tickers from a file; a missing file yields an empty list
 */
export function loadTickerFile(filePath: string): string[] {
    if (!fs.existsSync(filePath)) {
        logger.warn(`Ticker file not found: ${filePath}`);
        return [];
    }
    return parseTickerList(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Long/short membership for one run
 */
export interface Watchlist {
    longs: Set<string>;
    shorts: Set<string>;
    /** Union of both sides, sorted */
    symbols: string[];
}

/**
 * Load both side lists and their sorted union
 */
export function loadWatchlist(longsFile: string, shortsFile: string): Watchlist {
    const longs = new Set(loadTickerFile(longsFile));
    const shorts = new Set(loadTickerFile(shortsFile));
    const symbols = Array.from(new Set([...longs, ...shorts])).sort();
    return { longs, shorts, symbols };
}

/**
 * Validate configuration
 * @throws Error if a setting is unusable
 */
export function validateConfig(): void {
    const problems: string[] = [];

    if (!(config.fetchIntervalMinutes > 0)) problems.push('FETCH_INTERVAL_MINUTES must be > 0');
    if (!(config.atrLength > 0)) problems.push('ATR_LENGTH must be > 0');
    if (!(config.atrMult > 0)) problems.push('ATR_MULT must be > 0');
    if (!(config.minAnchorCount > 0)) problems.push('MIN_ANCHOR_COUNT must be > 0');
    if (!(config.recentDays >= 0)) problems.push('RECENT_DAYS must be >= 0');

    if (problems.length > 0) {
        throw new Error(`Invalid configuration: ${problems.join(', ')}`);
    }

    if (!config.finnhubApiKey) {
        logger.warn('FINNHUB_API_KEY not set: per-symbol earnings fallback is disabled');
    }
}
