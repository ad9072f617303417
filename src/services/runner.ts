/**
 * AVWAP Signal Radar - Run Orchestrator
 * One full pass: watchlist → anchors → bars → signals → log + cache
 */

import {
    AnchorRole,
    BarSource,
    DailyBar,
    EarningsCalendarSource,
    IsoDate,
    SignalReport,
} from '../types/index.js';
import { config, loadWatchlist, Watchlist } from '../config/index.js';
import { findAnchorIndex } from './avwapCalculator.js';
import { loadCache, saveCache } from './earningsCache.js';
import { resolveWatchlistAnchors } from './anchorResolver.js';
import { classifyAnchor, createEmptyReport, mergeReports, selectAnchorRoles } from './signalClassifier.js';
import { countSignals, writeSignalLog } from './signalLog.js';
import { daysBetween, toIsoDate } from '../utils/formatters.js';
import { DataUnavailableError, formatError, WatchlistError } from '../utils/errorHandler.js';
import logger from '../utils/logger.js';

/** Bars required from the anchor bar to the end of the series */
const MIN_TRAILING_BARS = 3;

export interface RunDependencies {
    barSource: BarSource;
    calendar: EarningsCalendarSource;
    now?: () => Date;
}

export interface RunOptions {
    longsFile: string;
    shortsFile: string;
    signalLogFile: string;
    earningsCacheFile: string;
    recentDays: number;
    minAnchorCount: number;
    atrLength: number;
    atrMult: number;
    calendarLookbackDays: number;
    calendarThrottleMs: number;
}

export interface RunSummary {
    symbols: number;
    processed: number;
    skipped: string[];
    signals: number;
    report: SignalReport;
}

export function defaultRunOptions(): RunOptions {
    return {
        longsFile: config.longsFile,
        shortsFile: config.shortsFile,
        signalLogFile: config.signalLogFile,
        earningsCacheFile: config.earningsCacheFile,
        recentDays: config.recentDays,
        minAnchorCount: config.minAnchorCount,
        atrLength: config.atrLength,
        atrMult: config.atrMult,
        calendarLookbackDays: config.calendarLookbackDays,
        calendarThrottleMs: config.calendarThrottleMs,
    };
}

/**
 * Calendar days of history needed to cover the earliest anchor plus the ATR window
 */
export function requiredLookbackDays(earliestAnchor: IsoDate, today: IsoDate, atrLength: number): number {
    return Math.max(atrLength + 3, daysBetween(earliestAnchor, today) + 3);
}

interface SymbolContext {
    symbol: string;
    watchlist: Watchlist;
    today: IsoDate;
    options: RunOptions;
    barSource: BarSource;
}

function anchorIndexFor(symbol: string, bars: DailyBar[], anchor: IsoDate): number | undefined {
    const index = findAnchorIndex(bars, anchor);
    if (index === undefined) {
        logger.warn(`${symbol}: no candle on earnings date ${anchor}`);
        return undefined;
    }
    if (bars.length - index < MIN_TRAILING_BARS) {
        logger.warn(`${symbol}: not enough bars after anchor ${anchor}`);
        return undefined;
    }
    return index;
}

/**
 * Signals for one symbol across its current and previous anchors
 *
 * @throws DataUnavailableError when there is no eligible anchor or no bars
 */
async function analyzeSymbol(context: SymbolContext, anchors: IsoDate[]): Promise<SignalReport> {
    const { symbol, watchlist, today, options, barSource } = context;
    const isLong = watchlist.longs.has(symbol);
    const isShort = watchlist.shorts.has(symbol);
    logger.info(`→ Processing ${symbol} (${isLong ? 'LONG' : isShort ? 'SHORT' : 'NA'})`);

    if (anchors.length === 0) {
        throw new DataUnavailableError(`No earnings anchors for ${symbol}`);
    }

    const roles = selectAnchorRoles(anchors, today, options.recentDays);
    if (roles.current !== anchors[0]) {
        logger.info(`${symbol}: skipping most recent earnings ${anchors[0]} (<=${options.recentDays}d); using previous anchor.`);
    }

    const passes: [AnchorRole, IsoDate][] = [];
    if (roles.current) passes.push(['current', roles.current]);
    if (roles.previous) passes.push(['previous', roles.previous]);
    if (passes.length === 0) {
        throw new DataUnavailableError(`${symbol}: no eligible anchors after the ${options.recentDays}-day recency guard`);
    }

    const earliest = passes.map(([, date]) => date).sort()[0];
    const lookbackDays = requiredLookbackDays(earliest, today, options.atrLength);
    const bars = await barSource.fetchDailyBars(symbol, lookbackDays);
    if (bars.length === 0) {
        throw new DataUnavailableError(`No price data for ${symbol}`);
    }

    const report = createEmptyReport();
    for (const [role, anchor] of passes) {
        const anchorIndex = anchorIndexFor(symbol, bars, anchor);
        if (anchorIndex === undefined) {
            logger.warn(`${symbol}: unable to analyse ${role} anchor ${anchor}`);
            continue;
        }
        try {
            mergeReports(
                report,
                classifyAnchor({
                    symbol,
                    bars,
                    anchorIndex,
                    role,
                    isLong,
                    isShort,
                    atrLength: options.atrLength,
                    atrMult: options.atrMult,
                })
            );
        } catch (error) {
            logger.warn(`${symbol}: ${role} anchor ${anchor} skipped: ${formatError(error)}`);
        }
    }
    return report;
}

/**
 * Run the whole pipeline once. Per-symbol problems are logged and skipped;
 * only an empty watchlist aborts.
 *
 * @throws WatchlistError when neither ticker file yields a symbol
 */
export async function runOnce(deps: RunDependencies, options: RunOptions = defaultRunOptions()): Promise<RunSummary> {
    const now = deps.now ?? (() => new Date());
    const startTime = Date.now();

    const watchlist = loadWatchlist(options.longsFile, options.shortsFile);
    if (watchlist.symbols.length === 0) {
        throw new WatchlistError(`No symbols found in ${options.longsFile} or ${options.shortsFile}`);
    }
    logger.info(`📋 Loaded ${watchlist.symbols.length} symbols (${watchlist.longs.size} long, ${watchlist.shorts.size} short)`);

    const today = toIsoDate(now());
    const cache = loadCache(options.earningsCacheFile);
    const anchorsBySymbol = await resolveWatchlistAnchors(watchlist.symbols, cache, deps.calendar, {
        today,
        minCount: options.minAnchorCount,
        lookbackDays: options.calendarLookbackDays,
        throttleMs: options.calendarThrottleMs,
    });

    const report = createEmptyReport();
    const skipped: string[] = [];
    for (const symbol of watchlist.symbols) {
        const context: SymbolContext = { symbol, watchlist, today, options, barSource: deps.barSource };
        try {
            mergeReports(report, await analyzeSymbol(context, anchorsBySymbol.get(symbol) ?? []));
        } catch (error) {
            skipped.push(symbol);
            if (error instanceof DataUnavailableError) {
                logger.warn(error.message);
            } else {
                logger.error(`${symbol}: analysis failed`, formatError(error));
            }
        }
    }

    writeSignalLog(options.signalLogFile, report, now());
    saveCache(cache, options.earningsCacheFile);

    const summary: RunSummary = {
        symbols: watchlist.symbols.length,
        processed: watchlist.symbols.length - skipped.length,
        skipped,
        signals: countSignals(report),
        report,
    };

    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.info(`✅ Run complete in ${duration}s. Log: ${options.signalLogFile}, Cache: ${options.earningsCacheFile}`);
    logger.info(`   Symbols: ${summary.symbols} | Processed: ${summary.processed} | Signals: ${summary.signals}`);
    return summary;
}
