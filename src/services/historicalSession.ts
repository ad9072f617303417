/**
 * AVWAP Signal Radar - Historical Data Session Bridge
 * Turns a callback-driven broker session into awaitable bar requests
 */

import pLimit from 'p-limit';
import { BarSource, DailyBar } from '../types/index.js';
import { config } from '../config/index.js';
import { formatError, SourceFailureError } from '../utils/errorHandler.js';
import { parseIsoDate } from '../utils/formatters.js';
import logger from '../utils/logger.js';
import { normalizeBars } from './marketData.js';

/** Bar as delivered by the session; `time` is YYYYMMDD */
export interface SessionBar {
    time: string;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
}

/**
 * Broker session that answers requests through events keyed by request id
 */
export interface HistoricalDataSession {
    requestHistoricalData(reqId: number, symbol: string, duration: string): void;
    on(event: 'historicalData', listener: (reqId: number, bar: SessionBar) => void): unknown;
    on(event: 'historicalDataEnd', listener: (reqId: number) => void): unknown;
    on(event: 'error', listener: (reqId: number, code: number, message: string) => void): unknown;
}

/** Farm-connection status notices, not request failures */
const INFORMATIONAL_CODES = new Set([2104, 2106, 2158, 2176]);

interface PendingRequest {
    symbol: string;
    bars: SessionBar[];
    resolve: (bars: SessionBar[]) => void;
    reject: (error: Error) => void;
    timer: NodeJS.Timeout;
}

export interface SessionBarSourceOptions {
    timeoutMs?: number;
    firstRequestId?: number;
}

/**
 * Duration string for a lookback in days: "N D" up to a year, whole years beyond
 */
export function formatDuration(lookbackDays: number): string {
    if (lookbackDays > 365) return `${Math.max(1, Math.ceil(lookbackDays / 365))} Y`;
    return `${Math.max(2, lookbackDays)} D`;
}

export function sessionBarToDailyBar(bar: SessionBar): DailyBar | undefined {
    const compact = bar.time.trim().slice(0, 8);
    const date = /^\d{8}$/.test(compact)
        ? parseIsoDate(`${compact.slice(0, 4)}-${compact.slice(4, 6)}-${compact.slice(6, 8)}`)
        : parseIsoDate(bar.time);
    if (!date) return undefined;
    return { date, open: bar.open, high: bar.high, low: bar.low, close: bar.close, volume: bar.volume };
}

/**
 * Bar source over a shared session. Requests run one at a time; each gets a
 * fresh request id and resolves on `historicalDataEnd`, or to [] on timeout
 * or session error.
 */
export class SessionBarSource implements BarSource {
    private readonly pending = new Map<number, PendingRequest>();
    private readonly limit = pLimit(1);
    private readonly timeoutMs: number;
    private nextRequestId: number;

    constructor(
        private readonly session: HistoricalDataSession,
        options: SessionBarSourceOptions = {}
    ) {
        this.timeoutMs = options.timeoutMs ?? config.barTimeoutMs;
        this.nextRequestId = options.firstRequestId ?? 1;

        session.on('historicalData', (reqId, bar) => {
            this.pending.get(reqId)?.bars.push(bar);
        });
        session.on('historicalDataEnd', (reqId) => {
            const request = this.settle(reqId);
            request?.resolve(request.bars);
        });
        session.on('error', (reqId, code, message) => {
            if (INFORMATIONAL_CODES.has(code)) return;
            const request = this.settle(reqId);
            if (request) {
                request.reject(new SourceFailureError('Historical session', `error ${code} for ${request.symbol}: ${message}`));
            } else {
                logger.error(`Session error ${code}[${reqId}]: ${message}`);
            }
        });
    }

    /** Requests still awaiting a reply */
    get inFlight(): number {
        return this.pending.size;
    }

    fetchDailyBars(symbol: string, lookbackDays: number): Promise<DailyBar[]> {
        return this.limit(() => this.request(symbol, lookbackDays));
    }

    private settle(reqId: number): PendingRequest | undefined {
        const request = this.pending.get(reqId);
        if (!request) return undefined;
        clearTimeout(request.timer);
        this.pending.delete(reqId);
        return request;
    }

    private async request(symbol: string, lookbackDays: number): Promise<DailyBar[]> {
        const reqId = this.nextRequestId++;

        try {
            const raw = await new Promise<SessionBar[]>((resolve, reject) => {
                const timer = setTimeout(() => {
                    this.settle(reqId);
                    reject(new SourceFailureError('Historical session', `timed out after ${this.timeoutMs}ms for ${symbol}`));
                }, this.timeoutMs);
                this.pending.set(reqId, { symbol, bars: [], resolve, reject, timer });

                try {
                    this.session.requestHistoricalData(reqId, symbol, formatDuration(lookbackDays));
                } catch (error) {
                    this.settle(reqId);
                    reject(error instanceof Error ? error : new Error(String(error)));
                }
            });

            const bars: DailyBar[] = [];
            for (const bar of raw) {
                const daily = sessionBarToDailyBar(bar);
                if (daily) bars.push(daily);
            }
            return normalizeBars(bars);
        } catch (error) {
            logger.warn(`Bar request ${reqId} for ${symbol} failed: ${formatError(error)}`);
            return [];
        }
    }
}
