/**
 * AVWAP Signal Radar - Technical Analysis Utility
 * True Range / ATR and the ATR-scaled bounce patterns
 */

import { DailyBar } from '../types/index.js';

export const DEFAULT_ATR_LENGTH = 20;

/** eps/push = 0.05 * ATR */
export const DEFAULT_ATR_MULT = 0.05;

export interface BounceOptions {
    atrLength?: number;
    atrMult?: number;
}

/**
 * Calculate Simple Moving Average of the trailing window
 */
export function calculateSMA(values: number[], periods: number): number | undefined {
    if (periods <= 0 || values.length < periods) return undefined;
    const slice = values.slice(-periods);
    const sum = slice.reduce((a, b) => a + b, 0);
    return sum / periods;
}

/**
 * True Range for every bar after the first
 */
export function trueRanges(bars: DailyBar[]): number[] {
    const ranges: number[] = [];
    for (let i = 1; i < bars.length; i++) {
        const { high, low } = bars[i];
        const prevClose = bars[i - 1].close;
        ranges.push(Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose)));
    }
    return ranges;
}

/**
 * Average True Range: simple mean of the last `length` True Range values.
 * Undefined with fewer than length+1 bars or a non-positive result.
 */
export function calculateATR(bars: DailyBar[], length: number = DEFAULT_ATR_LENGTH): number | undefined {
    if (bars.length < length + 1) return undefined;
    const atr = calculateSMA(trueRanges(bars), length);
    if (atr === undefined || !Number.isFinite(atr) || atr <= 0) return undefined;
    return atr;
}

function bounceInputsValid(bars: DailyBar[], level: number, atr: number, atrLength: number): boolean {
    return bars.length >= atrLength + 3 && Number.isFinite(level) && Number.isFinite(atr);
}

/**
 * Bounce up from `level` over the last three bars (A, B, C):
 * B touches within eps and closes at/above the level, C closes higher and at least `push` above it.
 */
export function bounceUp(
    bars: DailyBar[],
    level: number | undefined,
    atr: number | undefined,
    options: BounceOptions = {}
): boolean {
    const { atrLength = DEFAULT_ATR_LENGTH, atrMult = DEFAULT_ATR_MULT } = options;
    if (level === undefined || atr === undefined) return false;
    if (!bounceInputsValid(bars, level, atr, atrLength)) return false;

    const eps = atrMult * atr;
    const push = atrMult * atr;
    const b = bars[bars.length - 2];
    const c = bars[bars.length - 1];

    const touched = b.low <= level + eps;
    const reclaimed = b.close >= level;
    const confirmed = c.close > b.close && c.close >= level + push;
    return touched && reclaimed && confirmed;
}

/**
 * Rejection down from `level`; mirror of bounceUp
 */
export function bounceDown(
    bars: DailyBar[],
    level: number | undefined,
    atr: number | undefined,
    options: BounceOptions = {}
): boolean {
    const { atrLength = DEFAULT_ATR_LENGTH, atrMult = DEFAULT_ATR_MULT } = options;
    if (level === undefined || atr === undefined) return false;
    if (!bounceInputsValid(bars, level, atr, atrLength)) return false;

    const eps = atrMult * atr;
    const push = atrMult * atr;
    const b = bars[bars.length - 2];
    const c = bars[bars.length - 1];

    const touched = b.high >= level - eps;
    const rejected = b.close <= level;
    const confirmed = c.close < b.close && c.close <= level - push;
    return touched && rejected && confirmed;
}
