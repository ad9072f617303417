/**
 * AVWAP Signal Radar - Anchored VWAP Calculator
 * Anchored VWAP and ±1/2/3 standard deviation bands from an anchor bar
 */

import { AnchoredVwap, Bands, DailyBar, IsoDate } from '../types/index.js';

/**
 * (open + high + low + close) / 4
 */
export function typicalPrice(bar: DailyBar): number {
    return (bar.open + bar.high + bar.low + bar.close) / 4;
}

/**
 * Index of the bar dated exactly `anchor`, if any
 */
export function findAnchorIndex(bars: DailyBar[], anchor: IsoDate): number | undefined {
    const index = bars.findIndex((bar) => bar.date === anchor);
    return index >= 0 ? index : undefined;
}

export function buildBands(vwap: number, stdev: number): Bands {
    return {
        VWAP: vwap,
        UPPER_1: vwap + stdev,
        LOWER_1: vwap - stdev,
        UPPER_2: vwap + 2 * stdev,
        LOWER_2: vwap - 2 * stdev,
        UPPER_3: vwap + 3 * stdev,
        LOWER_3: vwap - 3 * stdev,
    };
}

/**
 * Single forward pass from `anchorIndex` to the end of the series.
 *
 * Bars with volume <= 0 are skipped. Variance accumulates each bar's squared
 * deviation from the VWAP as it stands after that bar (the running mean), not
 * from the final VWAP.
 *
 * @returns undefined when no volume traded from the anchor onward
 */
export function computeBands(bars: DailyBar[], anchorIndex: number): AnchoredVwap | undefined {
    let cumVol = 0;
    let cumVP = 0;
    let cumSD = 0;

    for (let i = Math.max(0, anchorIndex); i < bars.length; i++) {
        const bar = bars[i];
        const volume = bar.volume;
        if (!(volume > 0)) continue;

        const tp = typicalPrice(bar);
        cumVol += volume;
        cumVP += tp * volume;
        const runningVwap = cumVP / cumVol;
        const deviation = tp - runningVwap;
        cumSD += deviation * deviation * volume;
    }

    if (cumVol === 0) return undefined;

    const vwap = cumVP / cumVol;
    const stdev = Math.sqrt(cumSD / cumVol);
    if (!Number.isFinite(vwap) || !Number.isFinite(stdev)) return undefined;

    return { vwap, stdev, bands: buildBands(vwap, stdev) };
}
