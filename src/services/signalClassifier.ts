/**
 * AVWAP Signal Radar - Signal Classifier
 * Turns bars + anchored bands into tier, VWAP-touch, crossing and bounce signals
 */

import {
    AnchorRole,
    AnchorRoles,
    BandName,
    Bands,
    DailyBar,
    IsoDate,
    LevelName,
    Side,
    Signal,
    SignalCategory,
    SignalReport,
    CURRENT_CATEGORIES,
    PREVIOUS_CATEGORIES,
} from '../types/index.js';
import { computeBands } from './avwapCalculator.js';
import {
    bounceDown,
    bounceUp,
    calculateATR,
    DEFAULT_ATR_LENGTH,
    DEFAULT_ATR_MULT,
} from '../utils/technicalAnalysis.js';
import { daysBetween, formatMonthDay } from '../utils/formatters.js';
import { ComputationUndefinedError, DataUnavailableError } from '../utils/errorHandler.js';

export const DEFAULT_RECENT_DAYS = 10;

const ALL_LEVELS: LevelName[] = ['VWAP', 'UPPER_1', 'LOWER_1', 'UPPER_2', 'LOWER_2', 'UPPER_3', 'LOWER_3'];

const UPPER_STEPS: [number, BandName][] = [
    [1, 'UPPER_1'],
    [2, 'UPPER_2'],
    [3, 'UPPER_3'],
];

const LOWER_STEPS: [number, BandName][] = [
    [1, 'LOWER_1'],
    [2, 'LOWER_2'],
    [3, 'LOWER_3'],
];

/** Levels tested for bounces on the current anchor, per side */
const CURRENT_BOUNCE_LEVELS: Record<Side, LevelName[]> = {
    LONG: ['LOWER_2', 'LOWER_1', 'VWAP', 'UPPER_1'],
    SHORT: ['UPPER_2', 'UPPER_1', 'VWAP', 'LOWER_1'],
};

/** A day spanning VWAP and both 1σ bands is not reported as a VWAP touch */
const NOISY_DAY_LEVELS: LevelName[] = ['VWAP', 'UPPER_1', 'LOWER_1'];

export interface ClassifyInput {
    symbol: string;
    bars: DailyBar[];
    anchorIndex: number;
    role: AnchorRole;
    isLong: boolean;
    isShort: boolean;
    atrLength?: number;
    atrMult?: number;
}

export function createEmptyReport(): SignalReport {
    return {
        TIER3: [],
        TIER2: [],
        TIER1: [],
        VWAP_CROSS: [],
        CROSS_UP: [],
        CROSS_DOWN: [],
        BOUNCE: [],
        PREV_BOUNCE_LONG: [],
        PREV_BOUNCE_SHORT: [],
        PREV_CROSS_UP: [],
        PREV_CROSS_DOWN: [],
    };
}

/**
 * Append every category of `source` onto `target`
 */
export function mergeReports(target: SignalReport, source: SignalReport): void {
    for (const category of [...CURRENT_CATEGORIES, ...PREVIOUS_CATEGORIES]) {
        target[category].push(...source[category]);
    }
}

/**
 * Pick the anchors for this cycle.
 * The latest date is only "current" once it is older than `recentDays`;
 * otherwise the prior date stands in and no previous-anchor pass runs.
 */
export function selectAnchorRoles(
    anchors: IsoDate[],
    today: IsoDate,
    recentDays: number = DEFAULT_RECENT_DAYS
): AnchorRoles {
    const [latest, prior] = anchors;
    if (latest === undefined) return {};

    if (daysBetween(latest, today) > recentDays) {
        return { current: latest, previous: prior };
    }
    return { current: prior };
}

/**
 * Band steps k where prevClose <= UPPER_k < currClose
 */
export function findUpperCrosses(prevClose: number, currClose: number, bands: Bands): number[] {
    return UPPER_STEPS.filter(([, name]) => prevClose <= bands[name] && bands[name] < currClose).map(([k]) => k);
}

/**
 * Band steps k where prevClose >= LOWER_k > currClose
 */
export function findLowerCrosses(prevClose: number, currClose: number, bands: Bands): number[] {
    return LOWER_STEPS.filter(([, name]) => prevClose >= bands[name] && bands[name] > currClose).map(([k]) => k);
}

/**
 * Levels inside each of the last two distinct dates' [low, high] ranges
 */
export function touchedLevelsByDate(bars: DailyBar[], bands: Bands): Map<IsoDate, Set<LevelName>> {
    const recentDates = Array.from(new Set(bars.map((bar) => bar.date)))
        .sort()
        .slice(-2);
    const hits = new Map<IsoDate, Set<LevelName>>(recentDates.map((date) => [date, new Set<LevelName>()]));

    for (const bar of bars) {
        const touched = hits.get(bar.date);
        if (!touched) continue;
        for (const name of ALL_LEVELS) {
            const value = bands[name];
            if (Number.isFinite(value) && bar.low <= value && value <= bar.high) {
                touched.add(name);
            }
        }
    }
    return hits;
}

function tierFor(close: number, bands: Bands, side: Side): { category: SignalCategory; level: LevelName } | undefined {
    if (side === 'LONG') {
        if (close > bands.UPPER_3) return { category: 'TIER3', level: 'UPPER_3' };
        if (close > bands.UPPER_2) return { category: 'TIER2', level: 'UPPER_2' };
        if (close > bands.UPPER_1) return { category: 'TIER1', level: 'UPPER_1' };
        return undefined;
    }
    if (close < bands.LOWER_3) return { category: 'TIER3', level: 'LOWER_3' };
    if (close < bands.LOWER_2) return { category: 'TIER2', level: 'LOWER_2' };
    if (close < bands.LOWER_1) return { category: 'TIER1', level: 'LOWER_1' };
    return undefined;
}

/**
 * Classify one symbol against one anchor.
 *
 * @throws DataUnavailableError when the series is empty
 * @throws ComputationUndefinedError when no volume traded since the anchor
 */
export function classifyAnchor(input: ClassifyInput): SignalReport {
    const {
        symbol,
        bars,
        anchorIndex,
        role,
        isLong,
        isShort,
        atrLength = DEFAULT_ATR_LENGTH,
        atrMult = DEFAULT_ATR_MULT,
    } = input;

    if (bars.length === 0) {
        throw new DataUnavailableError(`${symbol}: no bars to classify`);
    }

    const anchored = computeBands(bars, anchorIndex);
    if (!anchored) {
        throw new ComputationUndefinedError(`${symbol}: no volume since anchor ${bars[anchorIndex]?.date ?? anchorIndex}`);
    }

    const { bands } = anchored;
    const report = createEmptyReport();
    const last = bars[bars.length - 1];
    const displayDate = formatMonthDay(last.date);
    const prefix = role === 'previous' ? 'PREV_' : '';
    const sides: Side[] = [];
    if (isLong) sides.push('LONG');
    if (isShort) sides.push('SHORT');

    const emit = (category: SignalCategory, label: string, side: Side, date: string = displayDate): void => {
        const signal: Signal = { symbol, date, label, side };
        report[category].push(signal);
    };

    if (role === 'current') {
        for (const side of sides) {
            const tier = tierFor(last.close, bands, side);
            if (tier) emit(tier.category, tier.level, side);
        }

        const touchSide: Side | undefined = isLong ? 'LONG' : isShort ? 'SHORT' : undefined;
        if (touchSide) {
            for (const [date, touched] of touchedLevelsByDate(bars, bands)) {
                if (NOISY_DAY_LEVELS.every((level) => touched.has(level))) continue;
                if (touched.has('VWAP')) emit('VWAP_CROSS', 'VWAP', touchSide, formatMonthDay(date));
            }
        }
    }

    if (bars.length >= 2) {
        const prevClose = bars[bars.length - 2].close;
        const currClose = last.close;
        if (isLong) {
            for (const k of findUpperCrosses(prevClose, currClose, bands)) {
                emit(role === 'previous' ? 'PREV_CROSS_UP' : 'CROSS_UP', `${prefix}CROSS_UP_UPPER_${k}`, 'LONG');
            }
        }
        if (isShort) {
            for (const k of findLowerCrosses(prevClose, currClose, bands)) {
                emit(role === 'previous' ? 'PREV_CROSS_DOWN' : 'CROSS_DOWN', `${prefix}CROSS_DOWN_LOWER_${k}`, 'SHORT');
            }
        }
    }

    if (bars.length < atrLength + 3) return report;
    const atr = calculateATR(bars, atrLength);
    if (atr === undefined) return report;
    const options = { atrLength, atrMult };

    if (role === 'current') {
        for (const side of sides) {
            const detect = side === 'LONG' ? bounceUp : bounceDown;
            for (const level of CURRENT_BOUNCE_LEVELS[side]) {
                if (detect(bars, bands[level], atr, options)) emit('BOUNCE', `BOUNCE_${level}`, side);
            }
        }
    } else {
        if (isLong && bounceUp(bars, bands.UPPER_1, atr, options)) {
            emit('PREV_BOUNCE_LONG', 'PREV_BOUNCE_UPPER_1', 'LONG');
        }
        if (isShort && bounceDown(bars, bands.LOWER_1, atr, options)) {
            emit('PREV_BOUNCE_SHORT', 'PREV_BOUNCE_LOWER_1', 'SHORT');
        }
    }

    return report;
}
