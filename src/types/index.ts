/**
 * AVWAP Signal Radar - Type Definitions
 * Core interfaces for bars, anchors, bands and signals
 */

/** Calendar date as YYYY-MM-DD */
export type IsoDate = string;

export type Side = 'LONG' | 'SHORT';

export type AnchorRole = 'current' | 'previous';

/**
 * One daily OHLCV row, ascending by date within a series
 */
export interface DailyBar {
    date: IsoDate;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
}

export type BandName = 'UPPER_1' | 'UPPER_2' | 'UPPER_3' | 'LOWER_1' | 'LOWER_2' | 'LOWER_3';

export type LevelName = 'VWAP' | BandName;

export type Bands = Record<LevelName, number>;

/**
 * Anchored VWAP result for one anchor
 */
export interface AnchoredVwap {
    vwap: number;
    stdev: number;
    bands: Bands;
}

/**
 * Output row: `SYMBOL,MM/DD,LABEL,SIDE`
 */
export interface Signal {
    symbol: string;
    /** Display date (MM/DD) */
    date: string;
    label: string;
    side: Side;
}

export type CurrentCategory = 'TIER3' | 'TIER2' | 'TIER1' | 'VWAP_CROSS' | 'CROSS_UP' | 'CROSS_DOWN' | 'BOUNCE';

export type PreviousCategory = 'PREV_BOUNCE_LONG' | 'PREV_BOUNCE_SHORT' | 'PREV_CROSS_UP' | 'PREV_CROSS_DOWN';

export type SignalCategory = CurrentCategory | PreviousCategory;

/** Category blocks in output order */
export const CURRENT_CATEGORIES: readonly CurrentCategory[] = [
    'TIER3',
    'TIER2',
    'TIER1',
    'VWAP_CROSS',
    'CROSS_UP',
    'CROSS_DOWN',
    'BOUNCE',
];

export const PREVIOUS_CATEGORIES: readonly PreviousCategory[] = [
    'PREV_BOUNCE_LONG',
    'PREV_BOUNCE_SHORT',
    'PREV_CROSS_UP',
    'PREV_CROSS_DOWN',
];

export type SignalReport = Record<SignalCategory, Signal[]>;

/**
 * Persisted anchor cache entry (canonical shape)
 */
export interface AnchorCacheEntry {
    current: IsoDate;
    previous?: IsoDate;
    /** All known dates, descending; written only when more than two are known */
    dates?: IsoDate[];
}

/**
 * Row from a date-batch earnings calendar
 */
export interface CalendarRow {
    symbol: string;
    company?: string;
    time?: string;
}

/**
 * Market data collaborator
 */
export interface BarSource {
    /** Ascending daily bars; empty on no data or transient failure */
    fetchDailyBars(symbol: string, lookbackDays: number): Promise<DailyBar[]>;
}

/**
 * Earnings calendar collaborator
 */
export interface EarningsCalendarSource {
    fetchByDate(date: IsoDate): Promise<CalendarRow[]>;
    /** Past report dates for one symbol, most recent first */
    fetchReportDates(symbol: string): Promise<IsoDate[]>;
}

/**
 * Anchors chosen for one symbol this cycle
 */
export interface AnchorRoles {
    current?: IsoDate;
    previous?: IsoDate;
}
