/**
 * Signal classifier tests
 * Tests anchor roles, tiers, VWAP touches, crossings and bounces
 */

import {
    classifyAnchor,
    createEmptyReport,
    findLowerCrosses,
    findUpperCrosses,
    mergeReports,
    selectAnchorRoles,
    touchedLevelsByDate,
} from '../src/services/signalClassifier';
import { buildBands } from '../src/services/avwapCalculator';
import { DailyBar, SignalReport } from '../src/types';
import { ComputationUndefinedError, DataUnavailableError } from '../src/utils/errorHandler';
import { datesFrom, flatBar, steadyRangeBars, tierTwoSeries } from './helpers/bars';

function labels(report: SignalReport): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const [category, signals] of Object.entries(report)) {
        if (signals.length > 0) out[category] = signals.map((s) => `${s.label}/${s.side}`);
    }
    return out;
}

/**
 * 20 steady bars, then a heavy anchor bar A and two thin bars B and C.
 * Anchored at A the bands sit within a few thousandths of 100; B dips to 99.9
 * and closes 100.2, C closes 100.8. ATR(20) = 1.77.
 */
function bounceSeries(): DailyBar[] {
    const bars = steadyRangeBars(23);
    bars[20] = { ...bars[20], open: 100, high: 100, low: 100, close: 100, volume: 1_000_000 };
    bars[21] = { ...bars[21], open: 100, high: 100.5, low: 99.9, close: 100.2, volume: 1 };
    bars[22] = { ...bars[22], open: 100.2, high: 101, low: 100.2, close: 100.8, volume: 1 };
    return bars;
}

describe('selectAnchorRoles', () => {
    const today = '2024-03-01';

    it('should use the latest date as current once it is older than the guard', () => {
        expect(selectAnchorRoles(['2024-02-01', '2023-11-01'], today, 10)).toEqual({
            current: '2024-02-01',
            previous: '2023-11-01',
        });
    });

    it('should promote the prior date and drop previous when the latest is recent', () => {
        const roles = selectAnchorRoles(['2024-02-25', '2023-11-20'], today, 10);
        expect(roles.current).toBe('2023-11-20');
        expect(roles.previous).toBeUndefined();
    });

    it('should treat exactly recentDays as recent', () => {
        expect(selectAnchorRoles(['2024-02-20', '2023-11-20'], today, 10).current).toBe('2023-11-20');
    });

    it('should leave no current anchor for a lone recent date', () => {
        expect(selectAnchorRoles(['2024-02-25'], today, 10).current).toBeUndefined();
    });

    it('should return no roles for no dates', () => {
        expect(selectAnchorRoles([], today)).toEqual({});
    });
});

describe('findUpperCrosses / findLowerCrosses', () => {
    // VWAP 98, σ 2 → U1 100, U2 102, U3 104, L1 96, L2 94, L3 92
    const bands = buildBands(98, 2);

    it('should report an upward cross of UPPER_1', () => {
        expect(findUpperCrosses(99, 101, bands)).toEqual([1]);
        expect(findLowerCrosses(99, 101, bands)).toEqual([]);
    });

    it('should report every band crossed in one move, counting a start on the band', () => {
        expect(findUpperCrosses(100, 105, bands)).toEqual([1, 2, 3]);
    });

    it('should report downward crosses of the lower bands', () => {
        expect(findLowerCrosses(97, 93, bands)).toEqual([1, 2]);
    });
});

describe('touchedLevelsByDate', () => {
    it('should collect levels inside each of the last two days', () => {
        const bands = buildBands(100, 5);
        const bars: DailyBar[] = [
            { date: '2024-01-02', open: 80, high: 81, low: 79, close: 80, volume: 1 },
            { date: '2024-01-03', open: 100, high: 101, low: 99, close: 100, volume: 1 },
            { date: '2024-01-04', open: 100, high: 106, low: 94, close: 100, volume: 1 },
        ];
        const hits = touchedLevelsByDate(bars, bands);

        expect(Array.from(hits.keys())).toEqual(['2024-01-03', '2024-01-04']);
        expect(Array.from(hits.get('2024-01-03') ?? [])).toEqual(['VWAP']);
        expect(Array.from(hits.get('2024-01-04') ?? []).sort()).toEqual(['LOWER_1', 'UPPER_1', 'VWAP']);
    });
});

describe('classifyAnchor', () => {
    it('should report TIER2 and both upper crosses for a long breakout', () => {
        const report = classifyAnchor({
            symbol: 'ABC',
            bars: tierTwoSeries(),
            anchorIndex: 0,
            role: 'current',
            isLong: true,
            isShort: false,
        });

        expect(report.TIER2).toEqual([{ symbol: 'ABC', date: '01/26', label: 'UPPER_2', side: 'LONG' }]);
        expect(labels(report)).toEqual({
            TIER2: ['UPPER_2/LONG'],
            CROSS_UP: ['CROSS_UP_UPPER_1/LONG', 'CROSS_UP_UPPER_2/LONG'],
        });
    });

    it('should report nothing for the same breakout on a short-only symbol', () => {
        const report = classifyAnchor({
            symbol: 'ABC',
            bars: tierTwoSeries(),
            anchorIndex: 0,
            role: 'current',
            isLong: false,
            isShort: true,
        });
        expect(labels(report)).toEqual({});
    });

    it('should prefix crossings from the previous anchor and skip tiers', () => {
        const report = classifyAnchor({
            symbol: 'ABC',
            bars: tierTwoSeries(),
            anchorIndex: 0,
            role: 'previous',
            isLong: true,
            isShort: false,
        });
        expect(labels(report)).toEqual({
            PREV_CROSS_UP: ['PREV_CROSS_UP_UPPER_1/LONG', 'PREV_CROSS_UP_UPPER_2/LONG'],
        });
    });

    it('should report a VWAP touch once, on the long side, for a symbol on both lists', () => {
        const [d1, d2, d3] = datesFrom(3);
        const bars: DailyBar[] = [
            flatBar(d1, 90, 1),
            flatBar(d2, 110, 1),
            { date: d3, open: 100, high: 101, low: 99, close: 100, volume: 1 },
        ];
        const report = classifyAnchor({ symbol: 'ABC', bars, anchorIndex: 0, role: 'current', isLong: true, isShort: true });

        expect(labels(report)).toEqual({ VWAP_CROSS: ['VWAP/LONG'] });
        expect(report.VWAP_CROSS[0].date).toBe('01/04');
    });

    it('should suppress a VWAP touch on a day that also spans both 1σ bands', () => {
        const bars = datesFrom(5).map((date) => flatBar(date, 100, 1000));
        const report = classifyAnchor({ symbol: 'ABC', bars, anchorIndex: 0, role: 'current', isLong: true, isShort: false });
        expect(report.VWAP_CROSS).toEqual([]);
    });

    it('should report bounces off every current level B dipped through', () => {
        const report = classifyAnchor({
            symbol: 'ABC',
            bars: bounceSeries(),
            anchorIndex: 20,
            role: 'current',
            isLong: true,
            isShort: false,
        });
        expect(labels(report)).toEqual({
            TIER3: ['UPPER_3/LONG'],
            BOUNCE: ['BOUNCE_LOWER_2/LONG', 'BOUNCE_LOWER_1/LONG', 'BOUNCE_VWAP/LONG', 'BOUNCE_UPPER_1/LONG'],
        });
    });

    it('should test only UPPER_1 for a long bounce on the previous anchor', () => {
        const report = classifyAnchor({
            symbol: 'ABC',
            bars: bounceSeries(),
            anchorIndex: 20,
            role: 'previous',
            isLong: true,
            isShort: false,
        });
        expect(labels(report)).toEqual({ PREV_BOUNCE_LONG: ['PREV_BOUNCE_UPPER_1/LONG'] });
    });

    it('should throw DataUnavailableError for an empty series', () => {
        expect(() =>
            classifyAnchor({ symbol: 'ABC', bars: [], anchorIndex: 0, role: 'current', isLong: true, isShort: false })
        ).toThrow(DataUnavailableError);
    });

    it('should throw ComputationUndefinedError when nothing traded since the anchor', () => {
        const bars = datesFrom(3).map((date) => flatBar(date, 100, 0));
        expect(() =>
            classifyAnchor({ symbol: 'ABC', bars, anchorIndex: 0, role: 'current', isLong: true, isShort: false })
        ).toThrow(ComputationUndefinedError);
    });
});

describe('mergeReports', () => {
    it('should append every category', () => {
        const target = createEmptyReport();
        const source = createEmptyReport();
        source.TIER1.push({ symbol: 'ABC', date: '01/26', label: 'UPPER_1', side: 'LONG' });
        source.PREV_CROSS_DOWN.push({ symbol: 'XYZ', date: '01/26', label: 'PREV_CROSS_DOWN_LOWER_1', side: 'SHORT' });

        mergeReports(target, source);
        mergeReports(target, source);

        expect(target.TIER1).toHaveLength(2);
        expect(target.PREV_CROSS_DOWN).toHaveLength(2);
        expect(target.BOUNCE).toEqual([]);
    });
});
