/**
 * Anchored VWAP calculator tests
 */

import { buildBands, computeBands, findAnchorIndex, typicalPrice } from '../src/services/avwapCalculator';
import { DailyBar } from '../src/types';
import { datesFrom, flatBar } from './helpers/bars';

describe('typicalPrice', () => {
    it('should average open, high, low and close', () => {
        expect(typicalPrice({ date: '2024-01-02', open: 10, high: 14, low: 8, close: 12, volume: 1 })).toBe(11);
    });
});

describe('findAnchorIndex', () => {
    const bars = datesFrom(3).map((date) => flatBar(date, 100, 1000));

    it('should return the index of the bar on the anchor date', () => {
        expect(findAnchorIndex(bars, '2024-01-03')).toBe(1);
    });

    it('should return undefined when no bar has that date', () => {
        expect(findAnchorIndex(bars, '2024-01-06')).toBeUndefined();
    });
});

describe('computeBands', () => {
    it('should collapse every band onto VWAP for a flat price', () => {
        const bars = datesFrom(10).map((date) => flatBar(date, 50, 1000));
        const result = computeBands(bars, 3);

        expect(result).toBeDefined();
        expect(result?.vwap).toBe(50);
        expect(result?.stdev).toBe(0);
        expect(result?.bands).toEqual(buildBands(50, 0));
        expect(Object.values(result?.bands ?? {})).toEqual([50, 50, 50, 50, 50, 50, 50]);
    });

    it('should measure deviation against the running VWAP', () => {
        const [d1, d2] = datesFrom(2);
        const result = computeBands([flatBar(d1, 10, 1), flatBar(d2, 20, 1)], 0);

        // bar 2 deviates 5 from the running VWAP of 15: sqrt(25 / 2)
        expect(result?.vwap).toBe(15);
        expect(result?.stdev).toBeCloseTo(Math.sqrt(12.5), 10);
    });

    it('should ignore bars before the anchor', () => {
        const [d1, d2, d3] = datesFrom(3);
        const result = computeBands([flatBar(d1, 100, 1000), flatBar(d2, 10, 1), flatBar(d3, 20, 1)], 1);
        expect(result?.vwap).toBe(15);
    });

    it('should give the same result with zero- or negative-volume bars removed', () => {
        const dates = datesFrom(5);
        const traded: DailyBar[] = [
            { date: dates[0], open: 100, high: 102, low: 99, close: 101, volume: 1000 },
            { date: dates[2], open: 101, high: 104, low: 100, close: 103, volume: 2000 },
            { date: dates[4], open: 103, high: 103, low: 97, close: 98, volume: 1500 },
        ];
        const withGaps: DailyBar[] = [
            traded[0],
            { date: dates[1], open: 150, high: 160, low: 140, close: 155, volume: 0 },
            traded[1],
            { date: dates[3], open: 10, high: 12, low: 9, close: 11, volume: -5 },
            traded[2],
        ];

        expect(computeBands(withGaps, 0)).toEqual(computeBands(traded, 0));
    });

    it('should order bands strictly when price varies', () => {
        const dates = datesFrom(4);
        const bars = [
            flatBar(dates[0], 100, 1000),
            flatBar(dates[1], 104, 1200),
            flatBar(dates[2], 97, 800),
            flatBar(dates[3], 102, 1500),
        ];
        const bands = computeBands(bars, 0)?.bands;

        expect(bands).toBeDefined();
        if (!bands) return;
        const ordered = [
            bands.LOWER_3,
            bands.LOWER_2,
            bands.LOWER_1,
            bands.VWAP,
            bands.UPPER_1,
            bands.UPPER_2,
            bands.UPPER_3,
        ];
        for (let i = 1; i < ordered.length; i++) {
            expect(ordered[i]).toBeGreaterThan(ordered[i - 1]);
        }
    });

    it('should return undefined when nothing traded since the anchor', () => {
        const bars = datesFrom(3).map((date) => flatBar(date, 100, 0));
        expect(computeBands(bars, 0)).toBeUndefined();
    });

    it('should return undefined for an anchor past the end of the series', () => {
        const bars = datesFrom(3).map((date) => flatBar(date, 100, 1000));
        expect(computeBands(bars, 3)).toBeUndefined();
    });
});
