/**
 * Watchlist tests
 * Tests ticker list parsing and loading the long/short files
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadTickerFile, loadWatchlist, parseTickerList } from '../src/config/index';

describe('parseTickerList', () => {
    it('should skip the TC2000 header and blank lines', () => {
        const text = 'Symbols from TC2000 - Watchlist 3\n\nAAPL\n  \nMSFT\n';
        expect(parseTickerList(text)).toEqual(['AAPL', 'MSFT']);
    });

    it('should uppercase and trim symbols', () => {
        expect(parseTickerList('  nvda \r\namd\r\n')).toEqual(['NVDA', 'AMD']);
    });

    it('should return nothing for empty text', () => {
        expect(parseTickerList('')).toEqual([]);
    });
});

describe('loadWatchlist', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'watchlist-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should return an empty list for a missing file', () => {
        expect(loadTickerFile(path.join(dir, 'missing.txt'))).toEqual([]);
    });

    it('should keep side membership and a sorted union', () => {
        const longs = path.join(dir, 'longs.txt');
        const shorts = path.join(dir, 'shorts.txt');
        fs.writeFileSync(longs, 'SYMBOLS FROM TC2000\nmsft\nAAPL\n');
        fs.writeFileSync(shorts, 'XOM\nAAPL\n');

        const watchlist = loadWatchlist(longs, shorts);

        expect(watchlist.symbols).toEqual(['AAPL', 'MSFT', 'XOM']);
        expect(Array.from(watchlist.longs)).toEqual(['MSFT', 'AAPL']);
        expect(watchlist.shorts.has('AAPL')).toBe(true);
        expect(watchlist.shorts.has('MSFT')).toBe(false);
    });

    it('should load one side when the other file is missing', () => {
        const shorts = path.join(dir, 'shorts.txt');
        fs.writeFileSync(shorts, 'XOM\n');

        const watchlist = loadWatchlist(path.join(dir, 'longs.txt'), shorts);

        expect(watchlist.symbols).toEqual(['XOM']);
        expect(watchlist.longs.size).toBe(0);
    });
});
