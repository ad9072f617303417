/**
 * AVWAP Signal Radar - Earnings Anchor Cache
 * Normalizes legacy cache shapes and persists the canonical form
 */

import fs from 'node:fs';
import path from 'node:path';
import { AnchorCacheEntry, IsoDate } from '../types/index.js';
import { isRecord, safeJsonParse } from '../utils/errorHandler.js';
import { parseIsoDate } from '../utils/formatters.js';
import logger from '../utils/logger.js';

/** Symbol → canonical entry, as written to disk */
export type AnchorCache = Record<string, AnchorCacheEntry>;

const LEGACY_KEYS = ['current', 'previous', 'latest', 'prior'] as const;

function rawDateValues(entry: unknown): unknown[] {
    if (typeof entry === 'string') return [entry];
    if (Array.isArray(entry)) return entry;
    if (isRecord(entry)) {
        const record = entry;
        if (Array.isArray(record.dates)) return record.dates;
        return LEGACY_KEYS.filter((key) => key in record).map((key) => record[key]);
    }
    return [];
}

/**
 * Map one persisted entry of any known shape to distinct dates, most recent first.
 *
 * Accepted shapes:
 * - "2024-01-05"
 * - ["2024-01-05", "2023-10-20"]
 * - { dates: [...] }
 * - { current, previous } (also the older `latest` / `prior` keys)
 */
export function normalizeCacheEntry(entry: unknown): IsoDate[] {
    const dates = new Set<IsoDate>();
    for (const value of rawDateValues(entry)) {
        if (typeof value !== 'string') continue;
        const date = parseIsoDate(value);
        if (date) dates.add(date);
    }
    return Array.from(dates).sort().reverse();
}

/**
 * Canonical entry for a set of dates; undefined when there are none
 */
export function serializeDates(dates: Iterable<IsoDate>): AnchorCacheEntry | undefined {
    const ordered = Array.from(new Set(dates)).sort().reverse();
    if (ordered.length === 0) return undefined;

    const entry: AnchorCacheEntry = { current: ordered[0] };
    if (ordered.length > 1) entry.previous = ordered[1];
    if (ordered.length > 2) entry.dates = ordered;
    return entry;
}

/**
 * Normalize a whole cache document. Anything that is not a JSON object is
 * treated as an empty cache; entries without a valid date are dropped.
 */
export function parseCacheDocument(raw: unknown): AnchorCache {
    const cache: AnchorCache = {};
    if (!isRecord(raw)) return cache;

    for (const [symbol, entry] of Object.entries(raw)) {
        const serialized = serializeDates(normalizeCacheEntry(entry));
        if (serialized) cache[symbol] = serialized;
    }
    return cache;
}

/**
 * Dates known for `symbol`, most recent first
 */
export function getCachedDates(cache: AnchorCache, symbol: string): IsoDate[] {
    const entry = cache[symbol];
    return entry ? normalizeCacheEntry(entry) : [];
}

/**
 * Load the cache from disk; missing or corrupt files start an empty cache
 */
export function loadCache(filePath: string): AnchorCache {
    if (!fs.existsSync(filePath)) return {};

    const raw = safeJsonParse(fs.readFileSync(filePath, 'utf-8'), undefined);
    if (!isRecord(raw)) {
        logger.warn(`Earnings cache ${filePath} is corrupt; starting with an empty cache.`);
        return {};
    }
    return parseCacheDocument(raw);
}

export function saveCache(cache: AnchorCache, filePath: string): void {
    const dir = path.dirname(filePath);
    if (dir && dir !== '.') fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(cache, null, 2)}\n`, 'utf-8');
}
