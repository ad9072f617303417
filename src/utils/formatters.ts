import { IsoDate } from '../types/index.js';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function pad2(n: number): string {
    return String(n).padStart(2, '0');
}

/**
 * Parse the date part of an ISO date or datetime string.
 * Returns undefined for anything that is not a real calendar date.
 */
export function parseIsoDate(value: string): IsoDate | undefined {
    const match = ISO_DATE_PATTERN.exec(value.trim());
    if (!match) return undefined;
    const [, y, m, d] = match;
    const year = parseInt(y, 10);
    const month = parseInt(m, 10);
    const day = parseInt(d, 10);
    const utc = new Date(Date.UTC(year, month - 1, day));
    if (utc.getUTCFullYear() !== year || utc.getUTCMonth() !== month - 1 || utc.getUTCDate() !== day) {
        return undefined;
    }
    return `${y}-${m}-${d}`;
}

function toUtcMs(date: IsoDate): number {
    const [y, m, d] = date.split('-').map((part) => parseInt(part, 10));
    return Date.UTC(y, m - 1, d);
}

/**
 * Local calendar date of a Date object
 */
export function toIsoDate(date: Date): IsoDate {
    return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function addDays(date: IsoDate, days: number): IsoDate {
    const shifted = new Date(toUtcMs(date) + days * MS_PER_DAY);
    return `${shifted.getUTCFullYear()}-${pad2(shifted.getUTCMonth() + 1)}-${pad2(shifted.getUTCDate())}`;
}

/**
 * Whole days from `from` to `to` (positive when `to` is later)
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
    return Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY);
}

/**
 * Display date for signal rows (e.g. "01/26")
 */
export function formatMonthDay(date: IsoDate): string {
    const [, m, d] = date.split('-');
    return `${m}/${d}`;
}

/**
 * Local wall-clock time (e.g. "09:30:00")
 */
export function formatClockTime(date: Date): string {
    return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}
