/**
 * AVWAP Signal Radar - Signal Log Writer
 * Serializes a run's signals into the sectioned text log read by the watcher
 */

import fs from 'node:fs';
import path from 'node:path';
import { CURRENT_CATEGORIES, PREVIOUS_CATEGORIES, Signal, SignalCategory, SignalReport } from '../types/index.js';
import { formatClockTime } from '../utils/formatters.js';

export const CURRENT_SECTION_HEADER = '# CURRENT ANCHOR';
export const PREVIOUS_SECTION_HEADER = '# PREVIOUS ANCHOR';

/**
 * LONG rows first, then SHORT rows; order within a side is kept
 */
export function sortLongFirst(signals: Signal[]): Signal[] {
    return [...signals.filter((s) => s.side === 'LONG'), ...signals.filter((s) => s.side === 'SHORT')];
}

export function formatSignalLine(signal: Signal): string {
    return `${signal.symbol},${signal.date},${signal.label},${signal.side}`;
}

function formatBlocks(report: SignalReport, categories: readonly SignalCategory[]): string {
    let out = '';
    for (const category of categories) {
        const signals = sortLongFirst(report[category]);
        if (signals.length === 0) continue;
        out += signals.map((signal) => `${formatSignalLine(signal)}\n`).join('');
        out += '\n';
    }
    return out;
}

/**
 * Full log text: both sections, each non-empty category followed by a blank
 * line, then the completion line.
 */
export function formatSignalLog(report: SignalReport, completedAt: Date): string {
    return (
        `${CURRENT_SECTION_HEADER}\n` +
        formatBlocks(report, CURRENT_CATEGORIES) +
        `${PREVIOUS_SECTION_HEADER}\n` +
        formatBlocks(report, PREVIOUS_CATEGORIES) +
        `Run completed at ${formatClockTime(completedAt)}\n`
    );
}

/**
 * Rewrite the log file from scratch
 */
export function writeSignalLog(filePath: string, report: SignalReport, completedAt: Date): void {
    const dir = path.dirname(filePath);
    if (dir && dir !== '.') fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(filePath, formatSignalLog(report, completedAt), 'utf-8');
}

/**
 * Number of signals across all categories
 */
export function countSignals(report: SignalReport): number {
    return [...CURRENT_CATEGORIES, ...PREVIOUS_CATEGORIES].reduce((sum, category) => sum + report[category].length, 0);
}
