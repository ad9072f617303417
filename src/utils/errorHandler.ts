/**
 * AVWAP Signal Radar - Error Handler Utility
 * Error categories for the signal pipeline, plus retry helpers
 */

import logger from './logger.js';

/** Bars missing, anchor bar missing, or too few bars after the anchor */
export class DataUnavailableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DataUnavailableError';
    }
}

/** Zero cumulative volume, undefined bands or a short ATR window */
export class ComputationUndefinedError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ComputationUndefinedError';
    }
}

/** Network, HTTP, parse or timeout failure from an external source */
export class SourceFailureError extends Error {
    constructor(
        public readonly source: string,
        message: string
    ) {
        super(`${source}: ${message}`);
        this.name = 'SourceFailureError';
    }
}

/** No usable ticker list; the only error that aborts a run */
export class WatchlistError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'WatchlistError';
    }
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry a function with exponential backoff
 * @param fn - Function to retry
 * @param maxRetries - Maximum number of retries
 * @param baseDelayMs - Base delay in milliseconds (doubles each retry)
 * @param context - Context string for logging
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    maxRetries: number = 3,
    baseDelayMs: number = 1000,
    context: string = 'operation'
): Promise<T> {
    let lastError: Error = new Error(`${context} was not attempted`);

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(String(error));

            if (attempt === maxRetries) {
                logger.error(`${context} failed after ${maxRetries} attempts`, lastError.message);
                throw lastError;
            }

            const delay = baseDelayMs * Math.pow(2, attempt - 1);
            logger.warn(`${context} failed (attempt ${attempt}/${maxRetries}), retrying in ${delay}ms...`);
            await sleep(delay);
        }
    }

    throw lastError;
}

/**
 * Safe JSON parse with fallback
 */
export function safeJsonParse(json: string, fallback: unknown): unknown {
    try {
        return JSON.parse(json);
    } catch {
        return fallback;
    }
}

/**
 * Format error for log lines
 */
export function formatError(error: unknown): string {
    if (error instanceof Error) {
        return `${error.name}: ${error.message}`;
    }
    return String(error);
}

/**
 * Narrow an unknown JSON value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
