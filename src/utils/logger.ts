/**
 * AVWAP Signal Radar - Logger Utility
 * Consistent logging with timestamps and levels
 */

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

const LOG_PREFIXES: Record<LogLevel, string> = {
    info: '📊',
    warn: '⚠️',
    error: '❌',
    debug: '🔍',
};

/**
 * Format timestamp for logs
 */
function getTimestamp(): string {
    return new Date().toISOString();
}

function isDebugEnabled(): boolean {
    return (process.env.LOG_LEVEL || '').toLowerCase() === 'debug';
}

/**
 * Log a message with level and timestamp
 */
function log(level: LogLevel, message: string, data?: unknown): void {
    if (level === 'debug' && !isDebugEnabled()) return;

    const prefix = LOG_PREFIXES[level];
    const timestamp = getTimestamp();
    const logMessage = `[${timestamp}] ${prefix} ${message}`;
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

    if (data !== undefined) {
        sink(logMessage, data);
    } else {
        sink(logMessage);
    }
}

export const logger = {
    info: (message: string, data?: unknown): void => log('info', message, data),
    warn: (message: string, data?: unknown): void => log('warn', message, data),
    error: (message: string, data?: unknown): void => log('error', message, data),
    debug: (message: string, data?: unknown): void => log('debug', message, data),
};

export default logger;
