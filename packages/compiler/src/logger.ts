/**
 * Logging Utility
 * Timestamped console logging with a buffer for inspection
 */

export type LogLevel = 'INFO' | 'WARN';

export interface LoggerOptions {
    /** Keep messages in the buffer only */
    quiet?: boolean;
}

const logBuffer: string[] = [];
const MAX_BUFFER_SIZE = 500;
let quiet = false;

/**
 * Configure console output
 */
export function initLogger(options: LoggerOptions = {}): void {
    quiet = options.quiet ?? false;
}

function record(level: LogLevel, msg: string): void {
    const time = new Date().toLocaleTimeString('en-GB', { hour12: false });
    logBuffer.push(`[${time}] ${level}: ${msg}`);
    if (logBuffer.length > MAX_BUFFER_SIZE) {
        logBuffer.shift();
    }
}

/**
 * Log a progress message
 */
export function log(msg: string): void {
    record('INFO', msg);
    if (!quiet) {
        console.log(msg);
    }
}

/**
 * Log an advisory notice; processing continues
 */
export function warn(msg: string): void {
    record('WARN', msg);
    if (!quiet) {
        console.warn(`Warning: ${msg}`);
    }
}

/**
 * Get the log buffer
 */
export function getLogBuffer(): string[] {
    return [...logBuffer];
}

/**
 * Messages of the given level, without timestamps
 */
export function getMessages(level: LogLevel): string[] {
    const marker = `] ${level}: `;
    return logBuffer
        .filter((entry) => entry.includes(marker))
        .map((entry) => entry.slice(entry.indexOf(marker) + marker.length));
}

/**
 * Clear the log buffer
 */
export function clearLog(): void {
    logBuffer.length = 0;
}
