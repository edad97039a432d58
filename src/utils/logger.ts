import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { format } from 'date-fns';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface LoggerOptions {
    level?: LogLevel;
    /** Every line at or above `level` is also appended here. */
    logFile?: string;
    /** Set false to keep the console quiet (the log file still receives lines). */
    console?: boolean;
}

const COLORS: Record<LogLevel, (text: string) => string> = {
    debug: chalk.gray,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red.bold,
};

export function timestamp(date: Date = new Date()): string {
    return format(date, 'yyyy-MM-dd HH:mm:ss');
}

function appendLine(file: string, line: string): void {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    fs.appendFileSync(file, line + '\n', 'utf-8');
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
    const toConsole = options.console ?? true;

    const write = (level: LogLevel, message: string) => {
        if (LOG_LEVELS.indexOf(level) < threshold) return;
        const line = `${timestamp()} - ${level.toUpperCase()} - ${message}`;

        if (toConsole) {
            const stream = level === 'error' || level === 'warn' ? console.error : console.log;
            stream(COLORS[level](line));
        }
        if (options.logFile) {
            appendLine(options.logFile, line);
        }
    };

    return {
        debug: (message) => write('debug', message),
        info: (message) => write('info', message),
        warn: (message) => write('warn', message),
        error: (message) => write('error', message),
    };
}

export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};

// Error ledger

export interface ErrorLedgerEntry {
    timestamp: string;
    filename: string;
    message: string;
}

export interface ErrorLedger {
    recordError(filename: string, message: string): void;
    entries(): ErrorLedgerEntry[];
}

/**
 * Per-file failures, kept in memory and, when a file is given, appended to it as
 * `[timestamp] filename: message`.
 */
export function createErrorLedger(logFile?: string): ErrorLedger {
    const recorded: ErrorLedgerEntry[] = [];

    return {
        recordError(filename, message) {
            const entry = { timestamp: timestamp(), filename, message };
            recorded.push(entry);
            if (logFile) {
                appendLine(logFile, `[${entry.timestamp}] ${filename}: ${message}`);
            }
        },
        entries: () => [...recorded],
    };
}
