import chalk from 'chalk';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'off';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'off'];

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

export type LogContext = Record<string, unknown>;

export interface LogSink {
    write(chunk: string): unknown;
    isTTY?: boolean;
}

export interface LoggerOptions {
    level?: LogLevel;
    /** Defaults to stderr so the report on stdout stays clean */
    sink?: LogSink;
    color?: boolean;
}

type Paint = (text: string) => string;

const LEVEL_STYLE: Record<Exclude<LogLevel, 'off'>, Paint> = {
    trace: chalk.gray,
    debug: chalk.cyan,
    info: chalk.green,
    warn: chalk.yellow,
    error: chalk.red,
};

function formatValue(value: unknown): string {
    if (typeof value === 'string') {
        return /\s/.test(value) ? JSON.stringify(value) : value;
    }
    if (value instanceof Error) {
        return JSON.stringify(value.message);
    }
    return JSON.stringify(value) ?? String(value);
}

export function formatContext(context: LogContext | undefined): string {
    if (!context) {
        return '';
    }
    return Object.entries(context)
        .map(([key, value]) => `${key}=${formatValue(value)}`)
        .join(' ');
}

export class Logger {
    private readonly level: LogLevel;
    private readonly sink: LogSink;
    private readonly color: boolean;

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? 'info';
        this.sink = options.sink ?? process.stderr;
        this.color = options.color ?? Boolean(this.sink.isTTY);
    }

    isEnabled(level: Exclude<LogLevel, 'off'>): boolean {
        return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
    }

    trace(message: string, context?: LogContext): void {
        this.log('trace', message, context);
    }

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.log('error', message, context);
    }

    private log(level: Exclude<LogLevel, 'off'>, message: string, context?: LogContext): void {
        if (!this.isEnabled(level)) {
            return;
        }
        const label = level.toUpperCase().padEnd(5);
        const details = formatContext(context);
        const line = this.color
            ? `${LEVEL_STYLE[level](label)} ${message}${details ? ' ' + chalk.dim(details) : ''}`
            : `${label} ${message}${details ? ' ' + details : ''}`;
        this.sink.write(line + '\n');
    }
}

let logger: Logger | undefined;

/**
 * Initializes the process-wide logger. Call this once at startup.
 */
export function initializeLogger(options: LoggerOptions = {}): Logger {
    logger = new Logger(options);
    return logger;
}

/**
 * Gets the logger. Throws if not initialized.
 */
export function getLogger(): Logger {
    if (!logger) {
        throw new Error('Logger not initialized. Call initializeLogger first.');
    }
    return logger;
}

export function disposeLogger(): void {
    logger = undefined;
}
