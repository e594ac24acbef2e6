/**
 * Logger Utility
 *
 * Per-module loggers with a `[module]` prefix and level control.
 * Each module creates its own Logger; the level is global unless
 * an instance overrides it.
 */

export enum LogLevel {
    NONE = 0,
    ERROR = 1,
    WARN = 2,
    INFO = 3,
    DEBUG = 4,
}

/**
 * Where log lines go. Defaults to the console.
 */
export interface LogSink {
    debug(...args: unknown[]): void;
    info(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

const consoleSink: LogSink = {
    debug: (...args) => console.log(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
};

let globalLogLevel: LogLevel = LogLevel.WARN;
let globalSink: LogSink = consoleSink;

export function setGlobalLogLevel(level: LogLevel): void {
    globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
    return globalLogLevel;
}

/**
 * Replace the sink shared by every Logger. Pass nothing to restore the console.
 */
export function setLogSink(sink?: LogSink): void {
    globalSink = sink ?? consoleSink;
}

/**
 * Map a level name from configuration (`debug`, `WARN`, ...) to a LogLevel.
 * Unknown or empty values return undefined so callers keep their default.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (!value) return undefined;
    switch (value.trim().toUpperCase()) {
        case 'NONE':
        case 'SILENT':
            return LogLevel.NONE;
        case 'ERROR':
            return LogLevel.ERROR;
        case 'WARN':
        case 'WARNING':
            return LogLevel.WARN;
        case 'INFO':
            return LogLevel.INFO;
        case 'DEBUG':
            return LogLevel.DEBUG;
        default:
            return undefined;
    }
}

/**
 * @example
 * ```typescript
 * const logger = new Logger('Kernel-Compiler');
 * logger.debug('Lowered Abs');
 * // [Kernel-Compiler] Lowered Abs
 * ```
 */
export class Logger {
    private readonly module: string;
    private localLevel?: LogLevel;

    constructor(module: string) {
        this.module = module;
    }

    /**
     * Override the global level for this instance only
     */
    setLevel(level: LogLevel | undefined): void {
        this.localLevel = level;
    }

    isEnabled(level: LogLevel): boolean {
        return level !== LogLevel.NONE && (this.localLevel ?? globalLogLevel) >= level;
    }

    private prefix(): string {
        return `[${this.module}]`;
    }

    debug(...args: unknown[]): void {
        if (this.isEnabled(LogLevel.DEBUG)) {
            globalSink.debug(this.prefix(), ...args);
        }
    }

    info(...args: unknown[]): void {
        if (this.isEnabled(LogLevel.INFO)) {
            globalSink.info(this.prefix(), ...args);
        }
    }

    warn(...args: unknown[]): void {
        if (this.isEnabled(LogLevel.WARN)) {
            globalSink.warn(this.prefix(), ...args);
        }
    }

    error(...args: unknown[]): void {
        if (this.isEnabled(LogLevel.ERROR)) {
            globalSink.error(this.prefix(), ...args);
        }
    }
}
