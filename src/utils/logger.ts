/**
 * Centralized Logging System for org-inline
 *
 * Provides structured logging with:
 * - Log levels (DEBUG, INFO, WARN, ERROR)
 * - A pluggable sink (console by default)
 * - Tracking of recent errors
 * - Module-scoped loggers
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

/**
 * Map string config values to LogLevel
 */
const LOG_LEVEL_MAP: Record<string, LogLevel> = {
    'debug': LogLevel.DEBUG,
    'info': LogLevel.INFO,
    'warn': LogLevel.WARN,
    'error': LogLevel.ERROR
};

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Parse a level name, returning undefined for unknown names
 */
export function parseLogLevel(value: string): LogLevel | undefined {
    return LOG_LEVEL_MAP[value.trim().toLowerCase()];
}

/**
 * Receives formatted log lines
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Default sink: route each level to the matching console method
 */
export const consoleSink: LogSink = (level, line) => {
    switch (level) {
        case LogLevel.DEBUG:
            console.debug(line);
            break;
        case LogLevel.INFO:
            console.log(line);
            break;
        case LogLevel.WARN:
            console.warn(line);
            break;
        case LogLevel.ERROR:
            console.error(line);
            break;
    }
};

/**
 * Error entry for tracking recent errors
 */
export interface ErrorEntry {
    timestamp: number;
    module: string;
    message: string;
    error?: Error;
}

/**
 * Global logging state
 */
export class LoggingService {
    private sink: LogSink = consoleSink;
    private errorCount: number = 0;
    private recentErrors: ErrorEntry[] = [];
    private maxRecentErrors: number = 50;
    private configuredLevel: LogLevel = LogLevel.WARN;

    /**
     * Set the minimum level that is emitted
     */
    setLevel(level: LogLevel): void {
        this.configuredLevel = level;
    }

    /**
     * Get the configured log level
     */
    getConfiguredLevel(): LogLevel {
        return this.configuredLevel;
    }

    /**
     * Replace the output sink, returning the previous one
     */
    setSink(sink: LogSink): LogSink {
        const previous = this.sink;
        this.sink = sink;
        return previous;
    }

    /**
     * Check if a log level should be output
     */
    shouldLog(level: LogLevel): boolean {
        // Errors are always logged regardless of configured level
        if (level === LogLevel.ERROR) {
            return true;
        }
        return level >= this.configuredLevel;
    }

    /**
     * Format a log message
     */
    formatMessage(level: LogLevel, module: string, message: string, data?: object): string {
        const timestamp = new Date().toISOString();
        const levelStr = LogLevel[level].padEnd(5);
        const dataStr = data ? ` ${JSON.stringify(data)}` : '';
        return `[${timestamp}] [${levelStr}] [${module}] ${message}${dataStr}`;
    }

    /**
     * Log a message
     */
    log(level: LogLevel, module: string, message: string, data?: object): void {
        if (!this.shouldLog(level)) {
            return;
        }
        this.sink(level, this.formatMessage(level, module, message, data));
    }

    /**
     * Log an error and remember it
     */
    logError(module: string, message: string, error?: Error, data?: object): void {
        this.log(LogLevel.ERROR, module, message, data);

        if (error?.stack) {
            this.sink(LogLevel.ERROR, `  Stack: ${error.stack}`);
        }

        this.errorCount++;
        this.recentErrors.push({
            timestamp: Date.now(),
            module,
            message: error ? `${message}: ${error.message}` : message,
            error
        });

        // Trim old errors
        while (this.recentErrors.length > this.maxRecentErrors) {
            this.recentErrors.shift();
        }
    }

    clearErrors(): void {
        this.errorCount = 0;
        this.recentErrors = [];
    }

    getRecentErrors(): ErrorEntry[] {
        return [...this.recentErrors];
    }

    getErrorCount(): number {
        return this.errorCount;
    }
}

// Global singleton instance
const loggingService = new LoggingService();

/**
 * Get the logging service instance
 */
export function getLoggingService(): LoggingService {
    return loggingService;
}

/**
 * Module-scoped logger for convenient logging
 */
export class Logger {
    constructor(private module: string) {}

    /**
     * Log a debug message (only when log level is DEBUG)
     */
    debug(message: string, data?: object): void {
        loggingService.log(LogLevel.DEBUG, this.module, message, data);
    }

    info(message: string, data?: object): void {
        loggingService.log(LogLevel.INFO, this.module, message, data);
    }

    warn(message: string, data?: object): void {
        loggingService.log(LogLevel.WARN, this.module, message, data);
    }

    /**
     * Log an error message with optional Error object
     * Errors are always logged and tracked
     */
    error(message: string, error?: Error, data?: object): void {
        loggingService.logError(this.module, message, error, data);
    }

    /**
     * Create a child logger with a sub-module name
     */
    child(subModule: string): Logger {
        return new Logger(`${this.module}:${subModule}`);
    }
}

/**
 * Create a logger for a module
 */
export function createLogger(module: string): Logger {
    return new Logger(module);
}

// Pre-created loggers for common modules
export const parserLogger = createLogger('Inline');
export const settingsLogger = createLogger('Settings');
