/**
 * Standalone Logger Utility
 *
 * Provides consistent logging with environment-aware formatting.
 * Debug output is only emitted when debug mode is enabled (CRUD_DEBUG_MODE).
 */

export type LogMeta = Record<string, unknown>;

export class Logger {
    constructor(private debugEnabled: boolean = process.env.CRUD_DEBUG_MODE === 'true') {}

    /**
     * Toggle debug output at runtime (set from CrudEnv at startup)
     */
    setDebug(enabled: boolean): void {
        this.debugEnabled = enabled;
    }

    isDebugEnabled(): boolean {
        return this.debugEnabled;
    }

    /**
     * Log debug message with context
     */
    debug(message: string, meta?: LogMeta) {
        if (!this.debugEnabled) {
            return;
        }

        console.debug(this.formatLog('DEBUG', message, meta));
    }

    /**
     * Log info message with context
     */
    info(message: string, meta?: LogMeta) {
        console.info(this.formatLog('INFO', message, meta));
    }

    /**
     * Log warning message with context
     */
    warn(message: string, meta?: LogMeta) {
        console.warn(this.formatLog('WARN', message, meta));
    }

    /**
     * Log error message with context
     */
    error(message: string, meta?: LogMeta) {
        console.error(this.formatLog('ERROR', message, meta));
    }

    /**
     * Log timing data with calculated elapsed time using hrtime precision
     * Takes start time from process.hrtime.bigint() and calculates duration
     */
    time(label: string, startTime: bigint, meta: LogMeta = {}): void {
        const durationMs = Number(process.hrtime.bigint() - startTime) / 1_000_000;
        this.debug(`[TIME] ${label}`, { ...meta, durationMs });
    }

    /**
     * Format log message with environment-aware output
     */
    private formatLog(level: string, message: string, meta?: LogMeta): string {
        if (process.env.NODE_ENV === 'production') {
            // Structured JSON for production log aggregation
            return JSON.stringify({
                timestamp: new Date().toISOString(),
                level,
                message,
                ...(meta && { meta }),
            });
        }

        const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
        return `${level} ${message}${metaStr}`;
    }
}

/**
 * Global logger instance shared by the schema pipeline and the HTTP layer
 */
export const logger = new Logger();
