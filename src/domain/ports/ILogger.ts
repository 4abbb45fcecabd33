export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured logging port injected into every service.
 */
export interface ILogger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    /** A logger for a narrower scope, sharing this logger's level. */
    child(scope: string): ILogger;
}
