import { ILogger, LogLevel } from '../../domain/ports/ILogger';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Console-backed logger writing `[Scope] message` lines.
 */
export class ConsoleLogger implements ILogger {
    constructor(
        private readonly scope: string,
        private readonly minLevel: LogLevel = 'info'
    ) { }

    /**
     * Returns a logger for a sub-component sharing this logger's level.
     */
    child(scope: string): ConsoleLogger {
        return new ConsoleLogger(scope, this.minLevel);
    }

    debug(message: string): void {
        if (this.enabled('debug')) console.debug(this.format(message));
    }

    info(message: string): void {
        if (this.enabled('info')) console.log(this.format(message));
    }

    warn(message: string): void {
        if (this.enabled('warn')) console.warn(this.format(message));
    }

    error(message: string): void {
        if (this.enabled('error')) console.error(this.format(message));
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
    }

    private format(message: string): string {
        return `[${this.scope}] ${message}`;
    }
}
