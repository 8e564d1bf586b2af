/**
 * TalkAlert Logger
 * Namespaced console logging filtered by LOG_LEVEL
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && value in LEVELS;
}

class Logger {
    namespace: string;

    constructor(namespace: string = 'TalkAlert') {
        this.namespace = namespace;
    }

    get logLevel(): LogLevel {
        const level = process.env.LOG_LEVEL?.toLowerCase();
        return isLogLevel(level) ? level : 'info';
    }

    _log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (!this._shouldLog(level)) return;
        const timestamp = new Date().toISOString();
        const prefix = `[${timestamp}] [${this.namespace}] [${level.toUpperCase()}]`;
        if (level === 'error') console.error(prefix, message, ...args);
        else if (level === 'warn') console.warn(prefix, message, ...args);
        else console.log(prefix, message, ...args);
    }

    _shouldLog(level: LogLevel): boolean {
        return LEVELS[level] >= LEVELS[this.logLevel];
    }

    debug(message: string, ...args: unknown[]): void {
        this._log('debug', message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        this._log('info', message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        this._log('warn', message, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        this._log('error', message, ...args);
    }
}

export default Logger;
