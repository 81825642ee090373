/**
 * Console logger for resolution decisions, filtered by PROXY_CONFIG_LOG_LEVEL.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface ProxyConfigLogger {
    error(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
    trace(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
    trace: 5
};

function isLogLevel(value: string): value is LogLevel {
    return Object.keys(LOG_LEVELS).includes(value);
}

let currentLevel: LogLevel = 'info';

const envLevel = process.env.PROXY_CONFIG_LOG_LEVEL?.toLowerCase();
if (envLevel && isLogLevel(envLevel)) {
    currentLevel = envLevel;
}

const PREFIX = process.env.PROXY_CONFIG_LOG_PREFIX || '[proxy-config]';

export function getLogLevel(): LogLevel {
    return currentLevel;
}

export function setLogLevel(level: LogLevel): void {
    if (isLogLevel(level)) {
        currentLevel = level;
    }
}

export function isLevelEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] <= LOG_LEVELS[currentLevel];
}

class ConsoleLogger implements ProxyConfigLogger {
    private format(message: string): string {
        return `${PREFIX} ${message}`;
    }

    error(message: string, ...args: unknown[]): void {
        if (isLevelEnabled('error')) {
            console.error(this.format(message), ...args);
        }
    }

    warn(message: string, ...args: unknown[]): void {
        if (isLevelEnabled('warn')) {
            console.warn(this.format(message), ...args);
        }
    }

    info(message: string, ...args: unknown[]): void {
        if (isLevelEnabled('info')) {
            console.info(this.format(message), ...args);
        }
    }

    debug(message: string, ...args: unknown[]): void {
        if (isLevelEnabled('debug')) {
            console.debug(this.format(message), ...args);
        }
    }

    trace(message: string, ...args: unknown[]): void {
        if (isLevelEnabled('trace')) {
            console.log(this.format(message), ...args);
        }
    }
}

const loggerInstance = new ConsoleLogger();

export function getLogger(): ProxyConfigLogger {
    return loggerInstance;
}
