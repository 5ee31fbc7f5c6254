/**
 * @fileoverview Structured Logging Module
 * Leveled, module-scoped logging for the engine. Output goes to the console
 * as either readable text lines or JSON lines, and every data argument is
 * scrubbed of credentials first.
 *
 * The initial configuration is read from the environment:
 * - `OVERTIME_LOG_LEVEL` = debug | info | warn | error | none
 * - `OVERTIME_DEBUG=true` forces DEBUG
 * - `OVERTIME_LOG_FORMAT` = text | json
 * - otherwise `NODE_ENV` picks the level (production → WARN, test → ERROR, else INFO)
 */

import { SENSITIVE_KEY_FRAGMENTS } from './constants.js';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4,
}

const LEVEL_LABELS: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: 'DEBUG',
    [LogLevel.INFO]: 'INFO',
    [LogLevel.WARN]: 'WARN',
    [LogLevel.ERROR]: 'ERROR',
    [LogLevel.NONE]: 'NONE',
};

const LEVELS_BY_NAME = new Map<string, LogLevel>([
    ['debug', LogLevel.DEBUG],
    ['info', LogLevel.INFO],
    ['warn', LogLevel.WARN],
    ['warning', LogLevel.WARN],
    ['error', LogLevel.ERROR],
    ['none', LogLevel.NONE],
    ['silent', LogLevel.NONE],
]);

export type LogFormat = 'text' | 'json';

export interface LoggerConfig {
    /** Messages below this level are dropped */
    minLevel: LogLevel;
    /** Prefix each entry with an ISO timestamp */
    timestamps: boolean;
    /** Include the module name of scoped loggers */
    showModule: boolean;
    format: LogFormat;
}

/**
 * Logger configuration derived from environment variables.
 */
export function getDefaultConfig(env: Record<string, string | undefined> = process.env): LoggerConfig {
    const named = env.OVERTIME_LOG_LEVEL?.trim().toLowerCase();
    const explicit = named === undefined ? undefined : LEVELS_BY_NAME.get(named);

    let minLevel: LogLevel;
    if (env.OVERTIME_DEBUG === 'true') {
        minLevel = LogLevel.DEBUG;
    } else if (explicit !== undefined) {
        minLevel = explicit;
    } else if (env.NODE_ENV === 'production') {
        minLevel = LogLevel.WARN;
    } else if (env.NODE_ENV === 'test') {
        minLevel = LogLevel.ERROR;
    } else {
        minLevel = LogLevel.INFO;
    }

    return {
        minLevel,
        timestamps: true,
        showModule: true,
        format: env.OVERTIME_LOG_FORMAT?.trim().toLowerCase() === 'json' ? 'json' : 'text',
    };
}

let config: LoggerConfig = getDefaultConfig();

export function configureLogger(changes: Partial<LoggerConfig>): void {
    config = { ...config, ...changes };
}

export function setLogLevel(level: LogLevel): void {
    config.minLevel = level;
}

export function enableDebugMode(): void {
    config.minLevel = LogLevel.DEBUG;
}

/**
 * Leaves debug mode for INFO.
 */
export function disableDebugMode(): void {
    config.minLevel = LogLevel.INFO;
}

/**
 * Restores the configuration derived from the environment.
 */
export function resetLogger(): void {
    config = getDefaultConfig();
}

export function isDebugEnabled(): boolean {
    return config.minLevel <= LogLevel.DEBUG;
}

// ==================== SCRUBBING ====================

function isSensitiveKey(key: string): boolean {
    const lower = key.toLowerCase();
    return SENSITIVE_KEY_FRAGMENTS.some((fragment) => lower.includes(fragment));
}

/**
 * Redacts credential-looking keys and long opaque tokens from logged data.
 */
function scrub(data: unknown): unknown {
    if (typeof data === 'string') {
        return data.replace(/[a-zA-Z0-9]{32,}/g, '[REDACTED]');
    }
    if (Array.isArray(data)) {
        return data.map(scrub);
    }
    if (data instanceof Error) {
        return { name: data.name, message: scrub(data.message) };
    }
    if (data !== null && typeof data === 'object') {
        return Object.fromEntries(
            Object.entries(data).map(([key, value]) => [key, isSensitiveKey(key) ? '[REDACTED]' : scrub(value)])
        );
    }
    return data;
}

// ==================== OUTPUT ====================

function render(level: LogLevel, module: string | undefined, message: string, data: unknown[]): unknown[] {
    const scope = config.showModule ? module : undefined;

    if (config.format === 'json') {
        const entry: Record<string, unknown> = {};
        if (config.timestamps) entry.time = new Date().toISOString();
        entry.level = LEVEL_LABELS[level];
        if (scope) entry.module = scope;
        entry.message = message;
        if (data.length > 0) entry.data = data;
        return [JSON.stringify(entry)];
    }

    const prefix = [
        config.timestamps ? `[${new Date().toISOString()}]` : null,
        `[${LEVEL_LABELS[level]}]`,
        scope ? `[${scope}]` : null,
    ].filter((part): part is string => part !== null);
    return [`${prefix.join(' ')} ${message}`, ...data];
}

function write(level: LogLevel, module: string | undefined, message: string, data: unknown[]): void {
    if (level < config.minLevel || level === LogLevel.NONE) return;

    const args = render(level, module, message, data.map(scrub));
    if (level >= LogLevel.ERROR) {
        console.error(...args);
    } else if (level === LogLevel.WARN) {
        console.warn(...args);
    } else {
        // eslint-disable-next-line no-console
        console.log(...args);
    }
}

// ==================== LOGGERS ====================

export interface Logger {
    debug(message: string, ...data: unknown[]): void;
    info(message: string, ...data: unknown[]): void;
    warn(message: string, ...data: unknown[]): void;
    error(message: string, ...data: unknown[]): void;
    log(level: LogLevel, message: string, ...data: unknown[]): void;
    /**
     * Starts a timer; the returned function logs the elapsed time at DEBUG.
     */
    time(label: string): () => void;
}

function buildLogger(module: string | undefined): Logger {
    return {
        debug: (message, ...data) => write(LogLevel.DEBUG, module, message, data),
        info: (message, ...data) => write(LogLevel.INFO, module, message, data),
        warn: (message, ...data) => write(LogLevel.WARN, module, message, data),
        error: (message, ...data) => write(LogLevel.ERROR, module, message, data),
        log: (level, message, ...data) => write(level, module, message, data),
        time: (label) => {
            const started = performance.now();
            return () => {
                const elapsed = performance.now() - started;
                write(LogLevel.DEBUG, module, `${label} took ${elapsed.toFixed(1)} ms`, []);
            };
        },
    };
}

/**
 * Creates a logger whose entries carry a module name.
 *
 * @example
 * const log = createLogger('Ingest');
 * log.warn('Sheet "Notes" skipped');
 */
export function createLogger(module: string): Logger {
    return buildLogger(module);
}

/** Logger without a module scope */
export const logger: Logger = buildLogger(undefined);
