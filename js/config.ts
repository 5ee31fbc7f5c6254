/**
 * @fileoverview Engine Configuration
 *
 * Settings come from three layers, later layers winning:
 * 1. Defaults (`DEFAULT_CONFIG`, built from CONSTANTS)
 * 2. `OVERTIME_*` environment variables (`loadConfig`)
 * 3. Explicit overrides passed to a session (`resolveConfig`)
 *
 * ## Validation
 *
 * Every numeric setting is validated:
 * - hoursPerDay, anomalyHoursThreshold: > 0
 * - defaultTopN, exportTopN: integer >= 0
 * - maxUploadBytes: integer > 0
 * - overtimeWrapThresholdHours: in (0, 24)
 * - minYear, maxYear: integers, minYear <= maxYear
 *
 * Invalid environment values are ignored and logged; defaults are used instead.
 * Invalid explicit overrides throw InvalidConfigurationError.
 */

import type { DedupePolicy } from './clean.js';
import { CONSTANTS } from './constants.js';
import type { SentryConfig } from './error-reporting.js';
import { InvalidConfigurationError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('Config');

/**
 * Environment variables as Node exposes them.
 */
export type EnvSource = Record<string, string | undefined>;

export interface EngineConfig {
    /** Hours in one DD:HH:MM:SS "day" */
    readonly hoursPerDay: number;
    /** Ranking size when `getTop` gets no size */
    readonly defaultTopN: number;
    /** Ranking size of the export's "Top Employees" sheet */
    readonly exportTopN: number;
    /** Largest accepted upload in bytes */
    readonly maxUploadBytes: number;
    readonly dedupePolicy: DedupePolicy;
    /** Hours worked above this are flagged */
    readonly anomalyHoursThreshold: number;
    /** Overtime above this is a wrapped negative */
    readonly overtimeWrapThresholdHours: number;
    /** Only ingest sheets whose label names a month */
    readonly monthSheetsOnly: boolean;
    readonly minYear: number;
    readonly maxYear: number;
}

export const DEFAULT_CONFIG: EngineConfig = Object.freeze<EngineConfig>({
    hoursPerDay: CONSTANTS.DEFAULT_HOURS_PER_DAY,
    defaultTopN: CONSTANTS.DEFAULT_TOP_N,
    exportTopN: CONSTANTS.DEFAULT_EXPORT_TOP_N,
    maxUploadBytes: CONSTANTS.DEFAULT_MAX_UPLOAD_BYTES,
    dedupePolicy: 'last',
    anomalyHoursThreshold: CONSTANTS.DEFAULT_ANOMALY_HOURS_THRESHOLD,
    overtimeWrapThresholdHours: CONSTANTS.DEFAULT_OVERTIME_WRAP_THRESHOLD,
    monthSheetsOnly: false,
    minYear: CONSTANTS.DEFAULT_MIN_YEAR,
    maxYear: CONSTANTS.DEFAULT_MAX_YEAR,
});

/**
 * Environment variable of each setting.
 */
export const ENV_VARS = {
    hoursPerDay: 'OVERTIME_HOURS_PER_DAY',
    defaultTopN: 'OVERTIME_TOP_N',
    exportTopN: 'OVERTIME_EXPORT_TOP_N',
    maxUploadBytes: 'OVERTIME_MAX_UPLOAD_BYTES',
    dedupePolicy: 'OVERTIME_DEDUPE_POLICY',
    anomalyHoursThreshold: 'OVERTIME_ANOMALY_HOURS',
    overtimeWrapThresholdHours: 'OVERTIME_WRAP_THRESHOLD_HOURS',
    monthSheetsOnly: 'OVERTIME_MONTH_SHEETS_ONLY',
    minYear: 'OVERTIME_MIN_YEAR',
    maxYear: 'OVERTIME_MAX_YEAR',
} as const satisfies Record<keyof EngineConfig, string>;

// ==================== VALIDATORS ====================

function positiveNumber(setting: string, value: number): number {
    if (!Number.isFinite(value) || value <= 0) {
        throw new InvalidConfigurationError(setting, `must be a positive number, got ${value}`);
    }
    return value;
}

function nonNegativeInteger(setting: string, value: number): number {
    if (!Number.isInteger(value) || value < 0) {
        throw new InvalidConfigurationError(setting, `must be a non-negative integer, got ${value}`);
    }
    return value;
}

function positiveInteger(setting: string, value: number): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new InvalidConfigurationError(setting, `must be a positive integer, got ${value}`);
    }
    return value;
}

function wrapThreshold(setting: string, value: number): number {
    if (!Number.isFinite(value) || value <= 0 || value >= 24) {
        throw new InvalidConfigurationError(setting, `must be between 0 and 24 hours, got ${value}`);
    }
    return value;
}

function year(setting: string, value: number): number {
    if (!Number.isInteger(value) || value < 1 || value > 9999) {
        throw new InvalidConfigurationError(setting, `must be a four-digit year, got ${value}`);
    }
    return value;
}

function dedupePolicy(setting: string, value: string): DedupePolicy {
    if (value === 'first' || value === 'last') return value;
    throw new InvalidConfigurationError(setting, `must be "first" or "last", got "${value}"`);
}

function checkYearRange(config: EngineConfig): EngineConfig {
    if (config.minYear > config.maxYear) {
        throw new InvalidConfigurationError(
            'minYear',
            `must not be after maxYear (${config.minYear} > ${config.maxYear})`
        );
    }
    return config;
}

// ==================== ENVIRONMENT ====================

function parseNumber(setting: string, raw: string): number {
    const value = Number(raw);
    if (Number.isNaN(value)) {
        throw new InvalidConfigurationError(setting, `"${raw}" is not a number`);
    }
    return value;
}

function parseBoolean(setting: string, raw: string): boolean {
    const value = raw.toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(value)) return true;
    if (['false', '0', 'no', 'off'].includes(value)) return false;
    throw new InvalidConfigurationError(setting, `"${raw}" is not a boolean`);
}

/**
 * Reads one variable; an invalid value is logged and the fallback used.
 */
function fromEnv<T>(env: EnvSource, name: string, parse: (raw: string) => T, fallback: T): T {
    const raw = env[name]?.trim();
    if (raw === undefined || raw === '') return fallback;
    try {
        return parse(raw);
    } catch (error) {
        if (!(error instanceof InvalidConfigurationError)) throw error;
        log.warn(`Ignoring ${error.message}`);
        return fallback;
    }
}

/**
 * Builds the configuration from `OVERTIME_*` environment variables.
 *
 * @param env - Variables to read (defaults to `process.env`).
 */
export function loadConfig(env: EnvSource = process.env): EngineConfig {
    const d = DEFAULT_CONFIG;
    const num =
        (check: (setting: string, value: number) => number, name: string) =>
        (raw: string): number =>
            check(name, parseNumber(name, raw));

    const config: EngineConfig = {
        hoursPerDay: fromEnv(env, ENV_VARS.hoursPerDay, num(positiveNumber, ENV_VARS.hoursPerDay), d.hoursPerDay),
        defaultTopN: fromEnv(env, ENV_VARS.defaultTopN, num(nonNegativeInteger, ENV_VARS.defaultTopN), d.defaultTopN),
        exportTopN: fromEnv(env, ENV_VARS.exportTopN, num(nonNegativeInteger, ENV_VARS.exportTopN), d.exportTopN),
        maxUploadBytes: fromEnv(
            env,
            ENV_VARS.maxUploadBytes,
            num(positiveInteger, ENV_VARS.maxUploadBytes),
            d.maxUploadBytes
        ),
        dedupePolicy: fromEnv(
            env,
            ENV_VARS.dedupePolicy,
            (raw) => dedupePolicy(ENV_VARS.dedupePolicy, raw.toLowerCase()),
            d.dedupePolicy
        ),
        anomalyHoursThreshold: fromEnv(
            env,
            ENV_VARS.anomalyHoursThreshold,
            num(positiveNumber, ENV_VARS.anomalyHoursThreshold),
            d.anomalyHoursThreshold
        ),
        overtimeWrapThresholdHours: fromEnv(
            env,
            ENV_VARS.overtimeWrapThresholdHours,
            num(wrapThreshold, ENV_VARS.overtimeWrapThresholdHours),
            d.overtimeWrapThresholdHours
        ),
        monthSheetsOnly: fromEnv(
            env,
            ENV_VARS.monthSheetsOnly,
            (raw) => parseBoolean(ENV_VARS.monthSheetsOnly, raw),
            d.monthSheetsOnly
        ),
        minYear: fromEnv(env, ENV_VARS.minYear, num(year, ENV_VARS.minYear), d.minYear),
        maxYear: fromEnv(env, ENV_VARS.maxYear, num(year, ENV_VARS.maxYear), d.maxYear),
    };

    if (config.minYear > config.maxYear) {
        log.warn(
            `Ignoring ${ENV_VARS.minYear}/${ENV_VARS.maxYear}: ${config.minYear} is after ${config.maxYear}`
        );
        return Object.freeze({ ...config, minYear: d.minYear, maxYear: d.maxYear });
    }
    return Object.freeze(config);
}

// ==================== OVERRIDES ====================

/**
 * Applies explicit overrides on top of a base configuration.
 *
 * @param overrides - Settings to change.
 * @param base - Configuration to start from (defaults to DEFAULT_CONFIG).
 * @throws InvalidConfigurationError when an override is out of range.
 */
export function resolveConfig(overrides: Partial<EngineConfig> = {}, base: EngineConfig = DEFAULT_CONFIG): EngineConfig {
    const o = overrides;
    const config: EngineConfig = {
        hoursPerDay: o.hoursPerDay === undefined ? base.hoursPerDay : positiveNumber('hoursPerDay', o.hoursPerDay),
        defaultTopN:
            o.defaultTopN === undefined ? base.defaultTopN : nonNegativeInteger('defaultTopN', o.defaultTopN),
        exportTopN: o.exportTopN === undefined ? base.exportTopN : nonNegativeInteger('exportTopN', o.exportTopN),
        maxUploadBytes:
            o.maxUploadBytes === undefined
                ? base.maxUploadBytes
                : positiveInteger('maxUploadBytes', o.maxUploadBytes),
        dedupePolicy:
            o.dedupePolicy === undefined ? base.dedupePolicy : dedupePolicy('dedupePolicy', o.dedupePolicy),
        anomalyHoursThreshold:
            o.anomalyHoursThreshold === undefined
                ? base.anomalyHoursThreshold
                : positiveNumber('anomalyHoursThreshold', o.anomalyHoursThreshold),
        overtimeWrapThresholdHours:
            o.overtimeWrapThresholdHours === undefined
                ? base.overtimeWrapThresholdHours
                : wrapThreshold('overtimeWrapThresholdHours', o.overtimeWrapThresholdHours),
        monthSheetsOnly: o.monthSheetsOnly ?? base.monthSheetsOnly,
        minYear: o.minYear === undefined ? base.minYear : year('minYear', o.minYear),
        maxYear: o.maxYear === undefined ? base.maxYear : year('maxYear', o.maxYear),
    };
    return Object.freeze(checkYearRange(config));
}

/**
 * Error reporting settings from the environment, or null when no DSN is set.
 */
export function loadErrorReportingConfig(env: EnvSource = process.env): SentryConfig | null {
    const dsn = env.OVERTIME_SENTRY_DSN?.trim();
    if (!dsn) return null;
    const sampleRate = fromEnv(
        env,
        'OVERTIME_SENTRY_SAMPLE_RATE',
        (raw) => {
            const value = parseNumber('OVERTIME_SENTRY_SAMPLE_RATE', raw);
            if (value < 0 || value > 1) {
                throw new InvalidConfigurationError('OVERTIME_SENTRY_SAMPLE_RATE', `must be between 0 and 1, got ${value}`);
            }
            return value;
        },
        1
    );
    return {
        dsn,
        environment: env.OVERTIME_SENTRY_ENVIRONMENT?.trim() || env.NODE_ENV || 'development',
        release: env.OVERTIME_RELEASE?.trim() || 'overtime-insights@dev',
        debug: env.OVERTIME_SENTRY_DEBUG === 'true',
        sampleRate,
    };
}
