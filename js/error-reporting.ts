/**
 * @fileoverview Error Reporting Module
 * Sends unexpected failures to Sentry. Reporting stays off until
 * `initErrorReporting` receives a DSN; while it is off every call only logs
 * locally. Everything that leaves the process is scrubbed of credentials and
 * email addresses first, and the RecordSet id is sent hashed.
 */

import type { Breadcrumb, Event, Scope } from '@sentry/node';
import { SENSITIVE_KEY_FRAGMENTS } from './constants.js';
import { createLogger } from './logger.js';

const log = createLogger('ErrorReporting');

// ==================== TYPES ====================

/**
 * Settings passed to `Sentry.init`.
 */
export interface SentryConfig {
    dsn: string;
    /** e.g. "production", "staging" */
    environment: string;
    /** e.g. "overtime-insights@1.0.0" */
    release: string;
    debug?: boolean;
    /** Fraction of error events sent, 0 to 1 */
    sampleRate?: number;
}

export type ReportLevel = 'fatal' | 'error' | 'warning' | 'info';

/**
 * Where a failure happened and what to attach to its report.
 */
export interface ErrorContext {
    /** Engine module, e.g. "Session" */
    module?: string;
    /** Operation within the module, e.g. "ingest" */
    operation?: string;
    /** Extra values; scrubbed before sending */
    metadata?: Record<string, unknown>;
    /** Message shown to the caller for this failure */
    userMessage?: string;
    level?: ReportLevel;
}

type SentryModule = typeof import('@sentry/node');

// ==================== STATE ====================

let sentry: SentryModule | null = null;
let recordSetId: string | null = null;

// ==================== SCRUBBING ====================

const REDACTIONS: readonly RegExp[] = [
    /Bearer\s+\S*/gi,
    /(?:api[_-]?key|token|password|secret)["\s:=]+[^"'\s,}&]*/gi,
    /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
];

/**
 * Replaces credentials and email addresses in free text with `[REDACTED]`.
 */
export function scrubSensitiveData(text: string): string {
    return REDACTIONS.reduce((scrubbed, pattern) => scrubbed.replace(pattern, '[REDACTED]'), text);
}

function isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return SENSITIVE_KEY_FRAGMENTS.some((fragment) => lowerKey.includes(fragment));
}

function scrubValue(value: unknown): unknown {
    if (typeof value === 'string') return scrubSensitiveData(value);
    if (Array.isArray(value)) return value.map(scrubValue);
    if (value !== null && typeof value === 'object') {
        return scrubRecord(Object.fromEntries(Object.entries(value)));
    }
    return value;
}

/**
 * Drops the values of sensitive keys and scrubs the rest, recursively.
 */
export function scrubRecord(record: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(
        Object.entries(record).map(([key, value]) => [key, isSensitiveKey(key) ? '[REDACTED]' : scrubValue(value)])
    );
}

/**
 * `beforeSend` hook: scrubs exception messages, stack frame paths,
 * breadcrumbs, the request and extras of an outgoing event.
 */
export function scrubEvent<T extends Event>(event: T): T {
    for (const exception of event.exception?.values ?? []) {
        if (exception.value) exception.value = scrubSensitiveData(exception.value);
        for (const frame of exception.stacktrace?.frames ?? []) {
            if (frame.filename) frame.filename = scrubSensitiveData(frame.filename);
        }
    }

    for (const breadcrumb of event.breadcrumbs ?? []) {
        if (breadcrumb.message) breadcrumb.message = scrubSensitiveData(breadcrumb.message);
        if (breadcrumb.data) breadcrumb.data = scrubRecord(breadcrumb.data);
    }

    const request = event.request;
    if (request?.url) request.url = scrubSensitiveData(request.url);
    if (typeof request?.query_string === 'string') {
        request.query_string = scrubSensitiveData(request.query_string);
    }

    if (event.extra) event.extra = scrubRecord(event.extra);

    return event;
}

/**
 * `beforeBreadcrumb` hook: debug console output never becomes a breadcrumb.
 */
export function filterBreadcrumb(breadcrumb: Breadcrumb): Breadcrumb | null {
    return breadcrumb.category === 'console' && breadcrumb.level === 'debug' ? null : breadcrumb;
}

// ==================== INITIALIZATION ====================

/**
 * Starts Sentry. Calling it again after a successful start does nothing.
 *
 * @param config - Settings from `loadErrorReportingConfig`; null leaves reporting off.
 * @returns Whether reporting is on.
 */
export async function initErrorReporting(config: SentryConfig | null): Promise<boolean> {
    if (sentry) return true;

    if (!config?.dsn) {
        log.info('No Sentry DSN configured; errors are only logged');
        return false;
    }

    try {
        // The SDK is only loaded by processes that report
        const client: SentryModule = await import('@sentry/node');
        client.init({
            dsn: config.dsn,
            environment: config.environment,
            release: config.release,
            debug: config.debug ?? false,
            sampleRate: config.sampleRate ?? 1,
            beforeSend: (event) => scrubEvent(event),
            beforeBreadcrumb: (breadcrumb) => filterBreadcrumb(breadcrumb),
        });
        if (recordSetId) client.setTag('record_set', hashString(recordSetId));

        sentry = client;
        log.info(`Sentry started for ${config.environment}`);
        return true;
    } catch (error) {
        log.warn('Sentry could not be started:', error);
        return false;
    }
}

// ==================== REPORTING ====================

function applyContext(scope: Scope, context: Omit<ErrorContext, 'level'> | undefined): void {
    if (context?.module) scope.setTag('module', context.module);
    if (context?.operation) scope.setTag('operation', context.operation);
    if (recordSetId) scope.setTag('record_set', hashString(recordSetId));
    if (context?.metadata) scope.setExtras(scrubRecord(context.metadata));
    if (context?.userMessage) scope.setExtra('user_message', scrubSensitiveData(context.userMessage));
}

/**
 * Runs `send` against a scoped Sentry client when reporting is on.
 * A failure inside the SDK is logged and never reaches the caller.
 */
function withClient(send: (client: SentryModule, scope: Scope) => void): void {
    const client = sentry;
    if (!client) return;
    try {
        client.withScope((scope) => send(client, scope));
    } catch (sdkError) {
        log.warn('Sentry rejected a report:', sdkError);
    }
}

/**
 * Logs an unexpected failure and, when reporting is on, sends it to Sentry.
 */
export function reportError(error: unknown, context?: ErrorContext): void {
    const err = error instanceof Error ? error : new Error(String(error));
    log.error(`[${context?.module ?? 'Engine'}] ${context?.operation ?? 'Error'}:`, err.message);

    withClient((client, scope) => {
        if (context?.level) scope.setLevel(context.level);
        applyContext(scope, context);
        client.captureException(err);
    });
}

/**
 * Logs a notable non-error event and, when reporting is on, sends it to Sentry.
 */
export function reportMessage(
    message: string,
    level: ReportLevel = 'info',
    context?: Omit<ErrorContext, 'level'>
): void {
    const text = `[${context?.module ?? 'Engine'}] ${message}`;
    if (level === 'error' || level === 'fatal') {
        log.error(text);
    } else {
        log.warn(text);
    }

    withClient((client, scope) => {
        scope.setLevel(level);
        applyContext(scope, context);
        client.captureMessage(scrubSensitiveData(message));
    });
}

/**
 * Sets the RecordSet that later reports are tagged with (null clears it).
 */
export function setSessionContext(id: string | null): void {
    recordSetId = id;
    sentry?.setTag('record_set', id ? hashString(id) : '');
}

/**
 * Adds a breadcrumb to the trail attached to later reports.
 */
export function addBreadcrumb(category: string, message: string, data?: Record<string, unknown>): void {
    sentry?.addBreadcrumb({
        category,
        message: scrubSensitiveData(message),
        data: data ? scrubRecord(data) : undefined,
        level: 'info',
    });
}

// ==================== HELPERS ====================

/**
 * 32-bit FNV-1a digest as hex.
 */
export function hashString(str: string): string {
    let hash = 0x811c9dc5;
    for (let i = 0; i < str.length; i++) {
        hash ^= str.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return (hash >>> 0).toString(16);
}

export function isErrorReportingEnabled(): boolean {
    return sentry !== null;
}

/**
 * Waits for queued reports to be sent, e.g. before the process exits.
 *
 * @returns False when the queue did not drain within `timeout` ms.
 */
export async function flushErrorReports(timeout = 2000): Promise<boolean> {
    if (!sentry) return true;
    try {
        return await sentry.flush(timeout);
    } catch (error) {
        log.warn('Sentry reports could not be flushed:', error);
        return false;
    }
}
