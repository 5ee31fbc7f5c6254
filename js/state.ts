/**
 * @fileoverview Session State Management
 *
 * This module implements the OvertimeSession, the single owner of the current
 * RecordSet. It manages:
 * - **Configuration**: validated engine settings (environment + overrides)
 * - **Current dataset**: the RecordSet of the last successful upload
 * - **Queries**: summaries, rankings, employee detail and exports over it
 * - **Reactivity**: subscribe/notify for callers that react to new data
 *
 * ## Lifecycle
 *
 * 1. **Construction** - configuration is loaded from `OVERTIME_*` variables
 *    and explicit overrides are validated on top
 * 2. **Ingestion** (`ingest`) - the upload is validated, parsed, ingested and
 *    cleaned into a new RecordSet built off to the side
 * 3. **Swap** - only a fully built RecordSet replaces the current one; any
 *    failure leaves the previous RecordSet current
 * 4. **Queries** - pure reads of the frozen record array
 *
 * ## Concurrency
 *
 * Single writer, many readers. Ingestion is synchronous and the swap is one
 * reference assignment, so a reader sees either the old or the new RecordSet,
 * never a mix. Records are frozen and never mutated after the swap.
 *
 * ## Errors
 *
 * `ingest` never throws for data problems: the response carries
 * `success: false` and a FriendlyError. Unexpected errors are also sent to
 * error reporting. Query methods throw `NotFoundError` and
 * `InvalidConfigurationError` where the request itself is invalid.
 */

import { randomUUID } from 'node:crypto';
import { summarize, topEmployees, calculateOverallStats } from './calc.js';
import { cleanRecords, createEmptyAnomalyCounts, createEmptyRejections } from './clean.js';
import { loadConfig, resolveConfig, type EngineConfig, type EnvSource } from './config.js';
import { ALLOWED_EXTENSIONS } from './constants.js';
import { addBreadcrumb, reportError, setSessionContext } from './error-reporting.js';
import {
    EmptyResultError,
    InvalidConfigurationError,
    NotFoundError,
    OvertimeError,
    toFriendlyError,
    UploadValidationError,
} from './errors.js';
import { exportSummaryCsv, exportSummaryWorkbook } from './export.js';
import { ingestWorkbook, readWorkbook } from './ingest.js';
import { createLogger } from './logger.js';
import type {
    AggregateRow,
    AttendanceRecord,
    DayAggregate,
    EmployeeAggregate,
    EmployeeQuery,
    Grouping,
    IngestOptions,
    IngestReport,
    IngestResponse,
    MonthAggregate,
    OverallStats,
    RecordSet,
    SessionEvent,
    SheetReport,
    SkippedSheet,
} from './types.js';
import { compareEmployeeIds, compareText } from './utils.js';

const log = createLogger('Session');

const GROUPINGS: readonly Grouping[] = ['employee', 'month', 'day'];

/**
 * Listener function type for the Publisher/Subscriber pattern.
 *
 * @param session - The session that changed
 * @param event - What changed
 */
type SessionListener = (session: OvertimeSession, event: SessionEvent) => void;

function emptyReport(sheets: SheetReport[] = [], skippedSheets: SkippedSheet[] = []): IngestReport {
    return {
        accepted: 0,
        rejected: 0,
        duplicates: 0,
        rejections: createEmptyRejections(),
        anomalies: createEmptyAnomalyCounts(),
        sheets,
        skippedSheets,
    };
}

function extensionOf(fileName: string): string {
    const dot = fileName.lastIndexOf('.');
    return dot < 0 ? '' : fileName.slice(dot + 1).toLowerCase();
}

/**
 * Owner of one current RecordSet and the queries over it.
 */
export class OvertimeSession {
    /** Validated configuration */
    readonly config: EngineConfig;

    /** Set of subscriber functions. */
    private readonly listeners: Set<SessionListener> = new Set();

    private recordSet: RecordSet | null = null;

    /**
     * @param overrides - Settings that win over the environment.
     * @param env - Environment to read `OVERTIME_*` variables from.
     * @throws InvalidConfigurationError when an override is out of range.
     */
    constructor(overrides: Partial<EngineConfig> = {}, env: EnvSource = process.env) {
        this.config = resolveConfig(overrides, loadConfig(env));
    }

    // ==================== SUBSCRIPTIONS ====================

    /**
     * Subscribes to dataset changes.
     *
     * @example
     * const unsubscribe = session.subscribe((session, event) => {
     *     console.log(event.type, session.getStats().recordCount);
     * });
     *
     * @returns Unsubscribe function to remove the listener
     */
    subscribe(listener: SessionListener): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    /**
     * Notifies all subscribers of a dataset change.
     */
    private notify(event: SessionEvent): void {
        this.listeners.forEach((listener) => listener(this, event));
    }

    // ==================== DATASET ====================

    /** The current RecordSet, or null before the first successful upload */
    get current(): RecordSet | null {
        return this.recordSet;
    }

    /** Records of the current RecordSet (empty when none is loaded) */
    get records(): readonly AttendanceRecord[] {
        return this.recordSet?.records ?? [];
    }

    hasData(): boolean {
        return this.recordSet !== null;
    }

    /**
     * Drops the current RecordSet.
     */
    clear(): void {
        if (!this.recordSet) return;
        this.recordSet = null;
        setSessionContext(null);
        this.notify({ type: 'cleared' });
    }

    /**
     * Refuses uploads that cannot be a spreadsheet within the size limit.
     */
    private validateUpload(bytes: Uint8Array | ArrayBuffer, fileName: string | undefined): void {
        if (fileName !== undefined) {
            const extension = extensionOf(fileName);
            if (!ALLOWED_EXTENSIONS.includes(extension)) {
                throw new UploadValidationError(
                    `Unsupported file type "${extension ? '.' + extension : fileName}"; ` +
                        `expected ${ALLOWED_EXTENSIONS.map((e) => '.' + e).join(' or ')}`
                );
            }
        }
        if (bytes.byteLength === 0) {
            throw new UploadValidationError('The upload is empty');
        }
        if (bytes.byteLength > this.config.maxUploadBytes) {
            throw new UploadValidationError(
                `The upload is ${bytes.byteLength} bytes; the limit is ${this.config.maxUploadBytes} bytes`
            );
        }
    }

    /**
     * Ingests a workbook and, on success, makes it the current RecordSet.
     *
     * Logic:
     * 1. Validates the file name and size.
     * 2. Parses the workbook and ingests every sheet (bad sheets are skipped).
     * 3. Cleans the rows of all sheets into one record list.
     * 4. Swaps the new RecordSet in and notifies subscribers.
     *
     * @param bytes - Raw `.xlsx` / `.xls` content.
     * @param options - Optional file name.
     * @returns The counters of the upload; `success: false` with an error when
     *   the previous RecordSet stays current.
     */
    ingest(bytes: Uint8Array | ArrayBuffer, options: IngestOptions = {}): IngestResponse {
        const sourceName = options.fileName ?? null;
        let sheets: SheetReport[] = [];
        let skippedSheets: SkippedSheet[] = [];
        let recordSet: RecordSet;

        const finished = log.time('ingest');
        try {
            this.validateUpload(bytes, options.fileName);

            const workbook = readWorkbook(bytes);
            const ingested = ingestWorkbook(workbook, {
                minYear: this.config.minYear,
                maxYear: this.config.maxYear,
                overtimeWrapThresholdHours: this.config.overtimeWrapThresholdHours,
                monthSheetsOnly: this.config.monthSheetsOnly,
            });
            sheets = ingested.sheets;
            skippedSheets = ingested.skippedSheets;

            if (sheets.length === 0) {
                const reasons = skippedSheets.map((s) => `${s.sheet}: ${s.reason}`).join('; ');
                throw new EmptyResultError(
                    0,
                    createEmptyRejections(),
                    `No sheet could be ingested${reasons ? ` (${reasons})` : ''}`
                );
            }

            const cleaned = cleanRecords(ingested.rows, {
                dedupePolicy: this.config.dedupePolicy,
                anomalyHoursThreshold: this.config.anomalyHoursThreshold,
            });

            recordSet = Object.freeze({
                id: randomUUID(),
                sourceName,
                ingestedAt: new Date().toISOString(),
                records: Object.freeze(cleaned.records.map((record) => Object.freeze(record))),
                report: {
                    accepted: cleaned.records.length,
                    rejected: cleaned.rejected,
                    duplicates: cleaned.duplicates,
                    rejections: cleaned.rejections,
                    anomalies: cleaned.anomalies,
                    sheets,
                    skippedSheets,
                },
            });
        } catch (error) {
            if (error instanceof OvertimeError) {
                log.warn(`Upload refused: ${error.message}`);
            } else {
                reportError(error, {
                    module: 'Session',
                    operation: 'ingest',
                    metadata: { sourceName, bytes: bytes.byteLength },
                });
            }

            const report = emptyReport(sheets, skippedSheets);
            if (error instanceof EmptyResultError) {
                report.rejected = error.rejected;
                report.rejections = error.rejections;
            }
            finished();
            return { success: false, ...report, error: toFriendlyError(error) };
        }
        finished();

        // Only a fully built RecordSet replaces the current one
        this.recordSet = recordSet;
        const { report } = recordSet;
        setSessionContext(recordSet.id);
        addBreadcrumb('ingest', 'Workbook ingested', {
            accepted: report.accepted,
            rejected: report.rejected,
            sheets: report.sheets.length,
        });
        log.info(
            `Ingested ${report.accepted} record(s) from ${report.sheets.length} sheet(s)` +
                (sourceName ? ` of ${sourceName}` : '')
        );
        this.notify({ type: 'ingested', recordSetId: recordSet.id });

        return { success: true, ...report };
    }

    // ==================== QUERIES ====================

    /**
     * Whole-RecordSet statistics.
     */
    getStats(): OverallStats {
        return calculateOverallStats(this.records, { hoursPerDay: this.config.hoursPerDay });
    }

    /**
     * Aggregate rows for a grouping.
     *
     * @throws InvalidConfigurationError for an unknown grouping.
     */
    getSummary(grouping: 'employee'): EmployeeAggregate[];
    getSummary(grouping: 'month'): MonthAggregate[];
    getSummary(grouping: 'day'): DayAggregate[];
    getSummary(grouping: Grouping): AggregateRow[];
    getSummary(grouping: Grouping): AggregateRow[] {
        if (!GROUPINGS.includes(grouping)) {
            throw new InvalidConfigurationError('grouping', `must be one of ${GROUPINGS.join(', ')}, got "${grouping}"`);
        }
        return summarize(this.records, grouping, { hoursPerDay: this.config.hoursPerDay });
    }

    /**
     * The employees with the most overtime.
     *
     * @param n - Ranking size (defaults to `defaultTopN`).
     */
    getTop(n: number = this.config.defaultTopN): EmployeeAggregate[] {
        return topEmployees(this.records, n, { hoursPerDay: this.config.hoursPerDay });
    }

    /**
     * Records matching every given filter, ascending by date and then employee id.
     * With no filter, every record is returned.
     *
     * @param query.id - Exact employee id (surrounding whitespace ignored).
     * @param query.name - Case-insensitive substring of the employee name.
     */
    findEmployeeRecords(query: EmployeeQuery): AttendanceRecord[] {
        const id = query.id?.trim();
        const name = query.name?.trim().toLowerCase();
        return this.records
            .filter((record) => !id || record.employeeId === id)
            .filter((record) => !name || record.employeeName.toLowerCase().includes(name))
            .sort(
                (a, b) =>
                    compareText(a.workDate, b.workDate) ||
                    compareEmployeeIds(a.employeeId, b.employeeId) ||
                    a.rowNumber - b.rowNumber
            );
    }

    /**
     * One employee's records, ascending by date.
     *
     * @throws NotFoundError when the employee has no records.
     */
    getEmployeeDetail(employeeId: string): AttendanceRecord[] {
        const records = this.findEmployeeRecords({ id: employeeId });
        if (records.length === 0) {
            throw new NotFoundError(`No records for employee "${employeeId}"`);
        }
        return records;
    }

    /**
     * Employee ids present in the current RecordSet, ascending.
     */
    getEmployeeIds(): string[] {
        return [...new Set(this.records.map((r) => r.employeeId))].sort(compareEmployeeIds);
    }

    // ==================== EXPORT ====================

    /**
     * The summary workbook as `.xlsx` bytes.
     */
    exportSummary(): Buffer {
        const options = { hoursPerDay: this.config.hoursPerDay };
        return exportSummaryWorkbook({
            employees: summarize(this.records, 'employee', options),
            months: summarize(this.records, 'month', options),
            days: summarize(this.records, 'day', options),
            top: topEmployees(this.records, this.config.exportTopN, options),
        });
    }

    /**
     * One aggregate view as CSV text.
     */
    exportSummaryCsv(grouping: Grouping): string {
        return exportSummaryCsv(this.getSummary(grouping), grouping);
    }
}
