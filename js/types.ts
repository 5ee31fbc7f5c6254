/**
 * @fileoverview TypeScript Type Definitions
 * Centralized type definitions shared across the overtime engine.
 */

// ==================== CELL & TIME TYPES ====================

/**
 * A single spreadsheet value before interpretation.
 */
export type RawCell =
    | { type: 'text'; text: string }
    | {
          type: 'number';
          value: number;
          /** True when the cell's number format is a date or time format */
          dateFormatted: boolean;
      }
    | { type: 'empty' };

/**
 * Declared semantic type of a column.
 */
export type TimeKind = 'time-of-day' | 'duration' | 'date';

/**
 * The representation a time or duration value arrived in.
 * Resolved explicitly by the time normalizer, never by implicit coercion.
 */
export type TimeEncoding =
    | {
          kind: 'text-clock';
          negative: boolean;
          hours: number;
          minutes: number;
          seconds: number;
      }
    | {
          kind: 'serial-fraction';
          /** Spreadsheet serial value, 1.0 = 24 hours */
          serial: number;
      }
    | {
          kind: 'decimal-hours';
          hours: number;
      };

// ==================== RECORD TYPES ====================

/**
 * Anomalies are flagged on a record, never corrected.
 */
export type AnomalyKind = 'hours-exceed-day' | 'negative-hours-worked' | 'break-exceeds-hours-worked';

/**
 * Where a record's overtime figure came from.
 */
export type OvertimeSource = 'reported' | 'derived' | 'missing';

/**
 * Canonical fields fed by spreadsheet columns.
 */
export type RecordField =
    | 'employeeId'
    | 'employeeName'
    | 'workDate'
    | 'clockIn'
    | 'clockOut'
    | 'breakDuration'
    | 'hoursWorked'
    | 'overtimeHours'
    | 'targetHours';

/**
 * A cell that could not be interpreted.
 */
export interface MalformedField {
    field: RecordField;
    /** Header label as written in the sheet */
    column: string;
    reason: string;
}

/**
 * One sheet row after column resolution and value normalization,
 * before the record cleaner has validated it.
 */
export interface IngestedRow {
    /** Sheet label the row came from */
    sourceSheet: string;
    /** Month name recognised in the sheet label */
    sourceMonth: string | null;
    /** 1-based spreadsheet row number */
    rowNumber: number;
    employeeId: string | null;
    employeeName: string | null;
    workDate: string | null;
    clockIn: number | null;
    clockOut: number | null;
    breakDuration: number | null;
    hoursWorked: number | null;
    overtimeHours: number | null;
    targetHours: number | null;
    /** Cells that failed to normalize */
    malformed: MalformedField[];
}

/**
 * The canonical unit of data after cleaning.
 */
export interface AttendanceRecord {
    employeeId: string;
    employeeName: string;
    /** YYYY-MM-DD */
    workDate: string;
    /** Decimal hours in [0, 24) */
    clockIn: number | null;
    /** Decimal hours in [0, 24) */
    clockOut: number | null;
    breakDuration: number | null;
    hoursWorked: number | null;
    /** Negative values are a shortfall against target */
    overtimeHours: number | null;
    overtimeSource: OvertimeSource;
    targetHours: number | null;
    sourceSheet: string;
    sourceMonth: string | null;
    rowNumber: number;
    anomalies: AnomalyKind[];
}

/**
 * Filters for `OvertimeSession.findEmployeeRecords`.
 */
export interface EmployeeQuery {
    /** Exact employee id */
    id?: string;
    /** Case-insensitive substring of the employee name */
    name?: string;
}

/**
 * Counters of rows the cleaner refused.
 */
export interface RejectionCounts {
    missingEmployeeId: number;
    invalidDate: number;
    malformedValue: number;
}

/**
 * Counters of flagged records, by anomaly kind.
 */
export type AnomalyCounts = Record<AnomalyKind, number>;

/**
 * Output of the record cleaner.
 */
export interface CleanResult {
    records: AttendanceRecord[];
    /** Rows refused, across all reasons */
    rejected: number;
    rejections: RejectionCounts;
    /** Rows superseded by another row with the same employee and date */
    duplicates: number;
    anomalies: AnomalyCounts;
}

/**
 * Summary of one ingested sheet.
 */
export interface SheetReport {
    sheet: string;
    sourceMonth: string | null;
    /** Non-blank data rows read from the sheet */
    rows: number;
    /** Header labels that matched no known column */
    ignoredColumns: string[];
}

/**
 * A sheet left out of ingestion, and why.
 */
export interface SkippedSheet {
    sheet: string;
    reason: string;
}

/**
 * Output of the sheet ingestor for a whole workbook.
 */
export interface WorkbookIngestResult {
    rows: IngestedRow[];
    sheets: SheetReport[];
    skippedSheets: SkippedSheet[];
}

/**
 * Cleaned record collection for one uploaded workbook.
 */
export interface RecordSet {
    id: string;
    /** File name or label supplied with the upload */
    sourceName: string | null;
    /** ISO timestamp */
    ingestedAt: string;
    records: readonly AttendanceRecord[];
    report: IngestReport;
}

// ==================== AGGREGATE TYPES ====================

/**
 * Grouping keys accepted by summaries.
 */
export type Grouping = 'employee' | 'month' | 'day';

/**
 * Formatted durations attached to every aggregate row.
 */
export interface FormattedDurations {
    totalOvertimeHhmmss: string;
    totalOvertimeDdhhmmss: string;
    avgOvertimeHhmmss: string;
    avgOvertimeDdhhmmss: string;
    totalHoursWorkedHhmmss: string;
}

/**
 * Totals shared by all aggregate variants.
 */
export interface AggregateTotals {
    totalOvertimeHours: number;
    avgOvertimeHours: number;
    totalHoursWorked: number;
}

export interface EmployeeAggregate extends AggregateTotals, FormattedDurations {
    group: 'employee';
    employeeId: string;
    employeeName: string;
    /** Distinct work dates */
    daysWorked: number;
    firstDate: string;
    lastDate: string;
}

export interface MonthAggregate extends AggregateTotals, FormattedDurations {
    group: 'month';
    /** YYYY-MM */
    month: string;
    /** e.g. "October 2025" */
    monthLabel: string;
    recordCount: number;
    uniqueEmployees: number;
}

export interface DayAggregate extends AggregateTotals, FormattedDurations {
    group: 'day';
    /** YYYY-MM-DD */
    workDate: string;
    employeeCount: number;
}

export type AggregateRow = EmployeeAggregate | MonthAggregate | DayAggregate;

/**
 * Whole-RecordSet statistics.
 */
export interface OverallStats {
    totalOvertimeHours: number;
    totalOvertimeHhmmss: string;
    totalOvertimeDdhhmmss: string;
    totalHoursWorked: number;
    totalHoursWorkedHhmmss: string;
    uniqueEmployees: number;
    recordCount: number;
    avgOvertimePerRecord: number;
    avgOvertimeHhmmss: string;
    avgOvertimeDdhhmmss: string;
    firstDate: string | null;
    lastDate: string | null;
}

// ==================== SESSION TYPES ====================

/**
 * Counters reported for an upload.
 */
export interface IngestReport {
    accepted: number;
    rejected: number;
    duplicates: number;
    rejections: RejectionCounts;
    anomalies: AnomalyCounts;
    sheets: SheetReport[];
    skippedSheets: SkippedSheet[];
}

/**
 * Response of `OvertimeSession.ingest`.
 */
export interface IngestResponse extends IngestReport {
    success: boolean;
    /** Set when the upload did not replace the current RecordSet */
    error?: FriendlyError;
}

/**
 * Change notification sent to session subscribers.
 */
export interface SessionEvent {
    type: 'ingested' | 'cleared';
    /** Id of the RecordSet that became current */
    recordSetId?: string;
}

/**
 * Options accepted by `OvertimeSession.ingest`.
 */
export interface IngestOptions {
    /** Original file name, used for the extension check and as the source label */
    fileName?: string;
}

/**
 * Structured user-facing error.
 */
export interface FriendlyError {
    /** Error type from ERROR_TYPES */
    type: string;
    /** User-friendly error title */
    title: string;
    /** Detailed message for this occurrence */
    message: string;
    /** Suggested action */
    action: 'retry' | 'fix-input' | 'none';
    /** ISO timestamp of when error occurred */
    timestamp: string;
    /** Error stack trace for debugging */
    stack?: string;
}
