/**
 * @fileoverview Application Constants
 * Contains global constants, configuration defaults, the column alias table,
 * export layouts and error messages shared across the engine.
 */

import type { FriendlyError, RecordField, TimeKind } from './types.js';

/**
 * Global engine constants.
 */
export const CONSTANTS = {
    /** Hours that make up one "day" in DD:HH:MM:SS rendering. */
    DEFAULT_HOURS_PER_DAY: 8,
    /** Number of employees returned by a ranking when no size is given. */
    DEFAULT_TOP_N: 10,
    /** Number of employees written to the ranking sheet of an export. */
    DEFAULT_EXPORT_TOP_N: 20,
    /** Largest accepted upload (50 MiB). */
    DEFAULT_MAX_UPLOAD_BYTES: 50 * 1024 * 1024,
    /** Hours worked above this are flagged as an anomaly. */
    DEFAULT_ANOMALY_HOURS_THRESHOLD: 24,
    /** Overtime above this is a wrapped negative clock value. */
    DEFAULT_OVERTIME_WRAP_THRESHOLD: 12,
    /** Earliest accepted calendar year. */
    DEFAULT_MIN_YEAR: 2000,
    /** Latest accepted calendar year. */
    DEFAULT_MAX_YEAR: 2100,
    SECONDS_PER_HOUR: 3600,
    SECONDS_PER_DAY: 86400,
} as const;

/**
 * Spreadsheet extensions accepted by `ingest` when a file name is supplied.
 */
export const ALLOWED_EXTENSIONS: readonly string[] = ['xlsx', 'xls'];

/**
 * Cell text that means "no value" rather than a malformed value.
 */
export const ABSENT_TOKENS: ReadonlySet<string> = new Set(['', 'off', 'nan', 'none', 'n/a', 'na', '-', '--']);

/**
 * Key fragments whose values never reach logs or error reports.
 */
export const SENSITIVE_KEY_FRAGMENTS: readonly string[] = ['token', 'password', 'secret', 'key', 'email', 'authorization', 'dsn'];

// ==================== COLUMN ALIASES ====================

/**
 * Declarative description of one canonical column.
 */
export interface ColumnDefinition {
    /** Canonical record field fed by this column */
    field: RecordField;
    /** How cell values are interpreted */
    kind: TimeKind | 'identifier' | 'text';
    /** A sheet without this column fails with a SchemaError */
    required: boolean;
    /** Accepted header spellings (matched case/whitespace-insensitively) */
    aliases: readonly string[];
    /** Negative durations arrive wrapped around a 24h clock */
    wrapsNegative?: boolean;
}

/**
 * Column alias table, resolved once per sheet against its header row.
 */
export const COLUMN_ALIASES: readonly ColumnDefinition[] = [
    {
        field: 'employeeId',
        kind: 'identifier',
        required: true,
        aliases: ['PIN CODE', 'PIN', 'PINCODE', 'EMPLOYEE ID', 'EMP ID', 'EMPLOYEE NO', 'EMPLOYEE NUMBER', 'STAFF ID'],
    },
    {
        field: 'employeeName',
        kind: 'text',
        required: false,
        aliases: ['FULL NAME', 'NAME', 'EMPLOYEE NAME', 'EMPLOYEE', 'STAFF NAME'],
    },
    {
        field: 'workDate',
        kind: 'date',
        required: true,
        aliases: ['DATE', 'WORK DATE', 'WORKDATE', 'SHIFT DATE'],
    },
    {
        field: 'clockIn',
        kind: 'time-of-day',
        required: false,
        aliases: ['T&A IN', 'TA_IN', 'TA IN', 'CLOCK IN', 'TIME IN', 'IN'],
    },
    {
        field: 'clockOut',
        kind: 'time-of-day',
        required: false,
        aliases: ['T&A OUT', 'TA_OUT', 'TA OUT', 'CLOCK OUT', 'TIME OUT', 'OUT'],
    },
    {
        field: 'breakDuration',
        kind: 'duration',
        required: false,
        aliases: ['T&A BREAK', 'TA_BREAK', 'TA BREAK', 'BREAK', 'BREAK DURATION', 'BREAK TIME'],
    },
    {
        field: 'hoursWorked',
        kind: 'duration',
        required: false,
        aliases: ['HOURS WORKED', 'WORKED HOURS', 'TOTAL HOURS', 'WORKED'],
    },
    {
        field: 'overtimeHours',
        kind: 'duration',
        required: false,
        aliases: ['OVERTIME HOURS', 'OVERTIME', 'OT', 'OT HOURS'],
        wrapsNegative: true,
    },
    {
        field: 'targetHours',
        kind: 'duration',
        required: false,
        aliases: ['TARGET', 'TARGET HOURS', 'EXPECTED HOURS', 'SCHEDULED HOURS'],
    },
];

// ==================== CALENDAR ====================

/**
 * Full English month names, January first.
 */
export const MONTH_NAMES: readonly string[] = [
    'January',
    'February',
    'March',
    'April',
    'May',
    'June',
    'July',
    'August',
    'September',
    'October',
    'November',
    'December',
];

/**
 * Month spellings recognised in sheet labels and textual dates, mapped to a
 * 1-based month number. Longer spellings come first so "june" wins over "jun".
 */
export const MONTH_TOKENS: readonly (readonly [string, number])[] = [
    ['january', 1],
    ['february', 2],
    ['march', 3],
    ['april', 4],
    ['may', 5],
    ['june', 6],
    ['july', 7],
    ['august', 8],
    ['september', 9],
    ['october', 10],
    ['november', 11],
    ['december', 12],
    ['sept', 9],
    ['jan', 1],
    ['feb', 2],
    ['mar', 3],
    ['apr', 4],
    ['jun', 6],
    ['jul', 7],
    ['aug', 8],
    ['sep', 9],
    ['oct', 10],
    ['nov', 11],
    ['dec', 12],
];

// ==================== EXPORT LAYOUT ====================

/**
 * Sheet names of the summary workbook.
 */
export const EXPORT_SHEETS = {
    EMPLOYEES: 'By Employee',
    MONTHS: 'By Month',
    DAYS: 'Daily Totals',
    TOP: 'Top Employees',
} as const;

/**
 * Column headers of each export sheet, in output order.
 */
export const EXPORT_COLUMNS = {
    EMPLOYEES: [
        'Employee ID',
        'Employee Name',
        'Total Overtime Hours',
        'Total Overtime HH:MM:SS',
        'Total Overtime DD:HH:MM:SS',
        'Average Overtime Hours',
        'Average Overtime HH:MM:SS',
        'Average Overtime DD:HH:MM:SS',
        'Total Hours Worked',
        'Total Hours Worked HH:MM:SS',
        'Days Worked',
        'First Date',
        'Last Date',
    ],
    MONTHS: [
        'Month',
        'Month Name',
        'Total Overtime Hours',
        'Total Overtime HH:MM:SS',
        'Total Overtime DD:HH:MM:SS',
        'Average Overtime Hours',
        'Average Overtime HH:MM:SS',
        'Average Overtime DD:HH:MM:SS',
        'Total Hours Worked',
        'Total Hours Worked HH:MM:SS',
        'Records',
        'Unique Employees',
    ],
    DAYS: [
        'Date',
        'Total Overtime Hours',
        'Total Overtime HH:MM:SS',
        'Total Overtime DD:HH:MM:SS',
        'Average Overtime Hours',
        'Average Overtime HH:MM:SS',
        'Average Overtime DD:HH:MM:SS',
        'Total Hours Worked',
        'Total Hours Worked HH:MM:SS',
        'Employees',
    ],
    TOP: [
        'Rank',
        'Employee ID',
        'Employee Name',
        'Total Overtime Hours',
        'Total Overtime HH:MM:SS',
        'Total Overtime DD:HH:MM:SS',
        'Average Overtime Hours',
        'Average Overtime HH:MM:SS',
        'Average Overtime DD:HH:MM:SS',
        'Total Hours Worked',
        'Total Hours Worked HH:MM:SS',
        'Days Worked',
        'First Date',
        'Last Date',
    ],
} as const;

// ==================== ERROR CONSTANTS ====================

/**
 * Classification of error types.
 */
export const ERROR_TYPES = {
    SCHEMA: 'SCHEMA_ERROR',
    MALFORMED_VALUE: 'MALFORMED_VALUE',
    EMPTY_RESULT: 'EMPTY_RESULT',
    INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
    NOT_FOUND: 'NOT_FOUND',
    VALIDATION: 'VALIDATION_ERROR',
    UNKNOWN: 'UNKNOWN_ERROR',
} as const;

export type ErrorType = typeof ERROR_TYPES[keyof typeof ERROR_TYPES];

/**
 * Error message configuration
 */
export interface ErrorMessageConfig {
    title: string;
    message: string;
    action: 'retry' | 'fix-input' | 'none';
}

/**
 * User-facing messages and actions for each error type.
 */
export const ERROR_MESSAGES: Record<ErrorType, ErrorMessageConfig> = {
    [ERROR_TYPES.SCHEMA]: {
        title: 'Unrecognised Sheet Layout',
        message: 'A worksheet is missing the employee identifier or date column.',
        action: 'fix-input',
    },
    [ERROR_TYPES.MALFORMED_VALUE]: {
        title: 'Unreadable Value',
        message: 'A cell could not be read as a time, duration or date.',
        action: 'fix-input',
    },
    [ERROR_TYPES.EMPTY_RESULT]: {
        title: 'No Valid Records',
        message: 'No valid overtime records were found in the workbook. Please check the file format.',
        action: 'fix-input',
    },
    [ERROR_TYPES.INVALID_CONFIGURATION]: {
        title: 'Invalid Configuration',
        message: 'A configuration value is outside its allowed range.',
        action: 'none',
    },
    [ERROR_TYPES.NOT_FOUND]: {
        title: 'Not Found',
        message: 'No records exist for the requested employee.',
        action: 'none',
    },
    [ERROR_TYPES.VALIDATION]: {
        title: 'Invalid Upload',
        message: 'The upload was refused. Please upload an .xlsx or .xls file under the size limit.',
        action: 'fix-input',
    },
    [ERROR_TYPES.UNKNOWN]: {
        title: 'Unexpected Error',
        message: 'An unexpected error occurred while processing the workbook.',
        action: 'retry',
    },
};

// Re-export types for convenience
export type { FriendlyError };
