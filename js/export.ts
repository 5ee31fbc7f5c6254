/**
 * @fileoverview Export Module
 * Generates the summary workbook (.xlsx) and CSV renderings of the aggregate views.
 * Includes security measures against CSV injection and a fixed column order.
 */

import * as XLSX from 'xlsx';
import { EXPORT_COLUMNS, EXPORT_SHEETS } from './constants.js';
import type { AggregateRow, DayAggregate, EmployeeAggregate, Grouping, MonthAggregate } from './types.js';
import { escapeCsv, round } from './utils.js';

type CellValue = string | number;

/**
 * Aggregate views written to the summary workbook.
 */
export interface SummaryViews {
    employees: readonly EmployeeAggregate[];
    months: readonly MonthAggregate[];
    days: readonly DayAggregate[];
    /** Ranked employees, best first */
    top: readonly EmployeeAggregate[];
}

const HEADERS: Record<Grouping, readonly string[]> = {
    employee: EXPORT_COLUMNS.EMPLOYEES,
    month: EXPORT_COLUMNS.MONTHS,
    day: EXPORT_COLUMNS.DAYS,
};

/**
 * Sanitizes a string to prevent CSV formula injection.
 * If a field starts with =, +, -, @, tab, or carriage return, Excel/Sheets might execute it.
 * We prepend a single quote to force it to be treated as text.
 *
 * @param str - The string to sanitize.
 * @returns Sanitized string safe for CSV.
 */
export function sanitizeFormulaInjection(str: string | null | undefined): string {
    if (!str) return '';
    const value = String(str);
    if (/^[=+\-@\t\r]/.test(value)) {
        return "'" + value;
    }
    return value;
}

// ==================== ROW LAYOUT ====================

/** Duration columns shared by every view, in EXPORT_COLUMNS order */
function durationValues(row: AggregateRow): CellValue[] {
    return [
        round(row.totalOvertimeHours),
        row.totalOvertimeHhmmss,
        row.totalOvertimeDdhhmmss,
        round(row.avgOvertimeHours),
        row.avgOvertimeHhmmss,
        row.avgOvertimeDdhhmmss,
        round(row.totalHoursWorked),
        row.totalHoursWorkedHhmmss,
    ];
}

/**
 * Cell values of one aggregate row, in the column order of its sheet.
 * Free-text values pass through `sanitizeText`.
 */
function rowValues(row: AggregateRow, sanitizeText: (text: string) => string): CellValue[] {
    switch (row.group) {
        case 'employee':
            return [
                sanitizeText(row.employeeId),
                sanitizeText(row.employeeName),
                ...durationValues(row),
                row.daysWorked,
                row.firstDate,
                row.lastDate,
            ];
        case 'month':
            return [row.month, row.monthLabel, ...durationValues(row), row.recordCount, row.uniqueEmployees];
        case 'day':
            return [row.workDate, ...durationValues(row), row.employeeCount];
    }
}

const keepText = (text: string): string => text;

// ==================== WORKBOOK ====================

function appendSheet(
    workbook: XLSX.WorkBook,
    name: string,
    headers: readonly string[],
    rows: CellValue[][]
): void {
    const sheet = XLSX.utils.aoa_to_sheet([[...headers], ...rows]);
    sheet['!cols'] = headers.map((header) => ({ wch: Math.max(12, header.length + 2) }));
    XLSX.utils.book_append_sheet(workbook, sheet, name);
}

/**
 * Builds the summary workbook. Empty views produce header-only sheets.
 */
export function buildSummaryWorkbook(views: SummaryViews): XLSX.WorkBook {
    const workbook = XLSX.utils.book_new();

    appendSheet(
        workbook,
        EXPORT_SHEETS.EMPLOYEES,
        EXPORT_COLUMNS.EMPLOYEES,
        views.employees.map((row) => rowValues(row, keepText))
    );
    appendSheet(
        workbook,
        EXPORT_SHEETS.MONTHS,
        EXPORT_COLUMNS.MONTHS,
        views.months.map((row) => rowValues(row, keepText))
    );
    appendSheet(
        workbook,
        EXPORT_SHEETS.DAYS,
        EXPORT_COLUMNS.DAYS,
        views.days.map((row) => rowValues(row, keepText))
    );
    appendSheet(
        workbook,
        EXPORT_SHEETS.TOP,
        EXPORT_COLUMNS.TOP,
        views.top.map((row, index) => [index + 1, ...rowValues(row, keepText)])
    );

    return workbook;
}

/**
 * Serializes the summary workbook to `.xlsx` bytes.
 */
export function exportSummaryWorkbook(views: SummaryViews): Buffer {
    return XLSX.write(buildSummaryWorkbook(views), { type: 'buffer', bookType: 'xlsx' });
}

// ==================== CSV ====================

/**
 * Renders one aggregate view as CSV.
 *
 * Logic:
 * 1. Writes the header row of the view's grouping.
 * 2. Sanitizes free-text fields against formula injection.
 * 3. Escapes quotes, commas and newlines in every field.
 *
 * @param rows - Rows of a single grouping.
 * @param grouping - Grouping of the rows; picks the header row when `rows` is empty.
 */
export function exportSummaryCsv(
    rows: readonly AggregateRow[],
    grouping: Grouping = rows.length > 0 ? rows[0].group : 'employee'
): string {
    const lines = [HEADERS[grouping].map(escapeCsv).join(',')];
    for (const row of rows) {
        lines.push(rowValues(row, sanitizeFormulaInjection).map(escapeCsv).join(','));
    }
    return lines.join('\n') + '\n';
}
