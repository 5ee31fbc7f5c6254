/**
 * @fileoverview Sheet Ingestor
 * Reads workbook bytes with SheetJS and turns each worksheet into a list of
 * partially-typed rows with canonical field names.
 *
 * ## Column Resolution
 * The header row of every sheet is matched once against the declarative alias
 * table (`COLUMN_ALIASES`), ignoring case, whitespace and underscores, so
 * "T&A IN", "t&a in" and "T&A  IN" all feed `clockIn`. The first header that
 * matches a field wins; later duplicates and unrecognised headers are ignored.
 * A sheet without an employee identifier or date column fails with SchemaError.
 *
 * ## Cell Handling
 * Cells become {@link RawCell} values before normalization. Numbers carrying a
 * date/time number format are tagged `dateFormatted`, which is what lets the
 * time normalizer tell a serial fraction (0.375 = 09:00) from decimal hours.
 * Each column is normalized by the `kind` its alias entry declares; serial
 * dates follow the workbook's date system (1900 or 1904). A cell that fails
 * to normalize is recorded on its row as malformed; the row is judged later
 * by the record cleaner.
 */

import * as XLSX from 'xlsx';
import { COLUMN_ALIASES, CONSTANTS, type ColumnDefinition } from './constants.js';
import { InvalidConfigurationError, MalformedValueError, SchemaError, UploadValidationError } from './errors.js';
import { createLogger } from './logger.js';
import { isAbsentText, normalizeDate, normalizeDuration, normalizeTimeOfDay } from './time.js';
import type {
    IngestedRow,
    MalformedField,
    RawCell,
    RecordField,
    SheetReport,
    SkippedSheet,
    WorkbookIngestResult,
} from './types.js';
import { detectMonthName, normalizeHeader } from './utils.js';

const log = createLogger('Ingest');

/**
 * Options for sheet and workbook ingestion.
 */
export interface SheetIngestOptions {
    /** Earliest accepted calendar year */
    minYear?: number;
    /** Latest accepted calendar year */
    maxYear?: number;
    /** Overtime values above this many hours are wrapped negatives */
    overtimeWrapThresholdHours?: number;
    /** Only ingest sheets whose label names a month */
    monthSheetsOnly?: boolean;
    /** Alternative alias table */
    aliases?: readonly ColumnDefinition[];
    /** Serial dates use the 1904 date system; `ingestWorkbook` reads it from the workbook */
    date1904?: boolean;
}

/**
 * A header resolved to a canonical field.
 */
export interface ResolvedColumn {
    definition: ColumnDefinition;
    /** 0-based column offset within the sheet range */
    index: number;
    /** Header label as written in the sheet */
    label: string;
}

/**
 * Result of matching a header row against the alias table.
 */
export interface ColumnResolution {
    columns: Map<RecordField, ResolvedColumn>;
    /** Labels that matched no field, or a field already taken */
    ignored: string[];
    /** Primary alias of each required field with no column */
    missing: string[];
}

// ==================== WORKBOOK READING ====================

/**
 * Parses `.xlsx` / `.xls` bytes. Number formats are kept so that
 * date/time-formatted numbers can be recognised.
 *
 * @throws UploadValidationError when SheetJS cannot parse the bytes.
 */
export function readWorkbook(bytes: Uint8Array | ArrayBuffer): XLSX.WorkBook {
    const options: XLSX.ParsingOptions = { cellNF: true, cellDates: false, dense: false };
    try {
        if (Buffer.isBuffer(bytes)) {
            return XLSX.read(bytes, { ...options, type: 'buffer' });
        }
        const data = bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes);
        return XLSX.read(data, { ...options, type: 'array' });
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new UploadValidationError(`The file could not be read as a spreadsheet: ${reason}`);
    }
}

/** Built-in number format ids that render dates or times */
const BUILTIN_DATE_FORMATS = new Set([14, 15, 16, 17, 18, 19, 20, 21, 22, 45, 46, 47]);

/**
 * True when a number format renders a date or a time.
 */
export function isDateFormat(format: string | number | undefined): boolean {
    if (format === undefined) return false;
    if (typeof format === 'number') return BUILTIN_DATE_FORMATS.has(format);
    if (/\[(h+|m+|s+)\]/i.test(format)) return true;
    const stripped = format
        .replace(/"[^"]*"/g, '')
        .replace(/\[[^\]]*\]/g, '')
        .replace(/\\./g, '');
    if (/^general$/i.test(stripped.trim())) return false;
    return /[dhmsy]/i.test(stripped);
}

const EPOCH_1900 = Date.UTC(1899, 11, 30);
const EPOCH_1904 = Date.UTC(1904, 0, 1);

/**
 * True when the workbook counts serial dates from 1904.
 */
export function usesDate1904(workbook: XLSX.WorkBook): boolean {
    return Boolean(workbook.Workbook?.WBProps?.date1904);
}

/**
 * Converts a SheetJS cell into a RawCell.
 *
 * @param date1904 - Date cells become serials of the 1904 date system.
 */
export function toRawCell(cell: XLSX.CellObject | undefined, date1904 = false): RawCell {
    if (!cell || cell.t === 'z' || cell.v === undefined) {
        return { type: 'empty' };
    }

    switch (cell.t) {
        case 'n':
            return typeof cell.v === 'number'
                ? { type: 'number', value: cell.v, dateFormatted: isDateFormat(cell.z) }
                : { type: 'text', text: String(cell.v) };
        case 'd':
            if (cell.v instanceof Date) {
                const serial = (cell.v.getTime() - (date1904 ? EPOCH_1904 : EPOCH_1900)) / 86400000;
                return { type: 'number', value: serial, dateFormatted: true };
            }
            return { type: 'text', text: String(cell.v) };
        case 'b':
            return { type: 'text', text: cell.v ? 'TRUE' : 'FALSE' };
        case 'e':
            return { type: 'text', text: cell.w ?? '#ERROR' };
        default: {
            const text = String(cell.v);
            return text.trim() === '' ? { type: 'empty' } : { type: 'text', text };
        }
    }
}

// ==================== COLUMN RESOLUTION ====================

type TextKind = 'identifier' | 'text' | 'date';
type HoursKind = 'time-of-day' | 'duration';

const TEXT_FIELD_KINDS: Partial<Record<RecordField, readonly TextKind[]>> = {
    employeeId: ['identifier', 'text'],
    employeeName: ['identifier', 'text'],
    workDate: ['date'],
};

function isTextKind(kind: ColumnDefinition['kind']): kind is TextKind {
    return kind === 'identifier' || kind === 'text' || kind === 'date';
}

/**
 * @throws InvalidConfigurationError when a field cannot hold what its kind produces.
 */
function checkKind(definition: ColumnDefinition): void {
    const textKinds = TEXT_FIELD_KINDS[definition.field];
    const fits = textKinds
        ? isTextKind(definition.kind) && textKinds.includes(definition.kind)
        : !isTextKind(definition.kind);
    if (!fits) {
        throw new InvalidConfigurationError(
            'aliases',
            `field "${definition.field}" cannot be read as "${definition.kind}"`
        );
    }
}

/**
 * Matches a header row against the alias table.
 *
 * @param headers - Header labels in column order; null for blank header cells.
 * @param aliases - Alias table.
 */
export function resolveColumns(
    headers: readonly (string | null)[],
    aliases: readonly ColumnDefinition[] = COLUMN_ALIASES
): ColumnResolution {
    const lookup = new Map<string, ColumnDefinition>();
    for (const definition of aliases) {
        checkKind(definition);
        for (const alias of definition.aliases) {
            const key = normalizeHeader(alias);
            if (!lookup.has(key)) lookup.set(key, definition);
        }
    }

    const columns = new Map<RecordField, ResolvedColumn>();
    const ignored: string[] = [];

    headers.forEach((label, index) => {
        if (label === null || label.trim() === '') return;
        const definition = lookup.get(normalizeHeader(label));
        if (!definition || columns.has(definition.field)) {
            ignored.push(label);
            return;
        }
        columns.set(definition.field, { definition, index, label });
    });

    const missing = aliases
        .filter((definition) => definition.required && !columns.has(definition.field))
        .map((definition) => definition.aliases[0]);

    return { columns, ignored, missing };
}

// ==================== ROW NORMALIZATION ====================

function normalizeIdentifier(cell: RawCell): string | null {
    if (cell.type === 'empty') return null;
    if (cell.type === 'number') return String(cell.value);
    const text = cell.text.trim();
    if (isAbsentText(text)) return null;
    // "1234.0" is a numeric id that went through a float column
    const integral = text.match(/^(\d+)\.0+$/);
    return integral ? integral[1] : text;
}

function normalizeText(cell: RawCell): string | null {
    if (cell.type === 'empty') return null;
    const text = cell.type === 'number' ? String(cell.value) : cell.text.trim();
    return text === '' ? null : text;
}

function createEmptyRow(sourceSheet: string, sourceMonth: string | null, rowNumber: number): IngestedRow {
    return {
        sourceSheet,
        sourceMonth,
        rowNumber,
        employeeId: null,
        employeeName: null,
        workDate: null,
        clockIn: null,
        clockOut: null,
        breakDuration: null,
        hoursWorked: null,
        overtimeHours: null,
        targetHours: null,
        malformed: [],
    };
}

function readText(kind: TextKind, cell: RawCell, options: SheetIngestOptions): string | null {
    switch (kind) {
        case 'identifier':
            return normalizeIdentifier(cell);
        case 'text':
            return normalizeText(cell);
        case 'date':
            return normalizeDate(cell, {
                minYear: options.minYear ?? CONSTANTS.DEFAULT_MIN_YEAR,
                maxYear: options.maxYear ?? CONSTANTS.DEFAULT_MAX_YEAR,
                date1904: options.date1904,
            });
    }
}

function readHours(
    kind: HoursKind,
    definition: ColumnDefinition,
    cell: RawCell,
    options: SheetIngestOptions
): number | null {
    if (kind === 'time-of-day') return normalizeTimeOfDay(cell);
    return normalizeDuration(cell, {
        wrapsNegative: definition.wrapsNegative,
        wrapThresholdHours: options.overtimeWrapThresholdHours ?? CONSTANTS.DEFAULT_OVERTIME_WRAP_THRESHOLD,
    });
}

/**
 * Normalizes one cell into its field on the row, by the column's declared kind.
 * MalformedValueError is recorded on the row instead of propagating.
 */
function applyCell(row: IngestedRow, column: ResolvedColumn, cell: RawCell, options: SheetIngestOptions): void {
    const { definition } = column;
    const { field, kind } = definition;
    try {
        switch (field) {
            case 'employeeId':
            case 'employeeName':
            case 'workDate':
                if (isTextKind(kind)) row[field] = readText(kind, cell, options);
                break;
            case 'clockIn':
            case 'clockOut':
            case 'breakDuration':
            case 'hoursWorked':
            case 'overtimeHours':
            case 'targetHours':
                if (!isTextKind(kind)) row[field] = readHours(kind, definition, cell, options);
                break;
        }
    } catch (error) {
        if (!(error instanceof MalformedValueError)) throw error;
        const malformed: MalformedField = {
            field,
            column: column.label,
            reason: error.message,
        };
        row.malformed.push(malformed);
    }
}

// ==================== SHEETS ====================

/**
 * Ingests one worksheet.
 *
 * @param name - Sheet label, recorded on every row as `sourceSheet`.
 * @param sheet - The SheetJS worksheet.
 * @param options - Ingestion options.
 * @throws SchemaError when a required column is missing.
 */
export function ingestSheet(
    name: string,
    sheet: XLSX.WorkSheet,
    options: SheetIngestOptions = {}
): { rows: IngestedRow[]; report: SheetReport } {
    const sourceMonth = detectMonthName(name);
    const ref = sheet['!ref'];
    if (!ref) {
        const required = (options.aliases ?? COLUMN_ALIASES).filter((definition) => definition.required);
        throw new SchemaError(name, required.map((definition) => definition.aliases[0]));
    }

    const range = XLSX.utils.decode_range(ref);
    const readCell = (r: number, c: number): RawCell =>
        toRawCell(sheet[XLSX.utils.encode_cell({ r, c })], options.date1904);
    const isBlankRow = (r: number): boolean => {
        for (let c = range.s.c; c <= range.e.c; c++) {
            if (readCell(r, c).type !== 'empty') return false;
        }
        return true;
    };

    // The header is the first row with any content
    let headerRow = range.s.r;
    while (headerRow <= range.e.r && isBlankRow(headerRow)) headerRow++;

    const headers: (string | null)[] = [];
    for (let c = range.s.c; c <= range.e.c; c++) {
        const cell = readCell(headerRow, c);
        headers.push(cell.type === 'empty' ? null : cell.type === 'number' ? String(cell.value) : cell.text.trim());
    }

    const resolution = resolveColumns(headers, options.aliases);
    if (resolution.missing.length > 0) {
        throw new SchemaError(name, resolution.missing);
    }

    const rows: IngestedRow[] = [];
    for (let r = headerRow + 1; r <= range.e.r; r++) {
        if (isBlankRow(r)) continue;
        const row = createEmptyRow(name, sourceMonth, r + 1);
        for (const column of resolution.columns.values()) {
            applyCell(row, column, readCell(r, range.s.c + column.index), options);
        }
        rows.push(row);
    }

    if (resolution.ignored.length > 0) {
        log.debug(`Sheet "${name}": ignoring column(s) ${resolution.ignored.join(', ')}`);
    }

    return {
        rows,
        report: { sheet: name, sourceMonth, rows: rows.length, ignoredColumns: resolution.ignored },
    };
}

/**
 * Ingests every sheet of a workbook. A sheet that fails with SchemaError is
 * skipped and reported; the remaining sheets are still ingested.
 *
 * @throws InvalidConfigurationError when `options.aliases` pairs a field with a kind it cannot hold.
 */
export function ingestWorkbook(workbook: XLSX.WorkBook, options: SheetIngestOptions = {}): WorkbookIngestResult {
    const sheetOptions: SheetIngestOptions = { ...options, date1904: options.date1904 ?? usesDate1904(workbook) };
    const rows: IngestedRow[] = [];
    const sheets: SheetReport[] = [];
    const skippedSheets: SkippedSheet[] = [];

    for (const name of workbook.SheetNames) {
        if (options.monthSheetsOnly && !detectMonthName(name)) {
            skippedSheets.push({ sheet: name, reason: 'Sheet label does not name a month' });
            continue;
        }

        const sheet = workbook.Sheets[name];
        if (!sheet) {
            skippedSheets.push({ sheet: name, reason: 'Sheet has no content' });
            continue;
        }

        try {
            const result = ingestSheet(name, sheet, sheetOptions);
            rows.push(...result.rows);
            sheets.push(result.report);
        } catch (error) {
            if (!(error instanceof SchemaError)) throw error;
            log.warn(error.message);
            skippedSheets.push({ sheet: name, reason: error.message });
        }
    }

    if (skippedSheets.length > 0) {
        log.info(`Skipped ${skippedSheets.length} sheet(s): ${skippedSheets.map((s) => s.sheet).join(', ')}`);
    }

    return { rows, sheets, skippedSheets };
}
