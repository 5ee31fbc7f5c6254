/**
 * @fileoverview Record Cleaner
 * Turns ingested rows from every sheet into the validated, deduplicated record
 * list of one RecordSet.
 *
 * ## Rules
 * - A row without an employee id is rejected (`missingEmployeeId`)
 * - A row without a readable work date is rejected (`invalidDate`)
 * - A row with any other malformed cell is rejected (`malformedValue`)
 * - Missing overtime is derived from hours worked and target when possible
 * - Rows sharing `(employeeId, workDate)` collapse to one record under a single
 *   dedupe policy applied across all sheets
 * - Implausible values are flagged as anomalies and kept unchanged
 *
 * The cleaner is pure: the same rows and options always produce the same result.
 */

import { CONSTANTS } from './constants.js';
import { EmptyResultError } from './errors.js';
import { createLogger } from './logger.js';
import type {
    AnomalyCounts,
    AnomalyKind,
    AttendanceRecord,
    CleanResult,
    IngestedRow,
    OvertimeSource,
    RejectionCounts,
} from './types.js';
import { roundToSecond } from './utils.js';

const log = createLogger('Clean');

/**
 * Which occurrence of a duplicated `(employeeId, workDate)` survives.
 */
export type DedupePolicy = 'first' | 'last';

export interface CleanOptions {
    /** Default `'last'`: the last occurrence in sheet/row order wins */
    dedupePolicy?: DedupePolicy;
    /** Hours worked above this are flagged `hours-exceed-day` */
    anomalyHoursThreshold?: number;
}

export function createEmptyRejections(): RejectionCounts {
    return { missingEmployeeId: 0, invalidDate: 0, malformedValue: 0 };
}

export function createEmptyAnomalyCounts(): AnomalyCounts {
    return {
        'hours-exceed-day': 0,
        'negative-hours-worked': 0,
        'break-exceeds-hours-worked': 0,
    };
}

/**
 * Overtime as reported, or derived as hours worked minus target.
 */
function resolveOvertime(row: IngestedRow): { overtimeHours: number | null; overtimeSource: OvertimeSource } {
    if (row.overtimeHours !== null) {
        return { overtimeHours: row.overtimeHours, overtimeSource: 'reported' };
    }
    if (row.hoursWorked !== null) {
        return {
            overtimeHours: roundToSecond(row.hoursWorked - (row.targetHours ?? 0)),
            overtimeSource: 'derived',
        };
    }
    return { overtimeHours: null, overtimeSource: 'missing' };
}

function detectAnomalies(row: IngestedRow, threshold: number): AnomalyKind[] {
    const anomalies: AnomalyKind[] = [];
    const { hoursWorked, breakDuration } = row;
    if (hoursWorked !== null && hoursWorked > threshold) anomalies.push('hours-exceed-day');
    if (hoursWorked !== null && hoursWorked < 0) anomalies.push('negative-hours-worked');
    if (hoursWorked !== null && breakDuration !== null && breakDuration > hoursWorked) {
        anomalies.push('break-exceeds-hours-worked');
    }
    return anomalies;
}

function toRecord(row: IngestedRow, employeeId: string, workDate: string, threshold: number): AttendanceRecord {
    return {
        employeeId,
        employeeName: row.employeeName ?? employeeId,
        workDate,
        clockIn: row.clockIn,
        clockOut: row.clockOut,
        breakDuration: row.breakDuration,
        hoursWorked: row.hoursWorked,
        ...resolveOvertime(row),
        targetHours: row.targetHours,
        sourceSheet: row.sourceSheet,
        sourceMonth: row.sourceMonth,
        rowNumber: row.rowNumber,
        anomalies: detectAnomalies(row, threshold),
    };
}

/**
 * Validates, deduplicates and flags ingested rows.
 *
 * @param rows - Rows of all sheets in sheet order, then row order.
 * @param options - Dedupe policy and anomaly threshold.
 * @throws EmptyResultError when no row survives.
 */
export function cleanRecords(rows: readonly IngestedRow[], options: CleanOptions = {}): CleanResult {
    const policy = options.dedupePolicy ?? 'last';
    const threshold = options.anomalyHoursThreshold ?? CONSTANTS.DEFAULT_ANOMALY_HOURS_THRESHOLD;

    const rejections = createEmptyRejections();
    const candidates: AttendanceRecord[] = [];

    for (const row of rows) {
        const employeeId = row.employeeId?.trim() ?? '';
        if (employeeId === '') {
            rejections.missingEmployeeId += 1;
            continue;
        }
        if (row.workDate === null || row.malformed.some((m) => m.field === 'workDate')) {
            rejections.invalidDate += 1;
            continue;
        }
        if (row.malformed.length > 0) {
            rejections.malformedValue += 1;
            continue;
        }
        candidates.push(toRecord(row, employeeId, row.workDate, threshold));
    }

    // Position of the winning occurrence for each natural key
    const winners = new Map<string, number>();
    let duplicates = 0;
    candidates.forEach((record, index) => {
        const key = `${record.employeeId}\u0000${record.workDate}`;
        if (!winners.has(key)) {
            winners.set(key, index);
            return;
        }
        duplicates += 1;
        if (policy === 'last') winners.set(key, index);
    });

    const records = candidates.filter(
        (record, index) => winners.get(`${record.employeeId}\u0000${record.workDate}`) === index
    );

    const anomalies = createEmptyAnomalyCounts();
    for (const record of records) {
        for (const kind of record.anomalies) anomalies[kind] += 1;
    }

    const rejected = rejections.missingEmployeeId + rejections.invalidDate + rejections.malformedValue;

    if (records.length === 0) {
        throw new EmptyResultError(
            rejected,
            rejections,
            rows.length === 0 ? 'The workbook contains no data rows' : undefined
        );
    }

    if (duplicates > 0) {
        log.info(`Collapsed ${duplicates} duplicate row(s), keeping the ${policy} occurrence`);
    }
    if (rejected > 0) {
        log.info(
            `Rejected ${rejected} row(s): ${rejections.missingEmployeeId} without employee id, ` +
                `${rejections.invalidDate} with invalid date, ${rejections.malformedValue} with malformed values`
        );
    }

    return { records, rejected, rejections, duplicates, anomalies };
}
