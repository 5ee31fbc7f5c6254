/**
 * @fileoverview Aggregation Engine - Pure Overtime Analytics
 *
 * This module turns a RecordSet's records into the summaries every view and
 * export is built from. It is completely side-effect free: no I/O, no session
 * access, no mutation of its input. Same inputs ALWAYS produce same outputs.
 *
 * ## Module Responsibility
 * - Group records by employee, calendar month and work date
 * - Rank employees by total overtime
 * - Compute whole-RecordSet statistics
 * - Decorate every row with HH:MM:SS / DD:HH:MM:SS renderings
 *
 * ## Business Rules (DO NOT CHANGE WITHOUT UPDATING TESTS)
 *
 * ### Exact sums
 * Normalized hour values are whole seconds. Sums are accumulated as integer
 * seconds ({@link HoursAccumulator}), so:
 * - Repeated aggregation of the same records is bit-for-bit identical
 * - The totals of any grouping add up exactly to the overall total
 *
 * ### Averages
 * - Group average overtime = total overtime / records with hours worked or
 *   overtime present (a record with neither is not a data point)
 * - Overall average = total overtime / record count, `0` for no records
 *
 * ### Ordering
 * - Employees ascend by id; all-digit ids come first and compare as numbers
 *   ("9" before "10"), other ids follow in code unit order
 * - Months and days ascend chronologically
 * - Rankings descend by total overtime, ties broken by employee id ascending
 *
 * ### Employee name
 * An employee's display name is the name on their latest dated record, so a
 * corrected spelling in a later month replaces the earlier one.
 */

import { CONSTANTS } from './constants.js';
import { formatDdhhmmss, formatHhmmss } from './format.js';
import type {
    AggregateRow,
    AggregateTotals,
    AttendanceRecord,
    DayAggregate,
    EmployeeAggregate,
    FormattedDurations,
    Grouping,
    MonthAggregate,
    OverallStats,
} from './types.js';
import { compareEmployeeIds, compareText, HoursAccumulator, IsoUtils } from './utils.js';

/**
 * Options shared by all aggregations.
 */
export interface CalcOptions {
    /** Hours in one DD:HH:MM:SS "day" (default 8) */
    hoursPerDay?: number;
}

// ==================== GROUP ACCUMULATION ====================

/**
 * Running totals for one group of records.
 */
class GroupTotals {
    readonly overtime = new HoursAccumulator();
    readonly worked = new HoursAccumulator();
    /** Records with hours worked or overtime present */
    dataPoints = 0;
    records = 0;

    add(record: AttendanceRecord): void {
        this.overtime.add(record.overtimeHours);
        this.worked.add(record.hoursWorked);
        if (record.overtimeHours !== null || record.hoursWorked !== null) {
            this.dataPoints += 1;
        }
        this.records += 1;
    }

    /**
     * Decimal and formatted totals of the group.
     */
    describe(hoursPerDay: number): AggregateTotals & FormattedDurations {
        const totalOvertimeHours = this.overtime.hours;
        const avgOvertimeHours = this.overtime.mean(this.dataPoints);
        const totalHoursWorked = this.worked.hours;
        return {
            totalOvertimeHours,
            avgOvertimeHours,
            totalHoursWorked,
            totalOvertimeHhmmss: formatHhmmss(totalOvertimeHours),
            totalOvertimeDdhhmmss: formatDdhhmmss(totalOvertimeHours, hoursPerDay),
            avgOvertimeHhmmss: formatHhmmss(avgOvertimeHours),
            avgOvertimeDdhhmmss: formatDdhhmmss(avgOvertimeHours, hoursPerDay),
            totalHoursWorkedHhmmss: formatHhmmss(totalHoursWorked),
        };
    }
}

/**
 * Groups records by a key, keeping insertion order of first appearance.
 */
function groupBy(
    records: readonly AttendanceRecord[],
    keyOf: (record: AttendanceRecord) => string
): Map<string, AttendanceRecord[]> {
    const groups = new Map<string, AttendanceRecord[]>();
    for (const record of records) {
        const key = keyOf(record);
        const group = groups.get(key);
        if (group) {
            group.push(record);
        } else {
            groups.set(key, [record]);
        }
    }
    return groups;
}

function totalsOf(records: readonly AttendanceRecord[]): GroupTotals {
    const totals = new GroupTotals();
    records.forEach((record) => totals.add(record));
    return totals;
}

// ==================== SUMMARIES ====================

/**
 * Per-employee totals, ascending by employee id.
 */
export function summarizeByEmployee(
    records: readonly AttendanceRecord[],
    options: CalcOptions = {}
): EmployeeAggregate[] {
    const hoursPerDay = options.hoursPerDay ?? CONSTANTS.DEFAULT_HOURS_PER_DAY;
    const rows: EmployeeAggregate[] = [];

    for (const [employeeId, group] of groupBy(records, (r) => r.employeeId)) {
        let latest = group[0];
        const dates = new Set<string>();
        for (const record of group) {
            dates.add(record.workDate);
            if (record.workDate >= latest.workDate) latest = record;
        }
        const sortedDates = [...dates].sort();

        rows.push({
            group: 'employee',
            employeeId,
            employeeName: latest.employeeName,
            ...totalsOf(group).describe(hoursPerDay),
            daysWorked: dates.size,
            firstDate: sortedDates[0],
            lastDate: sortedDates[sortedDates.length - 1],
        });
    }

    return rows.sort((a, b) => compareEmployeeIds(a.employeeId, b.employeeId));
}

/**
 * Per-calendar-month totals, ascending by month.
 */
export function summarizeByMonth(records: readonly AttendanceRecord[], options: CalcOptions = {}): MonthAggregate[] {
    const hoursPerDay = options.hoursPerDay ?? CONSTANTS.DEFAULT_HOURS_PER_DAY;
    const rows: MonthAggregate[] = [];

    for (const [month, group] of groupBy(records, (r) => IsoUtils.toMonthKey(r.workDate))) {
        const totals = totalsOf(group);
        rows.push({
            group: 'month',
            month,
            monthLabel: IsoUtils.formatMonthKey(month),
            ...totals.describe(hoursPerDay),
            recordCount: totals.records,
            uniqueEmployees: new Set(group.map((r) => r.employeeId)).size,
        });
    }

    return rows.sort((a, b) => compareText(a.month, b.month));
}

/**
 * Per-work-date totals, ascending by date.
 */
export function summarizeByDay(records: readonly AttendanceRecord[], options: CalcOptions = {}): DayAggregate[] {
    const hoursPerDay = options.hoursPerDay ?? CONSTANTS.DEFAULT_HOURS_PER_DAY;
    const rows: DayAggregate[] = [];

    for (const [workDate, group] of groupBy(records, (r) => r.workDate)) {
        rows.push({
            group: 'day',
            workDate,
            ...totalsOf(group).describe(hoursPerDay),
            employeeCount: new Set(group.map((r) => r.employeeId)).size,
        });
    }

    return rows.sort((a, b) => compareText(a.workDate, b.workDate));
}

/**
 * Summaries for a grouping key.
 */
export function summarize(
    records: readonly AttendanceRecord[],
    grouping: 'employee',
    options?: CalcOptions
): EmployeeAggregate[];
export function summarize(records: readonly AttendanceRecord[], grouping: 'month', options?: CalcOptions): MonthAggregate[];
export function summarize(records: readonly AttendanceRecord[], grouping: 'day', options?: CalcOptions): DayAggregate[];
export function summarize(records: readonly AttendanceRecord[], grouping: Grouping, options?: CalcOptions): AggregateRow[];
export function summarize(
    records: readonly AttendanceRecord[],
    grouping: Grouping,
    options: CalcOptions = {}
): AggregateRow[] {
    switch (grouping) {
        case 'employee':
            return summarizeByEmployee(records, options);
        case 'month':
            return summarizeByMonth(records, options);
        case 'day':
            return summarizeByDay(records, options);
    }
}

/**
 * The `n` employees with the most overtime.
 *
 * `n` is floored; `n <= 0` or NaN yields an empty list and `n` above the
 * number of employees yields all of them.
 */
export function topEmployees(
    records: readonly AttendanceRecord[],
    n: number,
    options: CalcOptions = {}
): EmployeeAggregate[] {
    if (Number.isNaN(n) || n < 1) return [];
    const ranked = summarizeByEmployee(records, options).sort(
        (a, b) =>
            b.totalOvertimeHours - a.totalOvertimeHours || compareEmployeeIds(a.employeeId, b.employeeId)
    );
    return Number.isFinite(n) ? ranked.slice(0, Math.floor(n)) : ranked;
}

/**
 * Whole-RecordSet statistics.
 */
export function calculateOverallStats(records: readonly AttendanceRecord[], options: CalcOptions = {}): OverallStats {
    const hoursPerDay = options.hoursPerDay ?? CONSTANTS.DEFAULT_HOURS_PER_DAY;
    const totals = totalsOf(records);
    const totalOvertimeHours = totals.overtime.hours;
    const totalHoursWorked = totals.worked.hours;
    const avgOvertimePerRecord = totals.overtime.mean(records.length);

    let firstDate: string | null = null;
    let lastDate: string | null = null;
    for (const record of records) {
        if (firstDate === null || record.workDate < firstDate) firstDate = record.workDate;
        if (lastDate === null || record.workDate > lastDate) lastDate = record.workDate;
    }

    return {
        totalOvertimeHours,
        totalOvertimeHhmmss: formatHhmmss(totalOvertimeHours),
        totalOvertimeDdhhmmss: formatDdhhmmss(totalOvertimeHours, hoursPerDay),
        totalHoursWorked,
        totalHoursWorkedHhmmss: formatHhmmss(totalHoursWorked),
        uniqueEmployees: new Set(records.map((r) => r.employeeId)).size,
        recordCount: records.length,
        avgOvertimePerRecord,
        avgOvertimeHhmmss: formatHhmmss(avgOvertimePerRecord),
        avgOvertimeDdhhmmss: formatDdhhmmss(avgOvertimePerRecord, hoursPerDay),
        firstDate,
        lastDate,
    };
}
