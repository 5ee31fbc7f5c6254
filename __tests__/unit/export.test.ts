import { describe, it, expect } from '@jest/globals';
import * as XLSX from 'xlsx';
import { summarizeByDay, summarizeByEmployee, summarizeByMonth, topEmployees } from '../../js/calc.js';
import { EXPORT_COLUMNS, EXPORT_SHEETS } from '../../js/constants.js';
import {
    buildSummaryWorkbook,
    exportSummaryCsv,
    exportSummaryWorkbook,
    sanitizeFormulaInjection,
    type SummaryViews,
} from '../../js/export.js';
import { readSheetRows } from '../helpers/workbook.js';
import { makeRecord } from '../helpers/records.js';

const EMPTY_VIEWS: SummaryViews = { employees: [], months: [], days: [], top: [] };

function viewsOf(records: ReturnType<typeof makeRecord>[]): SummaryViews {
    return {
        employees: summarizeByEmployee(records),
        months: summarizeByMonth(records),
        days: summarizeByDay(records),
        top: topEmployees(records, 20),
    };
}

describe('sanitizeFormulaInjection', () => {
    it('prefixes values that a spreadsheet would evaluate', () => {
        expect(sanitizeFormulaInjection('=SUM(A1)')).toBe("'=SUM(A1)");
        expect(sanitizeFormulaInjection('+1')).toBe("'+1");
        expect(sanitizeFormulaInjection('-1')).toBe("'-1");
        expect(sanitizeFormulaInjection('@cmd')).toBe("'@cmd");
    });

    it('leaves ordinary text alone', () => {
        expect(sanitizeFormulaInjection('Ann')).toBe('Ann');
        expect(sanitizeFormulaInjection(null)).toBe('');
    });
});

describe('buildSummaryWorkbook', () => {
    it('creates the four sheets in order', () => {
        expect(buildSummaryWorkbook(EMPTY_VIEWS).SheetNames).toEqual([
            EXPORT_SHEETS.EMPLOYEES,
            EXPORT_SHEETS.MONTHS,
            EXPORT_SHEETS.DAYS,
            EXPORT_SHEETS.TOP,
        ]);
    });

    it('sets a width for every column', () => {
        const sheet = buildSummaryWorkbook(EMPTY_VIEWS).Sheets[EXPORT_SHEETS.DAYS];
        expect(sheet['!cols']).toHaveLength(EXPORT_COLUMNS.DAYS.length);
    });
});

describe('exportSummaryWorkbook', () => {
    it('writes header-only sheets for empty views', () => {
        const bytes = exportSummaryWorkbook(EMPTY_VIEWS);

        expect(readSheetRows(bytes, EXPORT_SHEETS.EMPLOYEES)).toEqual([[...EXPORT_COLUMNS.EMPLOYEES]]);
        expect(readSheetRows(bytes, EXPORT_SHEETS.MONTHS)).toEqual([[...EXPORT_COLUMNS.MONTHS]]);
        expect(readSheetRows(bytes, EXPORT_SHEETS.DAYS)).toEqual([[...EXPORT_COLUMNS.DAYS]]);
        expect(readSheetRows(bytes, EXPORT_SHEETS.TOP)).toEqual([[...EXPORT_COLUMNS.TOP]]);
    });

    it('writes aggregate rows in column order', () => {
        const records = [
            makeRecord({ employeeName: 'Ann', workDate: '2025-09-30', overtimeHours: 2.5 }),
            makeRecord({ employeeName: 'Ann', workDate: '2025-10-01', overtimeHours: 1.25 }),
        ];

        const bytes = exportSummaryWorkbook(viewsOf(records));
        const employees = readSheetRows(bytes, EXPORT_SHEETS.EMPLOYEES);
        const top = readSheetRows(bytes, EXPORT_SHEETS.TOP);
        const months = readSheetRows(bytes, EXPORT_SHEETS.MONTHS);

        expect(employees[1]).toEqual([
            'E1', 'Ann', 3.75, '03:45:00', '00:03:45:00', 1.875, '01:52:30', '00:01:52:30', 0, '00:00:00', 2,
            '2025-09-30', '2025-10-01',
        ]);
        expect(top[1]).toEqual([1, ...employees[1]]);
        expect(months.slice(1).map((row) => row.slice(0, 3))).toEqual([
            ['2025-09', 'September 2025', 2.5],
            ['2025-10', 'October 2025', 1.25],
        ]);
    });

    it('produces a readable workbook', () => {
        const workbook = XLSX.read(exportSummaryWorkbook(EMPTY_VIEWS), { type: 'buffer' });
        expect(workbook.SheetNames).toHaveLength(4);
    });
});

describe('exportSummaryCsv', () => {
    it('writes only the header for no rows', () => {
        expect(exportSummaryCsv([], 'day')).toBe(EXPORT_COLUMNS.DAYS.join(',') + '\n');
    });

    it('takes the grouping from the rows', () => {
        const csv = exportSummaryCsv(summarizeByMonth([makeRecord({ overtimeHours: -0.5 })]));

        expect(csv.split('\n')).toEqual([
            EXPORT_COLUMNS.MONTHS.join(','),
            '2025-10,October 2025,-0.5,-00:30:00,-00:00:30:00,-0.5,-00:30:00,-00:00:30:00,0,00:00:00,1,1',
            '',
        ]);
    });

    it('neutralizes formulas and escapes names', () => {
        const rows = summarizeByEmployee([
            makeRecord({ employeeId: 'E1', employeeName: '=HYPERLINK("x")', overtimeHours: 3.75 }),
            makeRecord({ employeeId: 'E2', employeeName: 'Smith, Ann', overtimeHours: 1 }),
        ]);

        const lines = exportSummaryCsv(rows).split('\n');

        expect(lines[1]).toBe(
            `E1,"'=HYPERLINK(""x"")",3.75,03:45:00,00:03:45:00,3.75,03:45:00,00:03:45:00,0,00:00:00,1,2025-10-01,2025-10-01`
        );
        expect(lines[2].startsWith('E2,"Smith, Ann",1,')).toBe(true);
    });
});
