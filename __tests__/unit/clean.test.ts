import { describe, it, expect } from '@jest/globals';
import { cleanRecords } from '../../js/clean.js';
import { EmptyResultError } from '../../js/errors.js';
import { makeRow } from '../helpers/records.js';

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected the call to throw');
}

describe('cleanRecords', () => {
    describe('rejection', () => {
        it('counts rejected rows by reason', () => {
            const rows = [
                makeRow({ employeeId: null, rowNumber: 2 }),
                makeRow({ employeeId: '   ', rowNumber: 3 }),
                makeRow({ workDate: null, rowNumber: 4 }),
                makeRow({
                    workDate: null,
                    rowNumber: 5,
                    malformed: [{ field: 'workDate', column: 'DATE', reason: 'Unrecognised date: "x"' }],
                }),
                makeRow({
                    workDate: '2025-10-02',
                    rowNumber: 6,
                    malformed: [{ field: 'hoursWorked', column: 'HOURS WORKED', reason: 'Unrecognised duration value: "x"' }],
                }),
                makeRow({ workDate: '2025-10-03', rowNumber: 7, overtimeHours: 1 }),
            ];

            const result = cleanRecords(rows);

            expect(result.records).toHaveLength(1);
            expect(result.records[0].rowNumber).toBe(7);
            expect(result.rejected).toBe(5);
            expect(result.rejections).toEqual({ missingEmployeeId: 2, invalidDate: 2, malformedValue: 1 });
        });

        it('throws EmptyResultError when nothing survives', () => {
            const error = captureError(() => cleanRecords([makeRow({ employeeId: null }), makeRow({ workDate: null })]));

            expect(error).toBeInstanceOf(EmptyResultError);
            expect(error).toMatchObject({
                rejected: 2,
                rejections: { missingEmployeeId: 1, invalidDate: 1, malformedValue: 0 },
                message: 'No valid overtime records found (2 row(s) rejected)',
            });
        });

        it('reports a workbook without data rows', () => {
            expect(() => cleanRecords([])).toThrow('The workbook contains no data rows');
        });
    });

    describe('normalization', () => {
        it('trims the employee id and falls back to it for the name', () => {
            const [record] = cleanRecords([makeRow({ employeeId: ' E7 ', employeeName: null })]).records;

            expect(record.employeeId).toBe('E7');
            expect(record.employeeName).toBe('E7');
        });

        it('keeps reported overtime', () => {
            const [record] = cleanRecords([makeRow({ overtimeHours: -0.5, hoursWorked: 9, targetHours: 8 })]).records;

            expect(record.overtimeHours).toBe(-0.5);
            expect(record.overtimeSource).toBe('reported');
        });

        it('derives missing overtime from hours worked and target', () => {
            const { records } = cleanRecords([
                makeRow({ employeeId: 'E1', hoursWorked: 9.5, targetHours: 8 }),
                makeRow({ employeeId: 'E2', hoursWorked: 7 }),
                makeRow({ employeeId: 'E3' }),
            ]);

            expect(records.map((r) => [r.employeeId, r.overtimeHours, r.overtimeSource])).toEqual([
                ['E1', 1.5, 'derived'],
                ['E2', 7, 'derived'],
                ['E3', null, 'missing'],
            ]);
        });
    });

    describe('deduplication', () => {
        const rows = [
            makeRow({ employeeId: 'E1', overtimeHours: 1, sourceSheet: 'September', rowNumber: 5 }),
            makeRow({ employeeId: 'E2', overtimeHours: 2, sourceSheet: 'September', rowNumber: 6 }),
            makeRow({ employeeId: 'E1', overtimeHours: 3, sourceSheet: 'October', rowNumber: 2 }),
        ];

        it('keeps the last occurrence by default, across sheets', () => {
            const result = cleanRecords(rows);

            expect(result.duplicates).toBe(1);
            expect(result.records.map((r) => [r.employeeId, r.overtimeHours, r.sourceSheet])).toEqual([
                ['E2', 2, 'September'],
                ['E1', 3, 'October'],
            ]);
        });

        it('keeps the first occurrence when configured', () => {
            const result = cleanRecords(rows, { dedupePolicy: 'first' });

            expect(result.duplicates).toBe(1);
            expect(result.records.map((r) => [r.employeeId, r.overtimeHours])).toEqual([
                ['E1', 1],
                ['E2', 2],
            ]);
        });

        it('leaves at most one record per employee and date', () => {
            const many = Array.from({ length: 12 }, (_, i) =>
                makeRow({ employeeId: `E${i % 3}`, workDate: `2025-10-0${(i % 2) + 1}`, rowNumber: i + 2 })
            );
            const { records, duplicates } = cleanRecords(many);
            const keys = new Set(records.map((r) => `${r.employeeId}|${r.workDate}`));

            expect(records).toHaveLength(6);
            expect(keys.size).toBe(6);
            expect(duplicates).toBe(6);
        });
    });

    describe('anomalies', () => {
        it('flags implausible values without changing them', () => {
            const result = cleanRecords([
                makeRow({ employeeId: 'E1', hoursWorked: 25 }),
                makeRow({ employeeId: 'E2', hoursWorked: -1 }),
                makeRow({ employeeId: 'E3', hoursWorked: 1, breakDuration: 2 }),
                makeRow({ employeeId: 'E4', hoursWorked: 8, breakDuration: 1 }),
            ]);

            expect(result.records.map((r) => r.anomalies)).toEqual([
                ['hours-exceed-day'],
                ['negative-hours-worked'],
                ['break-exceeds-hours-worked'],
                [],
            ]);
            expect(result.records[0].hoursWorked).toBe(25);
            expect(result.anomalies).toEqual({
                'hours-exceed-day': 1,
                'negative-hours-worked': 1,
                'break-exceeds-hours-worked': 1,
            });
        });

        it('uses the configured threshold', () => {
            const [record] = cleanRecords([makeRow({ hoursWorked: 13 })], { anomalyHoursThreshold: 12 }).records;
            expect(record.anomalies).toEqual(['hours-exceed-day']);
        });
    });

    it('produces the same result for the same input', () => {
        const rows = [
            makeRow({ employeeId: 'E1', hoursWorked: 9.25, targetHours: 8 }),
            makeRow({ employeeId: 'E1', overtimeHours: 2 }),
            makeRow({ employeeId: null }),
        ];
        expect(cleanRecords(rows)).toEqual(cleanRecords(rows));
    });
});
