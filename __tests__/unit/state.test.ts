import { beforeEach, describe, it, expect, jest } from '@jest/globals';
import { ERROR_TYPES, EXPORT_COLUMNS, EXPORT_SHEETS } from '../../js/constants.js';
import { addBreadcrumb, setSessionContext } from '../../js/error-reporting.js';
import { NotFoundError } from '../../js/errors.js';
import { OvertimeSession } from '../../js/state.js';
import { buildWorkbookBytes, HEADER, readSheetRows, type SheetValue } from '../helpers/workbook.js';

jest.mock('../../js/error-reporting');

const SEPTEMBER: SheetValue[][] = [HEADER, ['1001', 'Ann', '2025-09-30', '08:00', '18:30', '10:30', '02:30']];
const OCTOBER: SheetValue[][] = [HEADER, ['1001', 'Ann', '2025-10-01', '08:00', '17:15', '09:15', '01:15']];

function twoMonthWorkbook(): Buffer {
    return buildWorkbookBytes({ September: SEPTEMBER, October: OCTOBER });
}

describe('OvertimeSession', () => {
    let session: OvertimeSession;

    beforeEach(() => {
        jest.clearAllMocks();
        session = new OvertimeSession({}, {});
    });

    describe('ingest', () => {
        it('aggregates one employee across two month sheets', () => {
            const response = session.ingest(twoMonthWorkbook(), { fileName: 'overtime.xlsx' });

            expect(response).toMatchObject({
                success: true,
                accepted: 2,
                rejected: 0,
                duplicates: 0,
                skippedSheets: [],
            });
            expect(response.sheets.map((s) => [s.sheet, s.sourceMonth, s.rows])).toEqual([
                ['September', 'September', 1],
                ['October', 'October', 1],
            ]);

            const [employee] = session.getSummary('employee');
            expect(employee).toMatchObject({
                employeeId: '1001',
                employeeName: 'Ann',
                totalOvertimeHours: 3.75,
                avgOvertimeHours: 1.875,
                daysWorked: 2,
                totalOvertimeHhmmss: '03:45:00',
                avgOvertimeHhmmss: '01:52:30',
            });
            expect(session.current?.sourceName).toBe('overtime.xlsx');
        });

        it('rejects rows with bad dates and keeps the rest', () => {
            const rows: SheetValue[][] = [HEADER];
            for (let i = 0; i < 100; i++) {
                rows.push([String(1000 + i), `Employee ${i}`, i % 10 === 0 ? 'not a date' : '2025-10-01', null, null, '08:00', '01:00']);
            }

            const response = session.ingest(buildWorkbookBytes({ October: rows }));

            expect(response.success).toBe(true);
            expect(response.accepted).toBe(90);
            expect(response.rejected).toBe(10);
            expect(response.rejections).toEqual({ missingEmployeeId: 0, invalidDate: 10, malformedValue: 0 });
            expect(session.getStats().recordCount).toBe(90);
        });

        it('keeps the previous record set when an upload fails', () => {
            session.ingest(twoMonthWorkbook());
            const previous = session.current;

            const response = session.ingest(buildWorkbookBytes({ Notes: [['Comment'], ['checked']] }));

            expect(response.success).toBe(false);
            expect(response.error?.type).toBe(ERROR_TYPES.EMPTY_RESULT);
            expect(response.error?.message).toBe(
                'No sheet could be ingested (Notes: Sheet "Notes" is missing required column(s): PIN CODE, DATE)'
            );
            expect(response.skippedSheets).toHaveLength(1);
            expect(session.current).toBe(previous);
            expect(session.getStats().recordCount).toBe(2);
        });

        it('reports rejection counts when every row is rejected', () => {
            const response = session.ingest(
                buildWorkbookBytes({ October: [HEADER, [null, 'Ann', '2025-10-01'], ['1002', 'Bob', 'someday']] })
            );

            expect(response.success).toBe(false);
            expect(response.error?.type).toBe(ERROR_TYPES.EMPTY_RESULT);
            expect(response.rejected).toBe(2);
            expect(response.rejections).toEqual({ missingEmployeeId: 1, invalidDate: 1, malformedValue: 0 });
            expect(session.hasData()).toBe(false);
        });

        it('refuses unsupported file types', () => {
            const response = session.ingest(twoMonthWorkbook(), { fileName: 'report.pdf' });

            expect(response.success).toBe(false);
            expect(response.error?.type).toBe(ERROR_TYPES.VALIDATION);
            expect(response.error?.message).toBe('Unsupported file type ".pdf"; expected .xlsx or .xls');
        });

        it('refuses empty and oversized uploads', () => {
            expect(session.ingest(new Uint8Array(0)).error?.message).toBe('The upload is empty');

            const small = new OvertimeSession({ maxUploadBytes: 10 }, {});
            const response = small.ingest(twoMonthWorkbook());
            expect(response.error?.type).toBe(ERROR_TYPES.VALIDATION);
            expect(small.hasData()).toBe(false);
        });

        it('collapses duplicates across sheets with the configured policy', () => {
            const bytes = buildWorkbookBytes({
                September: [HEADER, ['1001', 'Ann', '2025-10-01', null, null, null, '01:00']],
                October: [HEADER, ['1001', 'Ann', '2025-10-01', null, null, null, '02:00']],
            });

            const last = session.ingest(bytes);
            expect(last.accepted).toBe(1);
            expect(last.duplicates).toBe(1);
            expect(session.getStats().totalOvertimeHours).toBe(2);

            const first = new OvertimeSession({ dedupePolicy: 'first' }, {});
            first.ingest(bytes);
            expect(first.getStats().totalOvertimeHours).toBe(1);
        });

        it('reads negative overtime shown as a wrapped clock time', () => {
            session.ingest(buildWorkbookBytes({ October: [HEADER, ['1001', 'Ann', '2025-10-01', null, null, null, '22:57:17']] }));

            expect(session.getSummary('employee')[0].totalOvertimeHhmmss).toBe('-01:02:43');
        });

        it('freezes the records of the record set', () => {
            session.ingest(twoMonthWorkbook());

            expect(Object.isFrozen(session.current)).toBe(true);
            expect(Object.isFrozen(session.records)).toBe(true);
            expect(Object.isFrozen(session.records[0])).toBe(true);
        });

        it('tags error reports with the new record set', () => {
            session.ingest(twoMonthWorkbook());

            expect(setSessionContext).toHaveBeenCalledWith(session.current?.id);
            expect(addBreadcrumb).toHaveBeenCalledWith('ingest', 'Workbook ingested', {
                accepted: 2,
                rejected: 0,
                sheets: 2,
            });
        });
    });

    describe('queries', () => {
        it('answers with empty results before any upload', () => {
            expect(session.hasData()).toBe(false);
            expect(session.getStats().recordCount).toBe(0);
            expect(session.getSummary('month')).toEqual([]);
            expect(session.getTop()).toEqual([]);
            expect(session.getEmployeeIds()).toEqual([]);
            expect(session.findEmployeeRecords({ name: 'ann' })).toEqual([]);
            expect(() => session.getEmployeeDetail('1001')).toThrow(NotFoundError);
        });

        it('exports header-only sheets before any upload', () => {
            const bytes = session.exportSummary();

            expect(readSheetRows(bytes, EXPORT_SHEETS.EMPLOYEES)).toEqual([[...EXPORT_COLUMNS.EMPLOYEES]]);
            expect(readSheetRows(bytes, EXPORT_SHEETS.TOP)).toEqual([[...EXPORT_COLUMNS.TOP]]);
            expect(session.exportSummaryCsv('day')).toBe(EXPORT_COLUMNS.DAYS.join(',') + '\n');
        });

        it('returns one employee\'s records in date order', () => {
            session.ingest(
                buildWorkbookBytes({
                    October: [
                        HEADER,
                        ['1001', 'Ann', '2025-10-03', null, null, null, '01:00'],
                        ['1002', 'Bob', '2025-10-01', null, null, null, '01:00'],
                        ['1001', 'Ann', '2025-10-01', null, null, null, '02:00'],
                        ['1001', 'Ann', '2025-10-02', null, null, null, '03:00'],
                    ],
                })
            );

            const detail = session.getEmployeeDetail(' 1001 ');

            expect(detail.map((r) => [r.workDate, r.overtimeHours])).toEqual([
                ['2025-10-01', 2],
                ['2025-10-02', 3],
                ['2025-10-03', 1],
            ]);
            expect(() => session.getEmployeeDetail('9999')).toThrow('No records for employee "9999"');
            expect(session.getEmployeeIds()).toEqual(['1001', '1002']);
        });

        it('finds records by a case-insensitive part of the name', () => {
            session.ingest(
                buildWorkbookBytes({
                    October: [
                        HEADER,
                        ['1003', 'Joanna Lee', '2025-10-02', null, null, null, '01:00'],
                        ['1001', 'Ann', '2025-10-02', null, null, null, '02:00'],
                        ['1002', 'Bob', '2025-10-01', null, null, null, '03:00'],
                        ['1001', 'Ann', '2025-10-01', null, null, null, '04:00'],
                    ],
                })
            );

            expect(
                session.findEmployeeRecords({ name: 'ANN' }).map((r) => [r.employeeId, r.workDate])
            ).toEqual([
                ['1001', '2025-10-01'],
                ['1001', '2025-10-02'],
                ['1003', '2025-10-02'],
            ]);
            expect(
                session.findEmployeeRecords({ id: '1003', name: 'ann' }).map((r) => r.overtimeHours)
            ).toEqual([1]);
            expect(session.findEmployeeRecords({ id: '1002', name: 'ann' })).toEqual([]);
            expect(session.findEmployeeRecords({})).toHaveLength(4);
        });

        it('ranks with the configured default size', () => {
            const top = new OvertimeSession({ defaultTopN: 1 }, {});
            top.ingest(
                buildWorkbookBytes({
                    October: [
                        HEADER,
                        ['1001', 'Ann', '2025-10-01', null, null, null, '01:00'],
                        ['1002', 'Bob', '2025-10-01', null, null, null, '03:00'],
                    ],
                })
            );

            expect(top.getTop().map((r) => r.employeeId)).toEqual(['1002']);
            expect(top.getTop(5).map((r) => r.employeeId)).toEqual(['1002', '1001']);
        });

        it('exports the current record set', () => {
            session.ingest(twoMonthWorkbook());

            const rows = readSheetRows(session.exportSummary(), EXPORT_SHEETS.MONTHS);
            expect(rows.slice(1).map((row) => [row[0], row[2]])).toEqual([
                ['2025-09', 2.5],
                ['2025-10', 1.25],
            ]);
            expect(session.exportSummaryCsv('employee').split('\n')[1]).toBe(
                '1001,Ann,3.75,03:45:00,00:03:45:00,1.875,01:52:30,00:01:52:30,19.75,19:45:00,2,2025-09-30,2025-10-01'
            );
        });
    });

    describe('subscriptions', () => {
        it('notifies listeners of new data and clearing', () => {
            const listener = jest.fn();
            const unsubscribe = session.subscribe(listener);

            session.ingest(twoMonthWorkbook());
            expect(listener).toHaveBeenLastCalledWith(session, { type: 'ingested', recordSetId: session.current?.id });

            session.clear();
            expect(listener).toHaveBeenLastCalledWith(session, { type: 'cleared' });
            expect(session.hasData()).toBe(false);
            expect(setSessionContext).toHaveBeenLastCalledWith(null);

            unsubscribe();
            session.ingest(twoMonthWorkbook());
            expect(listener).toHaveBeenCalledTimes(2);
        });

        it('does not notify when clearing an empty session', () => {
            const listener = jest.fn();
            session.subscribe(listener);
            session.clear();
            expect(listener).not.toHaveBeenCalled();
        });
    });
});
