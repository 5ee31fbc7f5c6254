import { describe, it, expect } from '@jest/globals';
import { ERROR_MESSAGES, ERROR_TYPES } from '../../js/constants.js';
import {
    classifyError,
    EmptyResultError,
    InvalidConfigurationError,
    MalformedValueError,
    NotFoundError,
    OvertimeError,
    SchemaError,
    toFriendlyError,
    UploadValidationError,
} from '../../js/errors.js';

describe('error classes', () => {
    it('carry their type and details', () => {
        const schema = new SchemaError('Notes', ['PIN CODE', 'DATE']);
        expect(schema).toBeInstanceOf(OvertimeError);
        expect(schema.type).toBe(ERROR_TYPES.SCHEMA);
        expect(schema.missingColumns).toEqual(['PIN CODE', 'DATE']);
        expect(schema.name).toBe('SchemaError');

        const malformed = new MalformedValueError('25:99', 'Unrecognised time-of-day value');
        expect(malformed.message).toBe('Unrecognised time-of-day value: "25:99"');
        expect(malformed.value).toBe('25:99');

        const empty = new EmptyResultError(3, { missingEmployeeId: 3, invalidDate: 0, malformedValue: 0 });
        expect(empty.message).toBe('No valid overtime records found (3 row(s) rejected)');

        const config = new InvalidConfigurationError('hoursPerDay', 'must be a positive number, got 0');
        expect(config.message).toBe('hoursPerDay: must be a positive number, got 0');
        expect(config.setting).toBe('hoursPerDay');
    });
});

describe('classifyError', () => {
    it('maps engine errors to their type and anything else to UNKNOWN', () => {
        expect(classifyError(new NotFoundError('x'))).toBe(ERROR_TYPES.NOT_FOUND);
        expect(classifyError(new UploadValidationError('x'))).toBe(ERROR_TYPES.VALIDATION);
        expect(classifyError(new TypeError('x'))).toBe(ERROR_TYPES.UNKNOWN);
        expect(classifyError('boom')).toBe(ERROR_TYPES.UNKNOWN);
    });
});

describe('toFriendlyError', () => {
    it('keeps the message of engine errors', () => {
        const friendly = toFriendlyError(new UploadValidationError('The upload is empty'));

        expect(friendly.type).toBe(ERROR_TYPES.VALIDATION);
        expect(friendly.title).toBe(ERROR_MESSAGES[ERROR_TYPES.VALIDATION].title);
        expect(friendly.message).toBe('The upload is empty');
        expect(friendly.action).toBe('fix-input');
    });

    it('hides the message of unexpected errors', () => {
        const friendly = toFriendlyError(new Error('ENOMEM at 0x1f'));

        expect(friendly.type).toBe(ERROR_TYPES.UNKNOWN);
        expect(friendly.message).toBe(ERROR_MESSAGES[ERROR_TYPES.UNKNOWN].message);
        expect(friendly.action).toBe('retry');
    });

    it('accepts an explicit type', () => {
        expect(toFriendlyError('bad', ERROR_TYPES.SCHEMA).title).toBe('Unrecognised Sheet Layout');
    });
});
