/**
 * @fileoverview Engine Errors
 * Typed error classes for every failure the engine reports, and the mapping
 * from any thrown value to a structured, user-facing error.
 *
 * Propagation:
 * - MalformedValueError: one cell; the containing row is dropped and counted
 * - SchemaError: one sheet; the sheet is skipped and counted
 * - EmptyResultError: one upload; the previous RecordSet stays current
 * - InvalidConfigurationError: the call that received the bad value
 */

import { ERROR_MESSAGES, ERROR_TYPES, type ErrorType } from './constants.js';
import type { FriendlyError, RejectionCounts } from './types.js';

/**
 * Base class of all errors raised by the engine.
 */
export class OvertimeError extends Error {
    readonly type: ErrorType;

    constructor(type: ErrorType, message: string) {
        super(message);
        this.name = 'OvertimeError';
        this.type = type;
    }
}

/**
 * A worksheet lacks a required column.
 */
export class SchemaError extends OvertimeError {
    readonly sheet: string;
    readonly missingColumns: string[];

    constructor(sheet: string, missingColumns: string[]) {
        super(ERROR_TYPES.SCHEMA, `Sheet "${sheet}" is missing required column(s): ${missingColumns.join(', ')}`);
        this.name = 'SchemaError';
        this.sheet = sheet;
        this.missingColumns = missingColumns;
    }
}

/**
 * A single cell could not be interpreted.
 */
export class MalformedValueError extends OvertimeError {
    readonly value: string;

    constructor(value: unknown, reason: string) {
        super(ERROR_TYPES.MALFORMED_VALUE, `${reason}: ${JSON.stringify(value)}`);
        this.name = 'MalformedValueError';
        this.value = String(value);
    }
}

/**
 * Cleaning left no valid record.
 */
export class EmptyResultError extends OvertimeError {
    readonly rejected: number;
    readonly rejections: RejectionCounts;

    constructor(rejected: number, rejections: RejectionCounts, detail?: string) {
        super(
            ERROR_TYPES.EMPTY_RESULT,
            detail ?? `No valid overtime records found (${rejected} row(s) rejected)`
        );
        this.name = 'EmptyResultError';
        this.rejected = rejected;
        this.rejections = rejections;
    }
}

/**
 * A configuration or formatter parameter is out of range.
 */
export class InvalidConfigurationError extends OvertimeError {
    readonly setting: string;

    constructor(setting: string, message: string) {
        super(ERROR_TYPES.INVALID_CONFIGURATION, `${setting}: ${message}`);
        this.name = 'InvalidConfigurationError';
        this.setting = setting;
    }
}

/**
 * The requested employee has no records.
 */
export class NotFoundError extends OvertimeError {
    constructor(message: string) {
        super(ERROR_TYPES.NOT_FOUND, message);
        this.name = 'NotFoundError';
    }
}

/**
 * An upload was refused before parsing.
 */
export class UploadValidationError extends OvertimeError {
    constructor(message: string) {
        super(ERROR_TYPES.VALIDATION, message);
        this.name = 'UploadValidationError';
    }
}

// ==================== ERROR CLASSIFICATION ====================

/**
 * Classifies a thrown value into one of the ERROR_TYPES constants.
 *
 * @param error - Anything caught in a `catch` clause.
 * @returns The error type; UNKNOWN for anything the engine did not raise.
 */
export function classifyError(error: unknown): ErrorType {
    if (error instanceof OvertimeError) return error.type;
    return ERROR_TYPES.UNKNOWN;
}

/**
 * Creates a structured, user-facing error from any thrown value.
 * Engine errors keep their own message; other errors get the generic one.
 *
 * @param error - The raw error or error message.
 * @param type - Optional explicit error type override.
 */
export function toFriendlyError(error: unknown, type?: ErrorType): FriendlyError {
    const errorType = type ?? classifyError(error);
    const config = ERROR_MESSAGES[errorType];
    const err = error instanceof Error ? error : new Error(String(error));

    return {
        type: errorType,
        title: config.title,
        message: error instanceof OvertimeError ? err.message : config.message,
        action: config.action,
        timestamp: new Date().toISOString(),
        stack: err.stack,
    };
}
