/**
 * @fileoverview Mock error reporting module for testing
 * Records calls instead of loading the Sentry SDK.
 */

import { jest } from '@jest/globals';
import type { ErrorContext, SentryConfig } from '../error-reporting.js';

export const initErrorReporting = jest.fn(async (_config: SentryConfig | null): Promise<boolean> => false);
export const reportError = jest.fn((_error: unknown, _context?: ErrorContext): void => undefined);
export const reportMessage = jest.fn((_message: string): void => undefined);
export const setSessionContext = jest.fn((_sessionId: string | null): void => undefined);
export const addBreadcrumb = jest.fn(
    (_category: string, _message: string, _data?: Record<string, unknown>): void => undefined
);
export const isErrorReportingEnabled = jest.fn((): boolean => false);
export const flushErrorReports = jest.fn(async (_timeout?: number): Promise<boolean> => true);

export const scrubSensitiveData = (text: string): string => text;
export const scrubRecord = (record: Record<string, unknown>): Record<string, unknown> => record;
export const hashString = (str: string): string => str;
