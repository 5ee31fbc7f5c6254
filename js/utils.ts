/**
 * @fileoverview Utility Functions
 * Generic helper functions for rounding, exact hour accumulation, date keys,
 * header matching and CSV escaping. These functions are pure and stateless
 * where possible.
 */

import { CONSTANTS, MONTH_NAMES, MONTH_TOKENS } from './constants.js';

// ==================== NUMERIC HELPERS ====================

/**
 * Rounds a number to a specific number of decimal places.
 * Crucial for avoiding floating point drift in hour calculations.
 *
 * @param num - The number to round.
 * @param decimals - Number of decimal places.
 * @returns The rounded number.
 */
export function round(num: number, decimals = 4): number {
    if (!Number.isFinite(num)) return 0;
    const factor = Math.pow(10, decimals);
    return Math.round((num + Number.EPSILON) * factor) / factor;
}

/**
 * Rounds decimal hours to the nearest whole second.
 */
export function roundToSecond(hours: number): number {
    return Math.round(hours * CONSTANTS.SECONDS_PER_HOUR) / CONSTANTS.SECONDS_PER_HOUR;
}

/**
 * Fixed-decimal accumulator for hour values.
 *
 * Every normalized hour value is a whole number of seconds, so sums are kept
 * as integer seconds. Integer addition is exact and order-independent, which
 * makes group totals add up to the overall total and keeps repeated
 * aggregation of the same records bit-for-bit identical.
 */
export class HoursAccumulator {
    private seconds = 0;

    /**
     * Adds a value; `null` counts as zero.
     */
    add(hours: number | null): void {
        if (hours === null || !Number.isFinite(hours)) return;
        this.seconds += Math.round(hours * CONSTANTS.SECONDS_PER_HOUR);
    }

    /** Sum in decimal hours */
    get hours(): number {
        return this.seconds / CONSTANTS.SECONDS_PER_HOUR;
    }

    /**
     * Mean over `divisor` values, zero when there are none.
     */
    mean(divisor: number): number {
        if (divisor <= 0) return 0;
        return this.seconds / divisor / CONSTANTS.SECONDS_PER_HOUR;
    }
}

// ==================== IDENTIFIERS & HEADERS ====================

/**
 * Orders employee identifiers. All-digit identifiers come first and compare
 * numerically ("9" before "10", "007" before "7"); anything else follows
 * in code unit order.
 */
export function compareEmployeeIds(a: string, b: string): number {
    const digits = /^\d+$/;
    const aNumeric = digits.test(a);
    const bNumeric = digits.test(b);
    if (aNumeric !== bNumeric) return aNumeric ? -1 : 1;
    if (aNumeric) {
        const left = a.replace(/^0+(?=\d)/, '');
        const right = b.replace(/^0+(?=\d)/, '');
        if (left.length !== right.length) return left.length - right.length;
        if (left !== right) return left < right ? -1 : 1;
    }
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

/**
 * Code unit order, as used for date and month keys.
 */
export function compareText(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

/**
 * Canonical form of a header label for alias matching:
 * case, whitespace and underscores are ignored.
 */
export function normalizeHeader(label: string): string {
    return label.toLowerCase().replace(/[\s_]+/g, '');
}

/**
 * Finds a month name inside a sheet label such as "OCTOBER OVERTIME", "Sept-25"
 * or "SeptOT". A month spelling must start a word, so "Summary" is not March.
 *
 * @returns The 1-based month number, or null.
 */
export function detectMonthNumber(label: string): number | null {
    const lower = label.toLowerCase();
    for (const [token, month] of MONTH_TOKENS) {
        const pattern = new RegExp(`(?:^|[^a-z])${token}`);
        if (pattern.test(lower)) return month;
    }
    return null;
}

/**
 * Normalized month name ("October") for a sheet label, or null.
 */
export function detectMonthName(label: string): string | null {
    const month = detectMonthNumber(label);
    return month === null ? null : MONTH_NAMES[month - 1];
}

// ==================== CSV ====================

/**
 * Escapes a value for inclusion in a CSV file.
 * Handles quotes, commas, and newlines by wrapping in double quotes.
 * Escapes existing double quotes by doubling them.
 *
 * @param str - The value to escape.
 * @returns The CSV-safe string.
 */
export function escapeCsv(str: unknown): string {
    if (str === null || str === undefined) return '';
    const stringValue = String(str);
    if (/[",\n\r]/.test(stringValue)) {
        return '"' + stringValue.replace(/"/g, '""') + '"';
    }
    return stringValue;
}

// ==================== DATES ====================

export const IsoUtils = {
    /**
     * Converts a Date object to an ISO date string (YYYY-MM-DD).
     * Uses UTC methods to prevent local timezone shifts from changing the date.
     *
     * @param date - The date object.
     * @returns YYYY-MM-DD string.
     */
    toISODate(date: Date | null | undefined): string {
        if (!date) return '';
        const y = String(date.getUTCFullYear()).padStart(4, '0');
        const m = String(date.getUTCMonth() + 1).padStart(2, '0');
        const d = String(date.getUTCDate()).padStart(2, '0');
        return `${y}-${m}-${d}`;
    },

    /**
     * Builds a date key from calendar parts, or null when the parts do not
     * name a real day (e.g. February 30th).
     */
    fromParts(year: number, month: number, day: number): string | null {
        if (![year, month, day].every(Number.isInteger)) return null;
        if (month < 1 || month > 12 || day < 1 || day > 31) return null;
        const date = new Date(Date.UTC(year, month - 1, day));
        date.setUTCFullYear(year);
        if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
        return this.toISODate(date);
    },

    /**
     * Month key (YYYY-MM) of a date key.
     */
    toMonthKey(dateKey: string): string {
        return dateKey.slice(0, 7);
    },

    /**
     * Human-readable month of a month key, e.g. "2025-10" → "October 2025".
     */
    formatMonthKey(monthKey: string): string {
        const match = monthKey.match(/^(\d{4})-(\d{2})$/);
        if (!match) return monthKey;
        const [, year, month] = match;
        return `${MONTH_NAMES[parseInt(month, 10) - 1]} ${year}`;
    },
};
