/**
 * @fileoverview Time Normalizer
 * Converts heterogeneous spreadsheet cells into decimal hours or calendar dates.
 *
 * ## Encodings
 * Time-of-day and duration cells arrive in one of three encodings, resolved
 * explicitly into a {@link TimeEncoding} before any arithmetic happens:
 * - **text-clock**: `HH:MM[:SS]` text, optionally `-` signed (durations) or
 *   suffixed with AM/PM (times of day)
 * - **serial-fraction**: a number carrying a date/time number format, where
 *   1.0 = 24 hours (the spreadsheet serial convention)
 * - **decimal-hours**: a plain number, or numeric text, already in hours
 *
 * All three normalize to the same scale with the same rounding: the nearest
 * whole second (1/3600 hour).
 *
 * ## Absence
 * Blank cells and placeholder text (`off`, `n/a`, `-`, ...) normalize to `null`,
 * never to zero. Anything else that cannot be read throws MalformedValueError.
 *
 * ## Dates
 * Dates normalize to a `YYYY-MM-DD` key whether the source used serial numbers
 * or text. A value that is not a real calendar day inside the accepted year
 * range fails; there is no fallback to "today" or to the epoch.
 */

import { ABSENT_TOKENS, CONSTANTS, MONTH_TOKENS } from './constants.js';
import { MalformedValueError } from './errors.js';
import type { RawCell, TimeEncoding } from './types.js';
import { IsoUtils, roundToSecond } from './utils.js';

/**
 * Year bounds applied to normalized dates.
 */
export interface DateRangeLimits {
    minYear: number;
    maxYear: number;
}

/**
 * Date normalization settings.
 */
export interface DateOptions extends DateRangeLimits {
    /** Serial numbers count days from 1904-01-01 (the workbook's 1904 date system) */
    date1904?: boolean;
}

/**
 * Options for duration normalization.
 */
export interface DurationOptions {
    /** Column shows negative values wrapped around a 24h clock */
    wrapsNegative?: boolean;
    /** Wrapped values above this many hours are negative */
    wrapThresholdHours?: number;
}

const DEFAULT_LIMITS: DateRangeLimits = {
    minYear: CONSTANTS.DEFAULT_MIN_YEAR,
    maxYear: CONSTANTS.DEFAULT_MAX_YEAR,
};

const CLOCK_PATTERN = /^(-)?\s*(\d+):(\d{2})(?::(\d{2})(?:\.\d+)?)?\s*([ap]\.?m\.?)?$/i;
const DATETIME_CLOCK_PATTERN = /^\d{4}-\d{2}-\d{2}[ T](\d{1,2}:\d{2}(?::\d{2})?)(?:\.\d+)?$/;
const DECIMAL_PATTERN = /^-?\d+(?:\.\d+)?$/;
const ISO_DURATION_PATTERN = /^(-)?PT(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?$/i;

/**
 * True when the text stands for "no value".
 */
export function isAbsentText(text: string): boolean {
    return ABSENT_TOKENS.has(text.trim().toLowerCase());
}

// ==================== ENCODING RESOLUTION ====================

/**
 * Parses clock text into a text-clock encoding.
 * Returns null when the text is not clock-shaped at all.
 */
function parseClockText(text: string, kind: 'time-of-day' | 'duration'): TimeEncoding | null {
    const datetime = text.match(DATETIME_CLOCK_PATTERN);
    const clockText = datetime ? datetime[1] : text;
    const match = clockText.match(CLOCK_PATTERN);
    if (!match) return null;

    const [, sign, h, m, s, meridiem] = match;
    let hours = parseInt(h, 10);
    const minutes = parseInt(m, 10);
    const seconds = s ? parseInt(s, 10) : 0;

    if (minutes > 59 || seconds > 59) {
        throw new MalformedValueError(text, 'Minutes and seconds must be below 60');
    }

    if (kind === 'time-of-day') {
        if (sign) throw new MalformedValueError(text, 'A time of day cannot be negative');
        if (meridiem) {
            if (hours < 1 || hours > 12) {
                throw new MalformedValueError(text, 'A 12-hour clock time needs an hour from 1 to 12');
            }
            const pm = meridiem.toLowerCase().startsWith('p');
            hours = (hours % 12) + (pm ? 12 : 0);
        }
        if (hours > 23) throw new MalformedValueError(text, 'A time of day must be before 24:00');
    } else if (meridiem) {
        throw new MalformedValueError(text, 'A duration cannot carry AM/PM');
    }

    return { kind: 'text-clock', negative: Boolean(sign), hours, minutes, seconds };
}

/**
 * Parses an ISO 8601 duration ("PT8H30M", "PT7.5H") into decimal hours.
 */
function parseIsoDurationText(text: string): number | null {
    const match = text.match(ISO_DURATION_PATTERN);
    if (!match || (!match[2] && !match[3] && !match[4])) return null;
    const hours = parseFloat(match[2] || '0');
    const minutes = parseFloat(match[3] || '0');
    const seconds = parseFloat(match[4] || '0');
    const total = hours + minutes / 60 + seconds / 3600;
    return match[1] ? -total : total;
}

/**
 * Resolves a cell into its time encoding.
 *
 * @param cell - The raw cell.
 * @param kind - Declared semantic type of the column.
 * @returns The encoding, or null for an absent value.
 * @throws MalformedValueError when the cell cannot be read as a time.
 */
export function classifyTimeCell(cell: RawCell, kind: 'time-of-day' | 'duration'): TimeEncoding | null {
    switch (cell.type) {
        case 'empty':
            return null;

        case 'number': {
            if (!Number.isFinite(cell.value)) {
                throw new MalformedValueError(cell.value, 'Not a finite number');
            }
            return cell.dateFormatted
                ? { kind: 'serial-fraction', serial: cell.value }
                : { kind: 'decimal-hours', hours: cell.value };
        }

        case 'text': {
            const text = cell.text.trim();
            if (isAbsentText(text)) return null;

            const clock = parseClockText(text, kind);
            if (clock) return clock;

            if (DECIMAL_PATTERN.test(text)) {
                return { kind: 'decimal-hours', hours: parseFloat(text) };
            }

            if (kind === 'duration') {
                const iso = parseIsoDurationText(text);
                if (iso !== null) return { kind: 'decimal-hours', hours: iso };
            }

            throw new MalformedValueError(cell.text, `Unrecognised ${kind} value`);
        }
    }
}

/**
 * Converts an encoding to decimal hours rounded to the nearest second.
 *
 * A time of day keeps only the time portion of a serial (a date-stamped time
 * such as 45931.5 is noon) and must land in [0, 24).
 */
export function encodingToHours(encoding: TimeEncoding, kind: 'time-of-day' | 'duration'): number {
    switch (encoding.kind) {
        case 'text-clock': {
            const seconds = encoding.hours * 3600 + encoding.minutes * 60 + encoding.seconds;
            const hours = seconds / CONSTANTS.SECONDS_PER_HOUR;
            return encoding.negative ? -hours : hours;
        }

        case 'serial-fraction': {
            if (kind === 'duration') {
                return roundToSecond(encoding.serial * 24);
            }
            if (encoding.serial < 0) {
                throw new MalformedValueError(encoding.serial, 'A time of day cannot be negative');
            }
            const fraction = encoding.serial - Math.floor(encoding.serial);
            const seconds = Math.round(fraction * CONSTANTS.SECONDS_PER_DAY) % CONSTANTS.SECONDS_PER_DAY;
            return seconds / CONSTANTS.SECONDS_PER_HOUR;
        }

        case 'decimal-hours': {
            if (kind === 'time-of-day' && (encoding.hours < 0 || encoding.hours >= 24)) {
                throw new MalformedValueError(encoding.hours, 'A time of day must be in [0, 24) hours');
            }
            return roundToSecond(encoding.hours);
        }
    }
}

// ==================== PUBLIC NORMALIZERS ====================

/**
 * Normalizes a clock-in/clock-out cell to decimal hours in [0, 24).
 */
export function normalizeTimeOfDay(cell: RawCell): number | null {
    const encoding = classifyTimeCell(cell, 'time-of-day');
    return encoding ? encodingToHours(encoding, 'time-of-day') : null;
}

/**
 * Reverses the 24h wrap spreadsheet exports apply to negative durations.
 *
 * A shortfall of 1h 02m 43s shows up as the clock time 22:57:17, or as a
 * date-stamped time (e.g. 1903-12-31 22:57:17) when the value overflowed
 * into a date. Values of 24h or more keep only their time portion and become
 * negative; values above `threshold` become `hours - 24`.
 *
 * @returns Decimal hours, or null when a date-stamped value sits exactly on midnight.
 */
export function unwrapNegativeDuration(
    hours: number,
    threshold: number = CONSTANTS.DEFAULT_OVERTIME_WRAP_THRESHOLD
): number | null {
    if (hours >= 24) {
        const timeOfDay = roundToSecond(hours % 24);
        return timeOfDay === 0 ? null : roundToSecond(timeOfDay - 24);
    }
    if (hours > threshold) {
        return roundToSecond(hours - 24);
    }
    return hours;
}

/**
 * Normalizes a duration cell (break, hours worked, overtime, target) to
 * decimal hours. Durations are not bounded to a single day.
 */
export function normalizeDuration(cell: RawCell, options: DurationOptions = {}): number | null {
    const encoding = classifyTimeCell(cell, 'duration');
    if (!encoding) return null;

    const hours = encodingToHours(encoding, 'duration');
    const clockShaped =
        encoding.kind === 'serial-fraction' || (encoding.kind === 'text-clock' && !encoding.negative);

    if (options.wrapsNegative && clockShaped) {
        return unwrapNegativeDuration(hours, options.wrapThresholdHours);
    }
    return hours;
}

/**
 * Parses duration text such as "-00:30:00" back into decimal hours.
 * Inverse of `formatHhmmss` within one second.
 */
export function parseDurationText(text: string): number | null {
    return normalizeDuration({ type: 'text', text });
}

// ==================== DATES ====================

/**
 * Converts a spreadsheet serial day number to a date key.
 *
 * In the 1900 date system serial 1 is 1900-01-01, and serials from 61 on
 * account for the fictitious 1900-02-29 the format inherited. In the 1904
 * date system serial 0 is 1904-01-01.
 */
export function serialToDateKey(serial: number, date1904 = false): string | null {
    if (!Number.isFinite(serial)) return null;
    const whole = Math.floor(serial);
    if (date1904) {
        return whole < 0 ? null : IsoUtils.toISODate(new Date(Date.UTC(1904, 0, 1) + whole * 86400000));
    }
    if (whole < 1) return null;
    if (whole === 60) return null;
    const epoch = whole > 60 ? Date.UTC(1899, 11, 30) : Date.UTC(1899, 11, 31);
    return IsoUtils.toISODate(new Date(epoch + whole * 86400000));
}

function monthFromWord(word: string): number | null {
    const lower = word.toLowerCase().replace(/\.$/, '');
    const found = MONTH_TOKENS.find(([token]) => token === lower);
    return found ? found[1] : null;
}

/**
 * Parses date text into calendar parts. Returns null when no known layout matches.
 */
function parseDateText(text: string): { year: number; month: number; day: number } | null {
    let match = text.match(/(\d{4})-(\d{1,2})-(\d{1,2})/);
    if (match) {
        return { year: +match[1], month: +match[2], day: +match[3] };
    }

    match = text.match(/^(\d{4})\/(\d{1,2})\/(\d{1,2})$/);
    if (match) {
        return { year: +match[1], month: +match[2], day: +match[3] };
    }

    // Slashed dates read month first, unless the first part cannot be a month
    match = text.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    if (match) {
        const first = +match[1];
        const second = +match[2];
        return first > 12
            ? { year: +match[3], month: second, day: first }
            : { year: +match[3], month: first, day: second };
    }

    match = text.match(/^(\d{1,2})\.(\d{1,2})\.(\d{4})$/);
    if (match) {
        return { year: +match[3], month: +match[2], day: +match[1] };
    }

    match = text.match(/^(\d{1,2})[\s-]+([A-Za-z]+\.?)[\s,-]+(\d{4})$/);
    if (match) {
        const month = monthFromWord(match[2]);
        return month ? { year: +match[3], month, day: +match[1] } : null;
    }

    match = text.match(/^([A-Za-z]+\.?)\s+(\d{1,2}),?\s+(\d{4})$/);
    if (match) {
        const month = monthFromWord(match[1]);
        return month ? { year: +match[3], month, day: +match[2] } : null;
    }

    return null;
}

function checkYear(dateKey: string, original: unknown, limits: DateRangeLimits): string {
    const year = parseInt(dateKey.slice(0, 4), 10);
    if (year < limits.minYear || year > limits.maxYear) {
        throw new MalformedValueError(original, `Date outside ${limits.minYear}-${limits.maxYear}`);
    }
    return dateKey;
}

/**
 * Normalizes a date cell to a `YYYY-MM-DD` key.
 *
 * @param cell - The raw cell (serial number or text).
 * @param options - Accepted year range and the workbook's date system.
 * @returns The date key, or null for an absent value.
 * @throws MalformedValueError when the value is not a real day in range.
 */
export function normalizeDate(cell: RawCell, options: DateOptions = DEFAULT_LIMITS): string | null {
    if (cell.type === 'empty') return null;

    if (cell.type === 'number') {
        const key = serialToDateKey(cell.value, options.date1904);
        if (!key) throw new MalformedValueError(cell.value, 'Not a date serial number');
        return checkYear(key, cell.value, options);
    }

    const text = cell.text.trim();
    if (isAbsentText(text)) return null;

    if (DECIMAL_PATTERN.test(text)) {
        const key = serialToDateKey(parseFloat(text), options.date1904);
        if (!key) throw new MalformedValueError(cell.text, 'Not a date serial number');
        return checkYear(key, cell.text, options);
    }

    const parts = parseDateText(text);
    if (!parts) throw new MalformedValueError(cell.text, 'Unrecognised date');

    const key = IsoUtils.fromParts(parts.year, parts.month, parts.day);
    if (!key) throw new MalformedValueError(cell.text, 'Not a calendar date');
    return checkYear(key, cell.text, options);
}
