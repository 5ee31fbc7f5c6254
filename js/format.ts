/**
 * @fileoverview Duration Formatter
 * Renders decimal hours as HH:MM:SS and DD:HH:MM:SS strings. Every aggregate
 * row and every export column goes through these functions, so all views
 * present durations the same way.
 *
 * Rules:
 * - A negative value keeps its sign as a leading `-` and formats the absolute value
 * - Zero, null, undefined and NaN format as all-zero fields
 * - Fractional seconds are truncated, never rounded, so `60` cannot appear
 * - Hours may exceed two digits (`123:00:00`); days likewise
 */

import { CONSTANTS } from './constants.js';
import { InvalidConfigurationError } from './errors.js';
import { round } from './utils.js';

/**
 * Splits decimal hours into a sign and whole seconds (truncated).
 * The product is rounded to micro-seconds first so binary artefacts such as
 * 0.7 * 3600 = 2519.9999999999995 do not lose a whole second.
 */
function toWholeSeconds(hours: number | null | undefined): { negative: boolean; seconds: number } {
    if (hours == null || !Number.isFinite(hours) || hours === 0) {
        return { negative: false, seconds: 0 };
    }
    const seconds = Math.floor(round(Math.abs(hours) * CONSTANTS.SECONDS_PER_HOUR, 6));
    return { negative: hours < 0 && seconds > 0, seconds };
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * Formats decimal hours as `HH:MM:SS`.
 *
 * @example
 * formatHhmmss(1.5)   // → "01:30:00"
 * formatHhmmss(-0.5)  // → "-00:30:00"
 * formatHhmmss(null)  // → "00:00:00"
 */
export function formatHhmmss(hours: number | null | undefined): string {
    const { negative, seconds } = toWholeSeconds(hours);
    const h = Math.floor(seconds / 3600);
    const m = Math.floor((seconds % 3600) / 60);
    const s = seconds % 60;
    const result = `${pad(h)}:${pad(m)}:${pad(s)}`;
    return negative ? `-${result}` : result;
}

/**
 * Formats decimal hours as `DD:HH:MM:SS`, where one day is `hoursPerDay`
 * hours (a working day, 8 by default), not 24.
 *
 * @throws InvalidConfigurationError when hoursPerDay is not a positive number.
 *
 * @example
 * formatDdhhmmss(10)      // → "01:02:00:00"
 * formatDdhhmmss(30, 24)  // → "01:06:00:00"
 */
export function formatDdhhmmss(
    hours: number | null | undefined,
    hoursPerDay: number = CONSTANTS.DEFAULT_HOURS_PER_DAY
): string {
    if (!Number.isFinite(hoursPerDay) || hoursPerDay <= 0) {
        throw new InvalidConfigurationError('hoursPerDay', `must be a positive number, got ${hoursPerDay}`);
    }
    const daySeconds = Math.round(hoursPerDay * CONSTANTS.SECONDS_PER_HOUR);
    if (daySeconds <= 0) {
        throw new InvalidConfigurationError('hoursPerDay', `must be at least one second, got ${hoursPerDay}`);
    }

    const { negative, seconds } = toWholeSeconds(hours);
    const days = Math.floor(seconds / daySeconds);
    const remainder = seconds % daySeconds;
    const h = Math.floor(remainder / 3600);
    const m = Math.floor((remainder % 3600) / 60);
    const s = remainder % 60;
    const result = `${pad(days)}:${pad(h)}:${pad(m)}:${pad(s)}`;
    return negative ? `-${result}` : result;
}

/**
 * Formats decimal hours with a fixed number of decimals (e.g. "8.50").
 */
export function formatDecimalHours(hours: number | null | undefined, decimals = 2): string {
    if (hours == null || !Number.isFinite(hours)) return (0).toFixed(decimals);
    return round(hours, decimals).toFixed(decimals);
}
