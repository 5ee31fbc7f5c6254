import { describe, it, expect } from '@jest/globals';
import { InvalidConfigurationError } from '../../js/errors.js';
import { formatDdhhmmss, formatDecimalHours, formatHhmmss } from '../../js/format.js';
import { parseDurationText } from '../../js/time.js';

describe('formatHhmmss', () => {
    it('formats positive hours', () => {
        expect(formatHhmmss(1.5)).toBe('01:30:00');
        expect(formatHhmmss(8)).toBe('08:00:00');
    });

    it('keeps the sign of negative values', () => {
        expect(formatHhmmss(-0.5)).toBe('-00:30:00');
        expect(formatHhmmss(-1.25)).toBe('-01:15:00');
    });

    it('formats zero and absent values as all zeros', () => {
        expect(formatHhmmss(0)).toBe('00:00:00');
        expect(formatHhmmss(null)).toBe('00:00:00');
        expect(formatHhmmss(undefined)).toBe('00:00:00');
        expect(formatHhmmss(NaN)).toBe('00:00:00');
    });

    it('truncates fractional seconds instead of rounding', () => {
        expect(formatHhmmss(59.9 / 3600)).toBe('00:00:59');
        expect(formatHhmmss(0.99999 / 3600)).toBe('00:00:00');
    });

    it('does not lose a second to binary rounding', () => {
        expect(formatHhmmss(0.7)).toBe('00:42:00');
    });

    it('lets hours exceed two digits', () => {
        expect(formatHhmmss(123)).toBe('123:00:00');
    });

    it('drops the sign when the value truncates to zero', () => {
        expect(formatHhmmss(-0.1 / 3600)).toBe('00:00:00');
    });

    it('round-trips through parseDurationText within one second', () => {
        const values = [0, 0.5, -0.5, 1.2345, 7.999, -3.3333, 25.75, 100.01, 0.0001];
        for (const hours of values) {
            const parsed = parseDurationText(formatHhmmss(hours));
            expect(parsed).not.toBeNull();
            expect(Math.abs((parsed ?? 0) - hours)).toBeLessThan(1 / 3600);
        }
    });
});

describe('formatDdhhmmss', () => {
    it('uses an 8-hour working day by default', () => {
        expect(formatDdhhmmss(10)).toBe('01:02:00:00');
        expect(formatDdhhmmss(3.75)).toBe('00:03:45:00');
    });

    it('accepts a custom day length', () => {
        expect(formatDdhhmmss(30, 24)).toBe('01:06:00:00');
    });

    it('keeps the sign of negative values', () => {
        expect(formatDdhhmmss(-0.5)).toBe('-00:00:30:00');
    });

    it('formats absent values as all zeros', () => {
        expect(formatDdhhmmss(null)).toBe('00:00:00:00');
        expect(formatDdhhmmss(0)).toBe('00:00:00:00');
    });

    it('rejects a non-positive day length', () => {
        expect(() => formatDdhhmmss(1, 0)).toThrow(InvalidConfigurationError);
        expect(() => formatDdhhmmss(1, -8)).toThrow(InvalidConfigurationError);
        expect(() => formatDdhhmmss(1, NaN)).toThrow(InvalidConfigurationError);
    });
});

describe('formatDecimalHours', () => {
    it('renders a fixed number of decimals', () => {
        expect(formatDecimalHours(1.5)).toBe('1.50');
        expect(formatDecimalHours(1.875, 3)).toBe('1.875');
        expect(formatDecimalHours(null)).toBe('0.00');
    });
});
