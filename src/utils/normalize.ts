import { format, isValid, parse } from 'date-fns';

/**
 * Day-month-year layouts, tried in order. `dd` and `MM` also accept a single
 * digit. Two-digit years come first so that "01-Jan-24" is never read as year 24.
 */
export const DATE_FORMATS = [
    'dd-MMM-yy',
    'dd-MMM-yyyy',
    'dd/MMM/yy',
    'dd/MMM/yyyy',
    'dd-MM-yy',
    'dd-MM-yyyy',
    'dd/MM/yy',
    'dd/MM/yyyy',
] as const;

export const CANONICAL_DATE_FORMAT = 'dd-MMM-yyyy';

// date-fns resolves `yy` into the hundred years around its reference date;
// anchoring at 2019 puts two-digit years in 1969-2068.
const TWO_DIGIT_YEAR_REFERENCE = new Date(2019, 0, 1);

// Day, a three-letter month or 1-2 digit month, year; one separator throughout.
// date-fns `MMM` would otherwise also accept one-letter month names.
const DATE_SHAPE = /^\d{1,2}([-\/])(?:[A-Za-z]{3}|\d{1,2})\1\d{2,4}$/;

/**
 * Reformat a day-month-year date as `DD-Mon-YYYY`. Input matching none of the
 * known layouts comes back unchanged.
 */
export function normalizeDate(raw: string): string {
    const value = raw.trim();
    if (!DATE_SHAPE.test(value)) {
        return raw;
    }
    for (const layout of DATE_FORMATS) {
        const parsed = parse(value, layout, TWO_DIGIT_YEAR_REFERENCE);
        if (isValid(parsed)) {
            return format(parsed, CANONICAL_DATE_FORMAT);
        }
    }
    return raw;
}

/** Parse a money amount with `,` grouping. Unparseable input yields 0. */
export function normalizeAmount(raw: string): number {
    const cleaned = raw.replace(/,/g, '').trim();
    if (cleaned === '') return 0;
    const value = Number(cleaned);
    return Number.isFinite(value) ? value : 0;
}

export function roundTo(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}
