/**
 * Date and amount normalization – unit tests
 */
import { normalizeAmount, normalizeDate, roundTo } from '../utils/normalize';

describe('normalizeDate', () => {
    it.each([
        ['01-Jan-24', '01-Jan-2024'],
        ['01-Jan-2024', '01-Jan-2024'],
        ['5/Mar/2023', '05-Mar-2023'],
        ['07/feb/24', '07-Feb-2024'],
        ['15-08-23', '15-Aug-2023'],
        ['3-7-2022', '03-Jul-2022'],
        ['15/08/2023', '15-Aug-2023'],
        ['12/02/24', '12-Feb-2024'],
    ])('reformats %s as %s', (raw, expected) => {
        expect(normalizeDate(raw)).toBe(expected);
    });

    it('places two-digit years between 1969 and 2068', () => {
        expect(normalizeDate('01-Jan-69')).toBe('01-Jan-1969');
        expect(normalizeDate('01-Jan-68')).toBe('01-Jan-2068');
    });

    it('reads day before month for numeric dates', () => {
        expect(normalizeDate('02/03/2024')).toBe('02-Mar-2024');
    });

    it.each(['31-02-2024', '2024-01-15', 'Jan 5 2024', 'not a date', ''])(
        'returns %p unchanged when no layout fits',
        raw => {
            expect(normalizeDate(raw)).toBe(raw);
        }
    );

    it.each(['5-M-24', '5-A-24', '1-J-2024', '05-June-2024', '05-Jan/2024'])(
        'does not guess a month from %p',
        raw => {
            expect(normalizeDate(raw)).toBe(raw);
        }
    );

    it('is idempotent on its own output', () => {
        const inputs = ['01-Jan-24', '5/Mar/2023', '15-08-23', '15/08/2023', 'garbled'];
        for (const raw of inputs) {
            const once = normalizeDate(raw);
            expect(normalizeDate(once)).toBe(once);
        }
    });
});

describe('normalizeAmount', () => {
    it('strips grouping separators', () => {
        expect(normalizeAmount('1,000.00')).toBe(1000);
        expect(normalizeAmount('12,345,678.9')).toBe(12345678.9);
    });

    it('parses plain numbers', () => {
        expect(normalizeAmount('250')).toBe(250);
        expect(normalizeAmount(' 99.5 ')).toBe(99.5);
    });

    it('returns 0 for unparseable input', () => {
        expect(normalizeAmount('')).toBe(0);
        expect(normalizeAmount('12.5abc')).toBe(0);
        expect(normalizeAmount('N/A')).toBe(0);
    });
});

describe('roundTo', () => {
    it('rounds to the requested decimals', () => {
        expect(roundTo(148.1472, 2)).toBe(148.15);
        expect(roundTo(11.9988, 2)).toBe(12);
    });
});
