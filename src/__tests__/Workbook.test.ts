/**
 * sql.js workbook – unit tests
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { openWorkbook, SHEET_HEADERS, Workbook } from '../db/connection';
import { WorkbookError } from '../utils/errors';

describe('Workbook', () => {
    let workbook: Workbook;

    beforeEach(async () => {
        workbook = await openWorkbook();
    });

    afterEach(() => {
        workbook.close();
    });

    it('starts with both sheets empty', () => {
        expect(Array.from(workbook.iterateRows('PO_Details'))).toEqual([]);
        expect(Array.from(workbook.iterateRows('Invoice_Details'))).toEqual([]);
    });

    it('exposes the sheet headers', () => {
        expect(workbook.headers('PO_Details')).toEqual([
            'Serial Number', 'PO Number', 'PO Date', 'PO Amount', 'Department',
        ]);
        expect(workbook.headers('Invoice_Details')).toHaveLength(12);
        expect(SHEET_HEADERS.Invoice_Details[9]).toBe('Tax 12%');
    });

    it('returns rows in insertion order', () => {
        workbook.appendRow('PO_Details', [1, '300', '01-Jan-2024', 10.5, 'Ops']);
        workbook.appendRow('PO_Details', [2, '100', '', 0, 'N/A']);

        expect(Array.from(workbook.iterateRows('PO_Details'))).toEqual([
            [1, '300', '01-Jan-2024', 10.5, 'Ops'],
            [2, '100', '', 0, 'N/A'],
        ]);
    });

    it('keeps numeric-looking identifiers as text', () => {
        workbook.appendRow('PO_Details', [1, '0042', '', 0, 'N/A']);
        const [row] = Array.from(workbook.iterateRows('PO_Details'));
        expect(row?.[1]).toBe('0042');
    });

    it('rejects a row of the wrong width', () => {
        expect(() => workbook.appendRow('PO_Details', [1, '300'])).toThrow(WorkbookError);
        expect(() => workbook.appendRow('PO_Details', [1, '300'])).toThrow('PO_Details expects 5 values, got 2');
    });

    it('refuses to work once closed', async () => {
        const closed = await openWorkbook();
        closed.close();
        expect(() => Array.from(closed.iterateRows('PO_Details'))).toThrow(WorkbookError);
        expect(() => closed.appendRow('PO_Details', [1, '1', '', 0, 'N/A'])).toThrow('Workbook is closed');
        expect(() => closed.close()).not.toThrow();
    });
});

describe('Workbook persistence', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-workbook-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('saves to a new directory and loads the rows back', async () => {
        const file = path.join(dir, 'nested', 'ledger.db');

        const first = await openWorkbook(file);
        first.appendRow('Invoice_Details', [
            1, 'A1', '01-Jan-2024', '9', '02-Jan-2024', 'Ops', '7', '03-Jan-2024', 100, 12, 112, 'UnPaid',
        ]);
        first.save();
        first.close();
        expect(fs.existsSync(file)).toBe(true);

        const second = await openWorkbook(file);
        expect(Array.from(second.iterateRows('Invoice_Details'))).toEqual([
            [1, 'A1', '01-Jan-2024', '9', '02-Jan-2024', 'Ops', '7', '03-Jan-2024', 100, 12, 112, 'UnPaid'],
        ]);
        expect(Array.from(second.iterateRows('PO_Details'))).toEqual([]);
        second.close();
    });

    it('does not save on close', async () => {
        const file = path.join(dir, 'unsaved.db');
        const workbook = await openWorkbook(file);
        workbook.appendRow('PO_Details', [1, '1', '', 0, 'N/A']);
        workbook.close();
        expect(fs.existsSync(file)).toBe(false);
    });

    it('never writes an in-memory workbook', async () => {
        const memory = await openWorkbook();
        memory.save();
        memory.close();
        expect(fs.readdirSync(dir)).toEqual([]);
    });
});
