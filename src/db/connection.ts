import initSqlJs, { Database, SqlValue } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';
import { WorkbookError, errorMessage } from '../utils/errors.js';

export type SheetName = 'PO_Details' | 'Invoice_Details';

export type CellValue = string | number;

export const SHEET_HEADERS: Record<SheetName, readonly string[]> = {
    PO_Details: ['Serial Number', 'PO Number', 'PO Date', 'PO Amount', 'Department'],
    Invoice_Details: [
        'Serial Number', 'Invoice Number', 'Invoice Date', 'PO Number',
        'PO Date', 'Department', 'GR ID', 'GR Date', 'Subtotal',
        'Tax 12%', 'Grand Total', 'Status',
    ],
};

export const SHEET_NAMES: readonly SheetName[] = ['PO_Details', 'Invoice_Details'];

const COLUMN_TYPES: Record<string, string> = {
    'Serial Number': 'INTEGER',
    'PO Amount': 'REAL',
    'Subtotal': 'REAL',
    'Tax 12%': 'REAL',
    'Grand Total': 'REAL',
};

/**
 * Row-oriented access to the two sheets. Rows are plain cell arrays in header
 * order; header labels are not part of the rows.
 */
export interface TabularStore {
    headers(sheet: SheetName): readonly string[];
    appendRow(sheet: SheetName, values: readonly CellValue[]): void;
    iterateRows(sheet: SheetName): Iterable<CellValue[]>;
}

function quoteIdentifier(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
}

function toCell(value: SqlValue): CellValue {
    if (typeof value === 'number' || typeof value === 'string') return value;
    return '';
}

function initializeSchema(database: Database): void {
    for (const sheet of SHEET_NAMES) {
        const columns = SHEET_HEADERS[sheet]
            .map(header => `${quoteIdentifier(header)} ${COLUMN_TYPES[header] ?? 'TEXT'}`)
            .join(', ');
        database.run(`CREATE TABLE IF NOT EXISTS ${quoteIdentifier(sheet)} (${columns})`);
    }
}

/**
 * The ledger's tabular store: one SQLite table per sheet, kept in memory by
 * sql.js and exported to `filePath` on save.
 */
export class Workbook implements TabularStore {
    constructor(private db: Database | null, readonly filePath?: string) {}

    private get database(): Database {
        if (!this.db) {
            throw new WorkbookError('Workbook is closed');
        }
        return this.db;
    }

    headers(sheet: SheetName): readonly string[] {
        return SHEET_HEADERS[sheet];
    }

    appendRow(sheet: SheetName, values: readonly CellValue[]): void {
        const headers = SHEET_HEADERS[sheet];
        if (values.length !== headers.length) {
            throw new WorkbookError(`${sheet} expects ${headers.length} values, got ${values.length}`);
        }
        const placeholders = headers.map(() => '?').join(', ');
        this.database.run(`INSERT INTO ${quoteIdentifier(sheet)} VALUES (${placeholders})`, [...values]);
    }

    *iterateRows(sheet: SheetName): Iterable<CellValue[]> {
        const statement = this.database.prepare(`SELECT * FROM ${quoteIdentifier(sheet)} ORDER BY rowid`);
        try {
            while (statement.step()) {
                yield statement.get().map(toCell);
            }
        } finally {
            statement.free();
        }
    }

    save(): void {
        if (!this.filePath) return;
        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
            fs.writeFileSync(this.filePath, Buffer.from(this.database.export()));
        } catch (err) {
            throw new WorkbookError(`Could not save workbook to ${this.filePath}: ${errorMessage(err)}`, err);
        }
    }

    /** Release the database. Unsaved changes are dropped; call `save()` first. */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }
}

/**
 * Load the workbook stored at `filePath`, or start an empty one with both
 * sheets. Without a path the workbook is never written to disk.
 */
export async function openWorkbook(filePath?: string): Promise<Workbook> {
    const SQL = await initSqlJs();

    let db: Database;
    if (filePath && fs.existsSync(filePath)) {
        try {
            db = new SQL.Database(fs.readFileSync(filePath));
        } catch (err) {
            throw new WorkbookError(`Could not load workbook ${filePath}: ${errorMessage(err)}`, err);
        }
    } else {
        db = new SQL.Database();
    }

    // Older files may be missing a sheet
    initializeSchema(db);

    return new Workbook(db, filePath);
}
