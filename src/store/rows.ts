import { CellValue } from '../db/connection.js';
import { DEFAULT_INVOICE_STATUS, InvoiceRecord, InvoiceStatus } from '../types/invoice.js';
import { PurchaseOrderRecord, UNKNOWN_DEPARTMENT } from '../types/purchaseOrder.js';

function text(value: CellValue | undefined): string {
    if (value === undefined) return '';
    return typeof value === 'number' ? String(value) : value;
}

function numeric(value: CellValue | undefined): number {
    if (typeof value === 'number') return value;
    const parsed = Number(value);
    return value !== undefined && value !== '' && Number.isFinite(parsed) ? parsed : 0;
}

function status(value: CellValue | undefined): InvoiceStatus {
    return value === 'Paid' ? 'Paid' : DEFAULT_INVOICE_STATUS;
}

export function purchaseOrderToRow(record: PurchaseOrderRecord): CellValue[] {
    return [record.serial, record.poNumber, record.poDate, record.poAmount, record.department];
}

export function rowToPurchaseOrder(row: CellValue[]): PurchaseOrderRecord {
    return {
        serial: numeric(row[0]),
        poNumber: text(row[1]),
        poDate: text(row[2]),
        poAmount: numeric(row[3]),
        department: text(row[4]) || UNKNOWN_DEPARTMENT,
    };
}

export function invoiceToRow(record: InvoiceRecord): CellValue[] {
    return [
        record.serial,
        record.invoiceNumber,
        record.invoiceDate,
        record.poNumber,
        record.poDate,
        record.department,
        record.grId,
        record.grDate,
        record.subtotal,
        record.tax,
        record.grandTotal,
        record.status,
    ];
}

export function rowToInvoice(row: CellValue[]): InvoiceRecord {
    return {
        serial: numeric(row[0]),
        invoiceNumber: text(row[1]),
        invoiceDate: text(row[2]),
        poNumber: text(row[3]),
        poDate: text(row[4]),
        department: text(row[5]),
        grId: text(row[6]),
        grDate: text(row[7]),
        subtotal: numeric(row[8]),
        tax: numeric(row[9]),
        grandTotal: numeric(row[10]),
        status: status(row[11]),
    };
}

/** Business key column (PO Number / Invoice Number) as a string. */
export function businessKey(row: CellValue[]): string {
    return text(row[1]);
}

export function serialOf(row: CellValue[]): number {
    return numeric(row[0]);
}
