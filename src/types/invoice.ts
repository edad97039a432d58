import { PurchaseOrderRecord } from './purchaseOrder.js';

// Invoice Types
export type InvoiceStatus = 'UnPaid' | 'Paid';

export const DEFAULT_INVOICE_STATUS: InvoiceStatus = 'UnPaid';

export interface InvoiceFields {
    invoiceNumber?: string;
    invoiceDate?: string;
    poNumber?: string;
    poDate?: string;
    grId?: string;
    grDate?: string;
    subtotal?: number;
    tax?: number;
    grandTotal?: number;
    status?: InvoiceStatus;
}

/** Invoice fields after derivation: status is always settled. */
export interface InvoiceDraft extends InvoiceFields {
    status: InvoiceStatus;
}

export interface InvoiceRecord {
    serial: number;
    invoiceNumber: string;
    invoiceDate: string;
    poNumber: string;
    poDate: string;
    department: string;
    grId: string;
    grDate: string;
    subtotal: number;
    tax: number;
    grandTotal: number;
    status: InvoiceStatus;
}

export type InvoiceInsertResult =
    | { status: 'inserted'; record: InvoiceRecord; stubPurchaseOrder?: PurchaseOrderRecord }
    | { status: 'duplicate'; invoiceNumber: string };
