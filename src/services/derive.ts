import { DEFAULT_INVOICE_STATUS, InvoiceDraft, InvoiceFields } from '../types/invoice.js';
import { PurchaseOrderFields, UNKNOWN_DEPARTMENT } from '../types/purchaseOrder.js';
import { roundTo } from '../utils/normalize.js';

/** Flat rate applied when an invoice prints no tax line. */
export const DEFAULT_TAX_RATE = 0.12;

/**
 * Fill the computed invoice fields: 12% tax and subtotal + tax when only the
 * subtotal was printed, and the UnPaid status.
 */
export function deriveInvoice(fields: InvoiceFields): InvoiceDraft {
    const derived: InvoiceDraft = { ...fields, status: fields.status ?? DEFAULT_INVOICE_STATUS };

    if (derived.subtotal !== undefined) {
        if (derived.tax === undefined) {
            derived.tax = roundTo(derived.subtotal * DEFAULT_TAX_RATE, 2);
        }
        if (derived.grandTotal === undefined) {
            derived.grandTotal = derived.subtotal + (derived.tax ?? 0);
        }
    }

    return derived;
}

export function derivePurchaseOrder<T extends PurchaseOrderFields>(fields: T): T & { department: string } {
    return { ...fields, department: fields.department ?? UNKNOWN_DEPARTMENT };
}
