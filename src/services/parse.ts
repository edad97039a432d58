import { InvoiceDraft, InvoiceFields } from '../types/invoice.js';
import { PurchaseOrderDraft } from '../types/purchaseOrder.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { normalizeAmount, normalizeDate } from '../utils/normalize.js';
import { deriveInvoice, derivePurchaseOrder } from './derive.js';
import { extractInvoiceFields, extractPurchaseOrderFields } from './extract.js';

function optionalDate(raw: string | undefined): string | undefined {
    return raw === undefined ? undefined : normalizeDate(raw);
}

function optionalAmount(raw: string | undefined): number | undefined {
    return raw === undefined ? undefined : normalizeAmount(raw);
}

/**
 * Extract, normalize and derive an invoice. Returns null when the text gave up
 * no field at all.
 */
export function parseInvoice(text: string, logger: Logger = silentLogger): InvoiceDraft | null {
    const raw = extractInvoiceFields(text, logger);
    if (Object.keys(raw).length === 0) {
        return null;
    }

    const fields: InvoiceFields = {
        invoiceNumber: raw.invoiceNumber,
        invoiceDate: optionalDate(raw.invoiceDate),
        poNumber: raw.poNumber,
        poDate: optionalDate(raw.poDate),
        grId: raw.grId,
        grDate: optionalDate(raw.grDate),
        subtotal: optionalAmount(raw.subtotal),
        tax: optionalAmount(raw.tax),
        grandTotal: optionalAmount(raw.grandTotal),
    };

    const draft = deriveInvoice(fields);
    logger.info(
        `Parsed data: Invoice=${draft.invoiceNumber ?? 'N/A'}, Date=${draft.invoiceDate ?? 'N/A'}, ` +
        `PO=${draft.poNumber ?? 'N/A'}, GR=${draft.grId ?? 'N/A'}`
    );
    return draft;
}

/**
 * Extract and normalize a purchase order. A PO without a number is unusable
 * and yields null.
 */
export function parsePurchaseOrder(text: string, logger: Logger = silentLogger): PurchaseOrderDraft | null {
    const raw = extractPurchaseOrderFields(text, logger);
    if (!raw.poNumber) {
        return null;
    }

    return derivePurchaseOrder({
        poNumber: raw.poNumber,
        poDate: optionalDate(raw.poDate),
        poAmount: optionalAmount(raw.poAmount),
        department: raw.department,
    });
}
