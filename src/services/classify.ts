import { DocumentType } from '../types/output.js';

const INVOICE_PHRASE = 'invoice';
const INVOICE_NUMBER_PHRASE = 'invoice no';
const PURCHASE_ORDER_PHRASE = 'purchase order';
const PO_NUMBER_PHRASE = 'po no';

/**
 * Decide what a text blob is from its signal phrases. The invoice test runs
 * first, so a text that also mentions a purchase order is still an invoice.
 */
export function classifyDocument(text: string): DocumentType {
    const lower = text.toLowerCase();
    const mentionsInvoice = lower.includes(INVOICE_PHRASE);

    if (mentionsInvoice && lower.includes(INVOICE_NUMBER_PHRASE)) {
        return 'invoice';
    }

    if (lower.includes(PURCHASE_ORDER_PHRASE) || (lower.includes(PO_NUMBER_PHRASE) && !mentionsInvoice)) {
        return 'purchase_order';
    }

    return 'unknown';
}
