import { SheetName, TabularStore } from '../db/connection.js';
import { InvoiceDraft, InvoiceInsertResult, InvoiceRecord, DEFAULT_INVOICE_STATUS } from '../types/invoice.js';
import {
    PurchaseOrderDraft,
    PurchaseOrderLookup,
    PurchaseOrderRecord,
    UNKNOWN_DEPARTMENT,
} from '../types/purchaseOrder.js';
import { Logger, silentLogger } from '../utils/logger.js';
import {
    businessKey,
    invoiceToRow,
    purchaseOrderToRow,
    rowToInvoice,
    rowToPurchaseOrder,
    serialOf,
} from './rows.js';

/**
 * The two linked collections (purchase orders and invoices) on top of a
 * tabular store. Every operation is synchronous; callers process one document
 * at a time, so a lookup and the insert that depends on it never interleave
 * with another document's.
 */
export class RecordStore {
    constructor(
        private readonly workbook: TabularStore,
        private readonly logger: Logger = silentLogger
    ) {}

    /**
     * One past the highest serial in the sheet, or 1 for an empty sheet. With
     * an append-only sheet this equals row count + 1.
     */
    nextSerial(sheet: SheetName): number {
        let highest = 0;
        for (const row of this.workbook.iterateRows(sheet)) {
            highest = Math.max(highest, serialOf(row));
        }
        return highest + 1;
    }

    /** First purchase order with exactly this number, in insertion order. */
    findPurchaseOrder(poNumber: string): PurchaseOrderLookup | null {
        for (const row of this.workbook.iterateRows('PO_Details')) {
            if (businessKey(row) === poNumber) {
                const record = rowToPurchaseOrder(row);
                return { serial: record.serial, poDate: record.poDate, department: record.department };
            }
        }
        return null;
    }

    invoiceExists(invoiceNumber: string): boolean {
        for (const row of this.workbook.iterateRows('Invoice_Details')) {
            if (businessKey(row) === invoiceNumber) {
                return true;
            }
        }
        return false;
    }

    /** Appends unconditionally; PO numbers are not deduplicated. */
    insertPurchaseOrder(draft: PurchaseOrderDraft): PurchaseOrderRecord {
        const record: PurchaseOrderRecord = {
            serial: this.nextSerial('PO_Details'),
            poNumber: draft.poNumber,
            poDate: draft.poDate ?? '',
            poAmount: draft.poAmount ?? 0,
            department: draft.department || UNKNOWN_DEPARTMENT,
        };

        this.workbook.appendRow('PO_Details', purchaseOrderToRow(record));
        this.logger.info(`Added PO record: ${record.poNumber}`);
        return record;
    }

    /**
     * Append an invoice, linking it to its purchase order. An invoice number
     * already on file makes this a no-op. A referenced PO that is not on file
     * gets a stub (amount 0, department N/A, the invoice's PO date) first.
     */
    insertInvoice(draft: InvoiceDraft): InvoiceInsertResult {
        const invoiceNumber = draft.invoiceNumber ?? '';

        if (invoiceNumber && this.invoiceExists(invoiceNumber)) {
            this.logger.info(`Invoice ${invoiceNumber} already exists - skipping`);
            return { status: 'duplicate', invoiceNumber };
        }

        const poNumber = draft.poNumber ?? '';
        let linked: PurchaseOrderLookup | null = null;
        let stubPurchaseOrder: PurchaseOrderRecord | undefined;

        if (poNumber) {
            linked = this.findPurchaseOrder(poNumber);
            if (!linked) {
                this.logger.info(`PO Number ${poNumber} not found in PO_Details - auto-creating from invoice data`);
                stubPurchaseOrder = this.insertPurchaseOrder({
                    poNumber,
                    poDate: draft.poDate ?? '',
                    poAmount: 0,
                    department: UNKNOWN_DEPARTMENT,
                });
                linked = this.findPurchaseOrder(poNumber);
            }
        }

        const record: InvoiceRecord = {
            serial: this.nextSerial('Invoice_Details'),
            invoiceNumber,
            invoiceDate: draft.invoiceDate ?? '',
            poNumber,
            poDate: linked?.poDate || draft.poDate || '',
            department: linked?.department || UNKNOWN_DEPARTMENT,
            grId: draft.grId ?? '',
            grDate: draft.grDate ?? '',
            subtotal: draft.subtotal ?? 0,
            tax: draft.tax ?? 0,
            grandTotal: draft.grandTotal ?? 0,
            status: draft.status ?? DEFAULT_INVOICE_STATUS,
        };

        this.workbook.appendRow('Invoice_Details', invoiceToRow(record));
        this.logger.info(`Added invoice record: ${record.invoiceNumber}`);

        return stubPurchaseOrder
            ? { status: 'inserted', record, stubPurchaseOrder }
            : { status: 'inserted', record };
    }

    purchaseOrders(): PurchaseOrderRecord[] {
        return Array.from(this.workbook.iterateRows('PO_Details'), rowToPurchaseOrder);
    }

    invoices(): InvoiceRecord[] {
        return Array.from(this.workbook.iterateRows('Invoice_Details'), rowToInvoice);
    }
}
