import { InvoiceRecord } from './invoice.js';
import { PurchaseOrderRecord } from './purchaseOrder.js';
import { DocumentErrorKind } from '../utils/errors.js';

export type DocumentType = 'invoice' | 'purchase_order' | 'unknown';

export type DocumentOutcome =
    | 'inserted'
    | 'skipped_duplicate'
    | 'rejected_unparsed'
    | 'rejected_unknown_type'
    | 'extraction_failed'
    | 'failed';

export type AuditStep = 'extract' | 'classify' | 'parse' | 'insert';

export interface AuditEntry {
    step: AuditStep;
    timestamp: string;
    details: string;
}

export interface DocumentResult {
    documentId: string;
    filename: string;
    documentType: DocumentType;
    outcome: DocumentOutcome;
    invoice?: InvoiceRecord;
    purchaseOrder?: PurchaseOrderRecord;
    error?: { kind: DocumentErrorKind; message: string };
    auditTrail: AuditEntry[];
}

export interface BatchSummary {
    runId: string;
    folder: string;
    results: DocumentResult[];
    counts: Record<DocumentOutcome, number>;
    saved: boolean;
}
