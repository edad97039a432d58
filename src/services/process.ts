import { v4 as uuidv4 } from 'uuid';
import { RecordStore } from '../store/recordStore.js';
import { AuditEntry, DocumentResult, DocumentType } from '../types/output.js';
import { createAuditEntry } from '../utils/auditTrail.js';
import {
    DocumentError,
    ExtractionFailure,
    UnknownDocumentType,
    UnparsableDocument,
} from '../utils/errors.js';
import { ErrorLedger, Logger } from '../utils/logger.js';
import { classifyDocument } from './classify.js';
import { parseInvoice, parsePurchaseOrder } from './parse.js';

export interface ProcessingContext {
    store: RecordStore;
    logger: Logger;
    ledger: ErrorLedger;
}

type DocumentOutput = Pick<DocumentResult, 'outcome' | 'invoice' | 'purchaseOrder'>;

function ingest(
    filename: string,
    text: string,
    documentType: DocumentType,
    ctx: ProcessingContext,
    audit: AuditEntry[]
): DocumentOutput {
    if (documentType === 'invoice') {
        const draft = parseInvoice(text, ctx.logger);
        if (!draft) {
            throw new UnparsableDocument(filename, 'invoice');
        }
        audit.push(createAuditEntry('parse', `Invoice ${draft.invoiceNumber ?? '(no number)'} parsed`));

        const result = ctx.store.insertInvoice(draft);
        if (result.status === 'duplicate') {
            audit.push(createAuditEntry('insert', `Invoice ${result.invoiceNumber} already on file - skipped`));
            return { outcome: 'skipped_duplicate' };
        }

        const linkDetails = result.stubPurchaseOrder
            ? `; stub PO ${result.stubPurchaseOrder.poNumber} created (serial ${result.stubPurchaseOrder.serial})`
            : '';
        audit.push(createAuditEntry('insert', `Invoice serial ${result.record.serial}${linkDetails}`));
        return { outcome: 'inserted', invoice: result.record, purchaseOrder: result.stubPurchaseOrder };
    }

    if (documentType === 'purchase_order') {
        const draft = parsePurchaseOrder(text, ctx.logger);
        if (!draft) {
            throw new UnparsableDocument(filename, 'PO');
        }
        audit.push(createAuditEntry('parse', `PO ${draft.poNumber} parsed`));

        const record = ctx.store.insertPurchaseOrder(draft);
        audit.push(createAuditEntry('insert', `PO serial ${record.serial}`));
        return { outcome: 'inserted', purchaseOrder: record };
    }

    throw new UnknownDocumentType(filename);
}

function rejectedOutcome(err: DocumentError): DocumentResult['outcome'] {
    switch (err.kind) {
        case 'ExtractionFailure':
            return 'extraction_failed';
        case 'UnknownDocumentType':
            return 'rejected_unknown_type';
        case 'UnparsableDocument':
            return 'rejected_unparsed';
    }
}

/**
 * Log a per-document failure against its file name, record it in the error
 * ledger and turn it into the matching rejected outcome.
 */
export function rejectDocument(
    err: DocumentError,
    ctx: ProcessingContext,
    documentType: DocumentType = 'unknown',
    audit: AuditEntry[] = []
): DocumentResult {
    ctx.logger.warn(`${err.message} (${err.filename})`);
    ctx.ledger.recordError(err.filename, err.message);
    return {
        documentId: uuidv4(),
        filename: err.filename,
        documentType,
        outcome: rejectedOutcome(err),
        error: { kind: err.kind, message: err.message },
        auditTrail: audit,
    };
}

/**
 * Take one document's extracted text through classification, parsing,
 * derivation and insertion. Unreadable, unclassifiable and unparsable
 * documents end in a rejected outcome; any other error reaches the caller.
 */
export function processDocumentText(filename: string, text: string, ctx: ProcessingContext): DocumentResult {
    const audit: AuditEntry[] = [];
    let documentType: DocumentType = 'unknown';

    try {
        if (!text.trim()) {
            throw new ExtractionFailure(filename);
        }
        audit.push(createAuditEntry('extract', `${text.length} characters of text`));

        documentType = classifyDocument(text);
        audit.push(createAuditEntry('classify', `Classified as ${documentType}`));

        const output = ingest(filename, text, documentType, ctx, audit);
        return { documentId: uuidv4(), filename, documentType, ...output, auditTrail: audit };
    } catch (err) {
        if (!(err instanceof DocumentError)) {
            throw err;
        }
        return rejectDocument(err, ctx, documentType, audit);
    }
}
