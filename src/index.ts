import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { openWorkbook, Workbook } from './db/connection.js';
import { processDocumentText, ProcessingContext, rejectDocument } from './services/process.js';
import { RecordStore } from './store/recordStore.js';
import { TextExtractionEngine, isSupportedFile } from './text/TextExtractionEngine.js';
import { TextExtractor } from './text/TextExtractor.js';
import { BatchSummary, DocumentOutcome, DocumentResult } from './types/output.js';
import { ExtractionFailure, errorMessage } from './utils/errors.js';
import { createErrorLedger, createLogger, ErrorLedger, Logger } from './utils/logger.js';

export interface LedgerOptions {
    /** sql.js database file; omitted means an in-memory workbook */
    workbookPath?: string;
    logger?: Logger;
    ledger?: ErrorLedger;
    /** Replaces the default PDF and plain-text extractors */
    extractors?: TextExtractor[];
    /** When set, each document's extracted text is written here */
    debugTextDir?: string;
}

export interface LedgerSession extends ProcessingContext {
    workbook: Workbook;
    engine: TextExtractionEngine;
    debugTextDir?: string;
}

/**
 * Open the workbook and wire the store, text extraction and diagnostics that
 * the processing functions share.
 */
export async function openLedger(options: LedgerOptions = {}): Promise<LedgerSession> {
    const logger = options.logger ?? createLogger();
    const workbook = await openWorkbook(options.workbookPath);
    logger.info(options.workbookPath ? `Opened workbook: ${options.workbookPath}` : 'Opened in-memory workbook');

    return {
        workbook,
        store: new RecordStore(workbook, logger),
        engine: new TextExtractionEngine(options.extractors, logger),
        logger,
        ledger: options.ledger ?? createErrorLedger(),
        debugTextDir: options.debugTextDir,
    };
}

async function writeDebugText(session: LedgerSession, filePath: string, text: string): Promise<void> {
    if (!session.debugTextDir) return;
    const stem = path.basename(filePath, path.extname(filePath));
    const target = path.join(session.debugTextDir, `${stem}_extracted.txt`);
    await fs.mkdir(session.debugTextDir, { recursive: true });
    await fs.writeFile(target, text, 'utf-8');
    session.logger.info(`Saved extracted text to: ${target}`);
}

/**
 * Process a single PDF, image or text file. Whatever goes wrong stays inside
 * this document's result.
 */
export async function processFile(session: LedgerSession, filePath: string): Promise<DocumentResult> {
    const filename = path.basename(filePath);
    session.logger.info(`Processing file: ${filename}`);

    let text: string;
    try {
        text = await session.engine.extractText(filePath);
    } catch (err) {
        return rejectDocument(new ExtractionFailure(filename, errorMessage(err), err), session);
    }

    try {
        if (text.trim()) {
            await writeDebugText(session, filePath, text);
        }
        return processDocumentText(filename, text, session);
    } catch (err) {
        const message = errorMessage(err);
        session.logger.error(`Error processing ${filename}: ${message}`);
        session.ledger.recordError(filename, message);
        return {
            documentId: uuidv4(),
            filename,
            documentType: 'unknown',
            outcome: 'failed',
            auditTrail: [],
        };
    }
}

function emptyCounts(): Record<DocumentOutcome, number> {
    return {
        inserted: 0,
        skipped_duplicate: 0,
        rejected_unparsed: 0,
        rejected_unknown_type: 0,
        extraction_failed: 0,
        failed: 0,
    };
}

async function listDocuments(folder: string): Promise<string[]> {
    const entries = await fs.readdir(folder, { withFileTypes: true });
    return entries
        .filter(entry => entry.isFile() && isSupportedFile(entry.name))
        .map(entry => path.join(folder, entry.name))
        .sort();
}

/**
 * Process every supported file in `folder`, one at a time, then save the
 * workbook. A missing folder is created and reported; a failed save is logged
 * and reflected in `saved`.
 */
export async function processFolder(session: LedgerSession, folder: string): Promise<BatchSummary> {
    const summary: BatchSummary = { runId: uuidv4(), folder, results: [], counts: emptyCounts(), saved: false };

    try {
        await fs.access(folder);
    } catch {
        session.logger.error(`Invoices folder not found: ${folder}`);
        await fs.mkdir(folder, { recursive: true });
        session.logger.info(`Created invoices folder: ${folder}`);
        return summary;
    }

    const files = await listDocuments(folder);
    if (files.length === 0) {
        session.logger.warn(`No files found in ${folder}`);
        return summary;
    }

    session.logger.info(`Found ${files.length} files to process`);
    for (const file of files) {
        const result = await processFile(session, file);
        summary.results.push(result);
        summary.counts[result.outcome]++;
    }

    summary.saved = saveLedger(session);
    return summary;
}

/** Persist the workbook; false (with the failure logged) when it could not be written. */
export function saveLedger(session: LedgerSession): boolean {
    try {
        session.workbook.save();
        if (session.workbook.filePath) {
            session.logger.info(`Workbook saved: ${session.workbook.filePath}`);
        }
        return true;
    } catch (err) {
        session.logger.error(`Error saving workbook: ${errorMessage(err)}`);
        session.ledger.recordError('Workbook Save', errorMessage(err));
        return false;
    }
}

export function shutdown(session: LedgerSession): void {
    session.workbook.close();
}

export * from './types/index.js';
export { openWorkbook, Workbook, SHEET_HEADERS } from './db/connection.js';
export type { CellValue, SheetName, TabularStore } from './db/connection.js';
export { RecordStore } from './store/recordStore.js';
export { classifyDocument } from './services/classify.js';
export { extractFields, extractTableRow } from './services/extract.js';
export { deriveInvoice, derivePurchaseOrder, DEFAULT_TAX_RATE } from './services/derive.js';
export { parseInvoice, parsePurchaseOrder } from './services/parse.js';
export { processDocumentText } from './services/process.js';
export { normalizeAmount, normalizeDate } from './utils/normalize.js';
export { createErrorLedger, createLogger, silentLogger } from './utils/logger.js';
export type { ErrorLedger, Logger } from './utils/logger.js';
export * from './utils/errors.js';
export * from './text/index.js';
export { loadConfig } from './config/index.js';
export type { LedgerConfig } from './config/index.js';
