import { Logger, silentLogger } from '../utils/logger.js';
import {
    FieldChain,
    FieldName,
    FieldStrategy,
    INVOICE_CHAINS,
    InvoiceFieldName,
    PURCHASE_ORDER_CHAINS,
    PurchaseOrderFieldName,
    TABLE_ROW_STRATEGIES,
} from './patterns.js';

export type RawFieldMap<F extends FieldName = FieldName> = Partial<Record<F, string>>;

export type ExtractableDocumentType = 'invoice' | 'purchase_order';

export interface StrategyMatch {
    strategy: string;
    groups: string[];
}

/**
 * Try each strategy in order and return the capture groups of the first hit.
 */
export function firstMatch(text: string, strategies: readonly FieldStrategy[]): StrategyMatch | null {
    for (const candidate of strategies) {
        const match = candidate.pattern.exec(text);
        if (match) {
            return {
                strategy: candidate.name,
                groups: match.slice(1).map(group => (group ?? '').trim()),
            };
        }
    }
    return null;
}

export interface TableRow {
    poNumber: string;
    poDate: string;
    grId: string;
    grDate: string;
}

/**
 * Read the PO NO / PO DATE / GR NO / GR DATE row some invoices print as a
 * small table, header on one line and the values on the next.
 */
export function extractTableRow(text: string): TableRow | null {
    const match = firstMatch(text, TABLE_ROW_STRATEGIES);
    if (!match) return null;

    const [poNumber, poDate, grId, grDate] = match.groups;
    if (!poNumber || !poDate || !grId || !grDate) return null;

    return { poNumber, poDate, grId, grDate };
}

function applyChains<F extends FieldName>(
    text: string,
    chains: FieldChain<F>,
    fields: RawFieldMap<F>,
    logger: Logger
): RawFieldMap<F> {
    for (const [field, strategies] of chains) {
        // Earlier, higher-priority sources keep their value
        if (fields[field] !== undefined) continue;

        const match = firstMatch(text, strategies);
        const value = match?.groups[0];
        if (match && value) {
            fields[field] = value;
            logger.debug(`${field} <- "${value}" (${match.strategy})`);
        }
    }
    return fields;
}

export function extractInvoiceFields(text: string, logger: Logger = silentLogger): RawFieldMap<InvoiceFieldName> {
    const fields: RawFieldMap<InvoiceFieldName> = {};

    const row = extractTableRow(text);
    if (row) {
        Object.assign(fields, row);
        logger.info(`Extracted from table: PO=${row.poNumber}, GR=${row.grId}`);
    }

    return applyChains(text, INVOICE_CHAINS, fields, logger);
}

export function extractPurchaseOrderFields(
    text: string,
    logger: Logger = silentLogger
): RawFieldMap<PurchaseOrderFieldName> {
    return applyChains(text, PURCHASE_ORDER_CHAINS, {}, logger);
}

/**
 * Pull the raw field strings for a document of the given type. Fields that no
 * strategy found are simply absent from the result.
 */
export function extractFields(
    text: string,
    documentType: ExtractableDocumentType,
    logger: Logger = silentLogger
): RawFieldMap {
    return documentType === 'invoice'
        ? extractInvoiceFields(text, logger)
        : extractPurchaseOrderFields(text, logger);
}
