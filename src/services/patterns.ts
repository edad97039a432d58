/**
 * Ordered extraction strategies per field. Within a chain the first strategy
 * that matches wins, so stricter label forms are listed before looser ones and
 * OCR-garbled label aliases sit after the clean spellings they stand in for.
 */

export type InvoiceFieldName =
    | 'invoiceNumber'
    | 'invoiceDate'
    | 'poNumber'
    | 'poDate'
    | 'grId'
    | 'grDate'
    | 'subtotal'
    | 'tax'
    | 'grandTotal';

export type PurchaseOrderFieldName = 'poNumber' | 'poDate' | 'poAmount' | 'department';

export type FieldName = InvoiceFieldName | PurchaseOrderFieldName;

export interface FieldStrategy {
    /** Short label used in debug logs. */
    name: string;
    pattern: RegExp;
}

export type FieldChain<F extends FieldName> = ReadonlyArray<readonly [F, readonly FieldStrategy[]]>;

// Day, then a month name or number, then a 2- or 4-digit year.
const DATE_TEXT = String.raw`\d{1,2}[-\/]\w+[-\/]\d{2,4}`;
const DATE_NUMERIC = String.raw`\d{1,2}[-\/]\d{1,2}[-\/]\d{2,4}`;
const AMOUNT = String.raw`\d[\d,]*\.?\d*`;
const INVOICE_ID = String.raw`[A-Z]?\d+`;

function strategy(name: string, source: string, flags = 'i'): FieldStrategy {
    return { name, pattern: new RegExp(source, flags) };
}

// PO NO | PO DATE | GR NO | GR DATE header, values in the row beneath it
const TABLE_HEADER = String.raw`PO\s*NO\.?[\s|]*PO\s*DATE[\s|]*GR\s*NO\.?[\s|]*GR\s*DATE`;
const TABLE_CELL_GAP = String.raw`[\s|]+`;

export const TABLE_ROW_STRATEGIES: readonly FieldStrategy[] = [
    strategy(
        'table-next-line',
        String.raw`${TABLE_HEADER}.*?\n[\s|]*(\d+)${TABLE_CELL_GAP}(${DATE_TEXT})${TABLE_CELL_GAP}(\d+)${TABLE_CELL_GAP}(${DATE_TEXT})`,
        'is',
    ),
    strategy(
        'table-fixed-width-ids',
        String.raw`${TABLE_HEADER}[\s\S]*?(\d{10})${TABLE_CELL_GAP}(${DATE_TEXT})${TABLE_CELL_GAP}(\d{7})${TABLE_CELL_GAP}(${DATE_TEXT})`,
        'i',
    ),
];

export const INVOICE_CHAINS: FieldChain<InvoiceFieldName> = [
    ['invoiceNumber', [
        strategy('invoice-no', String.raw`Invoice\s*No[:\s.]*(${INVOICE_ID})`),
        strategy('invoice-hash', String.raw`Invoice\s*#[:\s]*(${INVOICE_ID})`),
        strategy('inv-no', String.raw`Inv[\s.]*No[:\s.]*(${INVOICE_ID})`),
        strategy('invoice-number', String.raw`Invoice\s*Number[:\s]*(${INVOICE_ID})`),
        strategy('invoice-no-ocr', String.raw`(?:lnvoice|Iwoie|iavoie)\s*No[:\s.]*(${INVOICE_ID})`),
        strategy('invoice-no-next-line', String.raw`Invoice\s*No[:.]*[ \t]*\r?\n[^\n]*?\b([A-Z]?\d{4,})`),
    ]],
    ['invoiceDate', [
        strategy('invoice-date-text', String.raw`Invoice\s*Date[:\s.]*(${DATE_TEXT})`),
        strategy('invoice-date-numeric', String.raw`Invoice\s*Date[:\s.]*(${DATE_NUMERIC})`),
        strategy('invoice-near-date', String.raw`Invoice[\s\S]{0,30}Date[:\s]*(${DATE_TEXT})`),
        strategy('invoice-date-ocr-iwoie', String.raw`Iwoie[\s\S]{0,20}Date[:\s]*(${DATE_TEXT})`),
        strategy('invoice-date-ocr-iavoie', String.raw`iavoie[\s\S]{0,20}Date[:\s]*(${DATE_TEXT})`),
        strategy('date-after-invoice-no', String.raw`Invoice\s*No[:\s]*${INVOICE_ID}[\s\S]{0,100}?(${DATE_TEXT})`),
    ]],
    ['poNumber', [
        strategy('po-no', String.raw`PO\s*NO[:\s.]*(\d+)`),
        strategy('po-number', String.raw`PO\s*Number[:\s]*(\d+)`),
        strategy('p-o', String.raw`\bP\.?O\.?[:\s]*(\d+)`),
        strategy('purchase-order', String.raw`Purchase\s*Order[:\s]*(\d+)`),
    ]],
    ['poDate', [
        strategy('po-date-text', String.raw`PO\s*DATE[:\s.]*(${DATE_TEXT})`),
        strategy('po-date-numeric', String.raw`PO\s*DATE[:\s.]*(${DATE_NUMERIC})`),
        strategy('p-o-date', String.raw`\bP\.?O\.?\s*Date[:\s]*(${DATE_TEXT})`),
    ]],
    ['grId', [
        strategy('gr-no', String.raw`GR\s*NO[:\s.]*(\d+)`),
        strategy('gr-number', String.raw`GR\s*Number[:\s]*(\d+)`),
        strategy('g-r', String.raw`\bG\.?R\.?[:\s]*(\d+)`),
        strategy('goods-receipt', String.raw`Goods\s*Receipt[:\s]*(\d+)`),
    ]],
    ['grDate', [
        strategy('gr-date-text', String.raw`GR\s*DATE[:\s.]*(${DATE_TEXT})`),
        strategy('gr-date-numeric', String.raw`GR\s*DATE[:\s.]*(${DATE_NUMERIC})`),
        strategy('g-r-date', String.raw`\bG\.?R\.?\s*Date[:\s]*(${DATE_TEXT})`),
    ]],
    ['subtotal', [
        strategy('total-line', String.raw`^\s*TOTAL[:\s]+(${AMOUNT})`, 'im'),
        strategy('sub-total', String.raw`Sub\s*Total[:\s]+(${AMOUNT})`, 'im'),
        strategy('amount', String.raw`Amount[:\s]+(${AMOUNT})`, 'im'),
    ]],
    ['tax', [
        strategy('tax-percent', String.raw`(?:KPRA|Tax)\s*\d+%[:\s]+(${AMOUNT})`),
        strategy('tax', String.raw`(?:KPRA|Tax)[:\s]+(${AMOUNT})`),
        strategy('vat-percent', String.raw`VAT\s*\d+%[:\s]+(${AMOUNT})`),
    ]],
    ['grandTotal', [
        strategy('grand-total', String.raw`GRAND\s*TOTAL[:\s]+(${AMOUNT})`),
        strategy('total-amount', String.raw`Total\s*Amount[:\s]+(${AMOUNT})`),
        strategy('net-total', String.raw`Net\s*Total[:\s]+(${AMOUNT})`),
    ]],
];

export const PURCHASE_ORDER_CHAINS: FieldChain<PurchaseOrderFieldName> = [
    ['poNumber', [
        strategy('po-number', String.raw`PO\s*(?:Number|NO)[:\s.]+(\d+)`),
        strategy('purchase-order-number', String.raw`Purchase\s*Order\s*(?:No\.?|Number|#)?[:\s#]*(\d+)`),
    ]],
    ['poDate', [
        strategy('po-date', String.raw`PO\s*DATE[:\s]+(${DATE_TEXT})`),
        strategy('order-date', String.raw`Order\s*Date[:\s]+(${DATE_TEXT})`),
    ]],
    ['poAmount', [
        strategy('amount-or-total', String.raw`(?:Amount|Total)[:\s]+(${AMOUNT})`),
    ]],
    ['department', [
        strategy('department', String.raw`Department[:\s]+([A-Za-z][A-Za-z \t&]*)`),
        strategy('dept', String.raw`\bDept\.?[:\s]+([A-Za-z][A-Za-z \t&]*)`),
    ]],
];
