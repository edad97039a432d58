/**
 * Shared document texts for the extraction and pipeline tests.
 */

export const TABLE_INVOICE_TEXT = [
    'ACME SUPPLIES LTD',
    'INVOICE',
    'Invoice No: A1001',
    'PO NO PO DATE GR NO GR DATE',
    '1234567890 01-Jan-24 7654321 05-Jan-24',
    'Item A 1,000.00',
    'TOTAL: 1,000.00',
].join('\n');

export const LABELLED_INVOICE_TEXT = [
    'Invoice No: 20456',
    'Invoice Date: 12/03/2024',
    'PO Number: 4500012',
    'PO Date: 01-Mar-24',
    'GR No: 778899',
    'GR Date: 05-Mar-2024',
    'Sub Total: 2,500.50',
    'Tax 12%: 300.06',
    'Grand Total: 2,800.56',
].join('\n');

export const PURCHASE_ORDER_TEXT = [
    'PURCHASE ORDER',
    'PO Number: 9999',
    'PO Date: 03-Jan-2024',
    'Department: Finance',
    'Total: 500.00',
].join('\n');

export const LINKED_INVOICE_TEXT = [
    'INVOICE',
    'Invoice No: B2002',
    'Invoice Date: 10-Jan-2024',
    'PO No: 9999',
    'Sub Total: 200.00',
].join('\n');
