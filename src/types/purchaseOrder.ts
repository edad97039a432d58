// Purchase Order Types
export const UNKNOWN_DEPARTMENT = 'N/A';

export interface PurchaseOrderFields {
    poNumber?: string;
    poDate?: string;
    poAmount?: number;
    department?: string;
}

export interface PurchaseOrderDraft extends PurchaseOrderFields {
    poNumber: string;
    department: string;
}

export interface PurchaseOrderRecord {
    serial: number;
    poNumber: string;
    poDate: string;
    poAmount: number;
    department: string;
}

/** Values an invoice copies from the first purchase order with a matching number. */
export interface PurchaseOrderLookup {
    serial: number;
    poDate: string;
    department: string;
}
