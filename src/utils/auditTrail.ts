import { AuditEntry, AuditStep } from '../types/output.js';

export function createAuditEntry(step: AuditStep, details: string): AuditEntry {
    return {
        step,
        timestamp: new Date().toISOString(),
        details,
    };
}
