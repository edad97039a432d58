export type DocumentErrorKind = 'ExtractionFailure' | 'UnknownDocumentType' | 'UnparsableDocument';

/**
 * A failure confined to one source document. The batch logs it against the
 * file name and moves on to the next document.
 */
export class DocumentError extends Error {
    constructor(
        public readonly kind: DocumentErrorKind,
        public readonly filename: string,
        message: string,
        public readonly cause?: unknown,
    ) {
        super(message);
        this.name = kind;
    }
}

export class ExtractionFailure extends DocumentError {
    constructor(filename: string, message = 'No text could be extracted', cause?: unknown) {
        super('ExtractionFailure', filename, message, cause);
    }
}

export class UnknownDocumentType extends DocumentError {
    constructor(filename: string) {
        super('UnknownDocumentType', filename, 'Unknown document type');
    }
}

export class UnparsableDocument extends DocumentError {
    constructor(filename: string, documentLabel: 'invoice' | 'PO') {
        super('UnparsableDocument', filename, `Failed to parse ${documentLabel} data`);
    }
}

/** Raised by the workbook when the SQLite layer or the file system rejects an operation. */
export class WorkbookError extends Error {
    constructor(message: string, public readonly cause?: unknown) {
        super(message);
        this.name = 'WorkbookError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
