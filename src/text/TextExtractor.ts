/**
 * Turns a source file into best-effort plain text. Implementations may throw;
 * the engine moves on to the next extractor that supports the file.
 */
export interface TextExtractor {
    /** Unique extractor identifier, also used as the registry key */
    readonly name: string;
    /** Lower-case extensions, dot included (".pdf") */
    readonly extensions: readonly string[];
    extractText(filePath: string): Promise<string>;
}

export class TextExtractionError extends Error {
    constructor(
        message: string,
        public readonly extractor: string,
        public readonly cause?: unknown,
    ) {
        super(`[${extractor}] ${message}`);
        this.name = 'TextExtractionError';
    }
}
