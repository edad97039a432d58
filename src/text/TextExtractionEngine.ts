import * as path from 'path';
import { Logger, silentLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { PdfTextExtractor } from './PdfTextExtractor.js';
import { PlainTextExtractor } from './PlainTextExtractor.js';
import { TextExtractionError, TextExtractor } from './TextExtractor.js';

export const PDF_EXTENSIONS = ['.pdf'];
export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.tiff', '.tif', '.bmp'];
export const TEXT_EXTENSIONS = ['.txt'];
export const SUPPORTED_EXTENSIONS = [...PDF_EXTENSIONS, ...TEXT_EXTENSIONS, ...IMAGE_EXTENSIONS];

export function isSupportedFile(filePath: string): boolean {
    return SUPPORTED_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

export function defaultExtractors(): TextExtractor[] {
    return [new PdfTextExtractor(), new PlainTextExtractor()];
}

/**
 * Runs the extractors that claim a file's extension in registration order,
 * newest first, falling back to the next one when an extractor throws or
 * returns only whitespace.
 */
export class TextExtractionEngine {
    private readonly extractors = new Map<string, TextExtractor>();

    constructor(
        extractors: TextExtractor[] = defaultExtractors(),
        private readonly logger: Logger = silentLogger
    ) {
        extractors.forEach(extractor => this.register(extractor));
    }

    /** Add or replace an extractor; it is tried before the ones already registered. */
    register(extractor: TextExtractor): void {
        this.extractors.delete(extractor.name);
        const existing = [...this.extractors.values()];
        this.extractors.clear();
        this.extractors.set(extractor.name, extractor);
        existing.forEach(e => this.extractors.set(e.name, e));
    }

    candidates(filePath: string): TextExtractor[] {
        const extension = path.extname(filePath).toLowerCase();
        return [...this.extractors.values()].filter(e => e.extensions.includes(extension));
    }

    /** Best-effort text; '' when nothing could read the file. */
    async extractText(filePath: string): Promise<string> {
        const name = path.basename(filePath);
        const candidates = this.candidates(filePath);

        if (candidates.length === 0) {
            throw new TextExtractionError(`No text extractor for ${name}`, 'engine');
        }

        for (const extractor of candidates) {
            try {
                const text = await extractor.extractText(filePath);
                if (text.trim()) {
                    this.logger.info(`Extracted text from ${name} using ${extractor.name}`);
                    return text;
                }
                this.logger.info(`No text found in ${name} with ${extractor.name}`);
            } catch (err) {
                this.logger.warn(`Text extractor '${extractor.name}' failed on ${name}: ${errorMessage(err)}`);
            }
        }

        return '';
    }
}
