import { promises as fs } from 'fs';
import { TextExtractionError, TextExtractor } from './TextExtractor.js';

/** Reads text that an upstream OCR step already wrote next to the scans. */
export class PlainTextExtractor implements TextExtractor {
    readonly name = 'plain-text';
    readonly extensions = ['.txt'];

    async extractText(filePath: string): Promise<string> {
        try {
            return await fs.readFile(filePath, 'utf-8');
        } catch (err) {
            throw new TextExtractionError(`Could not read ${filePath}`, this.name, err);
        }
    }
}
