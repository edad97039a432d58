import PDFParser from 'pdf2json';
import { errorMessage } from '../utils/errors.js';
import { TextExtractionError, TextExtractor } from './TextExtractor.js';

interface PositionedText {
    x: number;
    y: number;
    text: string;
}

// Runs whose y positions differ by less than this share a line
const LINE_TOLERANCE = 0.5;

function decodeRun(encoded: string): string {
    try {
        return decodeURIComponent(encoded);
    } catch {
        return encoded;
    }
}

/**
 * Joins positioned runs into lines: same-line runs left to right, lines top to
 * bottom, pages one after another.
 */
export function joinRuns(pages: PositionedText[][]): string {
    const pageTexts = pages.map(runs => {
        const lines = new Map<number, PositionedText[]>();
        for (const run of runs) {
            const key = Math.round(run.y / LINE_TOLERANCE) * LINE_TOLERANCE;
            const line = lines.get(key) ?? [];
            line.push(run);
            lines.set(key, line);
        }

        return [...lines.entries()]
            .sort(([a], [b]) => a - b)
            .map(([, line]) => line.sort((a, b) => a.x - b.x).map(run => run.text).join(' ').trim())
            .filter(line => line.length > 0)
            .join('\n');
    });

    return pageTexts.filter(page => page.length > 0).join('\n');
}

/** Text layer of a PDF via pdf2json. Scanned PDFs without one yield ''. */
export class PdfTextExtractor implements TextExtractor {
    readonly name = 'pdf-text-layer';
    readonly extensions = ['.pdf'];

    extractText(filePath: string): Promise<string> {
        return new Promise((resolve, reject) => {
            const parser = new PDFParser();

            parser.on('pdfParser_dataError', (errData) => {
                const cause = 'parserError' in errData ? errData.parserError : errData;
                reject(new TextExtractionError(
                    `Could not parse ${filePath}: ${errorMessage(cause)}`,
                    this.name,
                    cause
                ));
            });

            parser.on('pdfParser_dataReady', (pdfData) => {
                const pages = pdfData.Pages.map(page =>
                    (page.Texts ?? []).flatMap(block =>
                        (block.R ?? []).map(run => ({ x: block.x, y: block.y, text: decodeRun(run.T) }))
                    )
                );
                resolve(joinRuns(pages));
            });

            Promise.resolve(parser.loadPDF(filePath)).catch((err: unknown) => {
                reject(new TextExtractionError(`Could not load ${filePath}`, this.name, err));
            });
        });
    }
}
