/**
 * Text extraction engine and built-in extractors – unit tests
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { joinRuns, PdfTextExtractor } from '../text/PdfTextExtractor';
import { PlainTextExtractor } from '../text/PlainTextExtractor';
import { isSupportedFile, TextExtractionEngine } from '../text/TextExtractionEngine';
import { TextExtractionError, TextExtractor } from '../text/TextExtractor';
import { Logger } from '../utils/logger';

function fakeExtractor(name: string, extensions: string[], impl: (file: string) => Promise<string>) {
    return { name, extensions, extractText: jest.fn(impl) } satisfies TextExtractor;
}

function spyLogger(): Logger & { info: jest.Mock; warn: jest.Mock } {
    return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('TextExtractionEngine', () => {
    it('uses the extractor registered for the extension', async () => {
        const pdf = fakeExtractor('pdf', ['.pdf'], async () => 'pdf text');
        const txt = fakeExtractor('txt', ['.txt'], async () => 'plain text');
        const engine = new TextExtractionEngine([pdf, txt]);

        await expect(engine.extractText('/in/doc.PDF')).resolves.toBe('pdf text');
        expect(txt.extractText).not.toHaveBeenCalled();
    });

    it('falls back when an extractor throws or finds nothing', async () => {
        const logger = spyLogger();
        const broken = fakeExtractor('broken', ['.png'], async () => {
            throw new Error('engine crashed');
        });
        const blank = fakeExtractor('blank', ['.png'], async () => '   ');
        const ocr = fakeExtractor('ocr', ['.png'], async () => 'Invoice No: 1');
        const engine = new TextExtractionEngine([ocr, blank, broken], logger);

        // newest registration is tried first
        expect(engine.candidates('scan.png').map(e => e.name)).toEqual(['broken', 'blank', 'ocr']);
        await expect(engine.extractText('/in/scan.png')).resolves.toBe('Invoice No: 1');
        expect(logger.warn).toHaveBeenCalledWith("Text extractor 'broken' failed on scan.png: engine crashed");
        expect(logger.info).toHaveBeenCalledWith('No text found in scan.png with blank');
        expect(logger.info).toHaveBeenCalledWith('Extracted text from scan.png using ocr');
    });

    it("returns '' when every extractor comes up empty", async () => {
        const engine = new TextExtractionEngine([fakeExtractor('blank', ['.pdf'], async () => '')]);
        await expect(engine.extractText('empty.pdf')).resolves.toBe('');
    });

    it('throws when no extractor handles the extension', async () => {
        const engine = new TextExtractionEngine([]);
        await expect(engine.extractText('/in/scan.png')).rejects.toThrow('[engine] No text extractor for scan.png');
        await expect(engine.extractText('/in/scan.png')).rejects.toBeInstanceOf(TextExtractionError);
    });

    it('replaces an extractor registered under the same name', async () => {
        const engine = new TextExtractionEngine([fakeExtractor('ocr', ['.png'], async () => 'old')]);
        engine.register(fakeExtractor('ocr', ['.png'], async () => 'new'));

        expect(engine.candidates('a.png')).toHaveLength(1);
        await expect(engine.extractText('a.png')).resolves.toBe('new');
    });

    it('knows the supported file types', () => {
        expect(['a.pdf', 'b.TXT', 'c.jpeg', 'd.tif', 'e.bmp'].map(isSupportedFile)).toEqual([true, true, true, true, true]);
        expect(['notes.md', 'data.csv', 'README'].map(isSupportedFile)).toEqual([false, false, false]);
    });
});

describe('PlainTextExtractor', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-text-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reads the file as UTF-8', async () => {
        const file = path.join(dir, 'ocr.txt');
        fs.writeFileSync(file, 'Invoice No: 7\nTotal: 1');
        await expect(new PlainTextExtractor().extractText(file)).resolves.toBe('Invoice No: 7\nTotal: 1');
    });

    it('wraps read failures', async () => {
        const file = path.join(dir, 'missing.txt');
        await expect(new PlainTextExtractor().extractText(file)).rejects.toThrow(`[plain-text] Could not read ${file}`);
    });
});

describe('PdfTextExtractor', () => {
    it('rejects a file that is not a PDF', async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-pdf-'));
        const file = path.join(dir, 'broken.pdf');
        fs.writeFileSync(file, 'plain words, no PDF header');

        const result = new PdfTextExtractor().extractText(file);

        await expect(result).rejects.toBeInstanceOf(TextExtractionError);
        await expect(result).rejects.toThrow(/^\[pdf-text-layer\] Could not (parse|load) /);
        fs.rmSync(dir, { recursive: true, force: true });
    });
});

describe('joinRuns', () => {
    it('groups runs into lines by position', () => {
        const pages = [[
            { x: 5, y: 1, text: 'B' },
            { x: 1, y: 1.1, text: 'A' },
            { x: 1, y: 3, text: 'C' },
        ]];
        expect(joinRuns(pages)).toBe('A B\nC');
    });

    it('puts pages one after another and drops empty ones', () => {
        const pages = [
            [{ x: 1, y: 2, text: 'Invoice No: 1' }],
            [],
            [{ x: 1, y: 2, text: 'Total: 5' }],
        ];
        expect(joinRuns(pages)).toBe('Invoice No: 1\nTotal: 5');
    });
});
