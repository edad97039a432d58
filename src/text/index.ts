export * from './TextExtractor.js';
export * from './PlainTextExtractor.js';
export * from './PdfTextExtractor.js';
export * from './TextExtractionEngine.js';
