export * from './docx.extractor.js';
export * from './extraction.module.js';
export * from './html.extractor.js';
export * from './pdf.extractor.js';
export * from './plain-text.extractor.js';
export * from './text-extraction.service.js';
export * from './text-extractor.js';
