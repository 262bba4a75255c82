/**
 * Extractor exports.
 *
 * @module extraction/extractors
 */

export { BaseExtractor } from "./BaseExtractor.js";
export { PlainTextExtractor } from "./PlainTextExtractor.js";
export { MarkdownExtractor, stripFrontmatter } from "./MarkdownExtractor.js";

export { PdfExtractor } from "./PdfExtractor.js";
export type { PdfExtractorConfig } from "./PdfExtractor.js";

export { DocxExtractor } from "./DocxExtractor.js";

export { DocExtractor } from "./DocExtractor.js";
export type { DocExtractorConfig } from "./DocExtractor.js";

export { ImageExtractor } from "./ImageExtractor.js";
export type { ImageExtractorConfig } from "./ImageExtractor.js";
