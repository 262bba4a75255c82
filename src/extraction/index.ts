/**
 * Text extraction pipeline.
 *
 * Routes a file to a format-specific extractor, decodes the raw result to a
 * string with encoding detection and re-encodes it into the caller's
 * encoding.
 *
 * @module extraction
 *
 * @example
 * ```typescript
 * import { ExtractionPipeline, TextsiftError } from "./extraction/index.js";
 *
 * const pipeline = new ExtractionPipeline();
 * try {
 *   const bytes = await pipeline.process("/path/to/scan.png", "utf-8", { language: "eng" });
 *   process.stdout.write(bytes);
 * } catch (error) {
 *   if (error instanceof TextsiftError) {
 *     console.error(`Error [${error.code}]: ${error.message}`);
 *   }
 * }
 * ```
 */

// Type exports
export type {
  DocumentType,
  Command,
  ProcessResult,
  ExtractionOptions,
  RawContent,
  CommandRunner,
  TempFileOptions,
  DocumentExtractor,
  ExtractorConfig,
} from "./types.js";

// Constants
export {
  DEFAULT_ENCODING,
  DOCUMENT_EXTENSIONS,
  EXTENSIONLESS_ALIAS,
  DEFAULT_EXTRACTOR_CONFIG,
  DOCUMENT_TYPE_LABELS,
} from "./constants.js";

// Error classes
export {
  TextsiftError,
  ShellError,
  DecodeError,
  UnsupportedEncodingError,
  ExtractionError,
  UnsupportedFormatError,
  UnsupportedMethodError,
  MissingToolError,
  FileAccessError,
  FileTooLargeError,
  isTextsiftError,
  isExtractionError,
} from "./errors.js";
export type { TextsiftErrorOptions } from "./errors.js";

// Shell
export { ShellRunner, formatCommand } from "./shell/ShellRunner.js";
export type { ShellRunnerOptions } from "./shell/ShellRunner.js";

// Encoding
export { ContentDecoder, JschardetDetector } from "./encoding/ContentDecoder.js";
export type { EncodingDetector, DetectedEncoding } from "./encoding/ContentDecoder.js";
export { ContentEncoder } from "./encoding/ContentEncoder.js";
export {
  isSupportedEncoding,
  normalizeEncodingName,
  assertSupportedEncoding,
} from "./encoding/registry.js";

// Extractors
export {
  BaseExtractor,
  PlainTextExtractor,
  MarkdownExtractor,
  stripFrontmatter,
  PdfExtractor,
  DocxExtractor,
  DocExtractor,
  ImageExtractor,
} from "./extractors/index.js";
export type {
  PdfExtractorConfig,
  DocExtractorConfig,
  ImageExtractorConfig,
} from "./extractors/index.js";

// Routing and orchestration
export { ExtractorRegistry, normalizeExtension } from "./ExtractorRegistry.js";
export type { DetectedType, FormatInfo, ExtractorRegistryOptions } from "./ExtractorRegistry.js";
export { ExtractionPipeline } from "./ExtractionPipeline.js";
export type { ExtractionPipelineOptions, ProcessOverrides } from "./ExtractionPipeline.js";
