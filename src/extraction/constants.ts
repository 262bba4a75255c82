/**
 * Constants for the extraction pipeline.
 *
 * @module extraction/constants
 */

import type { DocumentType } from "./types.js";

/**
 * Output encoding used when the caller does not name one.
 */
export const DEFAULT_ENCODING = "utf-8";

/**
 * File extensions grouped by document type.
 *
 * @example
 * ```typescript
 * if (DOCUMENT_EXTENSIONS.pdf.includes(extension)) {
 *   // Handle PDF
 * }
 * ```
 */
export const DOCUMENT_EXTENSIONS: Readonly<Record<DocumentType, readonly string[]>> = {
  txt: [".txt", ".text", ".csv", ".log", ".json"],
  markdown: [".md", ".markdown"],
  pdf: [".pdf"],
  docx: [".docx"],
  doc: [".doc"],
  image: [".png", ".jpg", ".jpeg", ".gif", ".tif", ".tiff", ".bmp", ".webp"],
};

/**
 * Extension assumed for files that have none.
 */
export const EXTENSIONLESS_ALIAS = ".txt";

/**
 * Default configuration values for extractors.
 */
export const DEFAULT_EXTRACTOR_CONFIG = {
  /**
   * Maximum file size: 50MB
   */
  maxFileSizeBytes: 52_428_800,
} as const;

/**
 * Document type labels for display purposes.
 */
export const DOCUMENT_TYPE_LABELS: Readonly<Record<DocumentType, string>> = {
  txt: "Text File",
  markdown: "Markdown File",
  pdf: "PDF Document",
  docx: "Word Document",
  doc: "Legacy Word Document",
  image: "Image (OCR)",
};
