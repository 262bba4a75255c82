/**
 * Extension-based extractor routing.
 *
 * @module extraction/ExtractorRegistry
 */

import * as path from "node:path";
import { DOCUMENT_TYPE_LABELS, EXTENSIONLESS_ALIAS } from "./constants.js";
import { ShellRunner } from "./shell/ShellRunner.js";
import type { CommandRunner, DocumentExtractor, DocumentType, ExtractorConfig } from "./types.js";
import {
  DocExtractor,
  DocxExtractor,
  ImageExtractor,
  MarkdownExtractor,
  PdfExtractor,
  PlainTextExtractor,
} from "./extractors/index.js";

/**
 * Detected type result for a path.
 */
export type DetectedType = DocumentType | "unknown";

/**
 * Summary of one registered format, for listings.
 */
export interface FormatInfo {
  documentType: DocumentType;
  label: string;
  extensions: readonly string[];
  methods: readonly string[];
}

/**
 * Options for constructing an ExtractorRegistry.
 */
export interface ExtractorRegistryOptions extends ExtractorConfig {
  /**
   * Runner shared by every shelling extractor.
   *
   * @default new ShellRunner()
   */
  runner?: CommandRunner;

  /**
   * Additional extractors. They are registered after the built-in ones, so
   * they take over any extension they share with a built-in extractor.
   */
  extractors?: readonly DocumentExtractor[];
}

/**
 * Maps file extensions to extractor instances.
 *
 * The table is built once in the constructor and never changes afterwards.
 *
 * @example
 * ```typescript
 * const registry = new ExtractorRegistry();
 *
 * registry.detect("/path/to/report.pdf"); // "pdf"
 * registry.detect("/path/to/README"); // "txt"
 * registry.detect("/path/to/file.xyz"); // "unknown"
 *
 * const extractor = registry.getExtractor("/path/to/report.pdf");
 * ```
 */
export class ExtractorRegistry {
  private readonly table: ReadonlyMap<string, DocumentExtractor>;
  private readonly extractors: readonly DocumentExtractor[];

  constructor(options?: ExtractorRegistryOptions) {
    const runner = options?.runner ?? new ShellRunner();
    const config: ExtractorConfig = { maxFileSizeBytes: options?.maxFileSizeBytes };

    const builtIn: DocumentExtractor[] = [
      new PlainTextExtractor(config),
      new MarkdownExtractor(config),
      new PdfExtractor({ ...config, runner }),
      new DocxExtractor(config),
      new DocExtractor({ ...config, runner }),
      new ImageExtractor({ ...config, runner }),
    ];

    this.extractors = [...builtIn, ...(options?.extractors ?? [])];

    const table = new Map<string, DocumentExtractor>();
    for (const extractor of this.extractors) {
      for (const extension of extractor.extensions) {
        table.set(extension.toLowerCase(), extractor);
      }
    }
    this.table = table;
  }

  /**
   * Lowercase extension of a path including the dot, or "" when it has none.
   *
   * @example
   * ```typescript
   * registry.getExtension("/path/to/file.PDF"); // ".pdf"
   * registry.getExtension("/path/to/Makefile"); // ""
   * ```
   */
  getExtension(filePath: string): string {
    return path.extname(filePath).toLowerCase();
  }

  /**
   * Find the extractor for an extension. An empty extension resolves to the
   * plain text extractor.
   *
   * @param extension - Extension with or without the leading dot
   * @returns The extractor, or null when none is registered
   */
  getExtractorForExtension(extension: string): DocumentExtractor | null {
    const normalized = normalizeExtension(extension) || EXTENSIONLESS_ALIAS;
    return this.table.get(normalized) ?? null;
  }

  /**
   * Get the extractor for a file path, or null if its type is unsupported.
   */
  getExtractor(filePath: string): DocumentExtractor | null {
    return this.getExtractorForExtension(this.getExtension(filePath));
  }

  /**
   * Detect the document type of a file path.
   */
  detect(filePath: string): DetectedType {
    return this.getExtractor(filePath)?.documentType ?? "unknown";
  }

  /**
   * Check if a file type is supported.
   */
  isSupported(filePath: string): boolean {
    return this.getExtractor(filePath) !== null;
  }

  /**
   * List registered formats, one entry per extractor.
   */
  listFormats(): FormatInfo[] {
    return this.extractors.map((extractor) => ({
      documentType: extractor.documentType,
      label: DOCUMENT_TYPE_LABELS[extractor.documentType],
      extensions: extractor.extensions,
      methods: extractor.methods,
    }));
  }
}

/**
 * Lowercase an extension and ensure it starts with a dot.
 *
 * @example
 * ```typescript
 * normalizeExtension("PDF"); // ".pdf"
 * normalizeExtension(".Md"); // ".md"
 * normalizeExtension(""); // ""
 * ```
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (trimmed === "") {
    return "";
  }
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}
