/**
 * PDF document extractor.
 *
 * Two methods are available through the `method` option:
 * - `pdftotext` (default): poppler's pdftotext, shelled out through the
 *   command runner. `layout=true` preserves the physical page layout.
 * - `pdf-parse`: in-process extraction with the pdf-parse library, for
 *   hosts without poppler installed.
 *
 * @module extraction/extractors/PdfExtractor
 */

import { createRequire } from "node:module";
import type pdfParseTypes from "pdf-parse";
import { createLazyLogger } from "../../logging/index.js";
import { ExtractionError } from "../errors.js";
import { ShellRunner } from "../shell/ShellRunner.js";
import type { CommandRunner, ExtractionOptions, ExtractorConfig, RawContent } from "../types.js";
import { BaseExtractor } from "./BaseExtractor.js";

// Import from lib directly to avoid debug mode in index.js
const require = createRequire(import.meta.url);
const pdfParse = require("pdf-parse/lib/pdf-parse.js") as typeof pdfParseTypes;

const getLogger = createLazyLogger("extraction:pdf");

/**
 * PDF-specific extractor configuration.
 */
export interface PdfExtractorConfig extends ExtractorConfig {
  /**
   * Runner for the pdftotext method.
   *
   * @default new ShellRunner()
   */
  runner?: CommandRunner;
}

/**
 * Extracts text from PDF documents.
 *
 * @example
 * ```typescript
 * const extractor = new PdfExtractor();
 *
 * const raw = await extractor.extract("/docs/report.pdf", { layout: "true" });
 * const viaLibrary = await extractor.extract("/docs/report.pdf", { method: "pdf-parse" });
 * ```
 */
export class PdfExtractor extends BaseExtractor {
  readonly documentType = "pdf";
  override readonly methods = ["pdftotext", "pdf-parse"] as const;

  private readonly runner: CommandRunner;

  constructor(config?: PdfExtractorConfig) {
    super(config);
    this.runner = config?.runner ?? new ShellRunner();
  }

  protected async extractFrom(
    filePath: string,
    options: ExtractionOptions,
    method: string | undefined
  ): Promise<RawContent> {
    if (method === "pdf-parse") {
      return this.extractWithLibrary(filePath);
    }
    return this.extractWithPdftotext(filePath, options);
  }

  private async extractWithPdftotext(
    filePath: string,
    options: ExtractionOptions
  ): Promise<RawContent> {
    const args = this.optionFlag(options, "layout")
      ? ["pdftotext", "-layout", filePath, "-"]
      : ["pdftotext", filePath, "-"];
    const { stdout } = await this.runner.run(args);
    return stdout;
  }

  private async extractWithLibrary(filePath: string): Promise<RawContent> {
    const buffer = await this.readFileBuffer(filePath);

    let result: pdfParseTypes.Result;
    try {
      result = await pdfParse(buffer);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExtractionError(`Failed to parse PDF: ${message}`, {
        filePath,
        cause: error instanceof Error ? error : undefined,
      });
    }

    getLogger().debug({ filePath, pages: result.numpages }, "Parsed PDF with pdf-parse");
    return result.text;
  }
}
