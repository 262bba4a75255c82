/**
 * Microsoft Word DOCX document extractor using mammoth.
 *
 * @module extraction/extractors/DocxExtractor
 */

import mammoth from "mammoth";
import { createLazyLogger } from "../../logging/index.js";
import { ExtractionError } from "../errors.js";
import type { RawContent } from "../types.js";
import { BaseExtractor } from "./BaseExtractor.js";

const getLogger = createLazyLogger("extraction:docx");

/**
 * Extracts raw paragraph text from DOCX documents.
 *
 * mammoth decodes the document's XML itself, so the result is already a
 * string and passes through the decoder untouched.
 *
 * @example
 * ```typescript
 * const extractor = new DocxExtractor();
 * const text = await extractor.extract("/docs/report.docx", {});
 * ```
 */
export class DocxExtractor extends BaseExtractor {
  readonly documentType = "docx";
  override readonly methods = ["mammoth"] as const;

  protected async extractFrom(filePath: string): Promise<RawContent> {
    try {
      const result = await mammoth.extractRawText({ path: filePath });
      if (result.messages.length > 0) {
        getLogger().debug(
          { filePath, messages: result.messages.map((m) => m.message) },
          "mammoth reported conversion messages"
        );
      }
      return result.value;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExtractionError(`Failed to extract DOCX content: ${message}`, {
        filePath,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}
