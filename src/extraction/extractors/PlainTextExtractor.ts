/**
 * Plain text extractor.
 *
 * @module extraction/extractors/PlainTextExtractor
 */

import type { RawContent } from "../types.js";
import { BaseExtractor } from "./BaseExtractor.js";

/**
 * Returns the file's bytes untouched; encoding detection happens downstream.
 *
 * @example
 * ```typescript
 * const extractor = new PlainTextExtractor();
 * const bytes = await extractor.extract("/notes/todo.txt", {});
 * ```
 */
export class PlainTextExtractor extends BaseExtractor {
  readonly documentType = "txt";

  protected async extractFrom(filePath: string): Promise<RawContent> {
    return this.readFileBuffer(filePath);
  }
}
