/**
 * Markdown extractor.
 *
 * Markdown is already plain text, so the extractor returns the file's bytes.
 * With `strip_frontmatter=true` a leading YAML frontmatter block
 * (`---` … `---`) is cut off first.
 *
 * @module extraction/extractors/MarkdownExtractor
 */

import type { ExtractionOptions, RawContent } from "../types.js";
import { BaseExtractor } from "./BaseExtractor.js";

/**
 * Frontmatter at the very start of the file, optionally after a UTF-8 BOM.
 * Matched against a latin1 view of the bytes, so match offsets are byte
 * offsets.
 */
const FRONTMATTER_PATTERN = /^(?:\xEF\xBB\xBF)?---[ \t]*\r?\n[\s\S]*?\r?\n---[ \t]*(?:\r?\n|$)/;

/**
 * Extracts Markdown source text.
 *
 * @example
 * ```typescript
 * const extractor = new MarkdownExtractor();
 * const body = await extractor.extract("/docs/guide.md", { strip_frontmatter: "true" });
 * ```
 */
export class MarkdownExtractor extends BaseExtractor {
  readonly documentType = "markdown";

  protected async extractFrom(filePath: string, options: ExtractionOptions): Promise<RawContent> {
    const buffer = await this.readFileBuffer(filePath);

    if (!this.optionFlag(options, "strip_frontmatter")) {
      return buffer;
    }

    return stripFrontmatter(buffer);
  }
}

/**
 * Remove a leading frontmatter block, keeping the remaining bytes as-is.
 *
 * @example
 * ```typescript
 * stripFrontmatter(Buffer.from("---\ntitle: x\n---\n# Body\n")).toString(); // "# Body\n"
 * ```
 */
export function stripFrontmatter(buffer: Buffer): Buffer {
  const match = FRONTMATTER_PATTERN.exec(buffer.toString("latin1"));
  if (!match) {
    return buffer;
  }
  return buffer.subarray(match[0].length);
}
