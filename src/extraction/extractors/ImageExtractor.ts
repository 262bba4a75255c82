/**
 * Image OCR extractor using tesseract.
 *
 * tesseract writes its result to `<outputbase>.txt`, so each run gets a
 * scratch base path from the runner that is removed once the text has been
 * read back, whether or not tesseract succeeded.
 *
 * @module extraction/extractors/ImageExtractor
 */

import * as fs from "node:fs/promises";
import { ExtractionError } from "../errors.js";
import { ShellRunner } from "../shell/ShellRunner.js";
import type { CommandRunner, ExtractionOptions, ExtractorConfig, RawContent } from "../types.js";
import { BaseExtractor } from "./BaseExtractor.js";

/**
 * Image-specific extractor configuration.
 */
export interface ImageExtractorConfig extends ExtractorConfig {
  /**
   * @default new ShellRunner()
   */
  runner?: CommandRunner;
}

/**
 * Extracts text from images with OCR.
 *
 * The `language` option is passed to tesseract as `-l <language>`
 * (e.g. "eng", "deu+fra").
 *
 * @example
 * ```typescript
 * const extractor = new ImageExtractor();
 * const raw = await extractor.extract("/scans/receipt.png", { language: "eng" });
 * ```
 */
export class ImageExtractor extends BaseExtractor {
  readonly documentType = "image";
  override readonly methods = ["tesseract"] as const;

  private readonly runner: CommandRunner;

  constructor(config?: ImageExtractorConfig) {
    super(config);
    this.runner = config?.runner ?? new ShellRunner();
  }

  protected async extractFrom(filePath: string, options: ExtractionOptions): Promise<RawContent> {
    return this.runner.withTempFile(async (outputBase) => {
      const args = ["tesseract", filePath, outputBase];
      const language = options["language"];
      if (language !== undefined && language !== "") {
        args.push("-l", language);
      }

      await this.runner.run(args);

      const outputPath = `${outputBase}.txt`;
      try {
        return await fs.readFile(outputPath);
      } catch (error) {
        throw new ExtractionError(`tesseract produced no output file at ${outputPath}`, {
          filePath,
          cause: error instanceof Error ? error : undefined,
        });
      }
    });
  }
}
