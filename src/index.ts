/**
 * textsift - Library Entry Point
 *
 * Re-exports the extraction pipeline and adds `extractText()`, a one-call
 * helper over a shared default pipeline.
 *
 * Logging stays silent until the host application calls initializeLogger().
 */

import { DEFAULT_ENCODING } from "./extraction/constants.js";
import { ExtractionPipeline } from "./extraction/ExtractionPipeline.js";
import type { ExtractionOptions } from "./extraction/types.js";

export * from "./extraction/index.js";
export { initializeLogger, resetLogger, type LoggerConfig, type LogLevel } from "./logging/index.js";

/**
 * Options for extractText()
 */
export interface ExtractTextOptions {
  /**
   * Output encoding
   * @default "utf-8"
   */
  encoding?: string;

  /** Treat the file as having this extension */
  extension?: string;

  /** Options passed to the extractor, e.g. `{ method: "pdf-parse" }` */
  extractorOptions?: ExtractionOptions;
}

let defaultPipeline: ExtractionPipeline | null = null;

/**
 * Extract text from a file with the default pipeline.
 *
 * @example
 * ```typescript
 * const bytes = await extractText("/docs/scan.png", { extractorOptions: { language: "deu" } });
 * console.log(bytes.toString("utf8"));
 * ```
 */
export async function extractText(
  filePath: string,
  options: ExtractTextOptions = {}
): Promise<Buffer> {
  if (defaultPipeline === null) {
    defaultPipeline = new ExtractionPipeline();
  }
  return defaultPipeline.process(
    filePath,
    options.encoding ?? DEFAULT_ENCODING,
    options.extractorOptions ?? {},
    options.extension === undefined ? undefined : { extension: options.extension }
  );
}
