/**
 * Extraction pipeline orchestrator.
 *
 * Runs one file through SELECT_EXTRACTOR → EXTRACT → DECODE → ENCODE. The
 * first failing stage aborts the run and its error reaches the caller
 * unchanged; there is no partial output and no retry.
 *
 * @module extraction/ExtractionPipeline
 */

import { createLazyLogger } from "../logging/index.js";
import { DEFAULT_ENCODING } from "./constants.js";
import { ContentDecoder } from "./encoding/ContentDecoder.js";
import { ContentEncoder } from "./encoding/ContentEncoder.js";
import { UnsupportedFormatError } from "./errors.js";
import { ExtractorRegistry, normalizeExtension } from "./ExtractorRegistry.js";
import type { DocumentExtractor, ExtractionOptions } from "./types.js";

const getLogger = createLazyLogger("extraction:pipeline");

/**
 * Collaborators of an ExtractionPipeline. Every one defaults to the
 * production implementation.
 */
export interface ExtractionPipelineOptions {
  registry?: ExtractorRegistry;
  decoder?: ContentDecoder;
  encoder?: ContentEncoder;
}

/**
 * Per-call overrides that are not extractor options.
 */
export interface ProcessOverrides {
  /**
   * Treat the file as having this extension instead of its own
   * (e.g. "pdf" for a download saved without one).
   */
  extension?: string;
}

/**
 * Extracts text from a file and re-encodes it into a target encoding.
 *
 * Holds no per-call state: concurrent `process()` calls on different files
 * are independent.
 *
 * @example
 * ```typescript
 * const pipeline = new ExtractionPipeline();
 *
 * const bytes = await pipeline.process("/docs/report.pdf", "utf-8", { layout: "true" });
 * process.stdout.write(bytes);
 * ```
 */
export class ExtractionPipeline {
  private readonly registry: ExtractorRegistry;
  private readonly decoder: ContentDecoder;
  private readonly encoder: ContentEncoder;

  constructor(options?: ExtractionPipelineOptions) {
    this.registry = options?.registry ?? new ExtractorRegistry();
    this.decoder = options?.decoder ?? new ContentDecoder();
    this.encoder = options?.encoder ?? new ContentEncoder();
  }

  /**
   * Extract, decode and encode one file.
   *
   * @param filePath - File to extract
   * @param targetEncoding - Output encoding
   * @param options - Extractor options, passed through unmodified
   * @param overrides - Per-call overrides
   * @returns The extracted text encoded in `targetEncoding`
   * @throws {UnsupportedFormatError} If no extractor handles the file's extension
   * @throws {ExtractionError} If the extractor fails
   * @throws {ShellError} If an external tool exits non-zero
   * @throws {DecodeError} If the extracted bytes cannot be decoded
   * @throws {UnsupportedEncodingError} If the detected or target encoding is unknown
   */
  async process(
    filePath: string,
    targetEncoding: string = DEFAULT_ENCODING,
    options: ExtractionOptions = {},
    overrides?: ProcessOverrides
  ): Promise<Buffer> {
    const logger = getLogger();
    const startTime = performance.now();

    const extractor = this.selectExtractor(filePath, overrides);
    logger.debug(
      { filePath, documentType: extractor.documentType, stage: "SELECT_EXTRACTOR" },
      "Selected extractor"
    );

    const raw = await extractor.extract(filePath, options);
    logger.debug(
      {
        filePath,
        stage: "EXTRACT",
        contentKind: typeof raw === "string" ? "text" : "bytes",
        length: raw.length,
      },
      "Extracted raw content"
    );

    const text = this.decoder.decode(raw);
    logger.debug({ filePath, stage: "DECODE", characters: text.length }, "Decoded content");

    const output = this.encoder.encode(text, targetEncoding);
    logger.debug(
      {
        filePath,
        stage: "ENCODE",
        encoding: targetEncoding,
        bytes: output.length,
        duration_ms: Math.round(performance.now() - startTime),
      },
      "Encoded output"
    );

    return output;
  }

  /**
   * The registry this pipeline routes through.
   */
  getRegistry(): ExtractorRegistry {
    return this.registry;
  }

  private selectExtractor(filePath: string, overrides?: ProcessOverrides): DocumentExtractor {
    const extension =
      overrides?.extension !== undefined
        ? normalizeExtension(overrides.extension)
        : this.registry.getExtension(filePath);

    const extractor = this.registry.getExtractorForExtension(extension);
    if (extractor === null) {
      throw new UnsupportedFormatError(`Unsupported file format: ${extension}`, extension, {
        filePath,
      });
    }
    return extractor;
  }
}
