/**
 * Shared plumbing for format-specific extractors.
 *
 * @module extraction/extractors/BaseExtractor
 */

import * as fs from "node:fs/promises";
import { DEFAULT_EXTRACTOR_CONFIG, DOCUMENT_EXTENSIONS } from "../constants.js";
import { FileAccessError, FileTooLargeError, UnsupportedMethodError } from "../errors.js";
import type {
  DocumentExtractor,
  DocumentType,
  ExtractionOptions,
  ExtractorConfig,
  RawContent,
} from "../types.js";

const TRUTHY_OPTION_VALUES = new Set(["true", "1", "yes", "on"]);

/**
 * Base class for extractors.
 *
 * Subclasses declare their document type and methods and implement
 * `extractFrom()`. The base validates the file before handing it over and
 * resolves the `method` option against `methods`.
 */
export abstract class BaseExtractor implements DocumentExtractor {
  abstract readonly documentType: DocumentType;
  readonly methods: readonly string[] = [];

  protected readonly config: Required<ExtractorConfig>;

  constructor(config?: ExtractorConfig) {
    this.config = {
      maxFileSizeBytes: config?.maxFileSizeBytes ?? DEFAULT_EXTRACTOR_CONFIG.maxFileSizeBytes,
    };
  }

  get extensions(): readonly string[] {
    return DOCUMENT_EXTENSIONS[this.documentType];
  }

  /**
   * Check if this extractor supports a given file extension.
   *
   * @param extension - File extension including dot (e.g., ".pdf")
   */
  supports(extension: string): boolean {
    return this.extensions.includes(extension.toLowerCase());
  }

  /**
   * Get the current configuration.
   */
  getConfig(): Readonly<Required<ExtractorConfig>> {
    return this.config;
  }

  /**
   * Validate the file, then extract.
   *
   * @throws {FileAccessError} If the file cannot be accessed
   * @throws {FileTooLargeError} If the file exceeds the size limit
   * @throws {UnsupportedMethodError} If `options.method` names none of several offered methods
   */
  async extract(filePath: string, options: ExtractionOptions): Promise<RawContent> {
    const method = this.resolveMethod(options, filePath);
    await this.assertReadable(filePath);
    return this.extractFrom(filePath, options, method);
  }

  /**
   * Format-specific extraction.
   *
   * @param method - Resolved sub-method, or undefined for single-strategy extractors
   */
  protected abstract extractFrom(
    filePath: string,
    options: ExtractionOptions,
    method: string | undefined
  ): Promise<RawContent>;

  /**
   * Pick the sub-method named by `options.method`, falling back to the
   * first declared method. An empty method string means "default".
   *
   * Only extractors offering a choice check `method`; the others ignore it,
   * so one options mapping can be shared across formats.
   */
  protected resolveMethod(options: ExtractionOptions, filePath: string): string | undefined {
    const requested = options["method"];
    if (this.methods.length <= 1 || requested === undefined || requested === "") {
      return this.methods[0];
    }
    if (!this.methods.includes(requested)) {
      throw new UnsupportedMethodError(requested, this.methods, { filePath });
    }
    return requested;
  }

  /**
   * Read a boolean-ish option ("true", "1", "yes", "on").
   */
  protected optionFlag(options: ExtractionOptions, key: string): boolean {
    const value = options[key];
    return value !== undefined && TRUTHY_OPTION_VALUES.has(value.trim().toLowerCase());
  }

  /**
   * Read the whole file.
   *
   * @throws {FileAccessError} If the file cannot be read
   */
  protected async readFileBuffer(filePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      throw new FileAccessError(`Cannot read file: ${filePath}`, {
        filePath,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private async assertReadable(filePath: string): Promise<void> {
    let size: number;
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        throw new FileAccessError(`Not a regular file: ${filePath}`, { filePath });
      }
      size = stats.size;
    } catch (error) {
      if (error instanceof FileAccessError) {
        throw error;
      }
      const code = isErrnoException(error) ? error.code : undefined;
      const cause = error instanceof Error ? error : undefined;
      if (code === "ENOENT") {
        throw new FileAccessError(`File not found: ${filePath}`, { filePath, cause });
      }
      if (code === "EACCES") {
        throw new FileAccessError(`Permission denied: ${filePath}`, { filePath, cause });
      }
      throw new FileAccessError(`Cannot access file: ${filePath}`, { filePath, cause });
    }

    if (size > this.config.maxFileSizeBytes) {
      throw new FileTooLargeError(
        `File exceeds maximum size of ${this.config.maxFileSizeBytes} bytes (actual: ${size} bytes)`,
        size,
        this.config.maxFileSizeBytes,
        { filePath }
      );
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
