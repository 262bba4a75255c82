/**
 * Type definitions for the extraction pipeline.
 *
 * @module extraction/types
 */

/**
 * Document families an extractor can handle.
 */
export type DocumentType = "txt" | "markdown" | "pdf" | "docx" | "doc" | "image";

/**
 * A command for the external process environment.
 *
 * An array is executed directly (program followed by its arguments); a
 * string is handed to `/bin/sh -c` and may use shell syntax.
 *
 * @example
 * ```typescript
 * const direct: Command = ["pdftotext", "-layout", "report.pdf", "-"];
 * const viaShell: Command = "antiword report.doc | tr -s ' '";
 * ```
 */
export type Command = readonly string[] | string;

/**
 * Captured outcome of an external process. Frozen once produced.
 */
export interface ProcessResult {
  readonly stdout: Buffer;
  readonly stderr: Buffer;
  readonly exitCode: number;
}

/**
 * Opaque extractor options (`-O key=value` on the command line).
 *
 * Keys are extractor-specific. The pipeline passes the mapping through
 * untouched, and extractors ignore keys they do not recognize, so a single
 * mapping can be shared across heterogeneous files.
 */
export type ExtractionOptions = Readonly<Record<string, string>>;

/**
 * Extractor output: raw bytes of unknown encoding, or text an extractor has
 * already decoded itself.
 */
export type RawContent = Buffer | string;

/**
 * Anything that can run a command and capture its output.
 *
 * ShellRunner is the production implementation; tests substitute fakes.
 */
export interface CommandRunner {
  /**
   * Run a command to completion.
   *
   * @throws {ShellError} When the command exits with a non-zero status
   * @throws {MissingToolError} When the program cannot be started
   */
  run(command: Command): Promise<ProcessResult>;

  /**
   * Hand `fn` a scratch file path that is removed however `fn` settles.
   */
  withTempFile<T>(fn: (tempPath: string) => Promise<T>, options?: TempFileOptions): Promise<T>;
}

/**
 * Options for scratch file creation.
 */
export interface TempFileOptions {
  /**
   * Prefix for the scratch directory name.
   *
   * @default "textsift-"
   */
  prefix?: string;

  /**
   * Extension appended to the scratch file name, including the dot.
   *
   * @default ""
   */
  extension?: string;
}

/**
 * Contract every format-specific extractor implements.
 *
 * @example
 * ```typescript
 * class TsvExtractor implements DocumentExtractor {
 *   readonly documentType = "txt";
 *   readonly extensions = [".tsv"];
 *   readonly methods = [];
 *
 *   supports(extension: string): boolean {
 *     return this.extensions.includes(extension.toLowerCase());
 *   }
 *
 *   async extract(filePath: string): Promise<RawContent> {
 *     return fs.readFile(filePath);
 *   }
 * }
 * ```
 */
export interface DocumentExtractor {
  /**
   * Document family handled by this extractor.
   */
  readonly documentType: DocumentType;

  /**
   * File extensions (lowercase, with dot) this extractor is registered for.
   */
  readonly extensions: readonly string[];

  /**
   * Sub-methods selectable through the `method` option. The first entry is
   * the default; an empty list means the extractor has a single strategy.
   */
  readonly methods: readonly string[];

  /**
   * Check if this extractor handles a file extension.
   *
   * @param extension - File extension including dot (e.g., ".pdf")
   */
  supports(extension: string): boolean;

  /**
   * Extract raw content from a file.
   *
   * @throws {ExtractionError} For format-specific failures
   * @throws {ShellError} When an external tool exits non-zero
   */
  extract(filePath: string, options: ExtractionOptions): Promise<RawContent>;
}

/**
 * Configuration shared by all extractors.
 */
export interface ExtractorConfig {
  /**
   * Maximum file size in bytes to process.
   *
   * @default 52428800 (50MB)
   */
  maxFileSizeBytes?: number;
}
