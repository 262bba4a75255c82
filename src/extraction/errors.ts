/**
 * Extraction error classes.
 *
 * Every failure the pipeline can surface is a TextsiftError carrying a
 * code for categorization, optional cause chaining and the file path that
 * was being processed. Nothing in the pipeline is retryable: external tools
 * and codecs are deterministic, so the same input fails the same way twice.
 *
 * @module extraction/errors
 */

/**
 * Options for constructing a TextsiftError.
 */
export interface TextsiftErrorOptions {
  /**
   * The underlying error that caused this error.
   */
  cause?: Error;

  /**
   * Whether the operation can be retried.
   *
   * @default false
   */
  retryable?: boolean;

  /**
   * File path associated with the error.
   */
  filePath?: string;
}

/**
 * Base error class for every failure raised by the extraction pipeline.
 *
 * @example
 * ```typescript
 * try {
 *   await pipeline.process("/path/to/file.pdf", "utf-8", {});
 * } catch (error) {
 *   if (error instanceof TextsiftError) {
 *     console.error(`Error [${error.code}]: ${error.message}`);
 *   }
 * }
 * ```
 */
export class TextsiftError extends Error {
  public readonly code: string;
  public override readonly cause?: Error;
  public readonly retryable: boolean;
  public readonly filePath?: string;

  constructor(message: string, code: string = "TEXTSIFT_ERROR", options?: TextsiftErrorOptions) {
    super(message);
    this.name = "TextsiftError";
    this.code = code;
    this.cause = options?.cause;
    this.retryable = options?.retryable ?? false;
    this.filePath = options?.filePath;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (options?.cause?.stack) {
      this.stack = `${this.stack ?? ""}\nCaused by: ${options.cause.stack}`;
    }
  }
}

/**
 * Error thrown when an external command exits with a non-zero status.
 *
 * Carries everything needed to reproduce the failure by hand: the exact
 * command, its exit code and both captured output streams.
 *
 * @example
 * ```typescript
 * try {
 *   await runner.run(["pdftotext", "-layout", filePath, "-"]);
 * } catch (error) {
 *   if (error instanceof ShellError) {
 *     console.error(error.exitCode, error.stderr.toString());
 *   }
 * }
 * ```
 */
export class ShellError extends TextsiftError {
  public readonly command: string;
  public readonly exitCode: number;
  public readonly stdout: Buffer;
  public readonly stderr: Buffer;

  constructor(
    command: string,
    exitCode: number,
    stdout: Buffer,
    stderr: Buffer,
    options?: TextsiftErrorOptions
  ) {
    const detail = stderr.toString("utf8").trim();
    super(
      `Command "${command}" exited with code ${exitCode}${detail ? `: ${detail}` : ""}`,
      "SHELL_ERROR",
      { ...options, retryable: false }
    );
    this.name = "ShellError";
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

/**
 * Error thrown when extracted bytes cannot be decoded to text.
 *
 * `encoding` is the encoding that was attempted, or null when the detector
 * produced no guess at all.
 */
export class DecodeError extends TextsiftError {
  public readonly encoding: string | null;

  constructor(message: string, encoding: string | null, options?: TextsiftErrorOptions) {
    super(message, "DECODE_ERROR", { ...options, retryable: false });
    this.name = "DecodeError";
    this.encoding = encoding;
  }
}

/**
 * Error thrown when an encoding name is not known to the encoding registry.
 *
 * Raised for caller-supplied target encodings and for detector guesses alike.
 */
export class UnsupportedEncodingError extends TextsiftError {
  public readonly encoding: string;

  constructor(encoding: string, options?: TextsiftErrorOptions) {
    super(`Unsupported encoding: "${encoding}"`, "UNSUPPORTED_ENCODING", {
      ...options,
      retryable: false,
    });
    this.name = "UnsupportedEncodingError";
    this.encoding = encoding;
  }
}

/**
 * Error thrown when a format-specific extractor fails.
 *
 * Base of all extractor failures: corrupt documents, missing external
 * tools, unknown extraction methods and unreadable files.
 *
 * @example
 * ```typescript
 * try {
 *   const result = await mammoth.extractRawText({ path: filePath });
 * } catch (error) {
 *   throw new ExtractionError("Failed to extract DOCX content", {
 *     cause: error instanceof Error ? error : undefined,
 *     filePath,
 *   });
 * }
 * ```
 */
export class ExtractionError extends TextsiftError {
  constructor(message: string, options?: TextsiftErrorOptions, code: string = "EXTRACTION_ERROR") {
    super(message, code, options);
    this.name = "ExtractionError";
  }
}

/**
 * Error thrown when no extractor is registered for a file extension.
 */
export class UnsupportedFormatError extends ExtractionError {
  public readonly extension: string;

  constructor(message: string, extension: string, options?: TextsiftErrorOptions) {
    super(message, options, "UNSUPPORTED_FORMAT");
    this.name = "UnsupportedFormatError";
    this.extension = extension;
  }
}

/**
 * Error thrown when the `method` option names a sub-method the extractor
 * does not offer.
 */
export class UnsupportedMethodError extends ExtractionError {
  public readonly method: string;
  public readonly supportedMethods: readonly string[];

  constructor(method: string, supportedMethods: readonly string[], options?: TextsiftErrorOptions) {
    super(
      `Unsupported extraction method "${method}" (expected one of: ${supportedMethods.join(", ")})`,
      options,
      "UNSUPPORTED_METHOD"
    );
    this.name = "UnsupportedMethodError";
    this.method = method;
    this.supportedMethods = supportedMethods;
  }
}

/**
 * Error thrown when an external program an extractor depends on cannot be
 * started, typically because it is not installed or not on PATH.
 */
export class MissingToolError extends ExtractionError {
  public readonly tool: string;

  constructor(tool: string, options?: TextsiftErrorOptions) {
    super(`Required external tool "${tool}" could not be started`, options, "MISSING_TOOL");
    this.name = "MissingToolError";
    this.tool = tool;
  }
}

/**
 * Error thrown when the input file cannot be accessed.
 */
export class FileAccessError extends ExtractionError {
  constructor(message: string, options?: TextsiftErrorOptions) {
    super(message, options, "FILE_ACCESS_ERROR");
    this.name = "FileAccessError";
  }
}

/**
 * Error thrown when the input file exceeds the configured size limit.
 */
export class FileTooLargeError extends ExtractionError {
  public readonly actualSizeBytes: number;
  public readonly maxSizeBytes: number;

  constructor(
    message: string,
    actualSizeBytes: number,
    maxSizeBytes: number,
    options?: TextsiftErrorOptions
  ) {
    super(message, options, "FILE_TOO_LARGE");
    this.name = "FileTooLargeError";
    this.actualSizeBytes = actualSizeBytes;
    this.maxSizeBytes = maxSizeBytes;
  }
}

/**
 * Type guard to check if an error is a TextsiftError.
 *
 * @example
 * ```typescript
 * if (isTextsiftError(error)) {
 *   console.error(`[${error.code}] ${error.message}`);
 * }
 * ```
 */
export function isTextsiftError(error: unknown): error is TextsiftError {
  return error instanceof TextsiftError;
}

/**
 * Type guard to check if an error came from an extractor.
 */
export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}
