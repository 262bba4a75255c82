/**
 * Unit tests for extraction error classes and type guards.
 *
 * Tests error class properties, cause chaining, and the hierarchy.
 */

import { describe, test, expect } from "vitest";
import {
  TextsiftError,
  ShellError,
  DecodeError,
  UnsupportedEncodingError,
  ExtractionError,
  UnsupportedFormatError,
  UnsupportedMethodError,
  MissingToolError,
  FileAccessError,
  FileTooLargeError,
  isTextsiftError,
  isExtractionError,
} from "../../../src/extraction/errors.js";

describe("TextsiftError base class", () => {
  test("sets code and message", () => {
    const error = new TextsiftError("Test message", "TEST_CODE");

    expect(error.message).toBe("Test message");
    expect(error.code).toBe("TEST_CODE");
    expect(error.name).toBe("TextsiftError");
  });

  test("uses default code when not provided", () => {
    expect(new TextsiftError("Test message").code).toBe("TEXTSIFT_ERROR");
  });

  test("is not retryable by default", () => {
    expect(new TextsiftError("Test message").retryable).toBe(false);
  });

  test("chains cause error into the stack", () => {
    const cause = new Error("Root cause");
    const error = new TextsiftError("Wrapper message", "CODE", { cause });

    expect(error.cause).toBe(cause);
    expect(error.stack).toContain("Caused by:");
    expect(error.stack).toContain("Root cause");
  });

  test("records the file path", () => {
    const error = new TextsiftError("Test message", "CODE", { filePath: "/tmp/a.pdf" });

    expect(error.filePath).toBe("/tmp/a.pdf");
  });
});

describe("ShellError", () => {
  test("carries command, exit code and both streams", () => {
    const stdout = Buffer.from("partial");
    const stderr = Buffer.from("oops\n");
    const error = new ShellError("antiword /tmp/a.doc", 1, stdout, stderr);

    expect(error.code).toBe("SHELL_ERROR");
    expect(error.name).toBe("ShellError");
    expect(error.command).toBe("antiword /tmp/a.doc");
    expect(error.exitCode).toBe(1);
    expect(error.stdout).toBe(stdout);
    expect(error.stderr).toBe(stderr);
    expect(error.message).toBe('Command "antiword /tmp/a.doc" exited with code 1: oops');
  });

  test("omits the detail when stderr is empty", () => {
    const error = new ShellError("false", 1, Buffer.alloc(0), Buffer.alloc(0));

    expect(error.message).toBe('Command "false" exited with code 1');
  });

  test("is never retryable", () => {
    const error = new ShellError("false", 1, Buffer.alloc(0), Buffer.alloc(0), {
      retryable: true,
    });

    expect(error.retryable).toBe(false);
  });
});

describe("DecodeError", () => {
  test("records the attempted encoding", () => {
    const error = new DecodeError("bad bytes", "utf-8");

    expect(error.code).toBe("DECODE_ERROR");
    expect(error.encoding).toBe("utf-8");
  });

  test("accepts a null encoding when nothing was detected", () => {
    expect(new DecodeError("no guess", null).encoding).toBeNull();
  });
});

describe("UnsupportedEncodingError", () => {
  test("names the encoding in the message", () => {
    const error = new UnsupportedEncodingError("klingon-8");

    expect(error.code).toBe("UNSUPPORTED_ENCODING");
    expect(error.encoding).toBe("klingon-8");
    expect(error.message).toBe('Unsupported encoding: "klingon-8"');
  });
});

describe("ExtractionError subclasses", () => {
  test("ExtractionError uses its default code", () => {
    const error = new ExtractionError("failed");

    expect(error.code).toBe("EXTRACTION_ERROR");
    expect(error.name).toBe("ExtractionError");
  });

  test("UnsupportedFormatError records the extension", () => {
    const error = new UnsupportedFormatError("Unsupported file format: .xyz", ".xyz");

    expect(error.code).toBe("UNSUPPORTED_FORMAT");
    expect(error.extension).toBe(".xyz");
    expect(error).toBeInstanceOf(ExtractionError);
  });

  test("UnsupportedMethodError lists the valid methods", () => {
    const error = new UnsupportedMethodError("ocr", ["pdftotext", "pdf-parse"]);

    expect(error.code).toBe("UNSUPPORTED_METHOD");
    expect(error.method).toBe("ocr");
    expect(error.supportedMethods).toEqual(["pdftotext", "pdf-parse"]);
    expect(error.message).toBe(
      'Unsupported extraction method "ocr" (expected one of: pdftotext, pdf-parse)'
    );
  });

  test("MissingToolError names the tool", () => {
    const error = new MissingToolError("tesseract");

    expect(error.code).toBe("MISSING_TOOL");
    expect(error.tool).toBe("tesseract");
    expect(error.message).toBe('Required external tool "tesseract" could not be started');
  });

  test("FileAccessError uses its code", () => {
    expect(new FileAccessError("File not found: /x").code).toBe("FILE_ACCESS_ERROR");
  });

  test("FileTooLargeError records both sizes", () => {
    const error = new FileTooLargeError("too big", 200, 100);

    expect(error.code).toBe("FILE_TOO_LARGE");
    expect(error.actualSizeBytes).toBe(200);
    expect(error.maxSizeBytes).toBe(100);
  });
});

describe("type guards", () => {
  test("isTextsiftError accepts every pipeline error", () => {
    expect(isTextsiftError(new DecodeError("x", null))).toBe(true);
    expect(isTextsiftError(new MissingToolError("antiword"))).toBe(true);
    expect(isTextsiftError(new Error("plain"))).toBe(false);
    expect(isTextsiftError("string")).toBe(false);
  });

  test("isExtractionError accepts only extractor failures", () => {
    expect(isExtractionError(new FileAccessError("x"))).toBe(true);
    expect(isExtractionError(new ShellError("false", 1, Buffer.alloc(0), Buffer.alloc(0)))).toBe(
      false
    );
    expect(isExtractionError(new UnsupportedEncodingError("x"))).toBe(false);
  });
});
