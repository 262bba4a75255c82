/**
 * Unit tests for document extractors.
 *
 * Extractors that shell out are driven through FakeCommandRunner, so the
 * external tools do not need to be installed.
 */

import { describe, test, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  PlainTextExtractor,
  MarkdownExtractor,
  PdfExtractor,
  DocxExtractor,
  DocExtractor,
  ImageExtractor,
  stripFrontmatter,
} from "../../../../src/extraction/extractors/index.js";
import {
  ExtractionError,
  FileAccessError,
  FileTooLargeError,
  ShellError,
  UnsupportedMethodError,
} from "../../../../src/extraction/errors.js";
import { DEFAULT_EXTRACTOR_CONFIG } from "../../../../src/extraction/constants.js";
import { FakeCommandRunner, createStdoutRunner } from "../../../helpers/fake-runner.js";
import { createTempDir, type TempDir } from "../../../helpers/temp-dir.js";

let tmp: TempDir;

beforeAll(async () => {
  tmp = await createTempDir();
});

afterAll(async () => {
  await tmp.cleanup();
});

describe("PlainTextExtractor", () => {
  describe("constructor", () => {
    test("uses default configuration", () => {
      const extractor = new PlainTextExtractor();

      expect(extractor.getConfig().maxFileSizeBytes).toBe(
        DEFAULT_EXTRACTOR_CONFIG.maxFileSizeBytes
      );
    });

    test("accepts custom configuration", () => {
      const extractor = new PlainTextExtractor({ maxFileSizeBytes: 1_000 });

      expect(extractor.getConfig().maxFileSizeBytes).toBe(1_000);
    });
  });

  describe("supports", () => {
    const extractor = new PlainTextExtractor();

    test("returns true for text extensions in any case", () => {
      expect(extractor.supports(".txt")).toBe(true);
      expect(extractor.supports(".CSV")).toBe(true);
      expect(extractor.supports(".log")).toBe(true);
    });

    test("returns false for other extensions", () => {
      expect(extractor.supports(".pdf")).toBe(false);
      expect(extractor.supports(".md")).toBe(false);
    });
  });

  describe("extract", () => {
    test("returns the file bytes untouched", async () => {
      const bytes = Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]);
      const filePath = await tmp.write("latin1.txt", bytes);

      const raw = await new PlainTextExtractor().extract(filePath, {});

      expect(Buffer.isBuffer(raw)).toBe(true);
      expect(raw).toEqual(bytes);
    });

    test("ignores the method option", async () => {
      const filePath = await tmp.write("plain.txt", "plain");

      const raw = await new PlainTextExtractor().extract(filePath, { method: "anything" });

      expect(raw.toString()).toBe("plain");
    });

    test("throws FileAccessError for a missing file", async () => {
      const filePath = path.join(tmp.path, "missing.txt");

      await expect(new PlainTextExtractor().extract(filePath, {})).rejects.toThrow(
        new FileAccessError(`File not found: ${filePath}`)
      );
    });

    test("throws FileAccessError for a directory", async () => {
      const dir = path.join(tmp.path, "folder.txt");
      await fs.mkdir(dir);

      await expect(new PlainTextExtractor().extract(dir, {})).rejects.toThrow(
        `Not a regular file: ${dir}`
      );
    });

    test("throws FileTooLargeError above the size limit", async () => {
      const filePath = await tmp.write("big.txt", "hello");
      const extractor = new PlainTextExtractor({ maxFileSizeBytes: 4 });

      const error = await extractor.extract(filePath, {}).then(
        () => null,
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(FileTooLargeError);
      if (!(error instanceof FileTooLargeError)) return;
      expect(error.message).toBe("File exceeds maximum size of 4 bytes (actual: 5 bytes)");
      expect(error.actualSizeBytes).toBe(5);
      expect(error.filePath).toBe(filePath);
    });
  });
});

describe("MarkdownExtractor", () => {
  const source = "---\ntitle: Notes\ntags: [a, b]\n---\n# Body\n\nText.\n";

  test("returns the whole file by default", async () => {
    const filePath = await tmp.write("notes.md", source);

    const raw = await new MarkdownExtractor().extract(filePath, {});

    expect(raw.toString()).toBe(source);
  });

  test("strips frontmatter when asked", async () => {
    const filePath = await tmp.write("stripped.md", source);

    const raw = await new MarkdownExtractor().extract(filePath, { strip_frontmatter: "true" });

    expect(raw.toString()).toBe("# Body\n\nText.\n");
  });

  test("treats other option values as false", async () => {
    const filePath = await tmp.write("kept.md", source);

    const raw = await new MarkdownExtractor().extract(filePath, { strip_frontmatter: "no" });

    expect(raw.toString()).toBe(source);
  });

  describe("stripFrontmatter", () => {
    test("handles CRLF line endings", () => {
      const input = Buffer.from("---\r\ntitle: x\r\n---\r\nBody\r\n");

      expect(stripFrontmatter(input).toString()).toBe("Body\r\n");
    });

    test("handles a leading byte order mark", () => {
      const input = Buffer.concat([
        Buffer.from([0xef, 0xbb, 0xbf]),
        Buffer.from("---\na: 1\n---\nX"),
      ]);

      expect(stripFrontmatter(input).toString()).toBe("X");
    });

    test("keeps multibyte body bytes intact", () => {
      const input = Buffer.from("---\nk: v\n---\nnaïve\n", "utf8");

      expect(stripFrontmatter(input).toString("utf8")).toBe("naïve\n");
    });

    test("leaves files without frontmatter unchanged", () => {
      const input = Buffer.from("# Title\n---\nnot frontmatter\n---\n");

      expect(stripFrontmatter(input)).toBe(input);
    });
  });
});

describe("PdfExtractor", () => {
  let pdfPath: string;

  beforeAll(async () => {
    pdfPath = await tmp.write("report.pdf", "%PDF-placeholder");
  });

  test("offers pdftotext first and pdf-parse second", () => {
    expect(new PdfExtractor().methods).toEqual(["pdftotext", "pdf-parse"]);
  });

  test("runs pdftotext by default and returns its stdout", async () => {
    const runner = createStdoutRunner("Page one\f");
    const extractor = new PdfExtractor({ runner });

    const raw = await extractor.extract(pdfPath, {});

    expect(runner.commands).toEqual([["pdftotext", pdfPath, "-"]]);
    expect(raw.toString()).toBe("Page one\f");
  });

  test("adds -layout when the layout option is set", async () => {
    const runner = createStdoutRunner("");
    const extractor = new PdfExtractor({ runner });

    await extractor.extract(pdfPath, { layout: "true" });

    expect(runner.commands).toEqual([["pdftotext", "-layout", pdfPath, "-"]]);
  });

  test("treats an empty method as the default", async () => {
    const runner = createStdoutRunner("");

    await new PdfExtractor({ runner }).extract(pdfPath, { method: "" });

    expect(runner.commands[0]?.[0]).toBe("pdftotext");
  });

  test("rejects an unknown method before running anything", async () => {
    const runner = createStdoutRunner("");
    const extractor = new PdfExtractor({ runner });

    await expect(extractor.extract(pdfPath, { method: "ocr" })).rejects.toThrow(
      UnsupportedMethodError
    );
    expect(runner.commands).toHaveLength(0);
  });

  test("propagates ShellError from pdftotext", async () => {
    const failure = new ShellError("pdftotext", 1, Buffer.alloc(0), Buffer.from("Syntax Error"));
    const runner = new FakeCommandRunner(async () => {
      throw failure;
    });

    await expect(new PdfExtractor({ runner }).extract(pdfPath, {})).rejects.toBe(failure);
  });

  test("wraps pdf-parse failures in ExtractionError", async () => {
    const junkPath = await tmp.write("junk.pdf", "this is not a pdf document");
    const runner = createStdoutRunner("");
    const extractor = new PdfExtractor({ runner });

    const error = await extractor.extract(junkPath, { method: "pdf-parse" }).then(
      () => null,
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ExtractionError);
    if (!(error instanceof ExtractionError)) return;
    expect(error.message.startsWith("Failed to parse PDF:")).toBe(true);
    expect(error.filePath).toBe(junkPath);
    expect(runner.commands).toHaveLength(0);
  });
});

describe("DocxExtractor", () => {
  test("offers mammoth", () => {
    expect(new DocxExtractor().methods).toEqual(["mammoth"]);
  });

  test("wraps mammoth failures in ExtractionError", async () => {
    const filePath = await tmp.write("broken.docx", "not a zip archive");

    const error = await new DocxExtractor().extract(filePath, {}).then(
      () => null,
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ExtractionError);
    if (!(error instanceof ExtractionError)) return;
    expect(error.message.startsWith("Failed to extract DOCX content:")).toBe(true);
  });
});

describe("DocExtractor", () => {
  test("runs antiword and returns its stdout", async () => {
    const filePath = await tmp.write("letter.doc", "placeholder");
    const runner = createStdoutRunner("Dear reader\n");

    const raw = await new DocExtractor({ runner }).extract(filePath, {});

    expect(runner.commands).toEqual([["antiword", filePath]]);
    expect(raw.toString()).toBe("Dear reader\n");
  });

  test("ignores the method option", async () => {
    const filePath = await tmp.write("memo.doc", "placeholder");
    const runner = createStdoutRunner("Memo\n");

    const raw = await new DocExtractor({ runner }).extract(filePath, { method: "pdf-parse" });

    expect(runner.commands).toEqual([["antiword", filePath]]);
    expect(raw.toString()).toBe("Memo\n");
  });
});

describe("ImageExtractor", () => {
  let imagePath: string;

  beforeAll(async () => {
    imagePath = await tmp.write("scan.png", "placeholder");
  });

  function tesseractRunner(): FakeCommandRunner {
    return new FakeCommandRunner(async (args) => {
      const outputBase = args[2];
      if (outputBase !== undefined) {
        await fs.writeFile(`${outputBase}.txt`, "OCR TEXT\n");
      }
      return {};
    });
  }

  test("ignores a method meant for another format", async () => {
    const runner = tesseractRunner();

    const raw = await new ImageExtractor({ runner }).extract(imagePath, { method: "antiword" });

    expect(raw.toString()).toBe("OCR TEXT\n");
  });

  test("runs tesseract into a scratch path and reads its output", async () => {
    const runner = tesseractRunner();

    const raw = await new ImageExtractor({ runner }).extract(imagePath, {});

    const outputBase = runner.tempPaths[0];
    expect(raw.toString()).toBe("OCR TEXT\n");
    expect(runner.commands).toEqual([["tesseract", imagePath, outputBase]]);
  });

  test("passes the language option", async () => {
    const runner = tesseractRunner();

    await new ImageExtractor({ runner }).extract(imagePath, { language: "deu" });

    expect(runner.commands[0]?.slice(3)).toEqual(["-l", "deu"]);
  });

  test("removes the scratch directory afterwards", async () => {
    const runner = tesseractRunner();

    await new ImageExtractor({ runner }).extract(imagePath, {});

    const outputBase = runner.tempPaths[0] ?? "";
    await expect(fs.access(path.dirname(outputBase))).rejects.toThrow();
  });

  test("throws ExtractionError when tesseract writes no file", async () => {
    const runner = new FakeCommandRunner();

    await expect(new ImageExtractor({ runner }).extract(imagePath, {})).rejects.toThrow(
      ExtractionError
    );
  });
});
