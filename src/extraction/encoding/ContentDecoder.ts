/**
 * Input side of the unicode sandwich.
 *
 * Turns extractor output of unknown encoding into a string. Bytes are run
 * through statistical encoding detection and decoded with the guessed codec;
 * strings pass through untouched.
 *
 * @module extraction/encoding/ContentDecoder
 */

import jschardet from "jschardet";
import { createLazyLogger } from "../../logging/index.js";
import { DecodeError } from "../errors.js";
import type { RawContent } from "../types.js";
import { assertSupportedEncoding, decodeWith, encodeWith } from "./registry.js";

const getLogger = createLazyLogger("extraction:decoder");

const REPLACEMENT_CHARACTER = "\uFFFD";
const BYTE_ORDER_MARK = "\uFEFF";

/**
 * Best guess produced by an encoding detector.
 */
export interface DetectedEncoding {
  /**
   * Encoding name as reported by the detector (e.g. "UTF-8", "windows-1252").
   */
  encoding: string;

  /**
   * Detector confidence between 0 and 1. Reported for logging only.
   */
  confidence: number;
}

/**
 * Statistical encoding detector.
 */
export interface EncodingDetector {
  /**
   * Guess the encoding of a byte sequence.
   *
   * @returns The top guess, or null when the detector has none
   */
  detect(bytes: Buffer): DetectedEncoding | null;
}

/**
 * EncodingDetector backed by jschardet.
 */
export class JschardetDetector implements EncodingDetector {
  detect(bytes: Buffer): DetectedEncoding | null {
    const result = jschardet.detect(bytes);
    if (typeof result.encoding !== "string" || result.encoding.length === 0) {
      return null;
    }
    return { encoding: result.encoding, confidence: result.confidence };
  }
}

/**
 * Decodes raw extractor output into a string.
 *
 * @example
 * ```typescript
 * const decoder = new ContentDecoder();
 *
 * decoder.decode("already text"); // "already text"
 * decoder.decode(Buffer.from("plain ascii")); // "plain ascii"
 * decoder.decode(Buffer.alloc(0)); // ""
 * ```
 */
export class ContentDecoder {
  private readonly detector: EncodingDetector;

  /**
   * @param detector - Detector override; defaults to jschardet
   */
  constructor(detector?: EncodingDetector) {
    this.detector = detector ?? new JschardetDetector();
  }

  /**
   * Decode raw content to a string.
   *
   * @throws {DecodeError} If no encoding could be detected or the bytes are
   *   malformed for the detected encoding
   * @throws {UnsupportedEncodingError} If the detected encoding is unknown to
   *   the encoding registry
   */
  decode(content: RawContent): string {
    if (typeof content === "string") {
      return content;
    }

    // Detectors have no defined answer for empty input
    if (content.length === 0) {
      return "";
    }

    const detected = this.detector.detect(content);
    if (detected === null) {
      throw new DecodeError(
        `Could not detect the character encoding of ${content.length} bytes`,
        null
      );
    }

    // Top guess wins regardless of confidence
    getLogger().debug(
      { encoding: detected.encoding, confidence: detected.confidence, bytes: content.length },
      "Detected encoding"
    );

    const encoding = assertSupportedEncoding(detected.encoding);
    const text = decodeWith(content, encoding);

    if (text.includes(REPLACEMENT_CHARACTER) && !reencodesExactly(text, content, encoding)) {
      throw new DecodeError(
        `Bytes are not valid ${detected.encoding}: decoding produced replacement characters`,
        detected.encoding
      );
    }

    return text;
  }
}

/**
 * Whether `text` encodes back to exactly `bytes`, with or without a leading
 * BOM. A replacement character in decoded text is genuine content only then;
 * single-byte codecs decode every undefined byte to U+FFFD and encode U+FFFD
 * to one of them.
 */
function reencodesExactly(text: string, bytes: Buffer, encoding: string): boolean {
  const reencoded = encodeWith(text, encoding);
  if (reencoded.equals(bytes)) {
    return true;
  }
  const bom = encodeWith(BYTE_ORDER_MARK, encoding);
  return (
    bytes.length >= bom.length &&
    bytes.subarray(0, bom.length).equals(bom) &&
    reencoded.equals(bytes.subarray(bom.length))
  );
}
