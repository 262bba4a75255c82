/**
 * Output side of the unicode sandwich.
 *
 * Encodes text into a caller-chosen encoding. Code points the target cannot
 * represent are dropped, never substituted and never reported as an error.
 *
 * @module extraction/encoding/ContentEncoder
 */

import { createLazyLogger } from "../../logging/index.js";
import { assertSupportedEncoding, decodeWith, encodeWith } from "./registry.js";

const getLogger = createLazyLogger("extraction:encoder");

const REPLACEMENT_CHARACTER = "\uFFFD";

// Encodings that cover all of Unicode. Other codecs round-trip U+FFFD
// through a byte they leave undefined.
const UNICODE_ENCODING = /utf|ucs|cesu|gb18030/;

/**
 * Encodes text with a lossy "ignore" policy for unrepresentable characters.
 *
 * Representability is decided per code point by an encode/decode round trip
 * through the target codec and memoized per encoding.
 *
 * @example
 * ```typescript
 * const encoder = new ContentEncoder();
 *
 * encoder.encode("naïve café", "ascii").toString("ascii"); // "nave caf"
 * encoder.encode("naïve café", "utf-8").toString("utf8"); // "naïve café"
 * ```
 */
export class ContentEncoder {
  private readonly representable = new Map<string, Map<string, boolean>>();

  /**
   * Encode text into `targetEncoding`.
   *
   * @throws {UnsupportedEncodingError} If the encoding registry does not
   *   know `targetEncoding`
   */
  encode(text: string, targetEncoding: string): Buffer {
    const encoding = assertSupportedEncoding(targetEncoding);
    const kept: string[] = [];
    let dropped = 0;

    for (const codePoint of text) {
      if (this.isRepresentable(codePoint, encoding)) {
        kept.push(codePoint);
      } else {
        dropped++;
      }
    }

    if (dropped > 0) {
      getLogger().debug({ encoding, dropped }, "Dropped unrepresentable characters");
      return encodeWith(kept.join(""), encoding);
    }

    return encodeWith(text, encoding);
  }

  private isRepresentable(codePoint: string, encoding: string): boolean {
    let cache = this.representable.get(encoding);
    if (cache === undefined) {
      cache = new Map<string, boolean>();
      this.representable.set(encoding, cache);
    }

    const cached = cache.get(codePoint);
    if (cached !== undefined) {
      return cached;
    }

    const result =
      codePoint === REPLACEMENT_CHARACTER
        ? UNICODE_ENCODING.test(encoding)
        : decodeWith(encodeWith(codePoint, encoding), encoding) === codePoint;
    cache.set(codePoint, result);
    return result;
  }
}
