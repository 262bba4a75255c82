/**
 * Process-wide encoding registry.
 *
 * Thin read-only layer over iconv-lite's codec table. The table is built
 * once when iconv-lite loads and is never mutated afterwards, so lookups are
 * safe from any number of concurrent pipeline runs.
 *
 * @module extraction/encoding/registry
 */

import iconv from "iconv-lite";
import { UnsupportedEncodingError } from "../errors.js";

/**
 * Normalize a user-supplied encoding name for display and caching.
 *
 * @example
 * ```typescript
 * normalizeEncodingName("  UTF-8 "); // "utf-8"
 * ```
 */
export function normalizeEncodingName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Check whether the registry knows an encoding name or alias.
 *
 * @example
 * ```typescript
 * isSupportedEncoding("latin1"); // true
 * isSupportedEncoding("klingon-8"); // false
 * ```
 */
export function isSupportedEncoding(name: string): boolean {
  const normalized = normalizeEncodingName(name);
  return normalized.length > 0 && iconv.encodingExists(normalized);
}

/**
 * Fail with UnsupportedEncodingError unless the registry knows `name`.
 *
 * @returns The normalized name
 */
export function assertSupportedEncoding(name: string): string {
  if (!isSupportedEncoding(name)) {
    throw new UnsupportedEncodingError(name);
  }
  return normalizeEncodingName(name);
}

/**
 * Decode bytes with a registered codec. A leading BOM is stripped.
 */
export function decodeWith(bytes: Buffer, encoding: string): string {
  return iconv.decode(bytes, assertSupportedEncoding(encoding));
}

/**
 * Encode text with a registered codec.
 *
 * Characters the codec cannot represent are substituted by the codec, not
 * dropped; ContentEncoder filters them out beforehand.
 */
export function encodeWith(text: string, encoding: string): Buffer {
  return iconv.encode(text, assertSupportedEncoding(encoding));
}
