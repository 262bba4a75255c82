/**
 * Runtime validation for CLI options
 *
 * Uses Zod for type-safe runtime validation of Commander.js options, plus
 * the collector commander calls for each repeated `-O key=value`.
 */

import { InvalidArgumentError } from "commander";
import { z } from "zod";
import { isSupportedEncoding } from "../../extraction/encoding/registry.js";

/**
 * Schema for extract (default) command options
 */
export const ExtractCommandOptionsSchema = z.object({
  encoding: z
    .string()
    .min(1, "encoding must not be empty")
    .refine(isSupportedEncoding, (value) => ({
      message: `Unknown encoding: "${value}"`,
    })),
  method: z.string().min(1, "method must not be empty").optional(),
  output: z.string().min(1, "output path must not be empty").optional(),
  option: z.record(z.string(), z.string()).default({}),
});

/**
 * Inferred TypeScript types from schemas
 */
export type ValidatedExtractOptions = z.infer<typeof ExtractCommandOptionsSchema>;

/**
 * Split one `key=value` argument at its first "=".
 *
 * @throws {InvalidArgumentError} If there is no "=" or the key is empty
 *
 * @example
 * ```typescript
 * parseOptionPair("language=deu"); // ["language", "deu"]
 * parseOptionPair("expr=a=b"); // ["expr", "a=b"]
 * ```
 */
export function parseOptionPair(pair: string): [string, string] {
  const separator = pair.indexOf("=");
  if (separator === -1) {
    throw new InvalidArgumentError(`Expected KEY=VALUE, got "${pair}".`);
  }

  const key = pair.slice(0, separator).trim();
  if (key === "") {
    throw new InvalidArgumentError(`Missing key in "${pair}".`);
  }

  return [key, pair.slice(separator + 1)];
}

/**
 * Commander collector for the repeatable `-O, --option` flag.
 *
 * Returns a new mapping on every call; `previous` is never mutated.
 *
 * @throws {InvalidArgumentError} If the key was already given
 */
export function collectExtractorOption(
  pair: string,
  previous: Record<string, string>
): Record<string, string> {
  const [key, value] = parseOptionPair(pair);
  if (Object.hasOwn(previous, key)) {
    throw new InvalidArgumentError(`Duplicate specification of the key "${key}" with --option.`);
  }
  return { ...previous, [key]: value };
}
