/**
 * Extract Command - Extract text from a document
 *
 * Runs one file through the extraction pipeline and writes the encoded text
 * to stdout or to a file.
 */

import * as fs from "node:fs/promises";
import chalk from "chalk";
import { createExtractSpinner, completeExtractSpinner } from "../output/progress.js";
import type { ExtractionPipeline } from "../../extraction/ExtractionPipeline.js";
import type { ValidatedExtractOptions } from "../utils/validation.js";

/**
 * Where the encoded output goes
 */
export interface OutputTarget {
  write(bytes: Buffer): Promise<void>;
}

/**
 * Output target for stdout
 */
export const stdoutTarget: OutputTarget = {
  write: (bytes) =>
    new Promise((resolve, reject) => {
      process.stdout.write(bytes, (error) => (error ? reject(error) : resolve()));
    }),
};

/**
 * Resolve the `-o` value to a destination path, or undefined for stdout
 */
export function resolveOutputPath(output: string | undefined): string | undefined {
  return output === undefined || output === "-" ? undefined : output;
}

/**
 * Build the extractor options mapping from `-O` pairs and `-m`.
 *
 * `-m` wins over an explicit `-O method=...`.
 */
export function buildExtractorOptions(options: ValidatedExtractOptions): Record<string, string> {
  return options.method === undefined
    ? { ...options.option }
    : { ...options.option, method: options.method };
}

/**
 * Execute extract command
 *
 * @param filePath - File to extract
 * @param options - Validated command options
 * @param pipeline - Extraction pipeline
 * @param stdout - Target used when no output file is given
 */
export async function extractCommand(
  filePath: string,
  options: ValidatedExtractOptions,
  pipeline: ExtractionPipeline,
  stdout: OutputTarget = stdoutTarget
): Promise<void> {
  const destination = resolveOutputPath(options.output);
  const spinner = createExtractSpinner(filePath);

  try {
    const bytes = await pipeline.process(filePath, options.encoding, buildExtractorOptions(options));

    if (destination === undefined) {
      completeExtractSpinner(spinner, bytes.length);
      await stdout.write(bytes);
    } else {
      await fs.writeFile(destination, bytes);
      completeExtractSpinner(spinner, bytes.length, destination);
    }
  } catch (error) {
    spinner.fail(chalk.red(`✗ Extraction failed for ${filePath}`));
    throw error;
  }
}
