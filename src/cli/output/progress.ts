/**
 * Progress Indicators for CLI
 *
 * Spinners are written to stderr and switch themselves off when stderr is
 * not a terminal, so they never mix with extracted text on stdout.
 */

import * as path from "node:path";
import ora, { type Ora } from "ora";
import chalk from "chalk";

/**
 * Create a spinner for one extraction
 *
 * @param filePath - File being extracted
 * @returns Started Ora spinner
 */
export function createExtractSpinner(filePath: string): Ora {
  return ora({
    text: `Extracting ${chalk.cyan(path.basename(filePath))}...`,
    color: "cyan",
    stream: process.stderr,
  }).start();
}

/**
 * Finish the extraction spinner
 *
 * @param spinner - Spinner from createExtractSpinner()
 * @param bytes - Size of the encoded output
 * @param destination - Output file, or undefined for stdout
 */
export function completeExtractSpinner(spinner: Ora, bytes: number, destination?: string): void {
  if (destination === undefined) {
    // Text follows on stdout; leave no spinner line behind
    spinner.stop();
    return;
  }
  spinner.succeed(`Wrote ${bytes} bytes to ${chalk.cyan(destination)}`);
}
