/**
 * Formats Command - List supported document formats
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { ExtractorRegistry } from "../../extraction/ExtractorRegistry.js";
import { createFormatsTable, formatFormatsJson } from "../output/formatters.js";

/**
 * Formats command options
 */
export interface FormatsCommandOptions {
  json?: boolean;
}

/**
 * Execute formats command
 */
export function formatsCommand(options: FormatsCommandOptions, registry: ExtractorRegistry): void {
  const formats = registry.listFormats();

  if (options.json) {
    console.log(formatFormatsJson(formats));
    return;
  }

  console.log(createFormatsTable(formats));
  console.log(
    "\n" +
      chalk.gray("Files without an extension are read as plain text. ") +
      chalk.gray("The first method listed is the default; choose another with ") +
      chalk.cyan("-m <method>")
  );
}
