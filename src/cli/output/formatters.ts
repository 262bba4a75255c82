/**
 * Output Formatters for CLI
 *
 * Functions for formatting output as tables or JSON.
 */

import Table from "cli-table3";
import chalk from "chalk";
import type { FormatInfo } from "../../extraction/ExtractorRegistry.js";

/**
 * Format the supported document formats as a table
 *
 * @param formats - Formats from ExtractorRegistry.listFormats()
 * @returns Formatted table string
 */
export function createFormatsTable(formats: readonly FormatInfo[]): string {
  const table = new Table({
    head: [chalk.cyan("Type"), chalk.cyan("Description"), chalk.cyan("Extensions"), chalk.cyan("Methods")],
    colAligns: ["left", "left", "left", "left"],
    style: {
      head: [],
      border: ["gray"],
    },
  });

  for (const format of formats) {
    table.push([
      format.documentType,
      format.label,
      format.extensions.join(", "),
      formatMethods(format.methods),
    ]);
  }

  return table.toString();
}

/**
 * Methods column: the first (default) method is bold, a format without
 * methods shows a dash
 */
function formatMethods(methods: readonly string[]): string {
  const [defaultMethod, ...others] = methods;
  if (defaultMethod === undefined) {
    return chalk.gray("-");
  }
  return [chalk.bold(defaultMethod), ...others].join(", ");
}

/**
 * Format the supported document formats as JSON
 */
export function formatFormatsJson(formats: readonly FormatInfo[]): string {
  return JSON.stringify(
    {
      totalFormats: formats.length,
      formats: formats.map((format) => ({
        type: format.documentType,
        label: format.label,
        extensions: format.extensions,
        methods: format.methods,
        defaultMethod: format.methods[0] ?? null,
      })),
    },
    null,
    2
  );
}
