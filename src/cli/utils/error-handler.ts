/**
 * Centralized Error Handler for CLI Commands
 *
 * Maps pipeline errors to user-friendly messages with actionable next steps.
 */

/* eslint-disable no-console */

import chalk from "chalk";
import { ZodError } from "zod";
import { ConfigError } from "../../config/index.js";
import {
  DecodeError,
  ExtractionError,
  FileAccessError,
  FileTooLargeError,
  MissingToolError,
  ShellError,
  UnsupportedEncodingError,
  UnsupportedFormatError,
  UnsupportedMethodError,
} from "../../extraction/errors.js";

/**
 * Package that provides each external tool an extractor shells out to
 */
const TOOL_PACKAGES: Readonly<Record<string, string>> = {
  pdftotext: "poppler-utils",
  antiword: "antiword",
  tesseract: "tesseract-ocr",
};

/**
 * Handle command errors and exit with appropriate status code
 *
 * Displays a formatted error message and exits the process with code 1.
 * Commands fail their own spinner before rethrowing.
 *
 * @param error - The error to handle
 */
export function handleCommandError(error: unknown): never {
  console.error(); // Blank line for spacing

  if (error instanceof ZodError) {
    console.error(chalk.red("✗ Invalid Options"));
    for (const issue of error.issues) {
      const field = issue.path.length > 0 ? `--${issue.path.join(".")}: ` : "";
      console.error(`  • ${field}${issue.message}`);
    }
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • See available options: " + chalk.gray("textsift --help"));
    process.exit(1);
  }

  if (error instanceof ConfigError) {
    console.error(chalk.red("✗ Invalid Configuration"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error(`  • Fix or unset ${chalk.cyan(error.variable)} in your environment or .env file`);
    process.exit(1);
  }

  if (error instanceof UnsupportedEncodingError) {
    console.error(chalk.red("✗ Unsupported Encoding"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error(
      "  • Use a common encoding such as " +
        chalk.cyan("utf-8") +
        ", " +
        chalk.cyan("latin1") +
        " or " +
        chalk.cyan("ascii")
    );
    process.exit(1);
  }

  if (error instanceof UnsupportedFormatError) {
    console.error(chalk.red("✗ Unsupported File Format"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • List supported formats: " + chalk.gray("textsift formats"));
    process.exit(1);
  }

  if (error instanceof UnsupportedMethodError) {
    console.error(chalk.red("✗ Unsupported Extraction Method"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • List methods per format: " + chalk.gray("textsift formats"));
    process.exit(1);
  }

  if (error instanceof MissingToolError) {
    console.error(chalk.red("✗ External Tool Not Found"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    const pkg = TOOL_PACKAGES[error.tool];
    if (pkg !== undefined) {
      console.error(`  • Install ${chalk.cyan(pkg)} with your system package manager`);
    }
    console.error(`  • Make sure ${chalk.cyan(error.tool)} is on your PATH`);
    process.exit(1);
  }

  if (error instanceof ShellError) {
    console.error(chalk.red("✗ External Command Failed"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Command:"));
    console.error("  " + chalk.gray(error.command));
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Run the command above by hand to see its full output");
    console.error("  • Check that the file is not corrupt or password protected");
    process.exit(1);
  }

  if (error instanceof FileTooLargeError) {
    console.error(chalk.red("✗ File Too Large"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error(
      "  • Raise the limit: " + chalk.gray(`TEXTSIFT_MAX_FILE_SIZE_BYTES=${error.actualSizeBytes}`)
    );
    process.exit(1);
  }

  if (error instanceof FileAccessError) {
    console.error(chalk.red("✗ Cannot Read File"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Check the path and the file permissions");
    process.exit(1);
  }

  if (error instanceof DecodeError) {
    console.error(chalk.red("✗ Decoding Failed"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • The extracted content may be binary or use a mixed encoding");
    console.error(
      "  • Inspect detection details: " + chalk.gray("LOG_LEVEL=debug textsift <filename>")
    );
    process.exit(1);
  }

  if (error instanceof ExtractionError) {
    console.error(chalk.red("✗ Extraction Failed"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Try another method if the format has one: " + chalk.gray("textsift formats"));
    console.error("  • Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug textsift <filename>"));
    process.exit(1);
  }

  // Handle generic Error instances
  if (error instanceof Error) {
    console.error(chalk.red("✗ Error"));
    console.error(`\n${error.message}`);

    // Show stack trace in verbose mode
    if (process.env["LOG_LEVEL"] === "debug" || process.env["LOG_LEVEL"] === "trace") {
      console.error("\n" + chalk.gray(error.stack || "No stack trace available"));
    }

    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug textsift <filename>"));
    process.exit(1);
  }

  // Handle unknown error types
  console.error(chalk.red("✗ Unknown Error"));
  console.error(`\n${String(error)}`);
  console.error("\n" + chalk.bold("Next steps:"));
  console.error("  • Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug textsift <filename>"));
  process.exit(1);
}
