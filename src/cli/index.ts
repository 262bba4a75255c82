#!/usr/bin/env node
/**
 * textsift - CLI Entry Point
 *
 * Extracts text from a document and prints it in the requested encoding:
 * - textsift <filename>: Extract text (default command)
 * - textsift formats: List supported formats and extraction methods
 */

import "dotenv/config";
import { Command } from "commander";
import { loadConfig, type AppConfig } from "../config/index.js";
import { ExtractionPipeline } from "../extraction/ExtractionPipeline.js";
import { ExtractorRegistry } from "../extraction/ExtractorRegistry.js";
import { getComponentLogger, initializeLogger } from "../logging/index.js";
import { extractCommand } from "./commands/extract-command.js";
import { formatsCommand } from "./commands/formats-command.js";
import { handleCommandError } from "./utils/error-handler.js";
import { ExtractCommandOptionsSchema, collectExtractorOption } from "./utils/validation.js";

const VERSION = "0.1.0";

let config: AppConfig;
try {
  config = loadConfig();
  initializeLogger({ level: config.logLevel, format: config.logFormat });
} catch (error) {
  handleCommandError(error);
}

const logger = getComponentLogger("cli");
const registry = new ExtractorRegistry({ maxFileSizeBytes: config.maxFileSizeBytes });

const program = new Command();

program
  .name("textsift")
  .description("Extract text from documents and print it in the requested encoding")
  .version(VERSION, "-V, --version")
  .argument("<filename>", "File to extract text from")
  .option("-e, --encoding <encoding>", "Output encoding", config.defaultEncoding)
  .option("-m, --method <method>", "Extraction method for formats that support several")
  .option("-o, --output <file>", 'Write text to this file instead of stdout ("-" for stdout)')
  .option(
    "-O, --option <key=value>",
    "Extractor option as KEY=VALUE (repeatable, e.g. -O language=deu -O layout=true)",
    collectExtractorOption,
    {}
  )
  .action(async (filename: string, options: Record<string, unknown>) => {
    try {
      const validatedOptions = ExtractCommandOptionsSchema.parse(options);
      logger.debug({ filename, encoding: validatedOptions.encoding }, "Starting extraction");
      await extractCommand(filename, validatedOptions, new ExtractionPipeline({ registry }));
    } catch (error) {
      handleCommandError(error);
    }
  });

// Formats command
program
  .command("formats")
  .description("List supported document formats and extraction methods")
  .option("--json", "Output as JSON")
  .action((options: { json?: boolean }) => {
    try {
      formatsCommand(options, registry);
    } catch (error) {
      handleCommandError(error);
    }
  });

await program.parseAsync();
