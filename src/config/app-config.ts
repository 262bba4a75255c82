/**
 * Application Configuration
 *
 * Reads the CLI's settings from environment variables and validates them
 * with zod. Library users construct the pipeline directly and never need
 * this module.
 *
 * @module config/app-config
 */

import { z } from "zod";
import { DEFAULT_ENCODING, DEFAULT_EXTRACTOR_CONFIG } from "../extraction/constants.js";
import { TextsiftError } from "../extraction/errors.js";
import { isSupportedEncoding } from "../extraction/encoding/registry.js";
import { LOG_LEVELS, type LogLevel } from "../logging/types.js";

/**
 * Environment variable names
 */
export const ENV_KEYS = {
  LOG_LEVEL: "LOG_LEVEL",
  LOG_FORMAT: "LOG_FORMAT",
  DEFAULT_ENCODING: "TEXTSIFT_DEFAULT_ENCODING",
  MAX_FILE_SIZE_BYTES: "TEXTSIFT_MAX_FILE_SIZE_BYTES",
} as const;

/**
 * Validated application configuration
 */
export interface AppConfig {
  logLevel: LogLevel;
  logFormat: "json" | "pretty";
  /** Output encoding when the caller does not pass one */
  defaultEncoding: string;
  maxFileSizeBytes: number;
}

/**
 * Error thrown when an environment variable holds an invalid value.
 */
export class ConfigError extends TextsiftError {
  /** The offending environment variable */
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(`Invalid ${variable}: ${message}`, "CONFIG_ERROR");
    this.name = "ConfigError";
    this.variable = variable;
  }
}

/**
 * Treat unset and empty variables alike
 */
const optionalEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema);

const LogLevelSchema = z.enum(LOG_LEVELS);

const EnvSchema = z.object({
  [ENV_KEYS.LOG_LEVEL]: optionalEnv(
    z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(LogLevelSchema)
      .default("warn")
  ),
  [ENV_KEYS.LOG_FORMAT]: optionalEnv(
    z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(z.enum(["json", "pretty"]))
      .default("pretty")
  ),
  [ENV_KEYS.DEFAULT_ENCODING]: optionalEnv(
    z
      .string()
      .refine(isSupportedEncoding, { message: "not a known encoding" })
      .default(DEFAULT_ENCODING)
  ),
  [ENV_KEYS.MAX_FILE_SIZE_BYTES]: optionalEnv(
    z.coerce.number().int().positive().default(DEFAULT_EXTRACTOR_CONFIG.maxFileSizeBytes)
  ),
});

/**
 * Load configuration from environment variables
 *
 * Environment variables:
 * - LOG_LEVEL: silent, fatal, error, warn, info, debug or trace (default: "warn")
 * - LOG_FORMAT: json or pretty (default: "pretty")
 * - TEXTSIFT_DEFAULT_ENCODING: Output encoding for the CLI (default: "utf-8")
 * - TEXTSIFT_MAX_FILE_SIZE_BYTES: Largest input file accepted (default: 52428800)
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws {ConfigError} Naming the first invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse({
    [ENV_KEYS.LOG_LEVEL]: env[ENV_KEYS.LOG_LEVEL],
    [ENV_KEYS.LOG_FORMAT]: env[ENV_KEYS.LOG_FORMAT],
    [ENV_KEYS.DEFAULT_ENCODING]: env[ENV_KEYS.DEFAULT_ENCODING],
    [ENV_KEYS.MAX_FILE_SIZE_BYTES]: env[ENV_KEYS.MAX_FILE_SIZE_BYTES],
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = String(issue?.path[0] ?? "environment");
    const raw = env[variable];
    throw new ConfigError(
      variable,
      `"${raw ?? ""}" (${issue?.message ?? "invalid value"})`
    );
  }

  const parsed = result.data;
  return {
    logLevel: parsed[ENV_KEYS.LOG_LEVEL],
    logFormat: parsed[ENV_KEYS.LOG_FORMAT],
    defaultEncoding: parsed[ENV_KEYS.DEFAULT_ENCODING],
    maxFileSizeBytes: parsed[ENV_KEYS.MAX_FILE_SIZE_BYTES],
  };
}
