/**
 * Logging Module - Public API
 *
 * Structured logging built on Pino with component-based context.
 *
 * ```typescript
 * // 1. Initialize once at startup (the CLI does this from LOG_LEVEL / LOG_FORMAT)
 * initializeLogger({ level: "info", format: "pretty" });
 *
 * // 2. Get a component logger in your modules
 * const logger = getComponentLogger("extraction:pipeline");
 * logger.info("Pipeline ready");
 * ```
 *
 * Library modules use createLazyLogger() instead, which stays silent until
 * the application initializes logging.
 *
 * @module logging
 */

export * from "./types.js";

export {
  initializeLogger,
  getComponentLogger,
  getRootLogger,
  isLoggerInitialized,
  createLazyLogger,
  resetLogger,
} from "./logger-factory.js";
