/**
 * Logger Factory
 *
 * Core logging infrastructure using Pino. Handles logger creation,
 * configuration, and component-scoped child loggers.
 *
 * All output goes to stderr: stdout carries extracted text.
 *
 * @module logging/logger-factory
 */

import pino from "pino";
import type { LoggerConfig, ComponentContext } from "./types.js";

/**
 * Singleton root logger instance
 * Initialized once at application startup
 */
let rootLogger: pino.Logger | null = null;

/**
 * Shared logger used by library code when the application never
 * initialized logging
 */
const silentLogger: pino.Logger = pino({ level: "silent" });

/**
 * Base Pino options shared by every format
 */
function baseOptions(config: LoggerConfig): pino.LoggerOptions {
  return {
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

/**
 * Create the root Pino logger with full configuration
 *
 * @internal
 */
function createRootLogger(config: LoggerConfig): pino.Logger {
  const pinoOptions = baseOptions(config);

  // If custom stream provided (for testing), use it directly
  if (config.stream) {
    return pino(pinoOptions, config.stream);
  }

  if (config.format === "pretty") {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

/**
 * Initialize the global logger
 *
 * Must be called once at application startup before any logging occurs.
 * Subsequent calls will throw an error.
 *
 * @param config - Logger configuration
 * @throws Error if logger is already initialized
 *
 * @example
 * ```typescript
 * initializeLogger({ level: "debug", format: "pretty" });
 * ```
 */
export function initializeLogger(config: LoggerConfig): void {
  if (rootLogger !== null) {
    throw new Error("Logger already initialized. initializeLogger() should only be called once.");
  }

  try {
    rootLogger = createRootLogger(config);
    rootLogger.debug({ level: config.level, format: config.format }, "Logger initialized");
  } catch (error) {
    // pino-pretty missing or transport failed: plain JSON to stderr
    rootLogger = pino(baseOptions(config), pino.destination(2));
    rootLogger.warn(
      {
        requestedFormat: config.format,
        fallbackFormat: "json",
        error: error instanceof Error ? error.message : String(error),
      },
      "Logger initialization failed, using fallback JSON logger"
    );
  }
}

/**
 * Get the root logger instance
 *
 * @throws Error if logger not initialized
 *
 * @internal - Most code should use getComponentLogger() instead
 */
export function getRootLogger(): pino.Logger {
  if (rootLogger === null) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return rootLogger;
}

/**
 * Check whether initializeLogger() has run
 */
export function isLoggerInitialized(): boolean {
  return rootLogger !== null;
}

/**
 * Get a component-scoped logger
 *
 * Creates a child logger with automatic component context.
 *
 * @param component - Component name (use colon notation for hierarchy)
 * @param requestId - Optional correlation ID
 * @returns Child logger with component context
 *
 * @example
 * ```typescript
 * const logger = getComponentLogger("extraction:pipeline");
 * logger.debug({ filePath }, "Extracting");
 * // Output: {"level":"debug","component":"extraction:pipeline","filePath":"...","msg":"Extracting",...}
 * ```
 */
export function getComponentLogger(component: string, requestId?: string): pino.Logger {
  const root = getRootLogger();

  const context: ComponentContext = {
    component,
    ...(requestId && { requestId }),
  };

  return root.child(context);
}

/**
 * Create a lazily-resolved component logger for library modules.
 *
 * The returned getter binds to the root logger the first time it is called
 * after initializeLogger(). Until then it hands out a silent logger, so
 * library code can be used without any logging setup.
 *
 * @example
 * ```typescript
 * const getLogger = createLazyLogger("extraction:shell");
 *
 * getLogger().debug({ command }, "Running command");
 * ```
 */
export function createLazyLogger(component: string): () => pino.Logger {
  let logger: pino.Logger | null = null;
  let boundTo: pino.Logger | null = null;

  return () => {
    if (rootLogger === null) {
      return silentLogger;
    }
    if (logger === null || boundTo !== rootLogger) {
      logger = getComponentLogger(component);
      boundTo = rootLogger;
    }
    return logger;
  };
}

/**
 * Reset logger (for testing only)
 *
 * @internal
 */
export function resetLogger(): void {
  rootLogger = null;
}
