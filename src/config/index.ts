/**
 * Configuration Module Exports
 *
 * @module config
 */

export {
  // Types
  type AppConfig,
  // Constants
  ENV_KEYS,
  // Errors
  ConfigError,
  // Functions
  loadConfig,
} from "./app-config.js";
