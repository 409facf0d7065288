/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

export { ConfigError, optionalEnv, optionalEnvBool, type Env } from "./env.js";
export {
  AppConfigSchema,
  LogLevelSchema,
  type AppConfig,
} from "./schema.js";
export {
  loadConfig,
  validateConfig,
  DEFAULT_WORK_DIR,
  DEFAULT_TOOLS_DIR,
  DEFAULT_SCRIPTS_DIR,
  DEFAULT_PYTHON,
} from "./loader.js";
