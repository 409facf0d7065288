/**
 * Configuration loader.
 *
 * Reads the environment, resolves paths against a base directory,
 * validates against the schema and freezes the result.
 */

import { resolve } from "node:path";
import type { ZodIssue } from "zod";
import { ConfigError, optionalEnv, optionalEnvBool, type Env } from "./env.js";
import { AppConfigSchema, type AppConfig } from "./schema.js";

export const DEFAULT_WORK_DIR = "data";
export const DEFAULT_TOOLS_DIR = "../downloads-generation";
export const DEFAULT_SCRIPTS_DIR = ".";
export const DEFAULT_PYTHON = "python";

/**
 * Convert Zod issues to display lines.
 */
function formatZodIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a raw configuration object.
 *
 * @throws ConfigError listing every invalid field
 */
export function validateConfig(input: unknown): Readonly<AppConfig> {
  const result = AppConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ConfigError(
      `Invalid configuration: ${issues.length} validation error(s)`,
      issues
    );
  }
  return Object.freeze(result.data);
}

/**
 * Load configuration from environment variables.
 *
 * @param env - Environment to read (defaults to process.env, after dotenv)
 * @param baseDir - Directory relative paths are resolved against
 */
export function loadConfig(
  env: Env = process.env,
  baseDir: string = process.cwd()
): Readonly<AppConfig> {
  return validateConfig({
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    workDir: resolve(baseDir, optionalEnv("WORK_DIR", DEFAULT_WORK_DIR, env)),
    toolsDir: resolve(baseDir, optionalEnv("TOOLS_DIR", DEFAULT_TOOLS_DIR, env)),
    scriptsDir: resolve(baseDir, optionalEnv("SCRIPTS_DIR", DEFAULT_SCRIPTS_DIR, env)),
    python: optionalEnv("PYTHON", DEFAULT_PYTHON, env),
    verifyChecksums: optionalEnvBool("VERIFY_CHECKSUMS", false, env),
  });
}
