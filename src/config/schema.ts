/**
 * Pipeline configuration schema.
 *
 * Every path is resolved to an absolute path once at startup and threaded
 * through the fetcher, stage runner and pipeline. Nothing reads or changes
 * the process working directory after that.
 */

import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const AppConfigSchema = z
  .object({
    /** Minimum log level */
    logLevel: LogLevelSchema,

    /** Root of the working directory: downloads, generated outputs, logs */
    workDir: z.string().min(1).describe("Absolute path of the working directory root"),

    /** Directory holding the downloads-generation tools */
    toolsDir: z.string().min(1).describe("Absolute path of the external tools checkout"),

    /** Directory holding local helper scripts */
    scriptsDir: z.string().min(1).describe("Absolute path of the helper scripts"),

    /** Interpreter used for the external tools */
    python: z.string().min(1),

    /** Re-hash registered artifacts before deciding to skip a stage */
    verifyChecksums: z.boolean(),
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;
