/**
 * Run configuration schema and validation.
 */
import { resolve } from "node:path";
import { z } from "zod";

import { ConfigurationError } from "./core/exceptions.js";
import { PROCESSING_MODES } from "./core/types.js";

/** Concurrency cap for the batch scheduler. Fixed; not part of the schema. */
export const MAX_PARALLEL_WORKERS = 5;

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

export const ConfigSchema = z
  .object({
    rootFolder: z.string().trim().min(1, "root folder is required"),
    logFile: z.string().trim().min(1).default("takeout-merge.log"),
    maxRetries: z.coerce.number().int().min(1).default(3),
    retryDelayMs: z.coerce.number().int().min(0).default(1000),
    deleteArchives: z.boolean().default(false),
    testModeLimit: z.coerce.number().int().min(0).default(0),
    mode: z.enum(PROCESSING_MODES).default("normal"),
    contentFolderName: z.string().trim().min(1).default("Takeout"),
    tempFolderName: z.string().trim().min(1).default("temp_takeout"),
    archiveExtension: z
      .string()
      .regex(/^\.[^./\\]+$/, "must look like .zip")
      .default(".zip"),
    failOnError: z.boolean().default(false),
  })
  .strict();

export type ConfigInput = z.input<typeof ConfigSchema>;

/** Resolved, immutable settings shared by every worker of a run. */
export type RunConfiguration = Readonly<z.output<typeof ConfigSchema>>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join(".");
    return field ? `${field}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a raw configuration object. Throws ConfigurationError listing
 * every invalid field.
 */
export function parseConfig(raw: unknown): RunConfiguration {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return Object.freeze({
    ...result.data,
    rootFolder: resolve(result.data.rootFolder),
    logFile: resolve(result.data.logFile),
  });
}
