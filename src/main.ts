/**
 * Command-line driver: flags and config file → RunConfiguration → run →
 * exit code.
 */
import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { z } from "zod";

import { parseConfig, type ConfigInput, type RunConfiguration } from "./config.js";
import { ConfigurationError, errorMessage } from "./core/exceptions.js";
import { ArchiveMerger } from "./index.js";
import { createLogger, type Logger } from "./logger.js";

export const USAGE = `
takeout-merge: extract export archives into their account folders

Usage:
  takeout-merge --root <dir> [options]

Options:
  --root <dir>             Folder containing one sub-folder per account
  --config <file.json>     JSON file with settings (flags override it)
  --log-file <file>        Log file, appended to   (default: takeout-merge.log)
  --max-retries <n>        Attempts per operation  (default: 3)
  --retry-delay <ms>       Pause between attempts  (default: 1000)
  --mode <mode>            normal | validate-only | validate-after (default: normal)
  --delete-archives        Delete each archive after a successful merge
  --test-limit <n>         Process only the first n archives (default: 0 = all)
  --content-folder <name>  Extracted folder to merge from (default: Takeout)
  --fail-on-error          Exit with status 1 when any archive failed
  --help                   Show this help
`.trim();

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

/** Where the CLI writes and how it builds the run logger. */
export interface CliEnvironment {
  out(text: string): void;
  err(text: string): void;
  createLogger(config: RunConfiguration): Logger;
}

const defaultEnvironment: CliEnvironment = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  createLogger: (config) =>
    createLogger({
      service: "takeout-merge",
      logFile: config.logFile,
      context: { runId: randomUUID() },
    }),
};

const OPTIONS = {
  root: { type: "string" },
  config: { type: "string" },
  "log-file": { type: "string" },
  "max-retries": { type: "string" },
  "retry-delay": { type: "string" },
  mode: { type: "string" },
  "delete-archives": { type: "boolean" },
  "test-limit": { type: "string" },
  "content-folder": { type: "string" },
  "fail-on-error": { type: "boolean" },
  help: { type: "boolean", short: "h", default: false },
} as const;

function parseFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true }).values;
  } catch (err) {
    throw new ConfigurationError([errorMessage(err)]);
  }
}

const ConfigFileSchema = z.record(z.string(), z.unknown());

async function loadConfigFile(path: string): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new ConfigurationError([`config file ${path}: ${errorMessage(err)}`]);
  }
  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError([`config file ${path}: expected a JSON object`]);
  }
  return result.data;
}

/**
 * Run the CLI against `argv` (without the node and script paths) and return
 * the process exit code.
 */
export async function main(argv: string[], env: CliEnvironment = defaultEnvironment): Promise<number> {
  let config: RunConfiguration;
  try {
    const values = parseFlags(argv);
    if (values.help) {
      env.out(USAGE);
      return EXIT_OK;
    }

    const flags: Partial<Record<keyof ConfigInput, string | boolean | undefined>> = {
      rootFolder: values.root,
      logFile: values["log-file"],
      maxRetries: values["max-retries"],
      retryDelayMs: values["retry-delay"],
      mode: values.mode,
      deleteArchives: values["delete-archives"],
      testModeLimit: values["test-limit"],
      contentFolderName: values["content-folder"],
      failOnError: values["fail-on-error"],
    };
    const raw: Record<string, unknown> = values.config ? await loadConfigFile(values.config) : {};
    for (const [key, value] of Object.entries(flags)) {
      if (value !== undefined) raw[key] = value;
    }
    config = parseConfig(raw);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    env.err(`${err.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  const logger = env.createLogger(config);
  try {
    const summary = await new ArchiveMerger(config, logger).run();
    env.out(
      `\nAll files processed: ${summary.completed} completed, ${summary.failed} failed` +
        (summary.notDispatched > 0 ? `, ${summary.notDispatched} skipped by test mode` : ""),
    );
    env.out(`Log written to ${config.logFile}`);
    return config.failOnError && summary.failed > 0 ? EXIT_FAILED : EXIT_OK;
  } catch (err) {
    logger.fatal(`Run aborted: ${errorMessage(err)}`, err);
    return EXIT_FAILED;
  }
}
