/**
 * Shared test fixtures: zip builder, temp folders, recording logger.
 */
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { zipSync, strToU8 } from "fflate";

import { parseConfig, type ConfigInput, type RunConfiguration } from "../src/config.js";
import type { LogContext, Logger, LogLevel } from "../src/logger.js";

// ---------------------------------------------------------------------------
// Zip builder helper
// ---------------------------------------------------------------------------

export function buildZip(files: Record<string, string | Uint8Array>): Uint8Array {
  const zipFiles: Record<string, Uint8Array> = {};
  for (const [name, data] of Object.entries(files)) {
    zipFiles[name] = typeof data === "string" ? strToU8(data) : data;
  }
  return zipSync(zipFiles);
}

// ---------------------------------------------------------------------------
// Temp dir + archive helpers
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "takeout-merge-test-"));
}

/** Write `<root>/<account>/<name>` containing `files`; returns its path. */
export function writeArchive(
  root: string,
  account: string,
  files: Record<string, string | Uint8Array>,
  name = "export.zip",
): string {
  const folder = join(root, account);
  mkdirSync(folder, { recursive: true });
  const p = join(folder, name);
  writeFileSync(p, buildZip(files));
  return p;
}

export function writeCorruptArchive(root: string, account: string, name = "export.zip"): string {
  const folder = join(root, account);
  mkdirSync(folder, { recursive: true });
  const p = join(folder, name);
  writeFileSync(p, "not a zip file");
  return p;
}

/** Validated config for tests: no retry pause, log file inside the root. */
export function testConfig(root: string, overrides: Partial<ConfigInput> = {}): RunConfiguration {
  return parseConfig({
    rootFolder: root,
    logFile: join(root, "run.log"),
    retryDelayMs: 0,
    ...overrides,
  });
}

// ---------------------------------------------------------------------------
// Recording logger
// ---------------------------------------------------------------------------

export interface LogRecord {
  level: LogLevel;
  msg: string;
  context: LogContext;
}

export class MemoryLogger implements Logger {
  readonly records: LogRecord[];
  private context: LogContext;

  constructor(records: LogRecord[] = [], context: LogContext = {}) {
    this.records = records;
    this.context = context;
  }

  private push(level: LogLevel, msg: string): void {
    this.records.push({ level, msg, context: { ...this.context } });
  }

  debug(msg: string): void {
    this.push("debug", msg);
  }

  info(msg: string): void {
    this.push("info", msg);
  }

  warn(msg: string): void {
    this.push("warn", msg);
  }

  error(msg: string): void {
    this.push("error", msg);
  }

  fatal(msg: string): void {
    this.push("fatal", msg);
  }

  child(context: LogContext): Logger {
    return new MemoryLogger(this.records, { ...this.context, ...context });
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  messages(level?: LogLevel): string[] {
    return this.records.filter((r) => !level || r.level === level).map((r) => r.msg);
  }
}
