/**
 * CLI driver tests: flag and config-file merging, exit codes.
 */
import { describe, test, expect } from "vitest";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import type { RunConfiguration } from "../src/config.js";
import { EXIT_FAILED, EXIT_OK, EXIT_USAGE, USAGE, main, type CliEnvironment } from "../src/main.js";
import { MemoryLogger, makeTmpDir, writeArchive, writeCorruptArchive } from "./fixtures.js";

interface Captured extends CliEnvironment {
  stdout: string[];
  stderr: string[];
  logger: MemoryLogger;
  configs: RunConfiguration[];
}

function capture(): Captured {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const configs: RunConfiguration[] = [];
  const logger = new MemoryLogger();
  return {
    stdout,
    stderr,
    logger,
    configs,
    out: (text) => stdout.push(text),
    err: (text) => stderr.push(text),
    createLogger: (config) => {
      configs.push(config);
      return logger;
    },
  };
}

/** Root with one good account (B) and one corrupt archive (A). */
function mixedRoot(): string {
  const root = makeTmpDir();
  writeCorruptArchive(root, "A");
  writeArchive(root, "B", { "Takeout/notes.txt": "fine" });
  return root;
}

function runFlags(root: string): string[] {
  return ["--root", root, "--log-file", join(root, "run.log"), "--retry-delay", "0", "--max-retries", "1"];
}

describe("main", () => {
  test("--help prints usage", async () => {
    const env = capture();
    expect(await main(["--help"], env)).toBe(EXIT_OK);
    expect(env.stdout).toEqual([USAGE]);
    expect(env.configs).toEqual([]);
  });

  test("failed archives still exit 0 by default", async () => {
    const root = mixedRoot();
    const env = capture();

    expect(await main(runFlags(root), env)).toBe(EXIT_OK);
    expect(env.stdout).toEqual([
      "\nAll files processed: 1 completed, 1 failed",
      `Log written to ${join(root, "run.log")}`,
    ]);
    expect(readFileSync(join(root, "B", "notes.txt"), "utf8")).toBe("fine");
  });

  test("--fail-on-error exits 1 when an archive failed", async () => {
    const root = mixedRoot();
    const env = capture();

    expect(await main([...runFlags(root), "--fail-on-error"], env)).toBe(EXIT_FAILED);
    expect(env.stdout[0]).toBe("\nAll files processed: 1 completed, 1 failed");
  });

  test("--fail-on-error exits 0 when everything completed", async () => {
    const root = makeTmpDir();
    writeArchive(root, "B", { "Takeout/notes.txt": "fine" });
    const env = capture();

    expect(await main([...runFlags(root), "--fail-on-error"], env)).toBe(EXIT_OK);
  });

  test("missing root flag is a configuration error", async () => {
    const env = capture();
    expect(await main([], env)).toBe(EXIT_USAGE);
    expect(env.stderr).toEqual([`Invalid configuration: rootFolder: Required\n\n${USAGE}`]);
    expect(env.configs).toEqual([]);
  });

  test("unknown flag is a configuration error", async () => {
    const env = capture();
    expect(await main(["--root", "/data", "--bogus"], env)).toBe(EXIT_USAGE);
    expect(env.stderr).toHaveLength(1);
    expect(env.stderr[0]).toMatch(/^Invalid configuration: Unknown option '--bogus'/);
    expect(env.stderr[0].endsWith(USAGE)).toBe(true);
  });

  test("flags override the config file", async () => {
    const root = makeTmpDir();
    writeArchive(root, "A", { "Takeout/notes.txt": "from archive" });
    const configPath = join(root, "settings.json");
    writeFileSync(
      configPath,
      JSON.stringify({
        rootFolder: root,
        logFile: join(root, "run.log"),
        mode: "validate-only",
        retryDelayMs: 0,
        maxRetries: 4,
      }),
    );
    const env = capture();

    expect(await main(["--config", configPath, "--mode", "normal"], env)).toBe(EXIT_OK);

    expect(env.configs).toHaveLength(1);
    expect(env.configs[0]).toMatchObject({
      rootFolder: root,
      mode: "normal",
      retryDelayMs: 0,
      maxRetries: 4,
    });
    expect(readFileSync(join(root, "A", "notes.txt"), "utf8")).toBe("from archive");
  });

  test("config file values apply without flags", async () => {
    const root = makeTmpDir();
    writeArchive(root, "A", { "Takeout/notes.txt": "from archive" });
    const configPath = join(root, "settings.json");
    writeFileSync(
      configPath,
      JSON.stringify({ rootFolder: root, logFile: join(root, "run.log"), mode: "validate-only", retryDelayMs: 0 }),
    );
    const env = capture();

    expect(await main(["--config", configPath], env)).toBe(EXIT_OK);
    expect(env.configs[0]?.mode).toBe("validate-only");
    expect(existsSync(join(root, "A", "notes.txt"))).toBe(false);
  });

  test("unreadable config file is a configuration error", async () => {
    const root = makeTmpDir();
    const configPath = join(root, "settings.json");
    writeFileSync(configPath, "{ not json");
    const env = capture();

    expect(await main(["--config", configPath], env)).toBe(EXIT_USAGE);
    expect(env.stderr[0]).toMatch(/^Invalid configuration: config file .*settings\.json: /);
  });

  test("config file that is not an object", async () => {
    const root = makeTmpDir();
    const configPath = join(root, "settings.json");
    writeFileSync(configPath, "[1, 2]");
    const env = capture();

    expect(await main(["--config", configPath], env)).toBe(EXIT_USAGE);
    expect(env.stderr).toEqual([
      `Invalid configuration: config file ${configPath}: expected a JSON object\n\n${USAGE}`,
    ]);
  });

  test("missing root folder aborts the run with exit 1", async () => {
    const root = join(makeTmpDir(), "missing");
    const env = capture();

    expect(await main(["--root", root, "--log-file", join(root, "..", "run.log")], env)).toBe(EXIT_FAILED);
    expect(env.logger.messages("fatal")).toHaveLength(1);
    expect(env.logger.messages("fatal")[0]).toMatch(/^Run aborted: /);
    expect(env.stdout).toEqual([]);
  });
});
