/**
 * Zip extraction into a worker's private temp folder.
 *
 * The archive is streamed through fflate's `Unzip`, so neither the archive nor
 * its decompressed entries are held in memory as a whole.
 */
import { Unzip, UnzipInflate, type UnzipFile } from "fflate";
import { once } from "node:events";
import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import { dirname, isAbsolute, posix, resolve, sep } from "node:path";
import { PassThrough } from "node:stream";
import { pipeline } from "node:stream/promises";

import { ExtractionFailedException, FileOperationError, errorMessage } from "../core/exceptions.js";

/** Expands an archive into a directory; returns the files written. */
export type ArchiveExtractor = (archivePath: string, destDir: string) => Promise<string[]>;

/** Resolve an entry name under `root`, or null when it would land outside. */
function entryTarget(root: string, name: string): string | null {
  const normalised = posix.normalize(name.replace(/\\/g, "/"));
  if (
    isAbsolute(normalised) ||
    normalised === ".." ||
    normalised.startsWith("../") ||
    /^[a-zA-Z]:/.test(normalised)
  ) {
    return null;
  }
  const target = resolve(root, ...normalised.split("/"));
  if (target !== root && !target.startsWith(root + sep)) return null;
  return target;
}

// Local file header, or the end-of-central-directory record of an empty archive
function looksLikeZip(head: Uint8Array): boolean {
  return (
    head.length >= 4 &&
    head[0] === 0x50 &&
    head[1] === 0x4b &&
    ((head[2] === 0x03 && head[3] === 0x04) || (head[2] === 0x05 && head[3] === 0x06))
  );
}

class StreamingExtraction {
  private archivePath: string;
  private root: string;
  private unzipper: Unzip;
  /** Entry bodies still receiving data */
  private open = new Set<PassThrough>();
  private pending: Promise<void>[] = [];
  private written: string[] = [];
  private failure: Error | undefined;
  /** Aborted on the first failure so no drain wait outlives it */
  private aborted = new AbortController();

  constructor(archivePath: string, root: string) {
    this.archivePath = archivePath;
    this.root = root;
    this.unzipper = new Unzip((file) => this.onFile(file));
    this.unzipper.register(UnzipInflate);
  }

  async run(): Promise<string[]> {
    let sawData = false;
    try {
      for await (const chunk of createReadStream(this.archivePath)) {
        const bytes: Buffer = chunk;
        if (!sawData) {
          sawData = true;
          if (!looksLikeZip(bytes)) {
            this.fail(new ExtractionFailedException(this.archivePath, "not a zip archive"));
            break;
          }
        }
        this.push(bytes, false);
        if (this.failure) break;
        await this.drain();
      }
    } catch (err) {
      this.fail(FileOperationError.from(this.archivePath, "read archive", err));
    }

    if (!this.failure) {
      if (!sawData) {
        this.fail(new ExtractionFailedException(this.archivePath, "archive is empty"));
      } else {
        this.push(new Uint8Array(0), true);
        if (!this.failure && this.open.size > 0) {
          this.fail(new ExtractionFailedException(this.archivePath, "archive is truncated"));
        }
      }
    }

    if (this.failure) {
      for (const body of this.open) body.destroy();
      this.open.clear();
    }
    await Promise.all(this.pending);
    if (this.failure) throw this.failure;
    return this.written;
  }

  private onFile(file: UnzipFile): void {
    if (this.failure) return;
    const target = entryTarget(this.root, file.name);
    if (target === null) {
      this.fail(
        new ExtractionFailedException(
          this.archivePath,
          `entry escapes the extraction folder: ${file.name}`,
        ),
      );
      return;
    }

    // Directory entries carry a trailing slash and no data
    if (file.name.endsWith("/")) {
      this.track(target, mkdir(target, { recursive: true }).then(() => undefined));
      return;
    }

    const body = new PassThrough();
    this.open.add(body);
    this.track(
      target,
      mkdir(dirname(target), { recursive: true })
        .then(() => pipeline(body, createWriteStream(target)))
        .then(() => {
          this.written.push(target);
        }),
    );

    file.ondata = (err, data, final) => {
      if (err) {
        this.fail(new ExtractionFailedException(this.archivePath, `${file.name}: ${err.message}`));
        this.open.delete(body);
        body.destroy();
        return;
      }
      body.write(data);
      if (final) {
        this.open.delete(body);
        body.end();
      }
    };
    file.start();
  }

  private push(bytes: Uint8Array, final: boolean): void {
    try {
      this.unzipper.push(bytes, final);
    } catch (err) {
      this.fail(new ExtractionFailedException(this.archivePath, errorMessage(err)));
    }
  }

  /** Wait until every entry body has room for more data. */
  private async drain(): Promise<void> {
    const waits = [...this.open]
      .filter((b) => b.writableNeedDrain)
      .map((b) => once(b, "drain", { signal: this.aborted.signal }));
    if (waits.length === 0) return;
    try {
      await Promise.all(waits);
    } catch (err) {
      this.fail(FileOperationError.from(this.archivePath, "write extracted file", err));
    }
  }

  private track(target: string, work: Promise<void>): void {
    this.pending.push(
      work.catch((err: unknown) => {
        this.fail(FileOperationError.from(target, "write extracted file", err));
      }),
    );
  }

  private fail(err: Error): void {
    if (this.failure) return;
    this.failure = err;
    this.aborted.abort();
  }
}

/**
 * Extract a zip archive into `destDir`. Corrupt archives and entries that
 * would land outside `destDir` raise ExtractionFailedException; filesystem
 * failures raise FileOperationError. On failure `destDir` is removed, so a
 * retry starts from an empty folder.
 */
export const extractZip: ArchiveExtractor = async (archivePath, destDir) => {
  const root = resolve(destDir);
  try {
    await mkdir(root, { recursive: true });
  } catch (err) {
    throw FileOperationError.from(root, "create extraction folder", err);
  }

  try {
    return await new StreamingExtraction(archivePath, root).run();
  } catch (err) {
    await rm(root, { recursive: true, force: true });
    throw err;
  }
};
