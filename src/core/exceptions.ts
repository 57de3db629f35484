/**
 * Custom exceptions for archive processing.
 */

/** Render any thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** A filesystem operation failed: missing path, permission denied, lock held. */
export class FileOperationError extends Error {
  path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${message}: ${path}`, options);
    this.name = "FileOperationError";
    this.path = path;
  }

  /** Wrap a caught error; FileOperationErrors pass through unchanged. */
  static from(path: string, action: string, err: unknown): FileOperationError {
    if (err instanceof FileOperationError) return err;
    return new FileOperationError(path, `${action} failed (${errorMessage(err)})`, {
      cause: err,
    });
  }
}

export class ExtractionFailedException extends Error {
  archivePath: string;

  constructor(archivePath: string, message?: string) {
    super(
      message
        ? `Extraction failed for ${archivePath}: ${message}`
        : `Extraction failed for ${archivePath}`,
    );
    this.name = "ExtractionFailedException";
    this.archivePath = archivePath;
  }
}

export class ConfigurationError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class ArchiveProcessingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArchiveProcessingError";
  }
}
