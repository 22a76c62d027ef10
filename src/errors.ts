export type SlicerErrorKind =
  | "missing_dependency"
  | "invalid_input"
  | "download"
  | "split"
  | "filesystem"
  | "run_aborted";

const fatalKinds: ReadonlySet<SlicerErrorKind> = new Set([
  "missing_dependency",
  "invalid_input",
  "filesystem",
  "run_aborted",
]);

/**
 * Base class for every error chapterslice raises on purpose.
 */
export class SlicerError extends Error {
  readonly kind: SlicerErrorKind;

  constructor(kind: SlicerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SlicerError";
    this.kind = kind;
  }
}

/** A required binary is absent and could not be installed. */
export class MissingDependencyError extends SlicerError {
  readonly missing: string[];

  constructor(message: string, missing: string[]) {
    super("missing_dependency", message);
    this.name = "MissingDependencyError";
    this.missing = missing;
  }
}

/** The batch file could not be read or lists nothing. */
export class InvalidInputError extends SlicerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("invalid_input", message, options);
    this.name = "InvalidInputError";
  }
}

export class DownloadError extends SlicerError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super("download", message, options);
    this.name = "DownloadError";
    this.url = url;
  }
}

export class SplitError extends SlicerError {
  readonly chapterIndex: number;

  constructor(chapterIndex: number, message: string, options?: { cause?: unknown }) {
    super("split", message, options);
    this.name = "SplitError";
    this.chapterIndex = chapterIndex;
  }
}

export class FilesystemError extends SlicerError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("filesystem", message, options);
    this.name = "FilesystemError";
    this.path = path;
  }
}

/** Raised when the user interrupts twice while the same item is running. */
export class RunAbortedError extends SlicerError {
  constructor(message = "Run aborted by user") {
    super("run_aborted", message);
    this.name = "RunAbortedError";
  }
}

export function isFatal(error: unknown): boolean {
  return error instanceof SlicerError && fatalKinds.has(error.kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
