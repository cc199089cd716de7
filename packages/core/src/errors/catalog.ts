/**
 * Typed errors raised while reconciling parameter files.
 *
 * Per-entry failures are collected by the fetcher and combined into a
 * single `ReconcileError`; manifest errors abort a call before any entry
 * is touched.
 */

export class ParamsError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

// Fatal

export class ManifestParseError extends ParamsError {
  constructor(cause: unknown) {
    super(
      "MANIFEST_INVALID",
      `invalid parameter manifest: ${describeCause(cause)}`,
      undefined,
      { cause },
    );
  }
}

// Verification

export class ChecksumMismatchError extends ParamsError {
  constructor(
    public readonly path: string,
    public readonly actual: string,
    public readonly expected: string,
  ) {
    super(
      "CHECKSUM_MISMATCH",
      `checksum mismatch in param file ${path}, ${actual} != ${expected}`,
      { path, actual, expected },
    );
  }
}

// Transport

export class DownloadError extends ParamsError {
  constructor(
    public readonly url: string,
    public readonly status: number,
  ) {
    super("DOWNLOAD_FAILED", `GET ${url} failed: HTTP ${status}`, {
      url,
      status,
    });
  }
}

// Per-entry, aggregated

export class FetchFailedError extends ParamsError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(
      "FETCH_FAILED",
      `fetching file ${path} failed: ${describeCause(cause)}`,
      { path },
      { cause },
    );
  }
}

export class CheckFailedError extends ParamsError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(
      "CHECK_FAILED",
      `checking file ${path} failed: ${describeCause(cause)}`,
      { path },
      { cause },
    );
  }
}

export class RemoveFailedError extends ParamsError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(
      "REMOVE_FAILED",
      `remove file ${path} failed: ${describeCause(cause)}`,
      { path },
      { cause },
    );
  }
}

/** All failures of one reconcile call. */
export class ReconcileError extends AggregateError {
  constructor(errors: readonly Error[]) {
    super(
      errors,
      `${errors.length} parameter file error(s): ${errors
        .map((err) => err.message)
        .join("; ")}`,
    );
    this.name = "ReconcileError";
  }
}

/**
 * Combine per-entry errors into one error, or null when there are none.
 */
export function combineErrors(
  errors: readonly Error[],
): ReconcileError | null {
  if (errors.length === 0) return null;
  return new ReconcileError(errors);
}

export function isNotFoundError(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err as NodeJS.ErrnoException).code === "ENOENT"
  );
}
