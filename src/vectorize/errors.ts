// Error taxonomy for a vectorization run.
//
// Only an uninitialised checkpoint is recovered locally; everything else is
// fatal and propagates to the caller. Restarting from the checkpoint is the
// only recovery path.

export type EmbeddingErrorCode =
  | "auth_failed"
  | "throttled"
  | "invalid_request"
  | "server_error"
  | "invalid_response"
  | "misaligned_batch"
  | "unknown";

export type IoOperation =
  | "open"
  | "read"
  | "write"
  | "sync"
  | "stat"
  | "truncate"
  | "close"
  | "mkdir"
  | "fetch";

export abstract class VectorizationError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The embedding service rejected a batch or answered with something unusable. */
export class EmbeddingError extends VectorizationError {
  readonly code: EmbeddingErrorCode;
  readonly status: number | undefined;

  constructor(
    code: EmbeddingErrorCode,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(message, options);
    this.code = code;
    this.status = options?.status;
  }
}

export class IoError extends VectorizationError {
  readonly code = "io_error";
  readonly operation: IoOperation;
  readonly path: string | undefined;

  constructor(operation: IoOperation, path: string | undefined, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed${path ? ` for ${path}` : ""}: ${reason}`, { cause });
    this.operation = operation;
    this.path = path;
  }
}

/** A malformed operation log record. Never skipped. */
export class ParseError extends VectorizationError {
  readonly code = "parse_error";
  readonly line: number;

  constructor(line: number, reason: string, cause?: unknown) {
    super(`Malformed operation at line ${line}: ${reason}`, { cause });
    this.line = line;
  }
}

/** A dispatched unit of work failed for a reason outside the taxonomy above. */
export class ExecutionFault extends VectorizationError {
  readonly code = "execution_fault";
  readonly unit: number;

  constructor(unit: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unit ${unit} failed to complete: ${reason}`, { cause });
    this.unit = unit;
  }
}

export class ConfigError extends VectorizationError {
  readonly code = "config_error";
  readonly keys: string[];

  constructor(message: string, keys: string[]) {
    super(message);
    this.keys = keys;
  }
}

/** Wraps any failure from a file-system call as an `IoError`. */
export async function io<T>(
  operation: IoOperation,
  path: string | undefined,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof VectorizationError) throw error;
    throw new IoError(operation, path, error);
  }
}
