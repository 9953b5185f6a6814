export type IOErrorCode =
  | "CLOSED"
  | "NOT_SEEKABLE"
  | "NOT_FOUND"
  | "DIRECTORY_NOT_FOUND"
  | "READ_FAILED"
  | "WRITE_FAILED";

/**
 * Malformed job descriptor or stream options. Raised before any I/O.
 */
export class ValidationError extends Error {
  override readonly name: string = "ValidationError";

  constructor(
    message: string,
    public readonly field?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class DecodeError extends Error {
  override readonly name: string = "DecodeError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class RenderError extends Error {
  override readonly name: string = "RenderError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class EncodeError extends Error {
  override readonly name: string = "EncodeError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class IOError extends Error {
  override readonly name: string = "IOError";

  constructor(
    message: string,
    public readonly code: IOErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class DirectoryNotFoundError extends IOError {
  override readonly name: string = "DirectoryNotFoundError";

  constructor(
    public readonly directory: string,
    options?: { cause?: unknown },
  ) {
    super(`Directory not found: ${directory}`, "DIRECTORY_NOT_FOUND", options);
  }
}

/** Narrows a thrown value to a Node system error with a code. */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
