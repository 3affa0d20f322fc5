/**
 * A write or read against the store failed. The message is the
 * underlying driver text, unchanged; the original error is kept as `cause`.
 */
export class StorageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StorageError";
  }
}

export class RequestAbortedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestAbortedError";
  }

  static deadline(ms: number): RequestAbortedError {
    return new RequestAbortedError(`request deadline of ${ms}ms exceeded`);
  }

  static clientClosed(): RequestAbortedError {
    return new RequestAbortedError("client closed request");
  }
}

export function toStorageError(err: unknown): StorageError {
  if (err instanceof StorageError) return err;
  if (err instanceof Error) return new StorageError(err.message, { cause: err });
  return new StorageError(String(err));
}

// Errors raised by express.json(): malformed JSON, oversized body, bad charset.
export interface HttpError extends Error {
  status: number;
  expose?: boolean;
}

export function isHttpError(err: unknown): err is HttpError {
  return err instanceof Error && "status" in err && typeof err.status === "number";
}
