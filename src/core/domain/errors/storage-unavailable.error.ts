/**
 * Raised when the message store cannot be reached or written.
 * No partial write is visible when this is thrown, so callers may retry.
 */
export class StorageUnavailableError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(cause ? `${message}: ${cause.message}` : message);
    this.name = 'StorageUnavailableError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
