/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Raised for setup problems that must stop the watcher (no capture region,
 * license rejected, unreadable config). The CLI maps it to exit status 1.
 */
export class FatalWatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalWatchError";
  }
}

export function isFatalWatchError(error: unknown): error is FatalWatchError {
  return error instanceof FatalWatchError;
}
