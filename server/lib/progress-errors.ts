/**
 * Structured failure reasons for progress operations.
 * Callers switch on `error` to render a specific message.
 */

export type ProgressErrorCode =
  | "invalid-key"
  | "invalid-raw-value"
  | "no-active-medium"
  | "invalid-setting"
  | "not-found";

export type ProgressError = {
  error: ProgressErrorCode;
  message: string;
};

/**
 * Non-fatal reasons attached to a successful result.
 * - unknown-book-length: position stored, nothing counted until a total is known
 * - already-complete: the read-through was finished; nothing changed
 */
export type ProgressNotice = "unknown-book-length" | "already-complete";

export function progressError(
  error: ProgressErrorCode,
  message: string,
): ProgressError {
  return { error, message };
}

export function isProgressError<T extends object>(
  result: T | ProgressError,
): result is ProgressError {
  return "error" in result;
}
