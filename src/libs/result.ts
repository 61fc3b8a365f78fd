import type { Result } from "../types.js";
import { AppError, type AppErrorCode, errorMessage } from "./errors.js";

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Runs `fn` and folds a thrown error into a failed Result tagged with `code`.
 * AppErrors pass through with their own code.
 */
export async function settle<T>(
  code: AppErrorCode,
  fn: () => Promise<T>
): Promise<Result<T, AppError>> {
  try {
    return ok(await fn());
  } catch (e) {
    if (e instanceof AppError) return err(e);
    return err(new AppError({ code, message: errorMessage(e), cause: e }));
  }
}
