export type AppErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UPSTREAM_ERROR"
  | "ADVISOR_TIMEOUT"
  | "PERSISTENCE_ERROR"
  | "INTERNAL";

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly details?: unknown;

  constructor(opts: { code: AppErrorCode; message: string; details?: unknown; cause?: unknown }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "AppError";
    this.code = opts.code;
    this.details = opts.details;
  }
}

export function assertUnreachable(x: never): never {
  throw new AppError({ code: "INTERNAL", message: `Unreachable: ${String(x)}` });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
