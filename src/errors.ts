export class UsageError extends Error {
  constructor(
    message: string,
    readonly usage: string,
    readonly quiet = false
  ) {
    super(message);
    this.name = "UsageError";
  }
}

export class BackendError extends Error {
  constructor(
    readonly command: string[],
    message: string,
    readonly exitCode?: number
  ) {
    super(message);
    this.name = "BackendError";
  }
}

export type BackendResult<T> = { ok: true; value: T } | { ok: false; error: BackendError };

export function success<T>(value: T): BackendResult<T> {
  return { ok: true, value };
}

export function failure<T>(command: string[], error: unknown): BackendResult<T> {
  return { ok: false, error: toBackendError(command, error) };
}

export function toBackendError(command: string[], error: unknown): BackendError {
  if (error instanceof BackendError) return error;
  const message = error instanceof Error ? error.message : String(error);
  const code = readExitCode(error);
  return new BackendError(command, message, code);
}

function readExitCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "number" ? error.code : undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
