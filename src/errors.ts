import type { ZodIssue } from "zod";

export type EvoMemoryErrorCode = "STORAGE_ERROR" | "VALIDATION_ERROR";

export class EvoMemoryError extends Error {
  readonly code: EvoMemoryErrorCode;

  constructor(code: EvoMemoryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** I/O or connection failure. Fatal to the triggering call, never retried. */
export class StorageError extends EvoMemoryError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("STORAGE_ERROR", `${operation} failed: ${detail}`, { cause });
    this.operation = operation;
  }
}

/** Caller input rejected before it reaches the database. */
export class ValidationError extends EvoMemoryError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super("VALIDATION_ERROR", message);
    this.issues = issues;
  }
}

/** Run a storage call, rethrowing anything it throws as a StorageError. */
export function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof EvoMemoryError) throw err;
    throw new StorageError(operation, err);
  }
}
