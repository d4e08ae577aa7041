export type AppErrorCode = "BACKING_STORE" | "NOT_FOUND" | "VALIDATION" | "ASSISTANT";

export interface AppErrorContext {
  table?: string;
  rowNumber?: number;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly table?: string;
  public readonly rowNumber?: number;

  constructor(code: AppErrorCode, message: string, context: AppErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = "AppError";
    this.code = code;
    this.table = context.table;
    this.rowNumber = context.rowNumber;
  }
}

/** Remote fetch or write failed; the cache was left as it was and the call can be retried. */
export class BackingStoreError extends AppError {
  constructor(message: string, context: AppErrorContext = {}) {
    super("BACKING_STORE", message, context);
    this.name = "BackingStoreError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, context: AppErrorContext = {}) {
    super("NOT_FOUND", message, context);
    this.name = "NotFoundError";
  }
}

/** Raised by remote stores when the named sheet does not exist. */
export class TableNotFoundError extends NotFoundError {
  constructor(table: string) {
    super(`Table "${table}" does not exist`, { table });
    this.name = "TableNotFoundError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context: AppErrorContext = {}) {
    super("VALIDATION", message, context);
    this.name = "ValidationError";
  }
}

export class AssistantError extends AppError {
  constructor(message: string, context: AppErrorContext = {}) {
    super("ASSISTANT", message, context);
    this.name = "AssistantError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
