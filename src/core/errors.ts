export type ErrorCode = "VALIDATION_ERROR" | "NOT_FOUND" | "STORAGE_ERROR";

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR";
}

export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND";

  constructor(readonly taskId: number) {
    super(`task ${taskId} not found`);
  }
}

/** Wraps any failure raised by the database driver. */
export class StorageError extends AppError {
  readonly code = "STORAGE_ERROR";
}
