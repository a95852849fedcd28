export type ExpenseValidationField =
  | "amount"
  | "title"
  | "description"
  | "confidence"
  | "date"
  | "category"
  | "tags";

export class ExpenseValidationError extends Error {
  public readonly field: ExpenseValidationField;

  constructor(field: ExpenseValidationField, message: string) {
    super(message);
    this.name = "ExpenseValidationError";
    this.field = field;
  }
}

export type ExpenseStorageOperation = "save" | "update" | "delete" | "fetch" | "search";

interface StorageErrorOptions {
  cause?: unknown;
  details?: string;
}

export class ExpenseStorageError extends Error {
  public readonly operation: ExpenseStorageOperation;
  public readonly details?: string;

  constructor(operation: ExpenseStorageOperation, message: string, options?: StorageErrorOptions) {
    super(message);
    this.name = "ExpenseStorageError";
    this.operation = operation;
    this.details = options?.details;
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}
