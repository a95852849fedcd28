export type ExpenseAnalysisErrorKind =
  | "config"
  | "auth"
  | "http"
  | "network"
  | "timeout"
  | "invalid_response";

export type AnalysisConfigErrorCode = "missing_api_key" | "invalid_url" | "request_encoding_failed";

interface AnalysisErrorOptions {
  cause?: unknown;
  details?: string;
  attempt?: number;
  status?: number;
  code?: AnalysisConfigErrorCode;
}

export class ExpenseAnalysisError extends Error {
  public readonly kind: ExpenseAnalysisErrorKind;
  public readonly details?: string;
  public readonly attempt?: number;
  public readonly status?: number;
  public readonly code?: AnalysisConfigErrorCode;
  public readonly retryable: boolean;

  constructor(kind: ExpenseAnalysisErrorKind, message: string, options?: AnalysisErrorOptions) {
    super(message);
    this.name = "ExpenseAnalysisError";
    this.kind = kind;
    this.details = options?.details;
    this.attempt = options?.attempt;
    this.status = options?.status;
    this.code = options?.code;
    this.retryable = kind !== "config" && kind !== "auth";
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}
