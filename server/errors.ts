import type { PromotionValidationError, PromotionValidationErrorKind } from "@shared/promotionValidation";

export const STATUS_LABELS: Record<number, string> = {
  400: "Bad Request",
  404: "Not Found",
  405: "Method Not Allowed",
  413: "Payload Too Large",
  415: "Unsupported Media Type",
  500: "Internal Server Error",
  503: "Service Unavailable",
};

export function statusLabel(status: number): string {
  return STATUS_LABELS[status] ?? (status >= 500 ? "Internal Server Error" : "Bad Request");
}

/** Base class for errors that map onto a specific HTTP response. */
export abstract class ApiError extends Error {
  abstract readonly status: number;

  get label(): string {
    return statusLabel(this.status);
  }
}

export class DataValidationError extends ApiError {
  readonly status = 400;
  readonly kind?: PromotionValidationErrorKind;
  readonly field?: string;

  constructor(message: string, details: { kind?: PromotionValidationErrorKind; field?: string } = {}) {
    super(message);
    this.name = "DataValidationError";
    this.kind = details.kind;
    this.field = details.field;
  }

  static fromValidation(error: PromotionValidationError): DataValidationError {
    return new DataValidationError(error.message, { kind: error.kind, field: error.field });
  }
}

export class NotFoundError extends ApiError {
  readonly status = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class MethodNotAllowedError extends ApiError {
  readonly status = 405;

  constructor(
    method: string,
    readonly allowed: string[],
  ) {
    super(`The method ${method} is not allowed for the requested URL.`);
    this.name = "MethodNotAllowedError";
  }
}

export class UnsupportedMediaTypeError extends ApiError {
  readonly status = 415;

  constructor(expected: string, received: string | undefined) {
    super(`Content-Type must be ${expected}; received ${received || "none"}`);
    this.name = "UnsupportedMediaTypeError";
  }
}

export class DatabaseError extends ApiError {
  readonly status: 500 | 503;

  constructor(message: string, options: { cause?: unknown; unavailable?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = "DatabaseError";
    this.status = options.unavailable ? 503 : 500;
  }
}

export function extractStatusCode(error: unknown): number {
  if (error && typeof error === "object") {
    const candidate = "status" in error ? error.status : undefined;
    const candidateCode = "statusCode" in error ? error.statusCode : undefined;
    const status =
      typeof candidate === "number"
        ? candidate
        : typeof candidateCode === "number"
          ? candidateCode
          : undefined;
    if (typeof status === "number" && status >= 400 && status <= 599) {
      return status;
    }
  }

  return 500;
}

export function resolveErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (typeof error === "string" && error.trim().length > 0) {
    return error;
  }

  return "Internal Server Error";
}

export type ErrorResponseBody = {
  status: number;
  error: string;
  message: string;
  kind?: PromotionValidationErrorKind;
  field?: string;
  errorId?: string;
};
