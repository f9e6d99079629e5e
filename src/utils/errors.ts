import { ZodError } from "zod";

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CHANNEL_UNAVAILABLE"
  | "PROVIDER_ERROR"
  | "PERSISTENCE_ERROR"
  | "INTERNAL_ERROR";

interface AppErrorOptions {
  code?: ErrorCode;
  details?: unknown;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(message: string, options?: AppErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options?.code ?? "INTERNAL_ERROR";
    this.details = options?.details;
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation error", details?: unknown) {
    super(message, { code: "VALIDATION_ERROR", details });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", details?: unknown) {
    super(message, { code: "NOT_FOUND", details });
  }
}

export class ChannelUnavailableError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { code: "CHANNEL_UNAVAILABLE", details });
  }
}

export interface ProviderErrorDetails {
  provider: string;
  statusCode?: number;
}

export class ProviderError extends AppError {
  public readonly provider: string;
  public readonly statusCode?: number;

  constructor(message: string, details: ProviderErrorDetails, cause?: unknown) {
    super(message, { code: "PROVIDER_ERROR", details, cause });
    this.provider = details.provider;
    this.statusCode = details.statusCode;
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "PERSISTENCE_ERROR", cause });
  }
}

export interface FailureResult {
  success: false;
  error: string;
  code: ErrorCode;
  details?: unknown;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function toFailure(error: unknown): FailureResult {
  if (error instanceof AppError) {
    return {
      success: false,
      error: error.message,
      code: error.code,
      details: error.details,
    };
  }

  if (error instanceof ZodError) {
    return {
      success: false,
      error: "Validation error",
      code: "VALIDATION_ERROR",
      details: error.flatten(),
    };
  }

  return {
    success: false,
    error: errorMessage(error) || "Internal error",
    code: "INTERNAL_ERROR",
  };
}
