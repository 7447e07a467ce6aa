/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Authentication errors
  | "AUTH_MISSING_API_KEY"
  | "AUTH_INVALID_TOKEN"
  | "AUTH_FORBIDDEN"
  // Validation errors
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  // Mirror errors
  | "MIRROR_NO_RECORDS"
  | "MIRROR_UNSAFE_PATH"
  // API errors
  | "API_RATE_LIMITED"
  | "API_SERVER_ERROR"
  | "API_BAD_REQUEST"
  | "API_NOT_FOUND"
  | "API_INVALID_RESPONSE"
  // Network errors
  | "NETWORK_OFFLINE"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;
  /** HTTP status of the response that produced this error, if any */
  readonly status?: number;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      details?: string;
      status?: number;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
    this.status = options?.status;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
