import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 */

// ============================================================================
// Authentication Errors
// ============================================================================

export function missingApiKey(): CLIError {
  return new CLIError("AUTH_MISSING_API_KEY", "ZENODO_API_KEY environment variable not set", {
    suggestion:
      "Create a personal access token under Applications in your Zenodo account, then export it",
    example: "export ZENODO_API_KEY='your_api_key_here'",
  });
}

export function invalidToken(details?: string): CLIError {
  return new CLIError("AUTH_INVALID_TOKEN", "Zenodo rejected the API key", {
    suggestion: "Check that ZENODO_API_KEY holds a valid, unrevoked token",
    details,
    status: 401,
  });
}

export function forbidden(details?: string): CLIError {
  return new CLIError("AUTH_FORBIDDEN", "The API key is not allowed to read this resource", {
    suggestion: "Make sure the token has the deposit:read scope",
    details,
    status: 403,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(optionName: string, reason: string): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`);
}

export function invalidConfig(details: string): CLIError {
  return new CLIError("VALIDATION_CONFIG_INVALID", "Config file has errors", {
    suggestion: "Fix the issues below and try again",
    example: "zenodo-mirror config validate",
    details,
  });
}

// ============================================================================
// Mirror Errors
// ============================================================================

export function noRecordsFound(communityId: string): CLIError {
  return new CLIError("MIRROR_NO_RECORDS", "No records found. Exiting.", {
    suggestion: "Check the community identifier and that the API key can read it",
    details: `community ${communityId}`,
  });
}

export function unsafeFilePath(filename: string): CLIError {
  return new CLIError("MIRROR_UNSAFE_PATH", `Refusing to write "${filename}" outside its record directory`);
}

// ============================================================================
// API Errors
// ============================================================================

export function rateLimited(retryAfterSeconds?: number): CLIError {
  const wait = retryAfterSeconds ? `${retryAfterSeconds} seconds` : "a moment";
  return new CLIError("API_RATE_LIMITED", "Zenodo is rate limiting requests", {
    suggestion: `Wait ${wait} and run the mirror again; finished files are skipped`,
    status: 429,
  });
}

export function serverError(status: number, details?: string): CLIError {
  return new CLIError("API_SERVER_ERROR", `Zenodo returned a server error (${status})`, {
    suggestion: "This is usually temporary. Run the mirror again later",
    details,
    status,
  });
}

export function badRequest(details?: string): CLIError {
  return new CLIError("API_BAD_REQUEST", "Zenodo could not process the request", {
    suggestion: "Check the community identifier and page size",
    details,
    status: 400,
  });
}

export function apiNotFound(details?: string): CLIError {
  return new CLIError("API_NOT_FOUND", "Not found on Zenodo", {
    suggestion: "Check the community identifier or file link",
    details,
    status: 404,
  });
}

export function invalidResponse(details: string): CLIError {
  return new CLIError("API_INVALID_RESPONSE", "Unexpected response from Zenodo", {
    details,
  });
}

// ============================================================================
// Network Errors
// ============================================================================

export function networkOffline(details?: string): CLIError {
  return new CLIError("NETWORK_OFFLINE", "Can't connect to Zenodo", {
    suggestion: "Check your internet connection and try again",
    details,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}

// ============================================================================
// HTTP Status Code Mapping
// ============================================================================

/**
 * Convert an HTTP error response to a CLIError.
 */
export function fromHttpStatus(
  status: number,
  statusText: string,
  payload?: unknown
): CLIError {
  const details = extractErrorMessage(payload);

  switch (status) {
    case 401:
      return invalidToken(details);
    case 403:
      return forbidden(details);
    case 404:
      return apiNotFound(details);
    case 429:
      return rateLimited();
    case 400:
      return badRequest(details);
    default:
      if (status >= 500) {
        return serverError(status, details);
      }
      return new CLIError(
        "UNKNOWN_ERROR",
        `Request failed (${status} ${statusText})`,
        { details, status }
      );
  }
}

/**
 * Extract error message from API response payload.
 * Zenodo reports errors as `{ status, message, errors? }`.
 */
function extractErrorMessage(payload: unknown): string | undefined {
  if (payload === undefined || payload === null || payload === "") return undefined;
  if (typeof payload === "string") return payload;
  if (typeof payload === "object") {
    if ("message" in payload && typeof payload.message === "string") {
      return payload.message;
    }
    return JSON.stringify(payload);
  }
  return undefined;
}
