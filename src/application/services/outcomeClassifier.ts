import type {
  AppBoundaryError,
  AppBoundaryErrorCode,
} from "../../core/entities/appError";

export type OutcomeClass = "retryable-failure" | "terminal-failure";

const terminalCodes = new Set<AppBoundaryErrorCode>([
  "auth_invalid",
  "config_invalid",
  "malformed_request",
  "permanent_rejection",
  "not_found",
  "validation_error",
  "malformed_response",
  "invalid_json",
  "cancelled",
]);

const retryableCodes = new Set<AppBoundaryErrorCode>([
  "timeout",
  "rate_limited",
  "transport_error",
]);

/**
 * Shared by provider and delivery calls. Codes with a fixed class win over the adapter's
 * `retryable` flag; anything else (e.g. provider_error) follows the flag.
 */
export const classifyFailure = (error: AppBoundaryError): OutcomeClass => {
  if (terminalCodes.has(error.code)) {
    return "terminal-failure";
  }
  if (retryableCodes.has(error.code)) {
    return "retryable-failure";
  }
  return error.retryable ? "retryable-failure" : "terminal-failure";
};
