/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_request"
  | "malformed_response"
  | "invalid_json"
  | "permanent_rejection"
  | "not_found"
  | "validation_error"
  | "cancelled";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 * `cost` is spend already incurred by the failed call (paid scrapes can bill on failure).
 */
export type AppBoundaryError = {
  source: "provider" | "delivery" | "loader" | "store";
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cost?: number;
  cause?: unknown;
};
