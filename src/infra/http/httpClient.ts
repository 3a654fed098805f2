import { err, ok, type Result } from "neverthrow";
import type {
  AppBoundaryError,
  AppBoundaryErrorCode,
} from "../../core/entities/appError";

type HttpMethod = "GET" | "POST";

export type HttpRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  /** Serialized as JSON unless it is already a string. */
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
};

export type HttpTextResponse = {
  status: number;
  contentType: string;
  text: string;
};

export type HttpClientError = {
  code:
    | "timeout"
    | "cancelled"
    | "transport_error"
    | "non_success_status"
    | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

export const isRetryableHttpStatus = (status: number): boolean =>
  status === 408 || status === 429 || status >= 500;

export const codeForHttpStatus = (status: number): AppBoundaryErrorCode => {
  if (status === 401 || status === 403) {
    return "auth_invalid";
  }
  if (status === 400 || status === 422) {
    return "malformed_request";
  }
  if (status === 404 || status === 410) {
    return "not_found";
  }
  if (status === 408) {
    return "timeout";
  }
  if (status === 429) {
    return "rate_limited";
  }
  if (status >= 500) {
    return "provider_error";
  }
  return "permanent_rejection";
};

/**
 * Lifts a transport-level failure into the boundary taxonomy shared by providers and sinks.
 */
export const toBoundaryError = (
  error: HttpClientError,
  context: { source: AppBoundaryError["source"]; provider: string },
): AppBoundaryError => {
  const code: AppBoundaryErrorCode =
    error.code === "non_success_status"
      ? codeForHttpStatus(error.httpStatus ?? 0)
      : error.code;

  return {
    source: context.source,
    provider: context.provider,
    code,
    message: error.message,
    retryable: error.retryable,
    httpStatus: error.httpStatus,
    cause: error.cause,
  };
};

/**
 * Centralizes HTTP IO so adapters share one timeout, cancellation and status parsing policy.
 * Retrying is left to the caller's retry controller.
 */
export class HttpClient {
  /**
   * Returns the parsed body as `unknown`; adapters validate it against their own schema.
   */
  async requestJson(
    request: HttpRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const response = await this.requestText(request);
    if (response.isErr()) {
      return err(response.error);
    }

    if (response.value.text.trim() === "") {
      return ok(null);
    }

    try {
      const parsed: unknown = JSON.parse(response.value.text);
      return ok(parsed);
    } catch (jsonError) {
      return err({
        code: "invalid_json",
        message: "HTTP response body was not valid JSON.",
        httpStatus: response.value.status,
        retryable: false,
        cause: jsonError,
      });
    }
  }

  async requestText(
    request: HttpRequest,
  ): Promise<Result<HttpTextResponse, HttpClientError>> {
    if (request.signal?.aborted) {
      return err({
        code: "cancelled",
        message: "HTTP request cancelled before it was sent.",
        retryable: false,
      });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    request.signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined
            ? undefined
            : typeof request.body === "string"
              ? request.body
              : JSON.stringify(request.body),
        signal: controller.signal,
      });

      const text = await response.text();

      if (!response.ok) {
        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable: isRetryableHttpStatus(response.status),
        });
      }

      return ok({
        status: response.status,
        contentType: response.headers.get("content-type") ?? "",
        text,
      });
    } catch (error) {
      if (controller.signal.aborted && !timedOut) {
        return err({
          code: "cancelled",
          message: "HTTP request cancelled.",
          retryable: false,
          cause: error,
        });
      }

      if (timedOut) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
