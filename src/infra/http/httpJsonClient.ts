import { err, ok, type Result } from "neverthrow";
import type { z } from "zod";

export type HttpJsonRequest = {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type HttpClientError = {
  code:
    | "timeout"
    | "transport_error"
    | "non_success_status"
    | "invalid_json"
    | "schema_mismatch";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

/**
 * Centralizes HTTP JSON IO so adapters share one timeout/retry/status parsing policy.
 * Bodies are validated against the caller's schema; nothing untyped leaves this class.
 */
export class HttpJsonClient {
  /**
   * Executes GET requests with bounded retries. Only transport faults, timeouts, 429 and 5xx retry.
   */
  async getJson<S extends z.ZodTypeAny>(
    request: HttpJsonRequest,
    schema: S,
  ): Promise<Result<z.output<S>, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request, schema);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.delay(request.retryDelayMs * attempt);
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  private async performRequest<S extends z.ZodTypeAny>(
    request: HttpJsonRequest,
    schema: S,
  ): Promise<Result<z.output<S>, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        return err({
          code: "schema_mismatch",
          message: `HTTP response body did not match the expected shape: ${parsed.error.issues
            .slice(0, 3)
            .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
            .join("; ")}`,
          retryable: false,
          cause: parsed.error,
        });
      }

      return ok(parsed.data);
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
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
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
