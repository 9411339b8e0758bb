import { err, ok, type Result } from "neverthrow";
import type { z } from "zod";

type HttpMethod = "GET" | "POST";

export type HttpRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
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
    | "malformed_response";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

type BodyReader<T> = (response: Response) => Promise<Result<T, HttpClientError>>;

const readText: BodyReader<string> = async (response) => {
  try {
    return ok(await response.text());
  } catch (error) {
    return err({
      code: "transport_error",
      message: "HTTP response body could not be read.",
      retryable: true,
      cause: error,
    });
  }
};

const jsonReader =
  <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): BodyReader<T> =>
  async (response) => {
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (jsonError) {
      return err({
        code: "invalid_json",
        message: "HTTP response body was not valid JSON.",
        retryable: false,
        cause: jsonError,
      });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      return err({
        code: "malformed_response",
        message: "HTTP response body did not match the expected shape.",
        retryable: false,
        cause: parsed.error,
      });
    }

    return ok(parsed.data);
  };

/**
 * Centralizes HTTP IO so adapters share one timeout/retry/pacing/status parsing policy.
 */
export class HttpClient {
  private lastRequestAt = 0;

  /**
   * @param minIntervalMs minimum spacing between the start of two requests made through this client
   */
  constructor(private readonly minIntervalMs = 0) {}

  /**
   * Fetches JSON and validates it against `schema` so adapters never handle untyped payloads.
   */
  async requestJson<T>(
    request: HttpRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<Result<T, HttpClientError>> {
    return this.withRetries(request, jsonReader(schema));
  }

  async requestText(
    request: HttpRequest,
  ): Promise<Result<string, HttpClientError>> {
    return this.withRetries(request, readText);
  }

  /**
   * Executes requests with bounded retries to avoid duplicated fetch policy across adapters.
   */
  private async withRetries<T>(
    request: HttpRequest,
    readBody: BodyReader<T>,
  ): Promise<Result<T, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request, readBody);
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

  private async performRequest<T>(
    request: HttpRequest,
    readBody: BodyReader<T>,
  ): Promise<Result<T, HttpClientError>> {
    await this.waitForSlot();

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
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

      return await readBody(response);
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

  /**
   * Spaces request starts at least `minIntervalMs` apart.
   */
  private async waitForSlot(): Promise<void> {
    const waitMs = this.lastRequestAt + this.minIntervalMs - Date.now();
    if (waitMs > 0) {
      await this.delay(waitMs);
    }
    this.lastRequestAt = Date.now();
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
