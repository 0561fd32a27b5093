/**
 * HTTP transport shared by the provider clients.
 *
 * Maps HTTP failures onto the voice error hierarchy:
 * 401 → AuthenticationFailedError, 429 → rate_limited, other ≥ 400 → status code,
 * transport failures → network_error.
 */

import type { RuntimeLogger } from "@murmur/shared";
import { AuthenticationFailedError, ProviderError, VoiceError } from "../errors";

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

const MAX_AUTH_DETAIL_CHARS = 2000;

export interface HttpRequest {
  readonly method: "GET" | "POST";
  readonly url: string;
  readonly headers?: Record<string, string>;
  readonly body?: string | FormData;
  readonly timeoutMs?: number;
}

export interface HttpTransportOptions {
  readonly logger: RuntimeLogger;
  readonly timeoutMs?: number;
  /** Overridable for tests */
  readonly fetch?: typeof fetch;
}

export function parseRetryAfter(header: string | null): number | undefined {
  if (header === null || header.trim().length === 0) {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Build the typed error for a failed HTTP response.
 */
export async function errorFromResponse(response: Response): Promise<ProviderError> {
  const body = await response.text().catch(() => "");

  if (response.status === 401) {
    const trimmed = body.trim();
    return new AuthenticationFailedError(
      trimmed.length > 0 ? Array.from(trimmed).slice(0, MAX_AUTH_DETAIL_CHARS).join("") : undefined
    );
  }

  if (response.status === 429) {
    const retryAfterSeconds = parseRetryAfter(response.headers.get("retry-after"));
    return new ProviderError(
      "rate_limited",
      retryAfterSeconds === undefined
        ? "Rate limit exceeded."
        : `Rate limit exceeded. Retry after ${Math.floor(retryAfterSeconds)} seconds.`,
      { status: 429, retryAfterSeconds }
    );
  }

  const code = String(response.status);
  return new ProviderError(code, `Provider error (${code}): ${body || "Unknown error"}`, {
    status: response.status,
  });
}

export class HttpTransport {
  private readonly logger: RuntimeLogger;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpTransportOptions) {
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
  }

  /**
   * Send a request and return the successful response; failures reject typed.
   */
  async send(request: HttpRequest): Promise<Response> {
    const start = performance.now();
    let response: Response;
    try {
      response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(request.timeoutMs ?? this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn("Provider request failed", { url: request.url, error: message });
      throw new ProviderError("network_error", `Network error: ${message}`, { cause: error });
    }

    const durationMs = Math.round(performance.now() - start);
    if (!response.ok) {
      const failure = await errorFromResponse(response);
      this.logger.warn("Provider request rejected", {
        url: request.url,
        status: response.status,
        code: failure.providerCode,
        durationMs,
      });
      throw failure;
    }

    this.logger.debug("Provider request completed", {
      url: request.url,
      status: response.status,
      durationMs,
    });
    return response;
  }

  async sendForBytes(request: HttpRequest): Promise<Uint8Array> {
    const response = await this.send(request);
    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw this.bodyError(error);
    }
  }

  async sendForText(request: HttpRequest): Promise<string> {
    const response = await this.send(request);
    try {
      return await response.text();
    } catch (error) {
      throw this.bodyError(error);
    }
  }

  async sendForJson(request: HttpRequest): Promise<unknown> {
    const text = await this.sendForText(request);
    try {
      return JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError("decoding_error", `Failed to decode response: ${message}`, {
        cause: error,
      });
    }
  }

  private bodyError(error: unknown): VoiceError {
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError("network_error", `Network error: ${message}`, { cause: error });
  }
}
