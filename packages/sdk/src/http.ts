/**
 * Single-shot HTTP transport used by the SDK core.
 *
 * The timeout covers the whole exchange, headers and body.
 */

import { NetworkError, PriorError, RequestTimeoutError } from "./exceptions.js";
import { type APIResponse, fromFetchResponse } from "./types.js";

export type Timeout = number;

export const DEFAULT_TIMEOUT: Timeout = 30_000;

interface TransportRequest {
  method: string;
  url: string;
  headers?: Record<string, string> | null;
  json?: unknown;
  timeout?: Timeout | null;
}

export class HTTPTransport {
  private timeout: Timeout;

  constructor(options?: { timeout?: Timeout }) {
    this.timeout = options?.timeout ?? DEFAULT_TIMEOUT;
  }

  async request(options: TransportRequest): Promise<APIResponse> {
    const effectiveTimeout = options.timeout ?? this.timeout;
    const controller = new AbortController();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(timeoutError(options.url, effectiveTimeout));
      }, effectiveTimeout);
    });

    try {
      return await Promise.race([this.send(options, controller.signal, effectiveTimeout), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async send(options: TransportRequest, signal: AbortSignal, timeout: Timeout): Promise<APIResponse> {
    let body: string | undefined;
    if (options.json !== undefined && options.json !== null) {
      body = JSON.stringify(options.json);
    }

    let response: Response;
    try {
      response = await fetch(options.url, {
        method: options.method,
        headers: normalizeHeaders(options.headers),
        body,
        signal,
      });
    } catch (err: unknown) {
      throw transportError(err, options.url, timeout);
    }

    try {
      return await fromFetchResponse(response, options.method);
    } catch (err: unknown) {
      if (err instanceof PriorError) throw err;
      throw transportError(err, options.url, timeout);
    }
  }
}

function timeoutError(url: string, timeout: Timeout, cause?: Error): RequestTimeoutError {
  return new RequestTimeoutError(`Request to ${url} timed out after ${timeout}ms.`, { cause });
}

function transportError(err: unknown, url: string, timeout: Timeout): NetworkError {
  if (err instanceof Error && err.name === "AbortError") {
    return timeoutError(url, timeout, err);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new NetworkError(`Network request failed for ${url}: ${message}`, {
    cause: err instanceof Error ? err : undefined,
  });
}

function normalizeHeaders(
  headers: Record<string, string> | null | undefined,
): Record<string, string> {
  if (!headers) return {};
  const normalized: Record<string, string> = {};
  for (const key of Object.keys(headers).sort()) {
    const value = headers[key];
    if (value != null) {
      normalized[key] = String(value);
    }
  }
  return normalized;
}
