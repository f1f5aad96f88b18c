export interface HttpRequest {
  url: string;
  body: string;
  headers: Record<string, string>;
  /** Seconds. */
  timeout: number;
}

/**
 * `code` is 0 and `error` is set when no HTTP response was received
 * (connection failure, timeout).
 */
export interface HttpResponse {
  code: number;
  reason: string;
  body: string;
  error?: string;
}

/** Pluggable HTTP POST capability used by the event bus. */
export interface HttpTransport {
  post(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Transport over the global `fetch`. Resolves for every outcome; network
 * errors and timeouts come back as `code: 0`.
 */
export function createFetchTransport(): HttpTransport {
  return {
    async post(request: HttpRequest): Promise<HttpResponse> {
      try {
        const response = await fetch(request.url, {
          method: 'POST',
          headers: request.headers,
          body: request.body,
          signal: AbortSignal.timeout(request.timeout * 1000),
        });
        return {
          code: response.status,
          reason: response.statusText,
          body: await response.text(),
        };
      } catch (err: unknown) {
        return {
          code: 0,
          reason: '',
          body: '',
          error: err instanceof Error ? err.message : String(err),
        };
      }
    },
  };
}
