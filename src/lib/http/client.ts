/**
 * Throttled HTTP verbs over fetch.
 *
 * Every request goes through the executor, which injects the active
 * credential and classifies the returned `Response` through the provider's
 * feedback hook. fetch does not throw on 4xx/5xx, so non-retryable statuses
 * surface as `FatalOperationError` carrying the response.
 */

import type { RunOptions, ThrottleExecutor } from "@/lib/rate-limiter";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface HttpRequestOptions extends Pick<RunOptions, "signal"> {
  headers?: Record<string, string>;
  params?: QueryParams;
  /** Serialized as JSON with a JSON content type */
  json?: unknown;
  /**
   * Raw body (form data, text, bytes); ignored when `json` is set.
   * Sent again on every retry, so a one-shot `ReadableStream` is not supported.
   */
  body?: RequestInit["body"];
}

export interface ThrottledHttpClientConfig<C> {
  executor: ThrottleExecutor<C>;
  /** Prefix for relative paths */
  baseUrl?: string;
  /** Writes the active credential into the request headers */
  authorize?: (headers: Headers, credential: C) => void;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

export interface ThrottledHttpClient {
  request: (method: HttpMethod, path: string, options?: HttpRequestOptions) => Promise<Response>;
  get: (path: string, options?: HttpRequestOptions) => Promise<Response>;
  post: (path: string, options?: HttpRequestOptions) => Promise<Response>;
  put: (path: string, options?: HttpRequestOptions) => Promise<Response>;
  patch: (path: string, options?: HttpRequestOptions) => Promise<Response>;
  delete: (path: string, options?: HttpRequestOptions) => Promise<Response>;
}

export const bearerAuthorization = (headers: Headers, token: string): void => {
  headers.set("authorization", `Bearer ${token}`);
};

/**
 * Cancels the body of a response that is retried or rotated away, so the
 * connection goes back to the pool instead of waiting for garbage collection.
 */
export const releaseResponse = async (response: Response): Promise<void> => {
  await response.body?.cancel();
};

export const buildUrl = (path: string, baseUrl?: string, params?: QueryParams): URL => {
  const url = baseUrl
    ? new URL(path.replace(/^\//, ""), baseUrl.replace(/\/?$/, "/"))
    : new URL(path);
  for (const [key, value] of Object.entries(params ?? {})) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url;
};

export const createThrottledHttpClient = <C>(
  config: ThrottledHttpClientConfig<C>,
): ThrottledHttpClient => {
  const { executor, baseUrl, authorize } = config;
  const fetchImpl = config.fetch ?? fetch;

  const request = (
    method: HttpMethod,
    path: string,
    options: HttpRequestOptions = {},
  ): Promise<Response> => {
    const url = buildUrl(path, baseUrl, options.params);

    return executor.run(
      async ({ credential }) => {
        // Fresh headers per attempt: the credential may have rotated
        const headers = new Headers(options.headers);
        if (authorize && credential !== undefined) {
          authorize(headers, credential);
        }

        let body = options.body;
        if (options.json !== undefined) {
          headers.set("content-type", "application/json");
          body = JSON.stringify(options.json);
        }

        // The abort signal only cancels waits; a request already sent runs to completion
        return fetchImpl(url, { method, headers, body });
      },
      { signal: options.signal, discardResult: releaseResponse },
    );
  };

  return {
    request,
    get: (path, options) => request("GET", path, options),
    post: (path, options) => request("POST", path, options),
    put: (path, options) => request("PUT", path, options),
    patch: (path, options) => request("PATCH", path, options),
    delete: (path, options) => request("DELETE", path, options),
  };
};
