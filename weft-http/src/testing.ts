import type { Express } from "express";

export interface TestRequestOptions {
  headers?: Record<string, string>;
  /** Serialized as JSON unless it is already a string */
  body?: unknown;
  signal?: AbortSignal;
}

/**
 * fetch bound to a running test server. Redirects are not followed.
 */
export interface TestClient {
  readonly baseUrl: string;
  request(method: string, path: string, options?: TestRequestOptions): Promise<Response>;
  get(path: string, options?: TestRequestOptions): Promise<Response>;
  post(path: string, body?: unknown, options?: TestRequestOptions): Promise<Response>;
  put(path: string, body?: unknown, options?: TestRequestOptions): Promise<Response>;
  patch(path: string, body?: unknown, options?: TestRequestOptions): Promise<Response>;
  delete(path: string, options?: TestRequestOptions): Promise<Response>;
}

export type TestCase<T = void> = (app: Express, client: TestClient) => Promise<T> | T;

export function createTestClient(baseUrl: string): TestClient {
  const request = (method: string, path: string, options: TestRequestOptions = {}) => {
    const headers: Record<string, string> = { ...options.headers };
    let body: string | undefined;

    if (options.body !== undefined) {
      if (typeof options.body === "string") {
        body = options.body;
      } else {
        body = JSON.stringify(options.body);
        headers["content-type"] ??= "application/json";
      }
    }

    return fetch(new URL(path, baseUrl), { method, headers, body, redirect: "manual", signal: options.signal });
  };

  return {
    baseUrl,
    request,
    get: (path, options) => request("GET", path, options),
    post: (path, body, options) => request("POST", path, { ...options, body }),
    put: (path, body, options) => request("PUT", path, { ...options, body }),
    patch: (path, body, options) => request("PATCH", path, { ...options, body }),
    delete: (path, options) => request("DELETE", path, options),
  };
}
