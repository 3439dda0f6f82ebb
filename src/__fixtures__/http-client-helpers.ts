/**
 * Fakes for the IHttpClient seam
 */

import { vi } from "vitest";
import {
  HttpRequestConfig,
  HttpResponse,
  IHttpClient,
} from "../core/interfaces/IHttpClient.js";

export function createHttpResponse(overrides: Partial<HttpResponse> = {}): HttpResponse {
  return {
    status: 200,
    statusText: "OK",
    headers: {},
    setCookies: [],
    body: Buffer.alloc(0),
    url: "https://api.example.com/resource",
    history: [],
    elapsed: 12.5,
    ...overrides,
  };
}

export function jsonResponse(body: unknown, overrides: Partial<HttpResponse> = {}): HttpResponse {
  return createHttpResponse({
    headers: { "content-type": "application/json" },
    body: Buffer.from(JSON.stringify(body), "utf8"),
    ...overrides,
  });
}

export function textResponse(
  body: string,
  status = 200,
  statusText = "OK"
): HttpResponse {
  return createHttpResponse({
    status,
    statusText,
    headers: { "content-type": "text/plain; charset=utf-8" },
    body: Buffer.from(body, "utf8"),
  });
}

/**
 * Fake client resolving with the given response (200 empty body by default)
 */
export function createMockHttpClient(response: HttpResponse = createHttpResponse()) {
  const request = vi.fn<(config: HttpRequestConfig) => Promise<HttpResponse>>(
    async () => response
  );
  const client: IHttpClient = { request };
  return { client, request };
}
