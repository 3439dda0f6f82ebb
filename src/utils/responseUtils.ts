/**
 * Response Utility Functions
 * Map a raw HttpResponse into the ResponseResult handed back to the host
 */

import { HttpResponse } from "../core/interfaces/IHttpClient.js";
import {
  JSONValue,
  MUTATING_METHODS,
  RequestSpec,
} from "../types/request.types.js";
import { LinkRelation, ResponseResult } from "../types/response.types.js";

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const PERMANENT_REDIRECT_STATUSES = new Set([301, 308]);
const LATIN1_LABELS = new Set(["iso-8859-1", "iso8859-1", "latin1", "latin-1", "l1"]);
const QUOTES_AND_SPACES = /^[\s'"]+|[\s'"]+$/g;

export function isOkStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Charset from Content-Type, with the usual fallbacks for text and JSON
 */
export function detectEncoding(contentType?: string): string | null {
  if (!contentType) {
    return null;
  }

  const [mediaType = "", ...params] = contentType.split(";");
  for (const param of params) {
    const [key, value] = param.split("=", 2);
    if (key?.trim().toLowerCase() === "charset" && value) {
      return value.replace(QUOTES_AND_SPACES, "");
    }
  }

  const media = mediaType.trim().toLowerCase();
  if (media.includes("text")) {
    return "ISO-8859-1";
  }
  if (media.includes("application/json")) {
    return "utf-8";
  }
  return null;
}

export function decodeText(body: Buffer, encoding: string | null): string {
  // TextDecoder maps these labels to windows-1252
  if (encoding && LATIN1_LABELS.has(encoding.toLowerCase())) {
    return body.toString("latin1");
  }
  if (encoding) {
    try {
      return new TextDecoder(encoding).decode(body);
    } catch {
      // Unknown label: fall through to UTF-8
    }
  }
  return new TextDecoder("utf-8").decode(body);
}

/**
 * Parse or null; a body that is not JSON is not an error
 */
export function parseJsonBody(text: string): JSONValue | null {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Cookie name to value from Set-Cookie header lines
 */
export function parseSetCookies(setCookies: string[]): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const line of setCookies) {
    const pair = line.split(";", 1)[0] ?? "";
    const separator = pair.indexOf("=");
    if (separator <= 0) continue;
    const name = pair.slice(0, separator).trim();
    if (!name) continue;
    cookies[name] = pair.slice(separator + 1).trim();
  }
  return cookies;
}

/**
 * Parse a Link header into relations keyed by rel (or URL when rel is absent)
 */
export function parseLinkHeader(header?: string): Record<string, LinkRelation> {
  const links: Record<string, LinkRelation> = {};
  const value = header?.replace(QUOTES_AND_SPACES, "");
  if (!value) {
    return links;
  }

  for (const entry of value.split(/, *</)) {
    const separator = entry.indexOf(";");
    const rawUrl = separator === -1 ? entry : entry.slice(0, separator);
    const rawParams = separator === -1 ? "" : entry.slice(separator + 1);

    const link: LinkRelation = { url: rawUrl.replace(/^[<>\s'"]+|[<>\s'"]+$/g, "") };
    for (const param of rawParams.split(";")) {
      const parts = param.split("=");
      if (parts.length !== 2) break;
      const [key = "", paramValue = ""] = parts;
      link[key.replace(QUOTES_AND_SPACES, "")] = paramValue.replace(QUOTES_AND_SPACES, "");
    }

    links[link.rel ?? link.url] = link;
  }
  return links;
}

export function buildResponseResult(
  spec: RequestSpec,
  response: HttpResponse
): ResponseResult {
  const encoding = detectEncoding(response.headers["content-type"]);
  const text = decodeText(response.body, encoding);
  const links = parseLinkHeader(response.headers["link"]);
  const hasLocation = response.headers["location"] !== undefined;

  return {
    changed: MUTATING_METHODS.has(spec.method),
    content: response.body.toString("base64"),
    cookies: parseSetCookies(response.setCookies),
    elapsed: Math.round(response.elapsed * 1000),
    encoding,
    headers: response.headers,
    history: response.history,
    is_permanent_redirect:
      hasLocation && PERMANENT_REDIRECT_STATUSES.has(response.status),
    is_redirect: hasLocation && REDIRECT_STATUSES.has(response.status),
    json: parseJsonBody(text),
    links,
    method: spec.method,
    next: links["next"]?.url ?? null,
    ok: isOkStatus(response.status),
    reason: response.statusText,
    text,
    status_code: response.status,
    url: response.url,
    verify: spec.verify,
  };
}
