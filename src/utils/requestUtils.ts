/**
 * Request Utility Functions
 * Turn a RequestSpec into a wire-ready HttpRequestConfig
 */

import { Blob } from "node:buffer";
import fs from "node:fs/promises";
import path from "node:path";
import {
  HttpRequestConfig,
  RequestBody,
  TlsSettings,
} from "../core/interfaces/IHttpClient.js";
import { ConfigurationError } from "../core/errors.js";
import {
  ClientCertificate,
  FileAttachment,
  FileReference,
  KeyValuePairs,
  QueryParams,
  RequestData,
  RequestSpec,
  Scalar,
  Timeout,
} from "../types/request.types.js";

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"]);

function findHeader(
  headers: Record<string, string>,
  name: string
): string | undefined {
  const wanted = name.toLowerCase();
  return Object.keys(headers).find((key) => key.toLowerCase() === wanted);
}

function toPairs(
  values: Record<string, Scalar | Scalar[] | null> | KeyValuePairs
): Array<[string, string]> {
  if (Array.isArray(values)) {
    return values.map(([key, value]) => [key, String(value)]);
  }

  const pairs: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(values)) {
    if (value === null) continue;
    for (const item of Array.isArray(value) ? value : [value]) {
      pairs.push([key, String(item)]);
    }
  }
  return pairs;
}

/**
 * Parse the URL and append query parameters to any query it already has
 *
 * @throws ConfigurationError if the URL is not an absolute http(s) URL
 */
export function buildUrl(rawUrl: string, params?: QueryParams): string {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    throw new ConfigurationError([`invalid URL '${rawUrl}': no scheme supplied`]);
  }
  if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
    throw new ConfigurationError([
      `invalid URL '${rawUrl}': unsupported scheme '${url.protocol.replace(/:$/, "")}'`,
    ]);
  }

  if (params === undefined) {
    return url.toString();
  }

  if (typeof params === "string") {
    const extra = params.replace(/^[?&]+/, "");
    if (extra) {
      url.search = url.search ? `${url.search}&${extra}` : `?${extra}`;
    }
    return url.toString();
  }

  for (const [key, value] of toPairs(params)) {
    url.searchParams.append(key, value);
  }
  return url.toString();
}

/**
 * Merge cookies into the Cookie header, keeping any caller-supplied value first
 */
export function buildHeaders(
  headers: Readonly<Record<string, string>> = {},
  cookies?: Readonly<Record<string, string>>
): Record<string, string> {
  const merged = { ...headers };
  if (!cookies || Object.keys(cookies).length === 0) {
    return merged;
  }

  const cookieString = Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
  const existing = findHeader(merged, "cookie");
  if (existing) {
    merged[existing] = `${merged[existing]}; ${cookieString}`;
  } else {
    merged["Cookie"] = cookieString;
  }
  return merged;
}

export function encodeFormData(data: RequestData): string | URLSearchParams {
  if (typeof data === "string") {
    return data;
  }
  return new URLSearchParams(toPairs(data));
}

async function readLocalFile(filePath: string, field: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`${field}: cannot read '${filePath}' (${reason})`], {
      cause: error,
    });
  }
}

async function buildMultipart(
  files: Readonly<Record<string, FileReference>>,
  data?: RequestData
): Promise<FormData> {
  if (typeof data === "string") {
    throw new ConfigurationError([
      "data must be a mapping or a list of pairs when files are sent",
    ]);
  }

  const form = new FormData();
  if (data !== undefined) {
    for (const [key, value] of toPairs(data)) {
      form.append(key, value);
    }
  }

  for (const [field, reference] of Object.entries(files)) {
    const attachment: FileAttachment =
      typeof reference === "string" ? { path: reference } : reference;
    const bytes =
      attachment.path !== undefined
        ? await readLocalFile(attachment.path, `files.${field}`)
        : Buffer.from(attachment.content ?? "", "utf8");
    const filename =
      attachment.filename ??
      (attachment.path !== undefined ? path.basename(attachment.path) : field);
    const blob = new Blob([bytes], {
      type: attachment.content_type ?? "application/octet-stream",
    });
    form.append(field, blob, filename);
  }
  return form;
}

/**
 * Encode the body. Form data wins over json, files switch to multipart.
 */
export async function buildBody(
  spec: RequestSpec,
  headers: Record<string, string>
): Promise<RequestBody | undefined> {
  if (spec.files && Object.keys(spec.files).length > 0) {
    return buildMultipart(spec.files, spec.data);
  }
  if (spec.data !== undefined) {
    return encodeFormData(spec.data);
  }
  if (spec.json !== undefined) {
    if (!findHeader(headers, "content-type")) {
      headers["Content-Type"] = "application/json";
    }
    return JSON.stringify(spec.json);
  }
  return undefined;
}

/**
 * Pick the proxy for a URL: scheme://host, scheme, all://host, then all
 */
export function selectProxy(
  url: string,
  proxies?: Readonly<Record<string, string>>
): string | undefined {
  if (!proxies) {
    return undefined;
  }
  const { protocol, hostname } = new URL(url);
  const scheme = protocol.replace(/:$/, "");
  const keys = [`${scheme}://${hostname}`, scheme, `all://${hostname}`, "all"];
  for (const key of keys) {
    const proxy = proxies[key];
    if (proxy) {
      try {
        new URL(proxy);
      } catch {
        throw new ConfigurationError([`proxies.${key}: invalid proxy URL '${proxy}'`]);
      }
      return proxy;
    }
  }
  return undefined;
}

/**
 * Seconds to milliseconds, rounded up to at least 1 ms since 0 disables the
 * timeout. A (connect, read) pair collapses to the larger value because axios
 * only exposes one socket-inactivity timeout.
 */
export function toTimeoutMs(timeout: Timeout | undefined, fallbackMs: number): number {
  if (timeout === undefined) {
    return fallbackMs;
  }
  const seconds = Array.isArray(timeout) ? Math.max(timeout[0], timeout[1]) : timeout;
  // Round to whole microseconds first so 0.7 s stays 700 ms
  return Math.max(1, Math.ceil(Math.round(seconds * 1_000_000) / 1000));
}

export async function loadTlsSettings(
  verify: boolean | string,
  cert?: ClientCertificate
): Promise<TlsSettings> {
  const settings: TlsSettings = { rejectUnauthorized: verify !== false };

  if (typeof verify === "string") {
    settings.ca = await readLocalFile(verify, "verify");
  }

  if (cert?.kind === "pair") {
    settings.cert = await readLocalFile(cert.certPath, "cert_key");
    settings.key = await readLocalFile(cert.keyPath, "cert_key");
  } else if (cert?.kind === "file") {
    // A single PEM carries both the certificate and its key
    const pem = await readLocalFile(cert.path, "cert_file");
    settings.cert = pem;
    settings.key = pem;
  }

  return settings;
}

/**
 * Build the wire-ready request. Every local file is read here, so a bad
 * path fails before any network I/O.
 */
export async function prepareRequest(
  spec: RequestSpec,
  defaultTimeoutMs = 0
): Promise<HttpRequestConfig> {
  const url = buildUrl(spec.url, spec.params);
  const headers = buildHeaders(spec.headers, spec.cookies);
  const data = await buildBody(spec, headers);

  return {
    url,
    method: spec.method,
    headers,
    data,
    auth: spec.auth,
    timeout: toTimeoutMs(spec.timeout, defaultTimeoutMs),
    followRedirects: spec.allowRedirects,
    proxy: selectProxy(url, spec.proxies),
    tls: await loadTlsSettings(spec.verify, spec.cert),
    stream: spec.stream,
  };
}
