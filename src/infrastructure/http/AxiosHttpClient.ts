/**
 * Axios HTTP Client Implementation
 * Concrete implementation of IHttpClient using Axios
 */

import https from "node:https";
import { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";
import axios, { AxiosInstance, AxiosProxyConfig, AxiosRequestConfig } from "axios";
import {
  IHttpClient,
  HttpRequestConfig,
  HttpResponse,
} from "../../core/interfaces/IHttpClient.js";
import { ILogger } from "../../core/interfaces/ILogger.js";
import { TransportError } from "../../core/errors.js";
import { HistoryEntry } from "../../types/response.types.js";
import { LoggerFactory } from "../logging/LoggerFactory.js";
import { createTunnelingAgent } from "./proxyTunnel.js";

/** Same ceiling as the usual session-based HTTP clients */
export const MAX_REDIRECTS = 30;

/**
 * Convert a proxy URL into axios' proxy shape
 */
export function toAxiosProxy(proxyUrl: string): AxiosProxyConfig {
  const parsed = new URL(proxyUrl);
  const protocol = parsed.protocol.replace(/:$/, "");
  const port = parsed.port
    ? Number(parsed.port)
    : protocol === "https"
      ? 443
      : 80;

  const proxy: AxiosProxyConfig = { protocol, host: parsed.hostname, port };
  if (parsed.username) {
    proxy.auth = {
      username: decodeURIComponent(parsed.username),
      password: decodeURIComponent(parsed.password),
    };
  }
  return proxy;
}

/**
 * Flatten response headers to lower-cased string values
 */
export function flattenHeaders(raw: object): {
  headers: Record<string, string>;
  setCookies: string[];
} {
  const headers: Record<string, string> = {};
  let setCookies: string[] = [];

  for (const [name, value] of Object.entries(raw)) {
    const values: unknown[] = Array.isArray(value) ? value : [value];
    const strings = values
      .filter(
        (v): v is string | number | boolean =>
          typeof v === "string" ||
          typeof v === "number" ||
          typeof v === "boolean"
      )
      .map(String);
    if (strings.length === 0) continue;

    const key = name.toLowerCase();
    if (key === "set-cookie") {
      setCookies = strings;
    }
    headers[key] = strings.join(", ");
  }

  return { headers, setCookies };
}

async function readBody(data: unknown): Promise<Buffer> {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof Readable) return buffer(data);
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === "string") return Buffer.from(data, "utf8");
  return Buffer.alloc(0);
}

export class AxiosHttpClient implements IHttpClient {
  private axiosInstance: AxiosInstance;
  private logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger || LoggerFactory.getLogger("AxiosHttpClient");
    this.axiosInstance = axios.create({
      validateStatus: () => true,
    });

    this.axiosInstance.interceptors.request.use((config) => {
      this.logger.debug(
        `HTTP Request: ${config.method?.toUpperCase()} ${config.url}`,
        {
          hasData: config.data !== undefined,
          maxRedirects: config.maxRedirects,
          responseType: config.responseType,
        }
      );
      return config;
    });

    this.axiosInstance.interceptors.response.use((response) => {
      this.logger.debug(
        `HTTP Response: ${response.status} from ${response.config.url}`
      );
      return response;
    });
  }

  async request(config: HttpRequestConfig): Promise<HttpResponse> {
    const history: HistoryEntry[] = [];
    let currentUrl = config.url;
    const startedAt = performance.now();

    try {
      const response = await this.axiosInstance.request<unknown>({
        url: config.url,
        method: config.method,
        headers: config.headers,
        data: config.data,
        auth: config.auth,
        timeout: config.timeout,
        maxRedirects: config.followRedirects ? MAX_REDIRECTS : 0,
        ...this.connectionSettings(config),
        responseType: config.stream ? "stream" : "arraybuffer",
        beforeRedirect: (options, responseDetails) => {
          history.push({
            status_code: responseDetails.statusCode,
            url: currentUrl,
          });
          const next: unknown = options.href;
          if (typeof next === "string") {
            currentUrl = next;
          }
        },
      });

      const body = await readBody(response.data);
      const { headers, setCookies } = flattenHeaders(response.headers);

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        setCookies,
        body,
        url: currentUrl,
        history,
        elapsed: performance.now() - startedAt,
      };
    } catch (error) {
      throw this.toTransportError(error, config);
    }
  }

  /**
   * HTTPS through a proxy goes through a CONNECT tunnel; axios' own proxy
   * support forwards plain-HTTP requests
   */
  private connectionSettings(
    config: HttpRequestConfig
  ): Pick<AxiosRequestConfig, "proxy" | "httpsAgent"> {
    if (config.proxy && new URL(config.url).protocol === "https:") {
      return {
        proxy: false,
        httpsAgent: createTunnelingAgent(config.proxy, config.tls, config.timeout),
      };
    }

    return {
      proxy: config.proxy ? toAxiosProxy(config.proxy) : undefined,
      httpsAgent: new https.Agent({
        rejectUnauthorized: config.tls.rejectUnauthorized,
        ca: config.tls.ca,
        cert: config.tls.cert,
        key: config.tls.key,
      }),
    };
  }

  private toTransportError(
    error: unknown,
    config: HttpRequestConfig
  ): TransportError {
    // Tunnel failures arrive wrapped in an AxiosError
    const tunnelError =
      error instanceof TransportError
        ? error
        : error instanceof Error && error.cause instanceof TransportError
          ? error.cause
          : undefined;
    if (tunnelError) {
      this.logger.warning(`HTTP Proxy Error: ${tunnelError.message}`);
      return tunnelError;
    }

    if (axios.isAxiosError(error)) {
      if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
        this.logger.warning(`HTTP Request Timeout: ${config.url}`);
        return new TransportError(
          `Request to ${config.url} timed out after ${config.timeout} ms`,
          true,
          { cause: error }
        );
      }
      this.logger.error(`HTTP Response Error`, error, { code: error.code });
      return new TransportError(
        `Request to ${config.url} failed: ${error.message}`,
        false,
        { cause: error }
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`HTTP Transport Error`, error);
    return new TransportError(`Request to ${config.url} failed: ${message}`, false, {
      cause: error,
    });
  }
}
