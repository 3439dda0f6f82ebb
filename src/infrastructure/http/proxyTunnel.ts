/**
 * CONNECT tunnelling for HTTPS requests sent through a proxy.
 * The proxy only relays bytes; the TLS session is with the target.
 */

import http from "node:http";
import https from "node:https";
import net from "node:net";
import { Duplex } from "node:stream";
import tls from "node:tls";
import { TlsSettings } from "../../core/interfaces/IHttpClient.js";
import { TransportError } from "../../core/errors.js";

export interface TunnelTarget {
  host: string;
  port: number;
}

interface ConnectionOptions {
  host?: string | null;
  hostname?: string | null;
  port?: number | string | null;
}

type ConnectionCallback = (error: Error | null, socket?: Duplex) => void;

function proxyAuthorization(proxy: URL): string | undefined {
  if (!proxy.username) {
    return undefined;
  }
  const credentials = `${decodeURIComponent(proxy.username)}:${decodeURIComponent(proxy.password)}`;
  return `Basic ${Buffer.from(credentials, "utf8").toString("base64")}`;
}

/**
 * Open a raw connection to the target through the proxy
 *
 * @param timeoutMs - 0 waits indefinitely
 * @throws TransportError when the proxy is unreachable, times out or
 *   answers the CONNECT with anything but 2xx
 */
export function openTunnel(
  proxyUrl: string,
  target: TunnelTarget,
  timeoutMs: number
): Promise<Duplex> {
  const proxy = new URL(proxyUrl);
  const authority = `${target.host}:${target.port}`;
  const headers: Record<string, string> = { host: authority };
  const authorization = proxyAuthorization(proxy);
  if (authorization) {
    headers["proxy-authorization"] = authorization;
  }

  const options: http.RequestOptions = {
    host: proxy.hostname,
    port: proxy.port ? Number(proxy.port) : proxy.protocol === "https:" ? 443 : 80,
    method: "CONNECT",
    path: authority,
    headers,
    agent: false,
  };

  return new Promise<Duplex>((resolve, reject) => {
    const request =
      proxy.protocol === "https:" ? https.request(options) : http.request(options);

    const refused = (status: number | undefined) =>
      new TransportError(
        `Proxy ${proxy.host} refused tunnel to ${authority} with status ${status}`,
        false
      );

    request.once("connect", (response, socket) => {
      const status = response.statusCode ?? 0;
      if (status >= 200 && status < 300) {
        resolve(socket);
        return;
      }
      socket.destroy();
      reject(refused(response.statusCode));
    });

    // Some proxies answer CONNECT as an ordinary response
    request.once("response", (response) => {
      response.resume();
      reject(refused(response.statusCode));
    });

    request.once("timeout", () => {
      request.destroy(
        new TransportError(
          `Proxy ${proxy.host} timed out opening tunnel to ${authority} after ${timeoutMs} ms`,
          true
        )
      );
    });

    request.once("error", (error) => {
      reject(
        error instanceof TransportError
          ? error
          : new TransportError(
              `Proxy ${proxy.host} unreachable: ${error.message}`,
              false,
              { cause: error }
            )
      );
    });

    if (timeoutMs > 0) {
      request.setTimeout(timeoutMs);
    }
    request.end();
  });
}

/**
 * An https.Agent that opens one tunnel per connection, so redirects to
 * other hosts get their own tunnel
 */
export function createTunnelingAgent(
  proxyUrl: string,
  tlsSettings: TlsSettings,
  timeoutMs: number
): https.Agent {
  return Object.assign(new https.Agent({ keepAlive: false }), {
    createConnection(options: ConnectionOptions, callback: ConnectionCallback): undefined {
      const host = options.hostname || options.host || "localhost";
      const port = Number(options.port || 443);

      openTunnel(proxyUrl, { host, port }, timeoutMs).then(
        (socket) => {
          callback(
            null,
            tls.connect({
              socket,
              servername: net.isIP(host) ? undefined : host,
              rejectUnauthorized: tlsSettings.rejectUnauthorized,
              ca: tlsSettings.ca,
              cert: tlsSettings.cert,
              key: tlsSettings.key,
            })
          );
        },
        (error: unknown) => {
          callback(error instanceof Error ? error : new Error(String(error)));
        }
      );
      return undefined;
    },
  });
}
