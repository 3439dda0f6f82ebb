/**
 * In-process HTTP server for transport and end-to-end tests.
 * Listens on 127.0.0.1 with an ephemeral port.
 */

import http, { IncomingMessage, ServerResponse } from "node:http";
import { Duplex } from "node:stream";
import { text } from "node:stream/consumers";

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

export type TestHandler = (req: IncomingMessage, res: ServerResponse) => void;

/**
 * Start a server around a handler, or around an existing http.Server
 */
export async function startTestServer(
  handlerOrServer: TestHandler | http.Server
): Promise<TestServer> {
  const server =
    handlerOrServer instanceof http.Server
      ? handlerOrServer
      : http.createServer(handlerOrServer);

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Test server is not listening on a TCP port");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export async function readRequestBody(req: IncomingMessage): Promise<string> {
  return text(req);
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

export interface TestProxy extends TestServer {
  /** "METHOD target" for every request the proxy received */
  seen: string[];
}

/**
 * Forward proxy stand-in. Plain-HTTP requests are answered directly with an
 * echo of the absolute target and proxy credentials; every CONNECT is
 * refused with the given status.
 */
export async function startTestProxy(connectStatus = 502): Promise<TestProxy> {
  const seen: string[] = [];
  const server = http.createServer((req, res) => {
    seen.push(`${req.method} ${req.url}`);
    sendJson(res, 200, {
      via: "proxy",
      target: req.url ?? null,
      proxyAuthorization: req.headers["proxy-authorization"] ?? null,
    });
  });

  server.on("connect", (req: IncomingMessage, socket: Duplex) => {
    seen.push(`CONNECT ${req.url}`);
    socket.end(
      `HTTP/1.1 ${connectStatus} ${http.STATUS_CODES[connectStatus] ?? "Error"}\r\nContent-Length: 0\r\n\r\n`
    );
  });

  const started = await startTestServer(server);
  return { ...started, seen };
}
