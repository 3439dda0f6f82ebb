import { describe, expect, it } from "vitest";
import {
  createHttpResponse,
  createMockHttpClient,
  jsonResponse,
  textResponse,
} from "../../__fixtures__/http-client-helpers.js";
import {
  ConfigurationError,
  RemoteError,
  TransportError,
} from "../../core/errors.js";
import { HTTPMethod } from "../../types/request.types.js";
import { RequestExecutor } from "../RequestExecutor.js";

const URL_UNDER_TEST = "https://api.example.com/resource";

describe("RequestExecutor", () => {
  describe("send", () => {
    it.each([
      [HTTPMethod.GET, false],
      [HTTPMethod.HEAD, false],
      [HTTPMethod.OPTIONS, false],
      [HTTPMethod.POST, true],
      [HTTPMethod.PUT, true],
      [HTTPMethod.PATCH, true],
      [HTTPMethod.DELETE, true],
    ])("%s reports changed=%s", async (method, changed) => {
      const { client, request } = createMockHttpClient();
      const executor = new RequestExecutor(client);

      const result = await executor.send({ method, url: URL_UNDER_TEST });

      expect(result.changed).toBe(changed);
      expect(result.method).toBe(method);
      expect(result.ok).toBe(true);
      expect(request).toHaveBeenCalledTimes(1);
      expect(request.mock.calls[0]?.[0].method).toBe(method);
    });

    it("rejects a missing url before any I/O", async () => {
      const { client, request } = createMockHttpClient();
      const executor = new RequestExecutor(client);

      await expect(executor.send({ method: "GET" })).rejects.toThrow(
        new ConfigurationError(["missing required arguments: url"])
      );
      expect(request).not.toHaveBeenCalled();
    });

    it.each([
      [{ username: "user" }],
      [{ password: "test-secret" }],
      [{ cert_key: ["/tls/a.crt", "/tls/a.key"], cert_file: "/tls/a.pem" }],
    ])("rejects invalid combination %j before any I/O", async (extra) => {
      const { client, request } = createMockHttpClient();
      const executor = new RequestExecutor(client);

      await expect(executor.send({ url: URL_UNDER_TEST, ...extra })).rejects.toBeInstanceOf(
        ConfigurationError
      );
      expect(request).not.toHaveBeenCalled();
    });

    it("rejects an unreadable client certificate before any I/O", async () => {
      const { client, request } = createMockHttpClient();
      const executor = new RequestExecutor(client);

      await expect(
        executor.send({ url: URL_UNDER_TEST, cert_file: "/nonexistent/client.pem" })
      ).rejects.toThrow(/^cert_file: cannot read '\/nonexistent\/client\.pem'/);
      expect(request).not.toHaveBeenCalled();
    });

    it("parses a JSON body", async () => {
      const { client } = createMockHttpClient(jsonResponse({ a: 1 }));
      const result = await new RequestExecutor(client).send({ url: URL_UNDER_TEST });

      expect(result.json).toEqual({ a: 1 });
      expect(result.text).toBe('{"a":1}');
    });

    it("yields null json for a non-JSON body", async () => {
      const { client } = createMockHttpClient(textResponse("plain words"));
      const result = await new RequestExecutor(client).send({ url: URL_UNDER_TEST });

      expect(result.json).toBeNull();
      expect(result.text).toBe("plain words");
      expect(result.encoding).toBe("utf-8");
    });

    it("fails on a status outside 2xx", async () => {
      const { client } = createMockHttpClient(textResponse("not found", 404, "Not Found"));
      const executor = new RequestExecutor(client);

      const error = await executor.send({ url: URL_UNDER_TEST }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteError);
      expect(error).toMatchObject({
        message: "request failed with HTTP status code 404 and error message not found",
        statusCode: 404,
        responseText: "not found",
      });
    });

    it("treats an unfollowed redirect as a failure", async () => {
      const { client } = createMockHttpClient(
        createHttpResponse({ status: 302, statusText: "Found", headers: { location: "/next" } })
      );

      await expect(
        new RequestExecutor(client).send({ url: URL_UNDER_TEST, allow_redirects: false })
      ).rejects.toThrow("request failed with HTTP status code 302 and error message ");
    });

    it("propagates transport failures", async () => {
      const { client, request } = createMockHttpClient();
      request.mockRejectedValueOnce(
        new TransportError(`Request to ${URL_UNDER_TEST} failed: connect ECONNREFUSED`, false)
      );

      await expect(new RequestExecutor(client).send({ url: URL_UNDER_TEST })).rejects.toThrow(
        TransportError
      );
    });

    it("hands the prepared request to the client", async () => {
      const { client, request } = createMockHttpClient();
      const executor = new RequestExecutor(client);

      await executor.send({
        method: "PUT",
        url: URL_UNDER_TEST,
        params: { page: 2 },
        headers: { Accept: "application/json" },
        cookies: { sid: "abc" },
        data: { name: "widget" },
        username: "user",
        password: "test-secret",
        timeout: [1, 1.5],
        allow_redirects: false,
        verify: false,
        stream: false,
      });

      const sent = request.mock.calls[0]?.[0];
      expect(sent).toMatchObject({
        url: `${URL_UNDER_TEST}?page=2`,
        method: HTTPMethod.PUT,
        headers: { Accept: "application/json", Cookie: "sid=abc" },
        auth: { username: "user", password: "test-secret" },
        timeout: 1500,
        followRedirects: false,
        tls: { rejectUnauthorized: false },
        stream: false,
      });
      expect(String(sent?.data)).toBe("name=widget");
    });

    it("applies the default timeout when none is given", async () => {
      const { client, request } = createMockHttpClient();
      const executor = new RequestExecutor(client, undefined, { defaultTimeoutMs: 5000 });

      await executor.send({ url: URL_UNDER_TEST });

      expect(request.mock.calls[0]?.[0].timeout).toBe(5000);
    });

    it("passes redirect history and final URL through", async () => {
      const { client } = createMockHttpClient(
        createHttpResponse({
          url: "https://api.example.com/final",
          history: [
            { status_code: 302, url: URL_UNDER_TEST },
            { status_code: 301, url: "https://api.example.com/middle" },
          ],
        })
      );

      const result = await new RequestExecutor(client).send({ url: URL_UNDER_TEST });

      expect(result.url).toBe("https://api.example.com/final");
      expect(result.history).toEqual([
        { status_code: 302, url: URL_UNDER_TEST },
        { status_code: 301, url: "https://api.example.com/middle" },
      ]);
    });
  });

  describe("execute", () => {
    it("wraps a success", async () => {
      const { client } = createMockHttpClient(jsonResponse({ ok: true }));
      const result = await new RequestExecutor(client).execute({ url: URL_UNDER_TEST });

      expect(result.success).toBe(true);
      expect(result.data?.status_code).toBe(200);
      expect(result.error).toBeUndefined();
      expect(result.metadata.executionTime).toBeGreaterThanOrEqual(0);
      expect(result.metadata.timestamp).toBeInstanceOf(Date);
    });

    it("reports configuration errors", async () => {
      const { client } = createMockHttpClient();
      const result = await new RequestExecutor(client).execute({});

      expect(result.success).toBe(false);
      expect(result.error).toEqual({
        message: "missing required arguments: url",
        code: "CONFIGURATION_ERROR",
      });
    });

    it("reports remote errors with their status", async () => {
      const { client } = createMockHttpClient(textResponse("not found", 404, "Not Found"));
      const result = await new RequestExecutor(client).execute({ url: URL_UNDER_TEST });

      expect(result.error).toEqual({
        message: "request failed with HTTP status code 404 and error message not found",
        code: "REMOTE_ERROR",
        statusCode: 404,
      });
    });

    it("reports unexpected failures as internal errors", async () => {
      const { client, request } = createMockHttpClient();
      request.mockRejectedValueOnce(new Error("boom"));

      const result = await new RequestExecutor(client).execute({ url: URL_UNDER_TEST });

      expect(result.error).toEqual({ message: "boom", code: "INTERNAL_ERROR" });
    });
  });
});
