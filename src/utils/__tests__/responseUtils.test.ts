import { describe, expect, it } from "vitest";
import { createHttpResponse } from "../../__fixtures__/http-client-helpers.js";
import { HTTPMethod, RequestSpec } from "../../types/request.types.js";
import {
  buildResponseResult,
  decodeText,
  detectEncoding,
  isOkStatus,
  parseJsonBody,
  parseLinkHeader,
  parseSetCookies,
} from "../responseUtils.js";

const spec: RequestSpec = {
  method: HTTPMethod.POST,
  url: "https://api.example.com/items",
  allowRedirects: true,
  verify: true,
  stream: true,
};

describe("isOkStatus", () => {
  it("accepts only 2xx", () => {
    expect(isOkStatus(200)).toBe(true);
    expect(isOkStatus(204)).toBe(true);
    expect(isOkStatus(299)).toBe(true);
    expect(isOkStatus(199)).toBe(false);
    expect(isOkStatus(302)).toBe(false);
    expect(isOkStatus(404)).toBe(false);
  });
});

describe("detectEncoding", () => {
  it("reads the charset parameter", () => {
    expect(detectEncoding('text/html; charset="UTF-8"')).toBe("UTF-8");
    expect(detectEncoding("application/json; charset=utf-16")).toBe("utf-16");
  });

  it("falls back by media type", () => {
    expect(detectEncoding("text/plain")).toBe("ISO-8859-1");
    expect(detectEncoding("application/json")).toBe("utf-8");
    expect(detectEncoding("image/png")).toBeNull();
    expect(detectEncoding(undefined)).toBeNull();
  });
});

describe("decodeText", () => {
  it("decodes with the detected charset", () => {
    expect(decodeText(Buffer.from([0x63, 0x61, 0x66, 0xe9]), "ISO-8859-1")).toBe("café");
  });

  it("decodes ISO-8859-1 as true Latin-1", () => {
    expect(decodeText(Buffer.from([0x80, 0x9f, 0x41]), "ISO-8859-1")).toBe("\u0080\u009fA");
    expect(decodeText(Buffer.from([0x80]), "latin1")).toBe("\u0080");
  });

  it("falls back to UTF-8", () => {
    expect(decodeText(Buffer.from("hi", "utf8"), "x-unknown")).toBe("hi");
    expect(decodeText(Buffer.from("héllo", "utf8"), null)).toBe("héllo");
  });
});

describe("parseJsonBody", () => {
  it("parses JSON and yields null otherwise", () => {
    expect(parseJsonBody('{"a":1}')).toEqual({ a: 1 });
    expect(parseJsonBody("[1,2]")).toEqual([1, 2]);
    expect(parseJsonBody("not json")).toBeNull();
    expect(parseJsonBody("")).toBeNull();
  });
});

describe("parseSetCookies", () => {
  it("maps cookie names to values and skips malformed lines", () => {
    expect(
      parseSetCookies(["session=abc123; Path=/; HttpOnly", "theme=dark", "=bad", "novalue"])
    ).toEqual({ session: "abc123", theme: "dark" });
  });
});

describe("parseLinkHeader", () => {
  it("keys relations by rel", () => {
    expect(
      parseLinkHeader(
        '<https://api.example.com/items?page=2>; rel="next", <https://api.example.com/items?page=5>; rel="last"'
      )
    ).toEqual({
      next: { url: "https://api.example.com/items?page=2", rel: "next" },
      last: { url: "https://api.example.com/items?page=5", rel: "last" },
    });
  });

  it("keeps extra parameters", () => {
    expect(parseLinkHeader('<https://example.com/doc>; rel="help"; type="text/html"')).toEqual({
      help: { url: "https://example.com/doc", rel: "help", type: "text/html" },
    });
  });

  it("keys a relation without rel by its URL", () => {
    expect(parseLinkHeader("<https://example.com/a>")).toEqual({
      "https://example.com/a": { url: "https://example.com/a" },
    });
  });

  it("returns an empty map without a header", () => {
    expect(parseLinkHeader(undefined)).toEqual({});
    expect(parseLinkHeader("")).toEqual({});
  });
});

describe("buildResponseResult", () => {
  it("maps every response field", () => {
    const body = Buffer.from('{"id":7}', "utf8");
    const response = createHttpResponse({
      status: 201,
      statusText: "Created",
      headers: {
        "content-type": "application/json",
        link: '<https://api.example.com/items?page=2>; rel="next"',
      },
      setCookies: ["sid=xyz; Path=/"],
      body,
      url: "https://api.example.com/items/7",
      history: [{ status_code: 302, url: "https://api.example.com/items" }],
      elapsed: 12.3456,
    });

    expect(buildResponseResult(spec, response)).toEqual({
      changed: true,
      content: body.toString("base64"),
      cookies: { sid: "xyz" },
      elapsed: 12346,
      encoding: "utf-8",
      headers: {
        "content-type": "application/json",
        link: '<https://api.example.com/items?page=2>; rel="next"',
      },
      history: [{ status_code: 302, url: "https://api.example.com/items" }],
      is_permanent_redirect: false,
      is_redirect: false,
      json: { id: 7 },
      links: { next: { url: "https://api.example.com/items?page=2", rel: "next" } },
      method: HTTPMethod.POST,
      next: "https://api.example.com/items?page=2",
      ok: true,
      reason: "Created",
      text: '{"id":7}',
      status_code: 201,
      url: "https://api.example.com/items/7",
      verify: true,
    });
  });

  it("flags redirects that carry a location", () => {
    const permanent = buildResponseResult(
      spec,
      createHttpResponse({ status: 301, headers: { location: "/moved" } })
    );
    expect(permanent.is_redirect).toBe(true);
    expect(permanent.is_permanent_redirect).toBe(true);
    expect(permanent.ok).toBe(false);

    const temporary = buildResponseResult(
      spec,
      createHttpResponse({ status: 307, headers: { location: "/later" } })
    );
    expect(temporary.is_redirect).toBe(true);
    expect(temporary.is_permanent_redirect).toBe(false);

    const bare = buildResponseResult(spec, createHttpResponse({ status: 302 }));
    expect(bare.is_redirect).toBe(false);
  });

  it("reports no next link, no encoding and null json for an empty body", () => {
    const result = buildResponseResult(
      { ...spec, method: HTTPMethod.GET },
      createHttpResponse()
    );
    expect(result.changed).toBe(false);
    expect(result.next).toBeNull();
    expect(result.encoding).toBeNull();
    expect(result.json).toBeNull();
    expect(result.text).toBe("");
    expect(result.content).toBe("");
  });
});
