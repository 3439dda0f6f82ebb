/**
 * Declarative schema of the `uri` tool's parameters.
 *
 * `requestParamsShape` is what the MCP host validates against and what it
 * shows as the tool's input schema. `requestParamsSchema` adds the
 * cross-field rules the host cannot express.
 */

import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import {
  ClientCertificate,
  HTTPMethod,
  JSONValue,
  RequestSpec,
} from "../types/request.types.js";

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);
const pairsSchema = z.array(z.tuple([z.string(), scalarSchema]));

const jsonValueSchema: z.ZodType<JSONValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const fileReferenceSchema = z.union([
  z.string().min(1),
  z
    .object({
      path: z.string().min(1).optional(),
      content: z.string().optional(),
      filename: z.string().optional(),
      content_type: z.string().optional(),
    })
    .refine((file) => (file.path === undefined) !== (file.content === undefined), {
      message: "exactly one of path or content is required",
    }),
]);

const secondsSchema = z.number().positive();

export const requestParamsShape = {
  method: z
    .nativeEnum(HTTPMethod)
    .default(HTTPMethod.GET)
    .describe("HTTP method for the request"),
  url: z
    .string({ required_error: "missing required arguments: url" })
    .min(1, "missing required arguments: url")
    .describe("URL for the request"),
  params: z
    .union([
      z.record(z.union([scalarSchema, z.array(scalarSchema), z.null()])),
      pairsSchema,
      z.string(),
    ])
    .nullish()
    .describe("Mapping, list of [key, value] pairs or raw string sent in the query string"),
  data: z
    .union([z.string(), z.record(z.union([scalarSchema, z.array(scalarSchema)])), pairsSchema])
    .nullish()
    .describe(
      "Body: a raw string, or form fields as a mapping or list of pairs (multipart fields when files are sent)"
    ),
  json: jsonValueSchema
    .optional()
    .describe("JSON-serializable value sent as the body; ignored when data is set"),
  headers: z
    .record(z.string())
    .nullish()
    .describe("HTTP headers to send with the request"),
  cookies: z
    .record(z.string())
    .nullish()
    .describe("Cookies to send with the request"),
  files: z
    .record(fileReferenceSchema)
    .nullish()
    .describe(
      "Multipart uploads: field name to a file path, or to { path | content, filename, content_type }"
    ),
  username: z
    .string()
    .nullish()
    .describe("Username for HTTP basic auth; requires password"),
  password: z
    .string()
    .nullish()
    .describe("Password for HTTP basic auth; requires username"),
  timeout: z
    .union([secondsSchema, z.tuple([secondsSchema, secondsSchema])])
    .nullish()
    .describe("Seconds to wait for the server, or a [connect, read] pair"),
  allow_redirects: z
    .boolean()
    .default(true)
    .describe("Follow redirects"),
  proxies: z
    .record(z.string())
    .nullish()
    .describe("Protocol (or protocol://host) to proxy URL"),
  verify: z
    .union([z.boolean(), z.string().min(1)])
    .default(true)
    .describe("Verify the server TLS certificate, or a path to a CA bundle to verify against"),
  stream: z
    .boolean()
    .default(true)
    .describe("Read the body incrementally instead of in one buffer"),
  cert_key: z
    .tuple([z.string().min(1), z.string().min(1)])
    .nullish()
    .describe("[cert, key] paths of the TLS client identity; exclusive with cert_file"),
  cert_file: z
    .string()
    .min(1)
    .nullish()
    .describe("Path to a PEM holding the TLS client cert and key; exclusive with cert_key"),
};

export const requestParamsSchema = z
  .object(requestParamsShape)
  .strict()
  .superRefine((params, ctx) => {
    const hasUsername = params.username != null;
    const hasPassword = params.password != null;
    if (hasUsername !== hasPassword) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "parameters are required together: username, password",
      });
    }
    if (params.cert_key != null && params.cert_file != null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "parameters are mutually exclusive: cert_key|cert_file",
      });
    }
  });

export type ValidatedRequestParams = z.output<typeof requestParamsSchema>;

function formatIssue(issue: z.ZodIssue): string {
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return `unsupported parameters: ${issue.keys.join(", ")}`;
  }
  if (
    issue.code === z.ZodIssueCode.custom ||
    issue.path.length === 0 ||
    issue.message.startsWith("missing required arguments")
  ) {
    return issue.message;
  }
  return `${issue.path.join(".")}: ${issue.message}`;
}

function toClientCertificate(params: ValidatedRequestParams): ClientCertificate | undefined {
  if (params.cert_key) {
    return { kind: "pair", certPath: params.cert_key[0], keyPath: params.cert_key[1] };
  }
  if (params.cert_file) {
    return { kind: "file", path: params.cert_file };
  }
  return undefined;
}

/**
 * Convert validated parameters into an immutable RequestSpec
 */
export function toRequestSpec(params: ValidatedRequestParams): RequestSpec {
  // Empty credentials send no Authorization header
  const auth =
    params.username && params.password
      ? { username: params.username, password: params.password }
      : undefined;

  return Object.freeze({
    method: params.method,
    url: params.url,
    params: params.params ?? undefined,
    data: params.data ?? undefined,
    json: params.json ?? undefined,
    headers: params.headers ?? undefined,
    cookies: params.cookies ?? undefined,
    files: params.files ?? undefined,
    auth,
    timeout: params.timeout ?? undefined,
    allowRedirects: params.allow_redirects,
    proxies: params.proxies ?? undefined,
    verify: params.verify,
    stream: params.stream,
    cert: toClientCertificate(params),
  });
}

/**
 * Validate host-supplied parameters
 *
 * @throws ConfigurationError listing every problem found
 */
export function parseRequestSpec(input: unknown): RequestSpec {
  const parsed = requestParamsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = Array.from(new Set(parsed.error.issues.map(formatIssue)));
    throw new ConfigurationError(issues, { cause: parsed.error });
  }
  return toRequestSpec(parsed.data);
}
