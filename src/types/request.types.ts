/**
 * Outbound request type definitions
 */

export enum HTTPMethod {
  GET = "GET",
  POST = "POST",
  OPTIONS = "OPTIONS",
  HEAD = "HEAD",
  PUT = "PUT",
  PATCH = "PATCH",
  DELETE = "DELETE",
}

/**
 * Methods assumed to alter remote state
 */
export const MUTATING_METHODS: ReadonlySet<HTTPMethod> = new Set([
  HTTPMethod.POST,
  HTTPMethod.PUT,
  HTTPMethod.PATCH,
  HTTPMethod.DELETE,
]);

export type JSONValue =
  | string
  | number
  | boolean
  | null
  | JSONValue[]
  | { [key: string]: JSONValue };

export type Scalar = string | number | boolean;

export type KeyValuePairs = Array<[string, Scalar]>;

/** Mapping (scalar or repeated values), ordered pairs, or a raw query string */
export type QueryParams =
  | Record<string, Scalar | Scalar[] | null>
  | KeyValuePairs
  | string;

/** Raw string body, or form fields as a mapping or ordered pairs */
export type RequestData = string | Record<string, Scalar | Scalar[]> | KeyValuePairs;

export interface FileAttachment {
  /** Local file to upload; exclusive with content */
  path?: string;
  /** Inline UTF-8 content; exclusive with path */
  content?: string;
  filename?: string;
  content_type?: string;
}

/** A bare string is a local path */
export type FileReference = string | FileAttachment;

export interface BasicAuth {
  username: string;
  password: string;
}

export type Timeout = number | [connect: number, read: number];

export type ClientCertificate =
  | { kind: "pair"; certPath: string; keyPath: string }
  | { kind: "file"; path: string };

/**
 * Normalized description of one outbound HTTP call
 */
export interface RequestSpec {
  readonly method: HTTPMethod;
  readonly url: string;
  readonly params?: QueryParams;
  readonly data?: RequestData;
  readonly json?: JSONValue;
  readonly headers?: Readonly<Record<string, string>>;
  readonly cookies?: Readonly<Record<string, string>>;
  readonly files?: Readonly<Record<string, FileReference>>;
  readonly auth?: BasicAuth;
  readonly timeout?: Timeout;
  readonly allowRedirects: boolean;
  readonly proxies?: Readonly<Record<string, string>>;
  /** true/false toggles verification; a string is a CA bundle path */
  readonly verify: boolean | string;
  readonly stream: boolean;
  readonly cert?: ClientCertificate;
}
