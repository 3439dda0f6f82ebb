/**
 * Response result type definitions
 */

import { HTTPMethod, JSONValue } from "./request.types.js";

export interface HistoryEntry {
  status_code: number;
  url: string;
}

/**
 * One Link header relation, e.g. `<https://x/?page=2>; rel="next"`
 */
export interface LinkRelation {
  url: string;
  rel?: string;
  [param: string]: string | undefined;
}

/**
 * Normalized outcome of one completed exchange
 */
export interface ResponseResult {
  changed: boolean;
  /** Raw body, base64 */
  content: string;
  cookies: Record<string, string>;
  /** Microseconds */
  elapsed: number;
  encoding: string | null;
  headers: Record<string, string>;
  history: HistoryEntry[];
  is_permanent_redirect: boolean;
  is_redirect: boolean;
  json: JSONValue | null;
  links: Record<string, LinkRelation>;
  method: HTTPMethod;
  next: string | null;
  ok: boolean;
  reason: string;
  text: string;
  status_code: number;
  url: string;
  verify: boolean | string;
}
