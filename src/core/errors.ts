/**
 * Error kinds surfaced by the request executor
 */

export type RequestErrorCode =
  | "CONFIGURATION_ERROR"
  | "TRANSPORT_ERROR"
  | "REMOTE_ERROR";

export abstract class RequestError extends Error {
  abstract readonly code: RequestErrorCode;
  readonly statusCode?: number;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = options?.statusCode;
  }
}

/**
 * Invalid parameter combination, missing field or unreadable local file.
 * Always raised before any network I/O.
 */
export class ConfigurationError extends RequestError {
  readonly code = "CONFIGURATION_ERROR" as const;
  readonly issues: string[];

  constructor(issues: string[], options?: { cause?: unknown }) {
    super(issues.join("; "), options);
    this.issues = issues;
  }
}

/**
 * The exchange could not complete (DNS, refused connection, TLS, timeout)
 */
export class TransportError extends RequestError {
  readonly code = "TRANSPORT_ERROR" as const;
  readonly timedOut: boolean;

  constructor(message: string, timedOut: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.timedOut = timedOut;
  }
}

/**
 * The exchange completed with a status outside [200, 300)
 */
export class RemoteError extends RequestError {
  readonly code = "REMOTE_ERROR" as const;
  readonly responseText: string;

  constructor(statusCode: number, responseText: string) {
    super(
      `request failed with HTTP status code ${statusCode} and error message ${responseText}`,
      { statusCode }
    );
    this.responseText = responseText;
  }
}

export function isRequestError(error: unknown): error is RequestError {
  return error instanceof RequestError;
}
