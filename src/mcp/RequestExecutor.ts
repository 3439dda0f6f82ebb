/**
 * Request execution for the `uri` tool.
 * Validates host parameters, performs exactly one HTTP exchange and maps
 * the response into a ResponseResult, or fails with a typed error.
 */

import { IHttpClient } from "../core/interfaces/IHttpClient.js";
import { ILogger } from "../core/interfaces/ILogger.js";
import { RemoteError, isRequestError } from "../core/errors.js";
import { AxiosHttpClient } from "../infrastructure/http/AxiosHttpClient.js";
import { LoggerFactory } from "../infrastructure/logging/LoggerFactory.js";
import { ResponseResult } from "../types/response.types.js";
import { ToolExecutionResult } from "../types/tool.types.js";
import { parseRequestSpec } from "../validation/requestSchema.js";
import { prepareRequest } from "../utils/requestUtils.js";
import {
  buildResponseResult,
  decodeText,
  detectEncoding,
  isOkStatus,
} from "../utils/responseUtils.js";

export interface RequestExecutorOptions {
  /** Applied when a request sets no timeout; 0 means none */
  defaultTimeoutMs?: number;
}

export class RequestExecutor {
  private httpClient: IHttpClient;
  private logger: ILogger;
  private defaultTimeoutMs: number;

  constructor(
    httpClient?: IHttpClient,
    logger?: ILogger,
    options: RequestExecutorOptions = {}
  ) {
    this.httpClient = httpClient || new AxiosHttpClient();
    this.logger = logger || LoggerFactory.getLogger("RequestExecutor");
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 0;
  }

  /**
   * Validate, send and map one request
   *
   * @param params - Parameter record as supplied by the host
   * @throws ConfigurationError before any network I/O when params are invalid
   * @throws TransportError when the exchange cannot complete
   * @throws RemoteError when the status is outside [200, 300)
   */
  async send(params: unknown): Promise<ResponseResult> {
    const spec = parseRequestSpec(params);
    const request = await prepareRequest(spec, this.defaultTimeoutMs);

    this.logger.info(`Calling ${request.method} ${request.url}`, {
      hasAuth: request.auth !== undefined,
      followRedirects: request.followRedirects,
      timeoutMs: request.timeout,
    });

    const response = await this.httpClient.request(request);

    if (!isOkStatus(response.status)) {
      const text = decodeText(
        response.body,
        detectEncoding(response.headers["content-type"])
      );
      this.logger.warning(
        `Request failed: ${request.method} ${response.url} returned ${response.status}`
      );
      throw new RemoteError(response.status, text);
    }

    this.logger.info(
      `Request succeeded: ${request.method} ${response.url} returned ${response.status}`,
      { redirects: response.history.length }
    );
    return buildResponseResult(spec, response);
  }

  /**
   * Same as send(), but reports the outcome as a result envelope instead
   * of throwing
   */
  async execute(params: unknown): Promise<ToolExecutionResult<ResponseResult>> {
    const timestamp = new Date();
    const startedAt = performance.now();
    const metadata = () => ({
      executionTime: performance.now() - startedAt,
      timestamp,
    });

    try {
      const data = await this.send(params);
      return { success: true, data, metadata: metadata() };
    } catch (error) {
      if (isRequestError(error)) {
        this.logger.warning(`Request error (${error.code}): ${error.message}`);
        return {
          success: false,
          error: {
            message: error.message,
            code: error.code,
            statusCode: error.statusCode,
          },
          metadata: metadata(),
        };
      }

      this.logger.error("Unexpected error while executing request", error);
      return {
        success: false,
        error: {
          message: error instanceof Error ? error.message : String(error),
          code: "INTERNAL_ERROR",
        },
        metadata: metadata(),
      };
    }
  }
}
