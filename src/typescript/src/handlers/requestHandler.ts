import { Context } from "aws-lambda";
import { CanonicalRequest, CanonicalResponse } from "../http/canonical.js";

/**
 * Interface for the HTTP application behind a Lambda function
 *
 * Implementations receive one canonical request per invocation, whatever the
 * invocation source was, and return the response to send back. Errors thrown
 * here are not caught: they fail the invocation.
 */
export interface RequestHandler {
  /**
   * Handle a single HTTP request
   *
   * @param request The request, with the gateway base path already removed from `path`
   * @param context The AWS Lambda context providing runtime information
   *
   * @example
   * ```typescript
   * handleRequest(request: CanonicalRequest): CanonicalResponse {
   *   if (request.method === "GET" && request.path === "/hello") {
   *     return {
   *       statusCode: 200,
   *       headers: { "Content-Type": "text/plain" },
   *       body: "Hello, world!",
   *     };
   *   }
   *   return { statusCode: 404 };
   * }
   * ```
   */
  handleRequest(
    request: CanonicalRequest,
    context: Context
  ): Promise<CanonicalResponse> | CanonicalResponse;
}

/**
 * A request handler written as a plain function
 */
export type RequestHandlerFunction = RequestHandler["handleRequest"];
