import { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda";
import { MalformedEventError } from "../errors.js";
import { RestProxyEvent } from "../events/eventModel.js";
import { parseEvent } from "../events/parseEvent.js";
import { CanonicalResponse } from "../http/canonical.js";
import { encodeResponse } from "../http/responseEncoder.js";
import { HttpEventHandler } from "./httpEventHandler.js";

/**
 * Handler for API Gateway V1 events (REST APIs)
 *
 * This handler processes APIGatewayProxyEvent events (Lambda proxy integration behind API Gateway REST API)
 * and returns APIGatewayProxyResult responses.
 *
 * Repeated headers and query parameters are read from the multi-value fields of the event, and
 * repeated response headers are returned through `multiValueHeaders`.
 *
 * The specific business logic is delegated to a provided RequestHandler implementation.
 */
export class APIGatewayProxyEventHandler extends HttpEventHandler<
  APIGatewayProxyEvent,
  RestProxyEvent,
  APIGatewayProxyResult
> {
  /**
   * Parse APIGatewayProxyEvent into the REST API event model
   */
  protected parseEvent(event: APIGatewayProxyEvent): RestProxyEvent {
    const model = parseEvent(event);
    if (model.kind !== "restProxy") {
      throw new MalformedEventError(
        `Expected an API Gateway REST API proxy event, got a ${model.kind} event`
      );
    }
    return model;
  }

  /**
   * Format the response as APIGatewayProxyResult
   */
  protected formatResponse(
    response: CanonicalResponse,
    event: RestProxyEvent
  ): APIGatewayProxyResult {
    return encodeResponse(response, event, this.options);
  }
}
