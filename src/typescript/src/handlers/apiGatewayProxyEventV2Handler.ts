import {
  APIGatewayProxyEventV2,
  APIGatewayProxyStructuredResultV2,
} from "aws-lambda";
import { MalformedEventError } from "../errors.js";
import { HttpApiEvent } from "../events/eventModel.js";
import { parseEvent } from "../events/parseEvent.js";
import { CanonicalResponse } from "../http/canonical.js";
import { encodeResponse } from "../http/responseEncoder.js";
import { HttpEventHandler } from "./httpEventHandler.js";

/**
 * Handler for API Gateway V2 events (HTTP APIs)
 *
 * This handler processes APIGatewayProxyEventV2 events and returns structured
 * APIGatewayProxyResultV2 responses.
 *
 * HTTP APIs have no multi-value headers: repeated response headers keep their
 * last value, except `Set-Cookie`, which is returned through `cookies`.
 *
 * The specific business logic is delegated to a provided RequestHandler implementation.
 */
export class APIGatewayProxyEventV2Handler extends HttpEventHandler<
  APIGatewayProxyEventV2,
  HttpApiEvent,
  APIGatewayProxyStructuredResultV2
> {
  /**
   * Parse APIGatewayProxyEventV2 into the HTTP API event model
   */
  protected parseEvent(event: APIGatewayProxyEventV2): HttpApiEvent {
    const model = parseEvent(event);
    if (model.kind !== "httpApi") {
      throw new MalformedEventError(
        `Expected an API Gateway HTTP API event, got a ${model.kind} event`
      );
    }
    return model;
  }

  /**
   * Format the response as APIGatewayProxyResultV2
   */
  protected formatResponse(
    response: CanonicalResponse,
    event: HttpApiEvent
  ): APIGatewayProxyStructuredResultV2 {
    return encodeResponse(response, event, this.options);
  }
}
