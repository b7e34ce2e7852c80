import { EventModel } from "../events/eventModel.js";
import { parseEvent } from "../events/parseEvent.js";
import { CanonicalResponse } from "../http/canonical.js";
import { LambdaHttpResult, encodeResponse } from "../http/responseEncoder.js";
import { HttpEventHandler } from "./httpEventHandler.js";

/**
 * Handler for functions that receive events from more than one HTTP source
 *
 * The event type is detected on every invocation (REST API, HTTP API,
 * function URL or Application Load Balancer) and the result is returned in
 * the matching shape.
 *
 * Usage:
 * ```typescript
 * const httpHandler = new LambdaHttpHandler(myRequestHandler);
 *
 * export const handler: Handler = (event, context) =>
 *   httpHandler.handle(event, context);
 * ```
 */
export class LambdaHttpHandler extends HttpEventHandler<
  unknown,
  EventModel,
  LambdaHttpResult
> {
  protected parseEvent(event: unknown): EventModel {
    return parseEvent(event);
  }

  protected formatResponse(
    response: CanonicalResponse,
    event: EventModel
  ): LambdaHttpResult {
    return encodeResponse(response, event, this.options);
  }
}
