import { ALBEvent, ALBResult } from "aws-lambda";
import { MalformedEventError } from "../errors.js";
import { LoadBalancerEvent } from "../events/eventModel.js";
import { parseEvent } from "../events/parseEvent.js";
import { CanonicalResponse } from "../http/canonical.js";
import { encodeResponse } from "../http/responseEncoder.js";
import { HttpEventHandler } from "./httpEventHandler.js";

/**
 * Handler for Application Load Balancer target events
 *
 * When the target group has multi-value headers enabled, the response is
 * returned through `multiValueHeaders`; otherwise repeated response headers
 * keep their last value.
 *
 * The specific business logic is delegated to a provided RequestHandler implementation.
 */
export class ALBEventHandler extends HttpEventHandler<
  ALBEvent,
  LoadBalancerEvent,
  ALBResult
> {
  protected parseEvent(event: ALBEvent): LoadBalancerEvent {
    const model = parseEvent(event);
    if (model.kind !== "loadBalancer") {
      throw new MalformedEventError(
        `Expected an Application Load Balancer event, got a ${model.kind} event`
      );
    }
    return model;
  }

  protected formatResponse(
    response: CanonicalResponse,
    event: LoadBalancerEvent
  ): ALBResult {
    return encodeResponse(response, event, this.options);
  }
}
