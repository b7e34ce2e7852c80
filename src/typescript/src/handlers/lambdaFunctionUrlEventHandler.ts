import { LambdaFunctionURLEvent, LambdaFunctionURLResult } from "aws-lambda";
import { MalformedEventError } from "../errors.js";
import { HttpApiEvent } from "../events/eventModel.js";
import { parseEvent } from "../events/parseEvent.js";
import { CanonicalResponse } from "../http/canonical.js";
import { encodeResponse } from "../http/responseEncoder.js";
import { HttpEventHandler } from "./httpEventHandler.js";

/**
 * Handler for Lambda Function URL requests
 *
 * Function URLs use the API Gateway V2 payload format with the `$default`
 * stage, so requests never carry a base path.
 *
 * The specific business logic is delegated to a provided RequestHandler implementation.
 */
export class LambdaFunctionURLEventHandler extends HttpEventHandler<
  LambdaFunctionURLEvent,
  HttpApiEvent,
  LambdaFunctionURLResult
> {
  /**
   * Parse Lambda Function URL event into the HTTP API event model
   */
  protected parseEvent(event: LambdaFunctionURLEvent): HttpApiEvent {
    const model = parseEvent(event);
    if (model.kind !== "httpApi") {
      throw new MalformedEventError(
        `Expected a Lambda function URL event, got a ${model.kind} event`
      );
    }
    return model;
  }

  /**
   * Format the response as LambdaFunctionURLResult
   */
  protected formatResponse(
    response: CanonicalResponse,
    event: HttpApiEvent
  ): LambdaFunctionURLResult {
    return encodeResponse(response, event, this.options);
  }
}
