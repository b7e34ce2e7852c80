import { Context } from "aws-lambda";
import { createLogger, format, transports } from "winston";
import {
  HttpEventHandlerOptions,
  ResolvedHandlerOptions,
  resolveHandlerOptions,
} from "../config.js";
import { ConfigurationError } from "../errors.js";
import { EventModel } from "../events/eventModel.js";
import { resolveBasePath } from "../http/basePath.js";
import {
  CanonicalRequest,
  CanonicalResponse,
  toPathAndQuery,
} from "../http/canonical.js";
import { buildCanonicalRequest } from "../http/requestBuilder.js";
import { RequestHandler, RequestHandlerFunction } from "./requestHandler.js";

const logger = createLogger({
  level: process.env.LOG_LEVEL?.toLowerCase() || "info",
  format: format.simple(),
  transports: [new transports.Console()],
});

/**
 * Abstract base class for Lambda handlers that serve HTTP events
 *
 * For every invocation this class:
 * - parses the event into an {@link EventModel}
 * - resolves the gateway base path (unless `includeBasePath` is `false`)
 * - builds a {@link CanonicalRequest} and passes it to the RequestHandler
 * - converts the returned response into the result shape of the event source
 *
 * Events that cannot be parsed, or that use an unsupported HTTP method, fail
 * the invocation without calling the RequestHandler. Errors thrown by the
 * RequestHandler are rethrown unchanged.
 *
 * Event-specific parsing and response formatting is handled by concrete subclasses.
 */
export abstract class HttpEventHandler<
  TEvent,
  TModel extends EventModel,
  TResult,
> {
  protected readonly requestHandler: RequestHandler;
  protected readonly options: ResolvedHandlerOptions;

  /**
   * @throws ConfigurationError when the request handler or the options are invalid
   */
  constructor(
    requestHandler: RequestHandler | RequestHandlerFunction,
    options: HttpEventHandlerOptions = {}
  ) {
    this.requestHandler = toRequestHandler(requestHandler);
    this.options = resolveHandlerOptions(options);
  }

  /**
   * Main handler method that processes Lambda events.
   */
  async handle(event: TEvent, context: Context): Promise<TResult> {
    logger.debug(`Incoming event: ${JSON.stringify(event)}`);

    let model: TModel;
    let request: CanonicalRequest;
    try {
      model = this.parseEvent(event);
      const basePath = resolveBasePath(model, this.options);
      request = buildCanonicalRequest(model, basePath);
    } catch (error) {
      logger.error(`Could not convert event into an HTTP request: ${error}`);
      throw error;
    }

    logger.debug(
      `Dispatching ${request.method} ${toPathAndQuery(request, { includeBasePath: true })} (base path '${request.basePath}')`
    );

    let response: CanonicalResponse;
    try {
      response = await this.requestHandler.handleRequest(request, context);
    } catch (error) {
      logger.error(`Request handler failed for ${request.method} ${request.path}: ${error}`);
      throw error;
    }

    return this.formatResponse(response, model);
  }

  /**
   * Parse the Lambda event into an event model
   * Must be implemented by concrete subclasses
   */
  protected abstract parseEvent(event: TEvent): TModel;

  /**
   * Format the response for the event source the request came from
   * Must be implemented by concrete subclasses
   */
  protected abstract formatResponse(
    response: CanonicalResponse,
    event: TModel
  ): TResult;
}

function toRequestHandler(
  requestHandler: RequestHandler | RequestHandlerFunction
): RequestHandler {
  if (typeof requestHandler === "function") {
    return { handleRequest: requestHandler };
  }
  if (
    typeof requestHandler === "object" &&
    requestHandler !== null &&
    typeof requestHandler.handleRequest === "function"
  ) {
    return requestHandler;
  }
  throw new ConfigurationError(
    "requestHandler must be a function or an object with a handleRequest method"
  );
}
