export * from "./handlers/index.js";
export type { HttpEventHandlerOptions, ResponseType } from "./config.js";
export { resolveHandlerOptions } from "./config.js";
export {
  ConfigurationError,
  InvalidResponseError,
  MalformedEventError,
  UnsupportedMethodError,
} from "./errors.js";
export type {
  EventModel,
  EventModelKind,
  HttpApiEvent,
  LoadBalancerEvent,
  RestProxyEvent,
} from "./events/eventModel.js";
export { parseEvent } from "./events/parseEvent.js";
export { resolveBasePath } from "./http/basePath.js";
export type {
  CanonicalRequest,
  CanonicalResponse,
  HttpField,
  HttpMethod,
} from "./http/canonical.js";
export {
  HTTP_METHODS,
  getHeader,
  getHeaders,
  toPathAndQuery,
} from "./http/canonical.js";
export { buildCanonicalRequest, stripBasePath } from "./http/requestBuilder.js";
export type {
  EncodeOptions,
  LambdaHttpResult,
  ResponseTarget,
} from "./http/responseEncoder.js";
export {
  encodeBody,
  encodeResponse,
  isTextContentType,
} from "./http/responseEncoder.js";
