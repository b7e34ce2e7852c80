import { EventModelKind } from "../events/eventModel.js";

export const HTTP_METHODS = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "CONNECT",
  "OPTIONS",
  "TRACE",
  "PATCH",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * A single header or query parameter. Lists of fields keep duplicates in the
 * order they were received.
 */
export type HttpField = [name: string, value: string];

/**
 * Source-independent HTTP request handed to the request handler
 */
export interface CanonicalRequest {
  method: HttpMethod;
  /** Request path without the base path, always starting with `/` */
  path: string;
  /**
   * Prefix the gateway put in front of the application's routes (e.g. `/prod`),
   * or an empty string. Prepend it when generating absolute URLs.
   */
  basePath: string;
  query: HttpField[];
  headers: HttpField[];
  body: Buffer;
  remoteAddress?: string;
  source: EventModelKind;
  requestId?: string;
  stage?: string;
}

/**
 * HTTP response returned by the request handler.
 *
 * Headers may be given as an ordered list of fields, or as a record where a
 * repeated header is written as an array. String bodies are sent as UTF-8.
 */
export interface CanonicalResponse {
  statusCode: number;
  headers?: HttpField[] | Record<string, string | string[]>;
  body?: Uint8Array | string;
}

/**
 * Get the first value of a header, matching the name case-insensitively
 */
export function getHeader(
  headers: readonly HttpField[],
  name: string
): string | undefined {
  const lowerName = name.toLowerCase();
  return headers.find(([key]) => key.toLowerCase() === lowerName)?.[1];
}

/**
 * Get every value of a header in order, matching the name case-insensitively
 */
export function getHeaders(
  headers: readonly HttpField[],
  name: string
): string[] {
  const lowerName = name.toLowerCase();
  return headers
    .filter(([key]) => key.toLowerCase() === lowerName)
    .map(([, value]) => value);
}

/**
 * Normalize the headers of a {@link CanonicalResponse} into an ordered list
 */
export function responseHeaderFields(response: CanonicalResponse): HttpField[] {
  const { headers } = response;
  if (!headers) {
    return [];
  }
  if (Array.isArray(headers)) {
    return headers.map(([name, value]): HttpField => [name, value]);
  }
  const fields: HttpField[] = [];
  for (const [name, value] of Object.entries(headers)) {
    for (const item of Array.isArray(value) ? value : [value]) {
      fields.push([name, item]);
    }
  }
  return fields;
}

/**
 * Render the request target, e.g. `/prod/items?tag=a&tag=b`.
 *
 * Query keys and values are percent-encoded; repeated keys are written once
 * per value, in order.
 */
export function toPathAndQuery(
  request: Pick<CanonicalRequest, "path" | "basePath" | "query">,
  options: { includeBasePath?: boolean } = {}
): string {
  let target = options.includeBasePath
    ? `${request.basePath}${request.path}`
    : request.path;

  let separator = "?";
  for (const [key, value] of request.query) {
    target += `${separator}${encodeURIComponent(key)}=${encodeURIComponent(value)}`;
    separator = "&";
  }
  return target;
}
