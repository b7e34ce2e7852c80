import { createLogger, format, transports } from "winston";
import { MalformedEventError, UnsupportedMethodError } from "../errors.js";
import {
  EventModel,
  HttpApiEvent,
  MultiValueMap,
  SingleValueMap,
} from "../events/eventModel.js";
import {
  CanonicalRequest,
  HTTP_METHODS,
  HttpField,
  HttpMethod,
  getHeader,
} from "./canonical.js";

const logger = createLogger({
  level: process.env.LOG_LEVEL?.toLowerCase() || "info",
  format: format.simple(),
  transports: [new transports.Console()],
});

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/;

/**
 * Build the canonical request for an event whose base path has already been
 * resolved.
 *
 * @throws UnsupportedMethodError when the method is not a known HTTP verb
 * @throws MalformedEventError when a base64 body cannot be decoded
 */
export function buildCanonicalRequest(
  event: EventModel,
  basePath: string
): CanonicalRequest {
  const method = toHttpMethod(event.method);
  const headers = buildHeaders(event);

  return {
    method,
    path: stripBasePath(event.path, basePath),
    basePath,
    query: buildQuery(event),
    headers,
    body: decodeBody(event.body, event.isBase64Encoded),
    remoteAddress:
      event.kind === "loadBalancer"
        ? lastForwardedFor(headers)
        : event.sourceIp,
    source: event.kind,
    requestId: event.kind === "loadBalancer" ? undefined : event.requestId,
    stage: event.kind === "loadBalancer" ? undefined : event.stage,
  };
}

export function toHttpMethod(method: string): HttpMethod {
  const upper = method.toUpperCase();
  const match = HTTP_METHODS.find((candidate) => candidate === upper);
  if (!match) {
    throw new UnsupportedMethodError(method);
  }
  return match;
}

/**
 * Remove `basePath` from the front of `path`. The prefix only matches on a
 * segment boundary; a path without the prefix is returned as is.
 */
export function stripBasePath(path: string, basePath: string): string {
  const normalized = path.startsWith("/") ? path : `/${path}`;
  const prefix = basePath.replace(/\/+$/, "");
  if (!prefix) {
    return normalized;
  }
  if (normalized === prefix) {
    return "/";
  }
  if (normalized.startsWith(`${prefix}/`)) {
    return normalized.slice(prefix.length);
  }
  return normalized;
}

/**
 * Combine the single-value and multi-value forms of headers or query
 * parameters. The multi-value form wins for every key it has; keys that only
 * appear in the single-value form are appended.
 */
export function mergeMultiValue(
  single: SingleValueMap,
  multi: MultiValueMap,
  label: string
): HttpField[] {
  const fields: HttpField[] = [];
  const multiKeys = new Set<string>();

  for (const [key, values] of Object.entries(multi)) {
    if (values.length === 0) {
      continue;
    }
    multiKeys.add(key);
    for (const value of values) {
      fields.push([key, value]);
    }
  }

  for (const [key, value] of Object.entries(single)) {
    if (!multiKeys.has(key)) {
      fields.push([key, value]);
    } else if (!multi[key].includes(value)) {
      logger.warn(
        `Ignoring single-value ${label} '${key}': value is not among its multi-value entries`
      );
    }
  }

  return fields;
}

function buildHeaders(event: EventModel): HttpField[] {
  switch (event.kind) {
    case "restProxy":
    case "loadBalancer":
      return mergeMultiValue(event.headers, event.multiValueHeaders, "header");
    case "httpApi":
      return buildHttpApiHeaders(event);
  }
}

function buildHttpApiHeaders(event: HttpApiEvent): HttpField[] {
  const headers: HttpField[] = Object.entries(event.headers);
  // Payload format 2.0 moves cookies out of the headers
  if (event.cookies.length > 0 && getHeader(headers, "cookie") === undefined) {
    headers.push(["cookie", event.cookies.join("; ")]);
  }
  return headers;
}

function buildQuery(event: EventModel): HttpField[] {
  switch (event.kind) {
    case "restProxy":
      return mergeMultiValue(
        event.queryStringParameters,
        event.multiValueQueryStringParameters,
        "query parameter"
      );
    case "httpApi":
      if (event.rawQueryString) {
        return [...new URLSearchParams(event.rawQueryString)];
      }
      return Object.entries(event.queryStringParameters);
    case "loadBalancer":
      // The load balancer passes the query string through without decoding it
      return mergeMultiValue(
        event.queryStringParameters,
        event.multiValueQueryStringParameters,
        "query parameter"
      ).map(([key, value]): HttpField => [
        decodeQueryComponent(key),
        decodeQueryComponent(value),
      ]);
  }
}

function decodeQueryComponent(value: string): string {
  try {
    return decodeURIComponent(value.replace(/\+/g, " "));
  } catch {
    return value;
  }
}

function decodeBody(body: string | null, isBase64Encoded: boolean): Buffer {
  if (body === null) {
    return Buffer.alloc(0);
  }
  if (!isBase64Encoded) {
    return Buffer.from(body, "utf8");
  }

  const compact = body.replace(/\s+/g, "");
  // A single leftover character cannot encode a whole byte
  if (
    !BASE64_PATTERN.test(compact) ||
    compact.replace(/=+$/, "").length % 4 === 1
  ) {
    throw new MalformedEventError(
      "Event body is flagged as base64 but is not valid base64"
    );
  }
  return Buffer.from(compact, "base64");
}

function lastForwardedFor(headers: HttpField[]): string | undefined {
  const forwardedFor = getHeader(headers, "x-forwarded-for");
  if (!forwardedFor) {
    return undefined;
  }
  const addresses = forwardedFor
    .split(",")
    .map((address) => address.trim())
    .filter((address) => address.length > 0);
  return addresses[addresses.length - 1];
}
