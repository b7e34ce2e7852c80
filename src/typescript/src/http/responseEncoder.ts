import { isUtf8 } from "node:buffer";
import { STATUS_CODES } from "node:http";
import {
  ALBResult,
  APIGatewayProxyResult,
  APIGatewayProxyStructuredResultV2,
} from "aws-lambda";
import {
  ResolvedHandlerOptions,
  ResponseType,
  normalizeContentType,
} from "../config.js";
import { InvalidResponseError } from "../errors.js";
import {
  CanonicalResponse,
  HttpField,
  getHeader,
  getHeaders,
  responseHeaderFields,
} from "./canonical.js";

/**
 * What the encoder needs to know about the invocation source. Any
 * {@link EventModel} satisfies it.
 */
export type ResponseTarget =
  | { kind: "restProxy" }
  | { kind: "httpApi" }
  | { kind: "loadBalancer"; multiValueEnabled: boolean };

export type LambdaHttpResult =
  | APIGatewayProxyResult
  | APIGatewayProxyStructuredResultV2
  | ALBResult;

export type EncodeOptions = Pick<
  ResolvedHandlerOptions,
  "responseTypes" | "defaultResponseType"
>;

export interface EncodedBody {
  body: string;
  isBase64Encoded: boolean;
}

const TEXT_CONTENT_TYPES = new Set([
  "application/json",
  "application/xml",
  "application/javascript",
  "application/x-www-form-urlencoded",
  "application/graphql",
  "image/svg+xml",
]);

/**
 * Convert a canonical response into the result shape expected by the
 * invocation source.
 *
 * Shapes without multi-value header support keep only the last value of a
 * repeated header. HTTP API results move `Set-Cookie` values to `cookies`
 * instead.
 *
 * @throws InvalidResponseError when the status code is not an integer in 100-599
 */
export function encodeResponse(
  response: CanonicalResponse,
  target: { kind: "restProxy" },
  options?: EncodeOptions
): APIGatewayProxyResult;
export function encodeResponse(
  response: CanonicalResponse,
  target: { kind: "httpApi" },
  options?: EncodeOptions
): APIGatewayProxyStructuredResultV2;
export function encodeResponse(
  response: CanonicalResponse,
  target: { kind: "loadBalancer"; multiValueEnabled: boolean },
  options?: EncodeOptions
): ALBResult;
export function encodeResponse(
  response: CanonicalResponse,
  target: ResponseTarget,
  options?: EncodeOptions
): LambdaHttpResult;
export function encodeResponse(
  response: CanonicalResponse,
  target: ResponseTarget,
  options: EncodeOptions = { responseTypes: {} }
): LambdaHttpResult {
  const { statusCode } = response;
  if (!Number.isInteger(statusCode) || statusCode < 100 || statusCode > 599) {
    throw new InvalidResponseError(
      `Response status code must be an integer between 100 and 599, got ${statusCode}`
    );
  }

  const headers = responseHeaderFields(response);
  const { body, isBase64Encoded } = encodeBody(
    toBuffer(response.body),
    getHeader(headers, "content-type"),
    options.responseTypes,
    options.defaultResponseType
  );

  switch (target.kind) {
    case "restProxy":
      return {
        statusCode,
        ...(hasRepeatedNames(headers)
          ? { multiValueHeaders: groupHeaders(headers) }
          : { headers: collapseHeaders(headers) }),
        body,
        isBase64Encoded,
      };
    case "httpApi": {
      const cookies = getHeaders(headers, "set-cookie");
      const result: APIGatewayProxyStructuredResultV2 = {
        statusCode,
        headers: collapseHeaders(
          headers.filter(([name]) => name.toLowerCase() !== "set-cookie")
        ),
        body,
        isBase64Encoded,
      };
      if (cookies.length > 0) {
        result.cookies = cookies;
      }
      return result;
    }
    case "loadBalancer":
      return {
        statusCode,
        statusDescription: `${statusCode} ${STATUS_CODES[statusCode] ?? ""}`.trimEnd(),
        ...(target.multiValueEnabled
          ? { multiValueHeaders: groupHeaders(headers) }
          : { headers: collapseHeaders(headers) }),
        body,
        isBase64Encoded,
      };
  }
}

/**
 * Decide between a literal UTF-8 body and a base64 body.
 *
 * The body is sent as text only when its content type is a text type (or is
 * configured as `"text"`) and the bytes are valid UTF-8.
 */
export function encodeBody(
  body: Buffer,
  contentType: string | undefined,
  responseTypes: Record<string, ResponseType> = {},
  defaultResponseType?: ResponseType
): EncodedBody {
  if (body.length === 0) {
    return { body: "", isBase64Encoded: false };
  }
  if (
    getResponseType(contentType, responseTypes, defaultResponseType) === "text" &&
    isUtf8(body)
  ) {
    return { body: body.toString("utf8"), isBase64Encoded: false };
  }
  return { body: body.toString("base64"), isBase64Encoded: true };
}

/**
 * An entry in `responseTypes` wins, then `defaultResponseType`, then text
 * type recognition.
 */
export function getResponseType(
  contentType: string | undefined,
  responseTypes: Record<string, ResponseType> = {},
  defaultResponseType?: ResponseType
): ResponseType {
  const normalized = normalizeContentType(contentType ?? "");
  const configured = responseTypes[normalized] ?? defaultResponseType;
  if (configured) {
    return configured;
  }
  return normalized && isTextContentType(normalized) ? "text" : "binary";
}

export function isTextContentType(contentType: string): boolean {
  const normalized = normalizeContentType(contentType);
  return (
    normalized.startsWith("text/") ||
    TEXT_CONTENT_TYPES.has(normalized) ||
    normalized.endsWith("+json") ||
    normalized.endsWith("+xml")
  );
}

function toBuffer(body: CanonicalResponse["body"]): Buffer {
  if (body === undefined) {
    return Buffer.alloc(0);
  }
  if (typeof body === "string") {
    return Buffer.from(body, "utf8");
  }
  return Buffer.from(body.buffer, body.byteOffset, body.byteLength);
}

function hasRepeatedNames(headers: HttpField[]): boolean {
  const names = new Set(headers.map(([name]) => name.toLowerCase()));
  return names.size < headers.length;
}

function collapseHeaders(headers: HttpField[]): Record<string, string> {
  const collapsed = new Map<string, HttpField>();
  for (const [name, value] of headers) {
    collapsed.set(name.toLowerCase(), [name, value]);
  }
  return Object.fromEntries(collapsed.values());
}

function groupHeaders(headers: HttpField[]): Record<string, string[]> {
  const grouped = new Map<string, [string, string[]]>();
  for (const [name, value] of headers) {
    const key = name.toLowerCase();
    const entry = grouped.get(key);
    if (entry) {
      entry[1].push(value);
    } else {
      grouped.set(key, [name, [value]]);
    }
  }
  return Object.fromEntries(grouped.values());
}
