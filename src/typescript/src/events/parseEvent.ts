import { z } from "zod";
import { MalformedEventError } from "../errors.js";
import {
  EventModel,
  HttpApiEvent,
  LoadBalancerEvent,
  MultiValueMap,
  RestProxyEvent,
  SingleValueMap,
} from "./eventModel.js";

// API Gateway sends null for empty maps, so every map is nullish
const singleValueMapSchema = z.record(z.string().optional()).nullish();
const multiValueMapSchema = z.record(z.array(z.string()).optional()).nullish();
const bodySchema = z.string().nullish();
const base64FlagSchema = z.boolean().nullish();

const restProxyEventSchema = z.object({
  httpMethod: z.string().min(1),
  path: z.string(),
  resource: z.string().nullish(),
  headers: singleValueMapSchema,
  multiValueHeaders: multiValueMapSchema,
  queryStringParameters: singleValueMapSchema,
  multiValueQueryStringParameters: multiValueMapSchema,
  pathParameters: singleValueMapSchema,
  body: bodySchema,
  isBase64Encoded: base64FlagSchema,
  requestContext: z
    .object({
      stage: z.string().nullish(),
      requestId: z.string().nullish(),
      domainName: z.string().nullish(),
      resourcePath: z.string().nullish(),
      identity: z
        .object({
          sourceIp: z.string().nullish(),
        })
        .nullish(),
    })
    .nullish(),
});

const httpApiEventSchema = z.object({
  version: z.literal("2.0"),
  routeKey: z.string().nullish(),
  rawPath: z.string(),
  rawQueryString: z.string().nullish(),
  cookies: z.array(z.string()).nullish(),
  headers: singleValueMapSchema,
  queryStringParameters: singleValueMapSchema,
  body: bodySchema,
  isBase64Encoded: base64FlagSchema,
  requestContext: z.object({
    stage: z.string().nullish(),
    requestId: z.string().nullish(),
    domainName: z.string().nullish(),
    http: z.object({
      method: z.string().min(1),
      sourceIp: z.string().nullish(),
    }),
  }),
});

const loadBalancerEventSchema = z.object({
  httpMethod: z.string().min(1),
  path: z.string(),
  headers: singleValueMapSchema,
  multiValueHeaders: multiValueMapSchema,
  queryStringParameters: singleValueMapSchema,
  multiValueQueryStringParameters: multiValueMapSchema,
  body: bodySchema,
  isBase64Encoded: base64FlagSchema,
  requestContext: z.object({
    elb: z.object({
      targetGroupArn: z.string().nullish(),
    }),
  }),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validate<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  label: string
): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new MalformedEventError(`Invalid ${label} event: ${details}`);
  }
  return result.data;
}

function toSingleValueMap(
  map: Record<string, string | undefined> | null | undefined
): SingleValueMap {
  const result: SingleValueMap = {};
  for (const [key, value] of Object.entries(map ?? {})) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function toMultiValueMap(
  map: Record<string, string[] | undefined> | null | undefined
): MultiValueMap {
  const result: MultiValueMap = {};
  for (const [key, values] of Object.entries(map ?? {})) {
    if (values !== undefined) {
      result[key] = [...values];
    }
  }
  return result;
}

function optional(value: string | null | undefined): string | undefined {
  return value ?? undefined;
}

function parseRestProxyEvent(raw: unknown): RestProxyEvent {
  const event = validate(restProxyEventSchema, raw, "REST API proxy");
  return {
    kind: "restProxy",
    method: event.httpMethod,
    path: event.path,
    headers: toSingleValueMap(event.headers),
    multiValueHeaders: toMultiValueMap(event.multiValueHeaders),
    queryStringParameters: toSingleValueMap(event.queryStringParameters),
    multiValueQueryStringParameters: toMultiValueMap(
      event.multiValueQueryStringParameters
    ),
    body: event.body ?? null,
    isBase64Encoded: event.isBase64Encoded ?? false,
    sourceIp: optional(event.requestContext?.identity?.sourceIp),
    resource: optional(event.resource ?? event.requestContext?.resourcePath),
    pathParameters: toSingleValueMap(event.pathParameters),
    stage: optional(event.requestContext?.stage),
    requestId: optional(event.requestContext?.requestId),
    domainName: optional(event.requestContext?.domainName),
  };
}

function parseHttpApiEvent(raw: unknown): HttpApiEvent {
  const event = validate(httpApiEventSchema, raw, "HTTP API");
  return {
    kind: "httpApi",
    method: event.requestContext.http.method,
    path: event.rawPath,
    headers: toSingleValueMap(event.headers),
    queryStringParameters: toSingleValueMap(event.queryStringParameters),
    rawQueryString: event.rawQueryString ?? "",
    cookies: event.cookies ? [...event.cookies] : [],
    body: event.body ?? null,
    isBase64Encoded: event.isBase64Encoded ?? false,
    sourceIp: optional(event.requestContext.http.sourceIp),
    stage: optional(event.requestContext.stage),
    routeKey: optional(event.routeKey),
    requestId: optional(event.requestContext.requestId),
    domainName: optional(event.requestContext.domainName),
  };
}

function parseLoadBalancerEvent(raw: unknown): LoadBalancerEvent {
  const event = validate(loadBalancerEventSchema, raw, "load balancer");
  return {
    kind: "loadBalancer",
    method: event.httpMethod,
    path: event.path,
    headers: toSingleValueMap(event.headers),
    multiValueHeaders: toMultiValueMap(event.multiValueHeaders),
    queryStringParameters: toSingleValueMap(event.queryStringParameters),
    multiValueQueryStringParameters: toMultiValueMap(
      event.multiValueQueryStringParameters
    ),
    multiValueEnabled:
      event.multiValueHeaders != null ||
      event.multiValueQueryStringParameters != null,
    body: event.body ?? null,
    isBase64Encoded: event.isBase64Encoded ?? false,
    targetGroupArn: optional(event.requestContext.elb.targetGroupArn),
  };
}

/**
 * Parse a raw Lambda invocation payload into an {@link EventModel}.
 *
 * The schema is chosen from discriminating fields: `requestContext.elb` marks a
 * load balancer event, `version: "2.0"` an HTTP API (or function URL) event,
 * and `httpMethod` a REST API proxy event.
 *
 * @throws MalformedEventError when no schema matches or the matching schema
 *         is not satisfied
 */
export function parseEvent(raw: unknown): EventModel {
  if (!isRecord(raw)) {
    throw new MalformedEventError("Event must be a JSON object");
  }

  if (isRecord(raw.requestContext) && "elb" in raw.requestContext) {
    return parseLoadBalancerEvent(raw);
  }

  if (raw.version === "2.0") {
    return parseHttpApiEvent(raw);
  }

  if ("httpMethod" in raw) {
    if (raw.version !== undefined && raw.version !== "1.0") {
      throw new MalformedEventError(
        `Unsupported event payload version: ${JSON.stringify(raw.version)}`
      );
    }
    return parseRestProxyEvent(raw);
  }

  throw new MalformedEventError(
    "Event does not match any supported HTTP event schema"
  );
}
