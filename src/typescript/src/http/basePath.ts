import { createLogger, format, transports } from "winston";
import {
  EventModel,
  HttpApiEvent,
  RestProxyEvent,
  SingleValueMap,
} from "../events/eventModel.js";

const logger = createLogger({
  level: process.env.LOG_LEVEL?.toLowerCase() || "info",
  format: format.simple(),
  transports: [new transports.Console()],
});

/**
 * Resolve the base path the gateway placed in front of the application's
 * routes, e.g. `/prod` for `https://abc.execute-api.us-east-1.amazonaws.com/prod/hello`.
 *
 * Returns an empty string when there is no base path, when it cannot be
 * determined, or when detection is switched off.
 */
export function resolveBasePath(
  event: EventModel,
  options: { includeBasePath: boolean }
): string {
  if (!options.includeBasePath) {
    return "";
  }

  switch (event.kind) {
    case "restProxy":
      return resolveRestProxyBasePath(event);
    case "httpApi":
      return resolveHttpApiBasePath(event);
    case "loadBalancer":
      // Load balancers have no stages
      return "";
  }
}

function resolveRestProxyBasePath(event: RestProxyEvent): string {
  // On the default execute-api domain the stage is not part of event.path
  const host = findHeader(event, "host");
  // Payload 1.0 events from an HTTP API report the unprefixed $default stage
  if (
    host?.toLowerCase().endsWith(".amazonaws.com") &&
    event.stage &&
    event.stage !== "$default"
  ) {
    return `/${event.stage}`;
  }

  if (!event.resource) {
    return "";
  }

  const resourcePath = populateResourcePath(
    event.resource,
    event.pathParameters
  );
  if (resourcePath === undefined) {
    logger.debug(
      `Path parameters do not match resource '${event.resource}', assuming no base path`
    );
    return "";
  }

  const path = trimTrailingSlash(event.path);
  if (resourcePath === "/") {
    return path === "/" ? "" : path;
  }

  const trimmedResource = trimTrailingSlash(resourcePath);
  if (!path.endsWith(trimmedResource)) {
    logger.debug(
      `Could not find resource '${trimmedResource}' in path '${event.path}', assuming no base path`
    );
    return "";
  }
  return path.slice(0, path.length - trimmedResource.length);
}

function resolveHttpApiBasePath(event: HttpApiEvent): string {
  if (!event.stage || event.stage === "$default") {
    return "";
  }

  const prefix = `/${event.stage}`;
  if (event.path === prefix || event.path.startsWith(`${prefix}/`)) {
    return prefix;
  }
  return "";
}

/**
 * Substitute path parameters into a resource template:
 * `/users/{id}/{proxy+}` with `{ id: "7", proxy: "a/b" }` gives `/users/7/a/b`.
 */
export function populateResourcePath(
  resource: string,
  pathParameters: SingleValueMap
): string | undefined {
  const segments: string[] = [];
  for (const segment of resource.split("/")) {
    if (segment.startsWith("{") && segment.endsWith("}")) {
      const end = segment.endsWith("+}") ? -2 : -1;
      const value = pathParameters[segment.slice(1, end)];
      if (value === undefined) {
        return undefined;
      }
      segments.push(value);
    } else {
      segments.push(segment);
    }
  }
  return segments.join("/");
}

function trimTrailingSlash(path: string): string {
  return path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path;
}

function findHeader(event: RestProxyEvent, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, values] of Object.entries(event.multiValueHeaders)) {
    if (key.toLowerCase() === lowerName && values.length > 0) {
      return values[0];
    }
  }
  for (const [key, value] of Object.entries(event.headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}
