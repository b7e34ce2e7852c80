import {
  HttpApiEvent,
  LoadBalancerEvent,
  RestProxyEvent,
} from "../events/eventModel.js";
import { populateResourcePath, resolveBasePath } from "./basePath.js";

function restEvent(overrides: Partial<RestProxyEvent> = {}): RestProxyEvent {
  return {
    kind: "restProxy",
    method: "GET",
    path: "/stage/hello",
    resource: "/hello",
    headers: {},
    multiValueHeaders: {},
    queryStringParameters: {},
    multiValueQueryStringParameters: {},
    pathParameters: {},
    body: null,
    isBase64Encoded: false,
    stage: "stage",
    ...overrides,
  };
}

function httpApiEvent(overrides: Partial<HttpApiEvent> = {}): HttpApiEvent {
  return {
    kind: "httpApi",
    method: "GET",
    path: "/prod/hello",
    headers: {},
    queryStringParameters: {},
    rawQueryString: "",
    cookies: [],
    body: null,
    isBase64Encoded: false,
    stage: "prod",
    ...overrides,
  };
}

const enabled = { includeBasePath: true };

describe("resolveBasePath", () => {
  test("should return no base path when detection is disabled", () => {
    expect(resolveBasePath(restEvent(), { includeBasePath: false })).toBe("");
    expect(resolveBasePath(httpApiEvent(), { includeBasePath: false })).toBe("");
  });

  describe("REST API proxy events", () => {
    test("should use the part of the path in front of the resource", () => {
      expect(resolveBasePath(restEvent(), enabled)).toBe("/stage");
    });

    test("should use the stage on the default execute-api domain", () => {
      const event = restEvent({
        path: "/hello",
        stage: "prod",
        headers: { Host: "abc123.execute-api.us-east-1.amazonaws.com" },
      });
      expect(resolveBasePath(event, enabled)).toBe("/prod");
    });

    test("should read the host from multi-value headers", () => {
      const event = restEvent({
        path: "/hello",
        stage: "prod",
        multiValueHeaders: { host: ["abc123.execute-api.us-east-1.amazonaws.com"] },
      });
      expect(resolveBasePath(event, enabled)).toBe("/prod");
    });

    test("should ignore the $default stage of payload 1.0 HTTP API events", () => {
      const event = restEvent({
        path: "/hello",
        stage: "$default",
        headers: { Host: "abc123.execute-api.us-east-1.amazonaws.com" },
      });
      expect(resolveBasePath(event, enabled)).toBe("");
    });

    test("should return no base path on a custom domain without a mapping", () => {
      const event = restEvent({
        path: "/hello",
        headers: { Host: "api.example.com" },
      });
      expect(resolveBasePath(event, enabled)).toBe("");
    });

    test("should fill in path parameters", () => {
      const event = restEvent({
        path: "/v1/users/42/orders",
        resource: "/users/{id}/orders",
        pathParameters: { id: "42" },
      });
      expect(resolveBasePath(event, enabled)).toBe("/v1");
    });

    test("should fill in greedy path parameters", () => {
      const event = restEvent({
        path: "/base-path/files/a/b.txt",
        resource: "/{proxy+}",
        pathParameters: { proxy: "files/a/b.txt" },
      });
      expect(resolveBasePath(event, enabled)).toBe("/base-path");
    });

    test("should ignore a trailing slash", () => {
      const event = restEvent({ path: "/stage/hello/" });
      expect(resolveBasePath(event, enabled)).toBe("/stage");
    });

    test("should treat the whole path as base path for the root resource", () => {
      expect(resolveBasePath(restEvent({ path: "/stage/", resource: "/" }), enabled)).toBe(
        "/stage"
      );
      expect(resolveBasePath(restEvent({ path: "/", resource: "/" }), enabled)).toBe("");
    });

    test("should return no base path when the resource is not in the path", () => {
      const event = restEvent({ path: "/stage/goodbye" });
      expect(resolveBasePath(event, enabled)).toBe("");
    });

    test("should return no base path when a path parameter is missing", () => {
      const event = restEvent({
        path: "/stage/users/42",
        resource: "/users/{id}",
      });
      expect(resolveBasePath(event, enabled)).toBe("");
    });

    test("should return no base path without a resource", () => {
      expect(resolveBasePath(restEvent({ resource: undefined }), enabled)).toBe("");
    });
  });

  describe("HTTP API events", () => {
    test("should use a named stage found at the start of the path", () => {
      expect(resolveBasePath(httpApiEvent(), enabled)).toBe("/prod");
      expect(resolveBasePath(httpApiEvent({ path: "/prod" }), enabled)).toBe("/prod");
    });

    test("should ignore the $default stage", () => {
      const event = httpApiEvent({ stage: "$default", path: "/hello" });
      expect(resolveBasePath(event, enabled)).toBe("");
    });

    test("should ignore a stage that is not in the path", () => {
      expect(resolveBasePath(httpApiEvent({ path: "/hello" }), enabled)).toBe("");
      expect(resolveBasePath(httpApiEvent({ path: "/production/x" }), enabled)).toBe("");
    });
  });

  test("should never return a base path for load balancer events", () => {
    const event: LoadBalancerEvent = {
      kind: "loadBalancer",
      method: "GET",
      path: "/stage/hello",
      headers: {},
      multiValueHeaders: {},
      queryStringParameters: {},
      multiValueQueryStringParameters: {},
      multiValueEnabled: false,
      body: null,
      isBase64Encoded: false,
    };
    expect(resolveBasePath(event, enabled)).toBe("");
  });
});

describe("populateResourcePath", () => {
  test("should substitute plain and greedy parameters", () => {
    expect(
      populateResourcePath("/users/{id}/{proxy+}", { id: "7", proxy: "a/b" })
    ).toBe("/users/7/a/b");
  });

  test("should return undefined for a missing parameter", () => {
    expect(populateResourcePath("/users/{id}", {})).toBeUndefined();
  });
});
