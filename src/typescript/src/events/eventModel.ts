/**
 * The invocation sources this library understands.
 *
 * - `restProxy`: API Gateway REST API proxy integration (payload format 1.0)
 * - `httpApi`: API Gateway HTTP API and Lambda function URLs (payload format 2.0)
 * - `loadBalancer`: Application Load Balancer target
 */
export type EventModelKind = "restProxy" | "httpApi" | "loadBalancer";

export type SingleValueMap = Record<string, string>;
export type MultiValueMap = Record<string, string[]>;

interface BaseEventModel {
  method: string;
  path: string;
  headers: SingleValueMap;
  queryStringParameters: SingleValueMap;
  body: string | null;
  isBase64Encoded: boolean;
  sourceIp?: string;
}

export interface RestProxyEvent extends BaseEventModel {
  kind: "restProxy";
  multiValueHeaders: MultiValueMap;
  multiValueQueryStringParameters: MultiValueMap;
  /** Resource path template, e.g. `/users/{id}` */
  resource?: string;
  pathParameters: SingleValueMap;
  stage?: string;
  requestId?: string;
  domainName?: string;
}

export interface HttpApiEvent extends BaseEventModel {
  kind: "httpApi";
  rawQueryString: string;
  cookies: string[];
  stage?: string;
  routeKey?: string;
  requestId?: string;
  domainName?: string;
}

export interface LoadBalancerEvent extends BaseEventModel {
  kind: "loadBalancer";
  multiValueHeaders: MultiValueMap;
  multiValueQueryStringParameters: MultiValueMap;
  /**
   * True when the target group has multi-value headers enabled. The load
   * balancer then sends only the multi-value fields and expects them back.
   */
  multiValueEnabled: boolean;
  targetGroupArn?: string;
}

export type EventModel = RestProxyEvent | HttpApiEvent | LoadBalancerEvent;
