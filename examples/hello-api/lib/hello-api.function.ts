import { Handler, Context } from "aws-lambda";
import {
  CanonicalRequest,
  CanonicalResponse,
  LambdaHttpHandler,
  RequestHandler,
  getHeader,
} from "../../../src/typescript/src/index.js";

class HelloApi implements RequestHandler {
  handleRequest(request: CanonicalRequest): CanonicalResponse {
    if (request.method === "GET" && request.path === "/hello") {
      const name =
        request.query.find(([key]) => key === "name")?.[1] ?? "world";
      return {
        statusCode: 200,
        headers: { "Content-Type": "text/plain; charset=utf-8" },
        body: `Hello, ${name}!`,
      };
    }

    if (request.method === "GET" && request.path === "/") {
      // Redirects must carry the base path to resolve behind a stage
      return {
        statusCode: 302,
        headers: { Location: `${request.basePath}/hello` },
      };
    }

    return {
      statusCode: 404,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        error: "Not Found",
        accept: getHeader(request.headers, "accept") ?? null,
      }),
    };
  }
}

const requestHandler = new LambdaHttpHandler(new HelloApi());

export const handler: Handler = async (event: unknown, context: Context) => {
  return requestHandler.handle(event, context);
};
