export type { RequestHandler, RequestHandlerFunction } from "./requestHandler.js";
export { HttpEventHandler } from "./httpEventHandler.js";
export { LambdaHttpHandler } from "./lambdaHttpHandler.js";
export { APIGatewayProxyEventHandler } from "./apiGatewayProxyEventHandler.js";
export { APIGatewayProxyEventV2Handler } from "./apiGatewayProxyEventV2Handler.js";
export { LambdaFunctionURLEventHandler } from "./lambdaFunctionUrlEventHandler.js";
export { ALBEventHandler } from "./albEventHandler.js";
