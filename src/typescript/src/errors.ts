/**
 * Thrown when an invocation payload does not match any supported event schema,
 * or when a required field is missing or has the wrong type.
 */
export class MalformedEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedEventError";
  }
}

/**
 * Thrown when the event carries an HTTP method outside the supported verb set.
 */
export class UnsupportedMethodError extends Error {
  constructor(public readonly method: string) {
    super(`Unsupported HTTP method: '${method}'`);
    this.name = "UnsupportedMethodError";
  }
}

/**
 * Thrown when the response returned by the request handler cannot be
 * converted into a Lambda result.
 */
export class InvalidResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidResponseError";
  }
}

/**
 * Thrown while a handler is being set up, before any event is processed.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
