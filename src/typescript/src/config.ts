import { z } from "zod";
import { ConfigurationError } from "./errors.js";

/**
 * How a response body is sent back to the invocation source
 */
export type ResponseType = "text" | "binary";

export interface HttpEventHandlerOptions {
  /**
   * Detect the gateway base path (e.g. the `/prod` stage prefix), strip it
   * from the request path and expose it as `basePath` on the request.
   * Defaults to `true`.
   */
  includeBasePath?: boolean;
  /**
   * Response types forced for specific content types, e.g.
   * `{ "text/csv": "binary" }`. Keys are matched case-insensitively and
   * without parameters.
   */
  responseTypes?: Record<string, ResponseType>;
  /**
   * Response type for every content type without an entry in
   * `responseTypes`. When unset, text content types are recognized
   * automatically and anything else is sent as binary.
   */
  defaultResponseType?: ResponseType;
}

export interface ResolvedHandlerOptions {
  includeBasePath: boolean;
  responseTypes: Record<string, ResponseType>;
  defaultResponseType?: ResponseType;
}

const responseTypeSchema = z.enum(["text", "binary"]);

const optionsSchema = z
  .object({
    includeBasePath: z.boolean().optional(),
    responseTypes: z.record(responseTypeSchema).optional(),
    defaultResponseType: responseTypeSchema.optional(),
  })
  .strict();

/**
 * Validate handler options and fill in defaults
 *
 * @throws ConfigurationError when the options are not valid
 */
export function resolveHandlerOptions(
  options: unknown = {}
): ResolvedHandlerOptions {
  const result = optionsSchema.safeParse(options ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid handler options: ${details}`);
  }

  const responseTypes: Record<string, ResponseType> = {};
  for (const [contentType, responseType] of Object.entries(
    result.data.responseTypes ?? {}
  )) {
    responseTypes[normalizeContentType(contentType)] = responseType;
  }

  return {
    includeBasePath: result.data.includeBasePath ?? true,
    responseTypes,
    defaultResponseType: result.data.defaultResponseType,
  };
}

/**
 * `"Text/HTML; charset=utf-8"` -> `"text/html"`
 */
export function normalizeContentType(contentType: string): string {
  return contentType.split(";")[0].trim().toLowerCase();
}
