import { InvalidResponseError } from "../errors.js";
import { CanonicalResponse } from "./canonical.js";
import {
  encodeBody,
  encodeResponse,
  getResponseType,
  isTextContentType,
} from "./responseEncoder.js";

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const NOT_UTF8 = Buffer.from([0xff, 0xfe, 0x00]);

describe("encodeBody", () => {
  test("should send valid UTF-8 text as a literal string", () => {
    expect(encodeBody(Buffer.from("héllo ✓"), "text/plain")).toEqual({
      body: "héllo ✓",
      isBase64Encoded: false,
    });
  });

  test("should base64 encode non-UTF-8 octet streams", () => {
    expect(encodeBody(NOT_UTF8, "application/octet-stream")).toEqual({
      body: "//4A",
      isBase64Encoded: true,
    });
  });

  test("should base64 encode text types when the bytes are not UTF-8", () => {
    expect(encodeBody(NOT_UTF8, "text/plain; charset=latin1")).toEqual({
      body: "//4A",
      isBase64Encoded: true,
    });
  });

  test("should base64 encode UTF-8 bytes of a binary content type", () => {
    expect(encodeBody(Buffer.from("hello"), "application/octet-stream")).toEqual({
      body: "aGVsbG8=",
      isBase64Encoded: true,
    });
  });

  test("should base64 encode bodies without a content type", () => {
    expect(encodeBody(Buffer.from("hello"), undefined)).toEqual({
      body: "aGVsbG8=",
      isBase64Encoded: true,
    });
  });

  test("should send empty bodies as an empty string", () => {
    expect(encodeBody(Buffer.alloc(0), "image/png")).toEqual({
      body: "",
      isBase64Encoded: false,
    });
  });

  test("should not depend on body length", () => {
    const small = encodeBody(Buffer.from("a"), "text/csv");
    const large = encodeBody(Buffer.from("a".repeat(1024 * 1024)), "text/csv");
    expect(small.isBase64Encoded).toBe(false);
    expect(large.isBase64Encoded).toBe(false);
    expect(encodeBody(NOT_UTF8, "text/csv")).toEqual(encodeBody(NOT_UTF8, "text/csv"));
  });

  test("should apply configured response types", () => {
    const responseTypes = {
      "text/csv": "binary" as const,
      "application/x-ndjson": "text" as const,
    };
    expect(encodeBody(Buffer.from("name,qty\n"), "text/csv", responseTypes)).toEqual({
      body: "bmFtZSxxdHkK",
      isBase64Encoded: true,
    });
    expect(
      encodeBody(Buffer.from('{"a":1}\n'), "Application/X-NDJSON", responseTypes)
    ).toEqual({ body: '{"a":1}\n', isBase64Encoded: false });
  });
});

describe("getResponseType", () => {
  test("should use the default response type for types without an override", () => {
    expect(getResponseType("text/plain; charset=utf-8", {}, "binary")).toBe("binary");
    expect(getResponseType("image/png", {}, "text")).toBe("text");
    expect(getResponseType(undefined, {}, "text")).toBe("text");
  });

  test("should prefer per-type overrides to the default response type", () => {
    expect(getResponseType("text/csv", { "text/csv": "text" }, "binary")).toBe("text");
  });


  test.each([
    ["text/html; charset=utf-8", "text"],
    ["application/json", "text"],
    ["application/problem+json", "text"],
    ["application/atom+xml", "text"],
    ["image/svg+xml", "text"],
    ["APPLICATION/JAVASCRIPT", "text"],
    ["image/png", "binary"],
    ["application/pdf", "binary"],
    ["", "binary"],
  ])("%p is %p", (contentType, expected) => {
    expect(getResponseType(contentType)).toBe(expected);
  });

  test("should ignore parameters when checking for text", () => {
    expect(isTextContentType("application/x-www-form-urlencoded; charset=utf-8")).toBe(
      true
    );
  });
});

describe("encodeResponse", () => {
  const repeated: CanonicalResponse = {
    statusCode: 200,
    headers: [
      ["Content-Type", "text/plain"],
      ["X-A", "1"],
      ["X-A", "2"],
      ["X-B", "3"],
    ],
    body: "ok",
  };

  test("should base64 encode PNG images", () => {
    const result = encodeResponse(
      {
        statusCode: 200,
        headers: [["Content-Type", "image/png"]],
        body: PNG_SIGNATURE,
      },
      { kind: "restProxy" }
    );
    expect(result).toEqual({
      statusCode: 200,
      headers: { "Content-Type": "image/png" },
      body: "iVBORw0KGgo=",
      isBase64Encoded: true,
    });
  });

  describe("REST API proxy results", () => {
    test("should use multiValueHeaders for repeated headers", () => {
      expect(encodeResponse(repeated, { kind: "restProxy" })).toEqual({
        statusCode: 200,
        multiValueHeaders: {
          "Content-Type": ["text/plain"],
          "X-A": ["1", "2"],
          "X-B": ["3"],
        },
        body: "ok",
        isBase64Encoded: false,
      });
    });

    test("should use headers when every name is unique", () => {
      const result = encodeResponse(
        { statusCode: 201, headers: { "Content-Type": "application/json" }, body: "{}" },
        { kind: "restProxy" }
      );
      expect(result).toEqual({
        statusCode: 201,
        headers: { "Content-Type": "application/json" },
        body: "{}",
        isBase64Encoded: false,
      });
      expect(result.multiValueHeaders).toBeUndefined();
    });

    test("should treat names differing in case as the same header", () => {
      const result = encodeResponse(
        {
          statusCode: 200,
          headers: { "Set-Cookie": ["a=1", "b=2"], "set-cookie": "c=3" },
        },
        { kind: "restProxy" }
      );
      expect(result.multiValueHeaders).toEqual({ "Set-Cookie": ["a=1", "b=2", "c=3"] });
    });
  });

  describe("HTTP API results", () => {
    test("should keep the last value of repeated headers", () => {
      expect(encodeResponse(repeated, { kind: "httpApi" })).toEqual({
        statusCode: 200,
        headers: { "Content-Type": "text/plain", "X-A": "2", "X-B": "3" },
        body: "ok",
        isBase64Encoded: false,
      });
    });

    test("should return Set-Cookie headers as cookies", () => {
      const result = encodeResponse(
        {
          statusCode: 302,
          headers: [
            ["Location", "/prod/login"],
            ["Set-Cookie", "a=1; Path=/"],
            ["set-cookie", "b=2"],
          ],
        },
        { kind: "httpApi" }
      );
      expect(result).toEqual({
        statusCode: 302,
        headers: { Location: "/prod/login" },
        cookies: ["a=1; Path=/", "b=2"],
        body: "",
        isBase64Encoded: false,
      });
    });
  });

  describe("load balancer results", () => {
    test("should use multiValueHeaders when the target group has them enabled", () => {
      expect(
        encodeResponse(repeated, { kind: "loadBalancer", multiValueEnabled: true })
      ).toEqual({
        statusCode: 200,
        statusDescription: "200 OK",
        multiValueHeaders: {
          "Content-Type": ["text/plain"],
          "X-A": ["1", "2"],
          "X-B": ["3"],
        },
        body: "ok",
        isBase64Encoded: false,
      });
    });

    test("should keep the last value of repeated headers otherwise", () => {
      expect(
        encodeResponse(
          { ...repeated, statusCode: 404 },
          { kind: "loadBalancer", multiValueEnabled: false }
        )
      ).toEqual({
        statusCode: 404,
        statusDescription: "404 Not Found",
        headers: { "Content-Type": "text/plain", "X-A": "2", "X-B": "3" },
        body: "ok",
        isBase64Encoded: false,
      });
    });

    test("should describe unknown status codes with the code alone", () => {
      const result = encodeResponse(
        { statusCode: 599 },
        { kind: "loadBalancer", multiValueEnabled: false }
      );
      expect(result.statusDescription).toBe("599");
    });
  });

  test("should send text as binary when the default response type is binary", () => {
    const result = encodeResponse(
      { statusCode: 200, headers: [["Content-Type", "text/plain"]], body: "hello" },
      { kind: "restProxy" },
      { responseTypes: {}, defaultResponseType: "binary" }
    );
    expect(result.body).toBe("aGVsbG8=");
    expect(result.isBase64Encoded).toBe(true);
  });

  test("should accept Uint8Array views", () => {
    const bytes = new Uint8Array([0x00, 0x68, 0x69, 0x00]).subarray(1, 3);
    const result = encodeResponse(
      { statusCode: 200, headers: [["Content-Type", "text/plain"]], body: bytes },
      { kind: "httpApi" }
    );
    expect(result.body).toBe("hi");
  });

  test.each([99, 600, 200.5, Number.NaN])(
    "should reject status code %p",
    (statusCode) => {
      expect(() => encodeResponse({ statusCode }, { kind: "restProxy" })).toThrow(
        InvalidResponseError
      );
    }
  );
});
