import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  buildErrorV1,
  describeError,
  getStatusCodeForErrorCode,
  HttpError,
  sanitizeErrorMessage,
  toErrorV1,
} from "../../src/utils/errors.js";
import { getOrGenerateRequestId } from "../../src/utils/request-id.js";

describe("error.v1", () => {
  it("omits empty details and a missing request id", () => {
    expect(buildErrorV1("INTERNAL", "boom", {})).toEqual({ schema: "error.v1", code: "INTERNAL", message: "boom" });
  });

  it("maps validation errors to BAD_INPUT", () => {
    const parsed = z.object({ score: z.number() }).safeParse({ score: "high" });
    if (parsed.success) throw new Error("expected a validation failure");

    const error = toErrorV1(parsed.error);

    expect(error.code).toBe("BAD_INPUT");
    expect(error.message).toBe("Validation failed");
    expect(error.details).toHaveProperty("validation_errors");
  });

  it("keeps the code and details of an HttpError", () => {
    expect(toErrorV1(new HttpError("NOT_FOUND", "Unknown NPC: zed", { npc: "zed" }))).toEqual({
      schema: "error.v1",
      code: "NOT_FOUND",
      message: "Unknown NPC: zed",
      details: { npc: "zed" },
    });
  });

  it("maps a client status on a thrown error to BAD_INPUT", () => {
    const bodyError = Object.assign(new Error("Unexpected end of JSON input"), { statusCode: 400 });
    expect(toErrorV1(bodyError).code).toBe("BAD_INPUT");
  });

  it("maps anything else to INTERNAL", () => {
    expect(toErrorV1(new Error("kaput")).code).toBe("INTERNAL");
    expect(toErrorV1(42).message).toBe("An unexpected error occurred");
  });

  it("maps codes to HTTP statuses", () => {
    expect(getStatusCodeForErrorCode("BAD_INPUT")).toBe(400);
    expect(getStatusCodeForErrorCode("NOT_FOUND")).toBe(404);
    expect(getStatusCodeForErrorCode("UPSTREAM_FAILED")).toBe(502);
    expect(getStatusCodeForErrorCode("INTERNAL")).toBe(500);
  });

  it("strips paths, keys and emails from messages", () => {
    expect(sanitizeErrorMessage("ENOENT /srv/app/data/roles.json")).toBe("ENOENT [path]");
    expect(sanitizeErrorMessage("bad OPENAI_API_KEY=test-secret")).toBe("bad [KEY_REDACTED]");
    expect(sanitizeErrorMessage("contact dev@example.com")).toBe("contact [email]");
  });

  it("describes unknown thrown values", () => {
    expect(describeError(new Error("x"))).toBe("x");
    expect(describeError("plain")).toBe("plain");
    expect(describeError(undefined)).toBe("An unexpected error occurred");
  });
});

describe("request ids", () => {
  it("echoes a caller-supplied id", () => {
    expect(getOrGenerateRequestId({ headers: { "x-request-id": "  abc-123 " } })).toBe("abc-123");
  });

  it("generates a UUID otherwise", () => {
    expect(getOrGenerateRequestId({ headers: {} })).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });
});
