import { describe, expect, it } from "vitest";
import { z } from "zod";
import { RelayError, httpStatusFor, toRelayError } from "../src/relay/errors.js";

describe("RelayError", () => {
  it("creates error with code and message", () => {
    const err = new RelayError("UNKNOWN_STEP", "Test message");
    expect(err.code).toBe("UNKNOWN_STEP");
    expect(err.message).toBe("Test message");
    expect(err.name).toBe("RelayError");
  });

  it("includes details when provided", () => {
    const err = new RelayError("IO_ERROR", "File not found", { path: "/test" });
    expect(err.details).toEqual({ path: "/test" });
  });

  it("toJSON returns serializable object", () => {
    const err = new RelayError("BAD_REQUEST", "Invalid input", { field: "text" });
    expect(err.toJSON()).toEqual({ code: "BAD_REQUEST", message: "Invalid input", details: { field: "text" } });
  });

  it("toJSON excludes details when undefined", () => {
    const json = new RelayError("INTERNAL", "Something went wrong").toJSON();
    expect(json).toEqual({ code: "INTERNAL", message: "Something went wrong" });
    expect("details" in json).toBe(false);
  });
});

describe("toRelayError", () => {
  it("returns RelayError unchanged", () => {
    const original = new RelayError("TIMED_OUT", "Too slow");
    expect(toRelayError(original)).toBe(original);
  });

  it("converts regular Error to INTERNAL", () => {
    const result = toRelayError(new Error("Something failed"));

    expect(result.code).toBe("INTERNAL");
    expect(result.message).toBe("Something failed");
    expect(result.details).toHaveProperty("name", "Error");
    expect(result.details).toHaveProperty("stack");
  });

  it("converts ZodError to BAD_REQUEST", () => {
    const parsed = z.object({ text: z.string() }).safeParse({});
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    const result = toRelayError(parsed.error);
    expect(result.code).toBe("BAD_REQUEST");
    expect(result.message).toBe("Validation error");
    expect(result.details).toHaveProperty("issues");
  });

  it("converts unknown values to INTERNAL", () => {
    const result = toRelayError("string error");
    expect(result.code).toBe("INTERNAL");
    expect(result.message).toBe("Unknown error");
    expect(result.details).toEqual({ err: "string error" });
  });

  it("converts null/undefined to INTERNAL", () => {
    expect(toRelayError(null).code).toBe("INTERNAL");
    expect(toRelayError(undefined).code).toBe("INTERNAL");
  });
});

describe("httpStatusFor", () => {
  it("maps client errors", () => {
    expect(httpStatusFor("BAD_REQUEST")).toBe(400);
    expect(httpStatusFor("UNKNOWN_STEP")).toBe(400);
    expect(httpStatusFor("NOT_FOUND")).toBe(404);
    expect(httpStatusFor("INVALID_TRANSITION")).toBe(409);
  });

  it("maps upstream failures to 502 and the rest to 500", () => {
    expect(httpStatusFor("COUNTERPARTY_UNREACHABLE")).toBe(502);
    expect(httpStatusFor("PUBLISH_ERROR")).toBe(502);
    expect(httpStatusFor("INTERNAL")).toBe(500);
    expect(httpStatusFor("LEDGER_INIT_FAILED")).toBe(500);
  });
});
