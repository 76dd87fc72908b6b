import { describe, it, expect } from "vitest";
import {
  PriorError,
  NetworkError,
  RequestTimeoutError,
  APIError,
  ResponseParseError,
  RegistrationError,
  ToolInputError,
} from "../src/exceptions.js";

describe("SDK Exceptions", () => {
  it("PriorError is an instance of Error", () => {
    const err = new PriorError("test");
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe("test");
    expect(err.name).toBe("PriorError");
  });

  it("NetworkError carries its cause", () => {
    const cause = new Error("socket hang up");
    const err = new NetworkError("network failed", { cause });
    expect(err).toBeInstanceOf(PriorError);
    expect(err.cause).toBe(cause);
  });

  it("RequestTimeoutError extends NetworkError", () => {
    const err = new RequestTimeoutError();
    expect(err).toBeInstanceOf(NetworkError);
    expect(err.message).toBe("Request timed out.");
    expect(err.name).toBe("RequestTimeoutError");
  });

  it("APIError carries status code, payload and request ID", () => {
    const err = new APIError({ statusCode: 402, message: "no credits", payload: { ok: false }, requestId: "req-1" });
    expect(err).toBeInstanceOf(PriorError);
    expect(err.statusCode).toBe(402);
    expect(err.payload).toEqual({ ok: false });
    expect(err.requestId).toBe("req-1");
  });

  it("APIError defaults payload and request ID to null", () => {
    const err = new APIError({ statusCode: 500, message: "boom" });
    expect(err.payload).toBeNull();
    expect(err.requestId).toBeNull();
  });

  it("ResponseParseError has a default message", () => {
    const err = new ResponseParseError({ statusCode: 200, text: "<html>" });
    expect(err.message).toBe("Invalid JSON in response (status 200).");
    expect(err.text).toBe("<html>");
  });

  it("RegistrationError is a PriorError", () => {
    const cause = new NetworkError("down");
    const err = new RegistrationError("Auto-registration failed: down", { cause });
    expect(err).toBeInstanceOf(PriorError);
    expect(err.cause).toBe(cause);
  });

  it("ToolInputError lists every issue in its message", () => {
    const err = new ToolInputError("prior_search", [
      { path: "$.query", message: "is required" },
      { path: "$.maxResults", message: "must be <= 10" },
    ]);
    expect(err.message).toBe("Invalid input for prior_search: $.query is required; $.maxResults must be <= 10");
    expect(err.tool).toBe("prior_search");
  });
});
