import { describe, expect, it } from "vitest";
import {
  DuplicateProviderError,
  ProviderRuntimeError,
  RateLimitExceededError,
  UnknownProviderError,
  UnsupportedOperationError,
  UpstreamError,
  cancelledError,
  createProviderError,
  invalidInput,
  isRetryableByCode,
  isUpstreamFailure,
  toProviderError
} from "../src/providers/errors";

describe("provider errors", () => {
  it("derives retryability from the code", () => {
    expect(isRetryableByCode("timeout")).toBe(true);
    expect(isRetryableByCode("network")).toBe(true);
    expect(isRetryableByCode("upstream")).toBe(true);
    expect(isRetryableByCode("rate_limit_exceeded")).toBe(true);
    expect(isRetryableByCode("invalid_input")).toBe(false);
    expect(isRetryableByCode("unsupported_operation")).toBe(false);
  });

  it("builds typed subclasses", () => {
    const unsupported = new UnsupportedOperationError("uuuka", "videoUrl");
    expect(unsupported).toBeInstanceOf(ProviderRuntimeError);
    expect(unsupported).toMatchObject({
      code: "unsupported_operation",
      retryable: false,
      provider: "uuuka",
      operation: "videoUrl",
      message: "Provider uuuka does not support videoUrl"
    });

    const upstream = new UpstreamError("bad gateway", { provider: "cenguigui", status: 502 });
    expect(upstream.code).toBe("upstream");
    expect(upstream.status).toBe(502);
    expect(upstream.details).toEqual({ status: 502 });
    expect(upstream.retryable).toBe(true);

    const timeout = new UpstreamError("slow", { code: "timeout" });
    expect(timeout.code).toBe("timeout");
    expect(timeout.details).toEqual({});

    expect(new RateLimitExceededError("cenguigui", 4)).toMatchObject({
      code: "rate_limit_exceeded",
      details: { maxQueueDepth: 4 }
    });
    expect(new UnknownProviderError("nope").message).toBe("Unknown provider: nope");
    expect(new UnknownProviderError("").message).toBe("No provider registered");
    expect(new DuplicateProviderError("a").code).toBe("duplicate_provider");
    expect(invalidInput("page must be >= 1").retryable).toBe(false);
    expect(cancelledError().code).toBe("cancelled");
  });

  it("recognizes upstream failures only", () => {
    expect(isUpstreamFailure(new UpstreamError("x", { code: "network" }))).toBe(true);
    expect(isUpstreamFailure(new ProviderRuntimeError("upstream", "plain"))).toBe(false);
    expect(isUpstreamFailure(new Error("x"))).toBe(false);
  });

  it("omits empty details when serializing", () => {
    expect(createProviderError("internal", "boom", { details: {} })).toEqual({
      code: "internal",
      message: "boom",
      retryable: false
    });
  });

  it("serializes runtime errors with their metadata", () => {
    const error = new UpstreamError("Upstream responded 503", { provider: "cenguigui", operation: "search", status: 503 });
    expect(toProviderError(error)).toEqual({
      code: "upstream",
      message: "Upstream responded 503",
      retryable: true,
      provider: "cenguigui",
      operation: "search",
      details: { status: 503 }
    });
  });

  it("classifies foreign errors by message", () => {
    expect(toProviderError(new Error("request timed out")).code).toBe("timeout");
    expect(toProviderError(new Error("429 Too Many Requests")).code).toBe("rate_limit_exceeded");
    expect(toProviderError(new Error("socket hang up")).code).toBe("network");
    expect(toProviderError(new Error("method not implemented")).code).toBe("unsupported_operation");
    expect(toProviderError("something odd", { provider: "p", operation: "episodes" })).toEqual({
      code: "internal",
      message: "something odd",
      retryable: false,
      provider: "p",
      operation: "episodes"
    });
    expect(toProviderError(new Error(""), { defaultCode: "upstream" })).toMatchObject({
      code: "upstream",
      message: "Unknown provider failure"
    });
  });
});
