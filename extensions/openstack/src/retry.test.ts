import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import {
  OPENSTACK_RETRY_DEFAULTS,
  OPENSTACK_RETRYABLE_CODES,
  backoffDelayMs,
  formatErrorMessage,
  getRetryAfterMs,
  parseRetryAfter,
  resolveRetryConfig,
  shouldRetryOpenStackError,
  withOpenStackRetry,
} from "./retry.js";
import { AuthenticationError, NotFoundError, SubmissionError, TransportError } from "./errors.js";

// =============================================================================
// Defaults & Constants
// =============================================================================

describe("OPENSTACK_RETRY_DEFAULTS", () => {
  it("has expected default values", () => {
    expect(OPENSTACK_RETRY_DEFAULTS).toEqual({
      maxAttempts: 3,
      minDelayMs: 100,
      maxDelayMs: 30_000,
      jitterFactor: 0.2,
    });
  });
});

describe("OPENSTACK_RETRYABLE_CODES", () => {
  it("contains core network error codes", () => {
    for (const code of ["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EPIPE"]) {
      expect(OPENSTACK_RETRYABLE_CODES.has(code)).toBe(true);
    }
  });
});

describe("resolveRetryConfig", () => {
  it("fills unset fields from the defaults", () => {
    expect(resolveRetryConfig({ maxAttempts: 5 })).toEqual({ ...OPENSTACK_RETRY_DEFAULTS, maxAttempts: 5 });
  });
});

describe("backoffDelayMs", () => {
  it("doubles per attempt up to the cap", () => {
    const config = { maxAttempts: 5, minDelayMs: 100, maxDelayMs: 300, jitterFactor: 0 };
    expect(backoffDelayMs(1, config)).toBe(100);
    expect(backoffDelayMs(2, config)).toBe(200);
    expect(backoffDelayMs(3, config)).toBe(300);
  });
});

// =============================================================================
// shouldRetryOpenStackError
// =============================================================================

describe("shouldRetryOpenStackError", () => {
  it("retries transport errors", () => {
    expect(shouldRetryOpenStackError(new TransportError("bad gateway", 502))).toBe(true);
  });

  it("never retries authoritative answers", () => {
    expect(shouldRetryOpenStackError(new NotFoundError("gone"))).toBe(false);
    expect(shouldRetryOpenStackError(new AuthenticationError("denied", 401))).toBe(false);
    expect(shouldRetryOpenStackError(new SubmissionError("conflict", 409))).toBe(false);
  });

  it("returns true for retryable error code (ECONNRESET)", () => {
    expect(shouldRetryOpenStackError({ code: "ECONNRESET" })).toBe(true);
  });

  it("looks at the cause code of fetch failures", () => {
    expect(shouldRetryOpenStackError({ message: "boom", cause: { code: "ECONNREFUSED" } })).toBe(true);
  });

  it("returns false for non-retryable error code", () => {
    expect(shouldRetryOpenStackError({ code: "ENOENT" })).toBe(false);
  });

  it("returns true for HTTP 429 and 5xx", () => {
    expect(shouldRetryOpenStackError({ statusCode: 429 })).toBe(true);
    expect(shouldRetryOpenStackError({ status: 503 })).toBe(true);
  });

  it("returns false for HTTP 400", () => {
    expect(shouldRetryOpenStackError({ statusCode: 400 })).toBe(false);
  });

  it("matches 'fetch failed' message pattern", () => {
    expect(shouldRetryOpenStackError(new Error("fetch failed"))).toBe(true);
  });

  it("returns false for null and undefined", () => {
    expect(shouldRetryOpenStackError(null)).toBe(false);
    expect(shouldRetryOpenStackError(undefined)).toBe(false);
  });
});

// =============================================================================
// Retry-After
// =============================================================================

describe("parseRetryAfter", () => {
  it("parses numeric seconds", () => {
    expect(parseRetryAfter("5")).toBe(5000);
  });

  it("parses an HTTP date", () => {
    const futureDate = new Date(Date.now() + 10_000).toUTCString();
    const ms = parseRetryAfter(futureDate);
    expect(ms).toBeGreaterThan(0);
    expect(ms).toBeLessThanOrEqual(10_000);
  });

  it("returns undefined for missing or garbage values", () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter("soon")).toBeUndefined();
  });
});

describe("getRetryAfterMs", () => {
  it("reads the hint carried by a transport error", () => {
    expect(getRetryAfterMs(new TransportError("slow down", 429, undefined, 2000))).toBe(2000);
  });

  it("returns null otherwise", () => {
    expect(getRetryAfterMs(new TransportError("bad gateway", 502))).toBeNull();
    expect(getRetryAfterMs({ message: "fail" })).toBeNull();
  });
});

// =============================================================================
// withOpenStackRetry
// =============================================================================

describe("withOpenStackRetry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns result on first successful attempt", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    const result = await withOpenStackRetry(fn);
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries and succeeds on second attempt", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new TransportError("connection reset", undefined, "ECONNRESET"))
      .mockResolvedValue("recovered");

    const promise = withOpenStackRetry(fn, { maxAttempts: 3, minDelayMs: 100, maxDelayMs: 1000, jitterFactor: 0 });
    await vi.advanceTimersByTimeAsync(500);
    expect(await promise).toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws the last error after exhausting all retries", async () => {
    const error = new TransportError("service unavailable", 503);
    const fn = vi.fn().mockRejectedValue(error);

    const promise = withOpenStackRetry(fn, { maxAttempts: 2, minDelayMs: 50, maxDelayMs: 200, jitterFactor: 0 });
    // Suppress unhandled rejection while timers advance
    promise.catch(() => {});
    await vi.advanceTimersByTimeAsync(5000);
    await expect(promise).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry a not-found answer", async () => {
    const error = new NotFoundError("Stack web not found");
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withOpenStackRetry(fn, { maxAttempts: 3 })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("waits for the Retry-After hint", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new TransportError("slow down", 429, undefined, 2000))
      .mockResolvedValue("done");

    const promise = withOpenStackRetry(fn, { maxAttempts: 2, minDelayMs: 10, jitterFactor: 0 });
    await vi.advanceTimersByTimeAsync(1999);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(await promise).toBe("done");
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

// =============================================================================
// formatErrorMessage
// =============================================================================

describe("formatErrorMessage", () => {
  it("formats a typed error with its name and status", () => {
    expect(formatErrorMessage(new NotFoundError("No service with name glance"))).toBe(
      "[NotFoundError] (HTTP 404) No service with name glance",
    );
  });

  it("omits the generic Error name", () => {
    expect(formatErrorMessage(new Error("Something went wrong"))).toBe("Something went wrong");
  });

  it("formats error with status field instead of statusCode", () => {
    expect(formatErrorMessage({ status: 500, message: "Internal" })).toBe("(HTTP 500) Internal");
  });

  it("returns 'Unknown error' for null and undefined", () => {
    expect(formatErrorMessage(null)).toBe("Unknown error");
    expect(formatErrorMessage(undefined)).toBe("Unknown error");
  });

  it("returns the string itself for string errors", () => {
    expect(formatErrorMessage("boom")).toBe("boom");
  });
});
