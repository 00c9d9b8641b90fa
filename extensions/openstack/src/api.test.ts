import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { extractErrorMessage, joinUrl, openstackRequest, readArray, readString, requireString } from "./api.js";
import { AuthenticationError, NotFoundError, OpenStackError, TransportError } from "./errors.js";

// ---------------------------------------------------------------------------
// Mock fetch
// ---------------------------------------------------------------------------

const mockFetch = vi.fn<typeof fetch>();

beforeEach(() => {
  vi.stubGlobal("fetch", mockFetch);
  mockFetch.mockReset();
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), { status, headers });
}

// ===========================================================================
// joinUrl / extractErrorMessage
// ===========================================================================

describe("joinUrl", () => {
  it("joins without doubling slashes", () => {
    expect(joinUrl("http://keystone.test:35357/v2.0/", "/tokens")).toBe("http://keystone.test:35357/v2.0/tokens");
    expect(joinUrl("http://heat.test/v1/t1", "stacks")).toBe("http://heat.test/v1/t1/stacks");
  });
});

describe("extractErrorMessage", () => {
  it("prefers Keystone's error.message", () => {
    expect(extractErrorMessage({ error: { message: "Invalid user", code: 401 } }, 401)).toBe("Invalid user");
  });

  it("falls back to Heat's explanation", () => {
    expect(extractErrorMessage({ explanation: "The resource could not be found." }, 404)).toBe(
      "The resource could not be found.",
    );
  });

  it("falls back to a generic message", () => {
    expect(extractErrorMessage(undefined, 502)).toBe("OpenStack API error: HTTP 502");
  });
});

// ===========================================================================
// openstackRequest
// ===========================================================================

describe("openstackRequest", () => {
  it("sends a GET with the token header by default", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ id: "abc" }));

    const result = await openstackRequest("http://heat.test/v1/t1/stacks", "tok123");

    expect(result).toEqual({ id: "abc" });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("http://heat.test/v1/t1/stacks");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({ Accept: "application/json", "X-Auth-Token": "tok123" });
  });

  it("sends a JSON body without a token for the token request", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ access: {} }));

    await openstackRequest("http://keystone.test/v2.0/tokens", undefined, {
      method: "POST",
      body: { auth: { tenantName: "admin" } },
    });

    const [, init] = mockFetch.mock.calls[0];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify({ auth: { tenantName: "admin" } }));
    expect(init?.headers).toEqual({ Accept: "application/json", "Content-Type": "application/json" });
  });

  it("returns undefined for an empty body", async () => {
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

    expect(await openstackRequest("http://x.test/y", "t", { method: "DELETE" })).toBeUndefined();
  });

  it("maps 404 to NotFoundError", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ explanation: "Stack web not found" }, 404));

    const err = await openstackRequest("http://x.test/y", "t").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ message: "Stack web not found", statusCode: 404 });
  });

  it("maps 401 and 403 to AuthenticationError", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: "expired" } }, 401));
    await expect(openstackRequest("http://x.test/y", "t")).rejects.toThrow(AuthenticationError);

    mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: "forbidden" } }, 403));
    await expect(openstackRequest("http://x.test/y", "t")).rejects.toThrow(AuthenticationError);
  });

  it("maps 429 to TransportError with the Retry-After hint", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ message: "slow down" }, 429, { "retry-after": "3" }));

    const err = await openstackRequest("http://x.test/y", "t").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ message: "slow down", statusCode: 429, retryAfterMs: 3000 });
  });

  it("maps 5xx with a non-JSON body to TransportError", async () => {
    mockFetch.mockResolvedValueOnce(new Response("Bad Gateway", { status: 502 }));

    const err = await openstackRequest("http://x.test/y", "t").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ message: "Bad Gateway", statusCode: 502 });
  });

  it("maps other client errors to OpenStackError with the status", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: "Conflict occurred" } }, 409));

    const err = await openstackRequest("http://x.test/y", "t").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(OpenStackError);
    expect(err).not.toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ message: "Conflict occurred", statusCode: 409 });
  });

  it("wraps network failures as TransportError with the cause code", async () => {
    mockFetch.mockRejectedValueOnce(
      new TypeError("fetch failed", { cause: Object.assign(new Error("connect"), { code: "ECONNREFUSED" }) }),
    );

    const err = await openstackRequest("http://x.test/y", "t").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ code: "ECONNREFUSED", message: "Request to http://x.test/y failed: fetch failed" });
  });

  it("rethrows a caller abort as-is", async () => {
    const controller = new AbortController();
    const reason = new Error("cancelled");
    controller.abort(reason);
    mockFetch.mockRejectedValueOnce(reason);

    await expect(openstackRequest("http://x.test/y", "t", { signal: controller.signal })).rejects.toBe(reason);
  });
});

// ===========================================================================
// Readers
// ===========================================================================

describe("response readers", () => {
  it("read typed fields and ignore mismatches", () => {
    const value = { name: "glance", count: 2, items: [1, 2] };
    expect(readString(value, "name")).toBe("glance");
    expect(readString(value, "count")).toBeUndefined();
    expect(readArray(value, "items")).toEqual([1, 2]);
    expect(readArray(value, "name")).toEqual([]);
    expect(readArray(null, "items")).toEqual([]);
  });

  it("requireString reports a malformed response", () => {
    expect(() => requireString({}, "id", "service")).toThrow('Malformed service response: missing "id"');
  });
});
