/**
 * REST API Request Helpers
 *
 * Shared utilities for authenticated requests to OpenStack service APIs.
 * Uses the global `fetch()` with an `X-Auth-Token` header.
 */

import {
  AuthenticationError,
  NotFoundError,
  OpenStackError,
  TransportError,
} from "./errors.js";
import { parseRetryAfter } from "./retry.js";

// =============================================================================
// Types
// =============================================================================

export type OpenStackRequestOptions = {
  method?: string;
  body?: unknown;
  headers?: Record<string, string>;
  /** Per-request timeout in ms (default 30s). */
  timeout?: number;
  /** Caller cancellation; an abort is rethrown as-is, never as a transport error. */
  signal?: AbortSignal;
};

// =============================================================================
// Core Request
// =============================================================================

/** Join a service base URL and a path without doubling slashes. */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/** Pull a human-readable message out of a Keystone or Heat error body. */
export function extractErrorMessage(body: unknown, status: number): string {
  const error = readRecord(body, "error");
  const message =
    readString(error, "message") ?? readString(body, "explanation") ?? readString(body, "message");
  return message ?? `OpenStack API error: HTTP ${status}`;
}

function parseBody(text: string): unknown {
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return { message: text.trim() };
  }
}

/**
 * Make an authenticated request to an OpenStack REST endpoint.
 *
 * Maps failures onto the error taxonomy: 404 is `NotFoundError`, 401/403 is
 * `AuthenticationError`, 429/5xx and network failures are `TransportError`,
 * anything else is a plain `OpenStackError` with the status code.
 *
 * @param token - Keystone token, or undefined for the token request itself.
 * @returns Parsed JSON body, or undefined for an empty body.
 */
export async function openstackRequest(
  url: string,
  token: string | undefined,
  opts?: OpenStackRequestOptions,
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutMs = opts?.timeout ?? 30_000;
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const signal = opts?.signal ? AbortSignal.any([opts.signal, controller.signal]) : controller.signal;

  const headers: Record<string, string> = {
    Accept: "application/json",
    ...opts?.headers,
  };
  if (token) headers["X-Auth-Token"] = token;
  if (opts?.body !== undefined) headers["Content-Type"] = "application/json";

  let res: Response;
  try {
    res = await fetch(url, {
      method: opts?.method ?? "GET",
      headers,
      body: opts?.body !== undefined ? JSON.stringify(opts.body) : undefined,
      signal,
    });
  } catch (err) {
    if (opts?.signal?.aborted) throw err;
    if (controller.signal.aborted) {
      throw new TransportError(`Request to ${url} timed out after ${timeoutMs}ms`, undefined, "ETIMEDOUT");
    }
    const cause = err instanceof Error ? err.cause : undefined;
    const code = readString(cause, "code");
    throw new TransportError(
      `Request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
      undefined,
      code,
    );
  } finally {
    clearTimeout(timer);
  }

  const body = parseBody(await res.text());

  if (!res.ok) {
    const message = extractErrorMessage(body, res.status);
    if (res.status === 404) throw new NotFoundError(message);
    if (res.status === 401 || res.status === 403) throw new AuthenticationError(message, res.status);
    if (res.status === 429 || res.status >= 500) {
      throw new TransportError(message, res.status, undefined, parseRetryAfter(res.headers.get("retry-after")));
    }
    throw new OpenStackError(message, res.status);
  }

  return body;
}

// =============================================================================
// Response Readers
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readRecord(value: unknown, key: string): Record<string, unknown> | undefined {
  if (!isRecord(value)) return undefined;
  const child = value[key];
  return isRecord(child) ? child : undefined;
}

export function readString(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) return undefined;
  const child = value[key];
  return typeof child === "string" ? child : undefined;
}

export function readArray(value: unknown, key: string): unknown[] {
  if (!isRecord(value)) return [];
  const child = value[key];
  return Array.isArray(child) ? child : [];
}

/** Like `readString`, but a missing value is a malformed response. */
export function requireString(value: unknown, key: string, context: string): string {
  const result = readString(value, key);
  if (result === undefined) {
    throw new OpenStackError(`Malformed ${context} response: missing "${key}"`);
  }
  return result;
}
