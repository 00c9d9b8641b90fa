/**
 * Retry Utilities
 *
 * Retry with exponential backoff and jitter for transport-level failures.
 * Authoritative answers (404, 409, 400, 401) are never retried.
 */

import type { OpenStackRetryOptions } from "./types.js";
import { OpenStackError, TransportError } from "./errors.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<OpenStackRetryOptions>;

export const OPENSTACK_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Node network error codes that are safe to retry.
 */
export const OPENSTACK_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
]);

// =============================================================================
// Error Checking
// =============================================================================

function field(error: unknown, key: string): unknown {
  if (typeof error !== "object" || error === null) return undefined;
  return Reflect.get(error, key);
}

function statusOf(error: unknown): number | undefined {
  const status = field(error, "statusCode") ?? field(error, "status");
  return typeof status === "number" ? status : undefined;
}

/**
 * Determine whether an OpenStack error is safe to retry.
 */
export function shouldRetryOpenStackError(error: unknown): boolean {
  if (error === null || error === undefined) return false;
  if (error instanceof TransportError) return true;
  // Typed errors other than transport are authoritative answers
  if (error instanceof OpenStackError) return false;

  const code = field(error, "code");
  if (typeof code === "string" && OPENSTACK_RETRYABLE_CODES.has(code)) return true;

  const cause = field(error, "cause");
  const causeCode = field(cause, "code");
  if (typeof causeCode === "string" && OPENSTACK_RETRYABLE_CODES.has(causeCode)) return true;

  const status = statusOf(error);
  if (status === 429) return true;
  if (status !== undefined && status >= 500 && status < 600) return true;

  const message = field(error, "message");
  if (typeof message !== "string") return false;
  const lowered = message.toLowerCase();
  const retryablePatterns = [
    "too many requests",
    "service unavailable",
    "connection reset",
    "socket hang up",
    "network error",
    "fetch failed",
  ];
  return retryablePatterns.some((pattern) => lowered.includes(pattern));
}

/**
 * Extract a Retry-After hint from an error (in ms).
 */
export function getRetryAfterMs(error: unknown): number | null {
  if (error instanceof TransportError && error.retryAfterMs !== undefined) {
    return error.retryAfterMs;
  }
  return null;
}

/**
 * Parse a Retry-After header value (seconds or HTTP date) into ms.
 */
export function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(value);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }
  return undefined;
}

// =============================================================================
// Retry Execution
// =============================================================================

export function resolveRetryConfig(options?: OpenStackRetryOptions): RetryConfig {
  return {
    maxAttempts: options?.maxAttempts ?? OPENSTACK_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? OPENSTACK_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? OPENSTACK_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? OPENSTACK_RETRY_DEFAULTS.jitterFactor,
  };
}

export function backoffDelayMs(attempt: number, config: RetryConfig): number {
  const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
  const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
  return Math.max(config.minDelayMs, cappedDelay + jitter);
}

/**
 * Execute a function with retry on transport failures.
 */
export async function withOpenStackRetry<T>(
  fn: () => Promise<T>,
  options?: OpenStackRetryOptions,
): Promise<T> {
  const config = resolveRetryConfig(options);

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryOpenStackError(error)) break;

      const delayMs = getRetryAfterMs(error) ?? backoffDelayMs(attempt, config);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const name = field(error, "name");
  const message = field(error, "message");
  const status = statusOf(error);

  const parts: string[] = [];
  if (typeof name === "string" && name !== "Error") parts.push(`[${name}]`);
  if (status !== undefined) parts.push(`(HTTP ${status})`);
  parts.push(typeof message === "string" && message ? message : "Unknown error");

  return parts.join(" ");
}
