/**
 * Stack Operation Polling
 *
 * Waits for an asynchronous Heat operation to reach a terminal status.
 * Terminal statuses are exactly `<OPERATION>_COMPLETE` and `<OPERATION>_FAILED`;
 * everything else (IN_PROGRESS, rollback states, ...) keeps polling until the
 * deadline.
 */

import type { HeatStack, StackOperation } from "./types.js";
import { NotFoundError, PollTimeoutError } from "./errors.js";
import { emitOpenStackDiagnosticEvent } from "./diagnostics.js";

// =============================================================================
// Types
// =============================================================================

export type StackPollOutcome =
  | { tag: "complete"; stack: HeatStack }
  | { tag: "failed"; stack: HeatStack }
  /** The stack disappeared during DELETE, which is how deletion finishes. */
  | { tag: "deleted" }
  /** The stack disappeared during CREATE. */
  | { tag: "not-found" };

export type StackPollOptions = {
  /** Delay between status reads (default 5s). */
  intervalMs?: number;
  /** Overall deadline (default 1h). */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Called after every non-terminal read. */
  onPoll?: (stack: HeatStack, attempt: number) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
};

export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_POLL_TIMEOUT_MS = 60 * 60 * 1000;

// =============================================================================
// Helpers
// =============================================================================

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error("Operation aborted");
}

/** setTimeout-based sleep that rejects as soon as the signal aborts. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error("Operation aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function positiveMs(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive number of milliseconds, got ${value}`);
  }
  return value;
}

export function classifyStackStatus(
  operation: StackOperation,
  status: string,
): "complete" | "failed" | "pending" {
  if (status === `${operation}_COMPLETE`) return "complete";
  if (status === `${operation}_FAILED`) return "failed";
  return "pending";
}

// =============================================================================
// Poll Loop
// =============================================================================

/**
 * Read the stack until the operation settles.
 *
 * `readStack` is expected to retry transient transport failures itself; any
 * error it throws other than `NotFoundError` ends the wait.
 *
 * @throws PollTimeoutError when the deadline passes first.
 * @throws RangeError for a non-positive or non-finite interval or timeout.
 */
export async function pollStackOperation(
  readStack: () => Promise<HeatStack>,
  operation: StackOperation,
  options?: StackPollOptions,
): Promise<StackPollOutcome> {
  const intervalMs = positiveMs(options?.intervalMs, DEFAULT_POLL_INTERVAL_MS, "intervalMs");
  const timeoutMs = positiveMs(options?.timeoutMs, DEFAULT_POLL_TIMEOUT_MS, "timeoutMs");
  const sleep = options?.sleep ?? abortableSleep;
  const now = options?.now ?? Date.now;
  const signal = options?.signal;
  const deadline = now() + timeoutMs;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) throw abortReason(signal);

    let stack: HeatStack;
    try {
      stack = await readStack();
    } catch (err) {
      if (err instanceof NotFoundError) {
        return operation === "DELETE" ? { tag: "deleted" } : { tag: "not-found" };
      }
      throw err;
    }

    emitOpenStackDiagnosticEvent({
      type: "openstack.stack.poll",
      service: "orchestration",
      operation,
      stackName: stack.name,
      stackId: stack.id,
      stackStatus: stack.status,
      attempt,
    });

    const state = classifyStackStatus(operation, stack.status);
    if (state === "complete") return { tag: "complete", stack };
    if (state === "failed") return { tag: "failed", stack };

    options?.onPoll?.(stack, attempt);

    const remaining = deadline - now();
    if (remaining <= 0) throw new PollTimeoutError(operation, timeoutMs, stack.status);
    await sleep(Math.min(intervalMs, remaining), signal);
  }
}
