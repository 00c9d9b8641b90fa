import { describe, it, expect, vi, afterEach } from "vitest";
import { abortableSleep, classifyStackStatus, pollStackOperation } from "./polling.js";
import { NotFoundError, PollTimeoutError, TransportError } from "./errors.js";
import {
  enableOpenStackDiagnostics,
  onOpenStackDiagnosticEvent,
  resetOpenStackDiagnosticsForTest,
  type OpenStackDiagnosticEvent,
} from "./diagnostics.js";
import type { HeatStack } from "./types.js";

afterEach(() => {
  resetOpenStackDiagnosticsForTest();
});

function stack(status: string): HeatStack {
  return { id: "stk-1", name: "web", status, outputs: {} };
}

/** readStack that walks through a fixed list of results. */
function scripted(steps: Array<string | Error>) {
  let i = 0;
  return vi.fn(async () => {
    const step = steps[Math.min(i, steps.length - 1)];
    i++;
    if (step instanceof Error) throw step;
    return stack(step);
  });
}

describe("classifyStackStatus", () => {
  it("matches only the operation's own terminal statuses", () => {
    expect(classifyStackStatus("CREATE", "CREATE_COMPLETE")).toBe("complete");
    expect(classifyStackStatus("CREATE", "CREATE_FAILED")).toBe("failed");
    expect(classifyStackStatus("CREATE", "CREATE_IN_PROGRESS")).toBe("pending");
    expect(classifyStackStatus("CREATE", "DELETE_COMPLETE")).toBe("pending");
    expect(classifyStackStatus("DELETE", "DELETE_FAILED")).toBe("failed");
  });
});

describe("pollStackOperation", () => {
  it("sleeps between pending reads and returns on completion", async () => {
    const readStack = scripted(["CREATE_IN_PROGRESS", "CREATE_IN_PROGRESS", "CREATE_COMPLETE"]);
    const sleep = vi.fn(async () => {});

    const outcome = await pollStackOperation(readStack, "CREATE", { sleep, intervalMs: 10 });

    expect(outcome).toEqual({ tag: "complete", stack: stack("CREATE_COMPLETE") });
    expect(readStack).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10, undefined);
  });

  it("returns failed without sleeping", async () => {
    const sleep = vi.fn(async () => {});

    const outcome = await pollStackOperation(scripted(["CREATE_FAILED"]), "CREATE", { sleep });

    expect(outcome.tag).toBe("failed");
    expect(sleep).not.toHaveBeenCalled();
  });

  it("treats a vanished stack as deleted during DELETE", async () => {
    const readStack = scripted(["DELETE_IN_PROGRESS", new NotFoundError("Stack not found")]);

    const outcome = await pollStackOperation(readStack, "DELETE", { sleep: async () => {} });

    expect(outcome).toEqual({ tag: "deleted" });
  });

  it("reports not-found when the stack vanishes during CREATE", async () => {
    const outcome = await pollStackOperation(scripted([new NotFoundError("gone")]), "CREATE", {
      sleep: async () => {},
    });

    expect(outcome).toEqual({ tag: "not-found" });
  });

  it("propagates other read errors", async () => {
    const err = new TransportError("connection reset", undefined, "ECONNRESET");

    await expect(
      pollStackOperation(scripted(["CREATE_IN_PROGRESS", err]), "CREATE", { sleep: async () => {} }),
    ).rejects.toBe(err);
  });

  it("times out with the last seen status", async () => {
    let clock = 0;
    const sleep = vi.fn(async (ms: number) => {
      clock += ms;
    });

    const promise = pollStackOperation(scripted(["CREATE_IN_PROGRESS"]), "CREATE", {
      sleep,
      now: () => clock,
      intervalMs: 40,
      timeoutMs: 100,
    });

    await expect(promise).rejects.toThrow(new PollTimeoutError("CREATE", 100, "CREATE_IN_PROGRESS"));
    // 40 + 40 + 20 (clipped to the deadline)
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([40, 40, 20]);
  });

  it("stops before reading when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    const readStack = scripted(["CREATE_IN_PROGRESS"]);

    await expect(
      pollStackOperation(readStack, "CREATE", { signal: controller.signal }),
    ).rejects.toThrow("cancelled");
    expect(readStack).not.toHaveBeenCalled();
  });

  it("reports each pending read to onPoll", async () => {
    const onPoll = vi.fn();

    await pollStackOperation(scripted(["DELETE_IN_PROGRESS", "DELETE_COMPLETE"]), "DELETE", {
      sleep: async () => {},
      onPoll,
    });

    expect(onPoll).toHaveBeenCalledTimes(1);
    expect(onPoll).toHaveBeenCalledWith(stack("DELETE_IN_PROGRESS"), 1);
  });

  it.each([Number.NaN, 0, -1, Number.POSITIVE_INFINITY])(
    "rejects a timeoutMs of %s before reading",
    async (timeoutMs) => {
      const readStack = scripted(["CREATE_IN_PROGRESS"]);

      await expect(
        pollStackOperation(readStack, "CREATE", { timeoutMs, sleep: async () => {} }),
      ).rejects.toThrow(new RangeError(`timeoutMs must be a positive number of milliseconds, got ${timeoutMs}`));
      expect(readStack).not.toHaveBeenCalled();
    },
  );

  it("rejects a non-positive intervalMs", async () => {
    await expect(
      pollStackOperation(scripted(["CREATE_COMPLETE"]), "CREATE", { intervalMs: 0 }),
    ).rejects.toBeInstanceOf(RangeError);
  });

  it("emits a stack.poll event for every read", async () => {
    enableOpenStackDiagnostics();
    const events: OpenStackDiagnosticEvent[] = [];
    onOpenStackDiagnosticEvent((event) => events.push(event));

    await pollStackOperation(scripted(["CREATE_IN_PROGRESS", "CREATE_COMPLETE"]), "CREATE", {
      sleep: async () => {},
    });

    const polls = events.filter((event) => event.type === "openstack.stack.poll");
    expect(polls).toHaveLength(2);
    expect(polls[0]).toMatchObject({
      type: "openstack.stack.poll",
      service: "orchestration",
      operation: "CREATE",
      stackName: "web",
      stackId: "stk-1",
      stackStatus: "CREATE_IN_PROGRESS",
      attempt: 1,
    });
    expect(polls[1]).toMatchObject({ stackStatus: "CREATE_COMPLETE", attempt: 2 });
  });
});

describe("abortableSleep", () => {
  it("rejects when aborted mid-sleep", async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      const promise = abortableSleep(5_000, controller.signal);
      controller.abort(new Error("stop"));
      await expect(promise).rejects.toThrow("stop");
    } finally {
      vi.useRealTimers();
    }
  });

  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    try {
      const promise = abortableSleep(1_000);
      await vi.advanceTimersByTimeAsync(1_000);
      await expect(promise).resolves.toBeUndefined();
    } finally {
      vi.useRealTimers();
    }
  });
});
