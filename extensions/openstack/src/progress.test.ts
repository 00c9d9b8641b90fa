import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createStackProgress } from "./progress.js";
import type { HeatStack } from "./types.js";

const stack = (status: string): HeatStack => ({ id: "stk-1", name: "web", status, outputs: {} });

beforeEach(() => {
  vi.spyOn(process.stderr, "write").mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createStackProgress", () => {
  it("renders each poll with elapsed seconds", () => {
    let clock = 0;
    const progress = createStackProgress("create web", { now: () => clock });

    clock = 5_000;
    progress.update(stack("CREATE_IN_PROGRESS"), 1);

    expect(process.stderr.write).toHaveBeenCalledWith("\r  create web: CREATE_IN_PROGRESS [poll 1] (5s)");
  });

  it("finishes the line with the final status", () => {
    const progress = createStackProgress("create web", { now: () => 0 });
    progress.update(stack("CREATE_IN_PROGRESS"), 1);
    progress.done("CREATE_COMPLETE");
    progress.done("ignored");

    expect(process.stderr.write).toHaveBeenLastCalledWith("\r  create web: CREATE_COMPLETE\n");
    expect(process.stderr.write).toHaveBeenCalledTimes(2);
  });

  it("writes nothing when the operation settled on the first poll", () => {
    const progress = createStackProgress("create web");
    progress.done("CREATE_COMPLETE");

    expect(process.stderr.write).not.toHaveBeenCalled();
  });

  it("stays quiet in silent mode", () => {
    const progress = createStackProgress("create web", { silent: true });
    progress.update(stack("CREATE_IN_PROGRESS"), 1);
    progress.done();

    expect(process.stderr.write).not.toHaveBeenCalled();
  });
});
