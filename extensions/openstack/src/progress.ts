/**
 * Progress Reporting
 *
 * Single-line status display for stack operations waited on from the CLI.
 */

import type { HeatStack } from "./types.js";

export type StackProgress = {
  /** Feed a non-terminal poll result. */
  update: (stack: HeatStack, attempt: number) => void;
  done: (finalStatus?: string) => void;
};

export type StackProgressOptions = {
  stderr?: boolean;
  silent?: boolean;
  now?: () => number;
};

export function createStackProgress(label: string, options?: StackProgressOptions): StackProgress {
  const silent = options?.silent ?? false;
  const stream = options?.stderr !== false ? process.stderr : process.stdout;
  const now = options?.now ?? Date.now;
  const started = now();
  let lastStatus = "";
  let isDone = false;

  function render(status: string) {
    if (silent || isDone) return;
    const elapsed = Math.round((now() - started) / 1000);
    stream.write(`\r  ${label}: ${status} (${elapsed}s)`);
  }

  return {
    update(stack, attempt) {
      lastStatus = stack.status;
      render(`${stack.status} [poll ${attempt}]`);
    },
    done(finalStatus) {
      if (isDone) return;
      isDone = true;
      if (silent) return;
      // Nothing was drawn when the first poll was already terminal
      if (!lastStatus) return;
      stream.write(`\r  ${label}: ${finalStatus ?? lastStatus}\n`);
    },
  };
}
