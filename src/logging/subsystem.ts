import { Logger, type ILogObj } from "tslog";

import type { PluginLogger } from "../plugin-sdk/index.js";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug", "trace"];

export type LoggerSettings = {
  level?: LogLevel;
  json?: boolean;
};

export type SubsystemLogger = Required<PluginLogger> & {
  subsystem: string;
  child: (name: string) => SubsystemLogger;
};

// tslog numeric levels: 1 trace, 2 debug, 3 info, 4 warn, 5 error
const MIN_LEVEL: Record<Exclude<LogLevel, "silent">, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

let settings: Required<LoggerSettings> = {
  level: parseLogLevel(process.env.CONVERGENT_LOG_LEVEL) ?? "info",
  json: process.env.CONVERGENT_LOG_JSON === "1",
};
let root: Logger<ILogObj> | null = null;

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

function getRootLogger(): Logger<ILogObj> {
  if (!root) {
    const level = settings.level;
    root = new Logger<ILogObj>({
      name: "convergent",
      type: level === "silent" ? "hidden" : settings.json ? "json" : "pretty",
      minLevel: level === "silent" ? MIN_LEVEL.error : MIN_LEVEL[level],
    });
  }
  return root;
}

/** Apply logging settings; existing loggers pick them up on their next call. */
export function setLoggerSettings(next: LoggerSettings): void {
  settings = { ...settings, ...next };
  root = null;
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let cached: { root: Logger<ILogObj>; logger: Logger<ILogObj> } | null = null;
  // Re-derived after setLoggerSettings swaps the root.
  const current = (): Logger<ILogObj> => {
    const base = getRootLogger();
    if (!cached || cached.root !== base) cached = { root: base, logger: base.getSubLogger({ name: subsystem }) };
    return cached.logger;
  };
  return {
    subsystem,
    debug: (message) => {
      current().debug(message);
    },
    info: (message) => {
      current().info(message);
    },
    warn: (message) => {
      current().warn(message);
    },
    error: (message) => {
      current().error(message);
    },
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
