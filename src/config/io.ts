import fs from "node:fs";
import os from "node:os";

import { Value } from "@sinclair/typebox/value";

import { resolveConfigPath, resolveStateDir } from "./paths.js";
import { ConvergentConfigSchema, type ConvergentConfig } from "./schema.js";

export class ConfigError extends Error {
  constructor(
    message: string,
    public configPath: string,
    public issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ConfigIODeps = {
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  configPath?: string;
};

export type ConfigIO = {
  configPath: string;
  loadConfig: () => ConvergentConfig;
};

/** Render TypeBox validation errors as `path: message` lines. */
export function describeSchemaErrors(errors: Iterable<{ path: string; message: string }>): string[] {
  const issues: string[] = [];
  for (const error of errors) {
    issues.push(`${error.path || "/"}: ${error.message}`);
  }
  return issues;
}

export function createConfigIO(deps: ConfigIODeps = {}): ConfigIO {
  const env = deps.env ?? process.env;
  const homedir = deps.homedir ?? os.homedir;
  const configPath =
    deps.configPath ?? resolveConfigPath(env, resolveStateDir(env, homedir), homedir);

  function loadConfig(): ConvergentConfig {
    if (!fs.existsSync(configPath)) return {};

    const raw = fs.readFileSync(configPath, "utf-8");
    let parsed: unknown;
    try {
      parsed = raw.trim() ? JSON.parse(raw) : {};
    } catch (err) {
      throw new ConfigError(
        `Invalid JSON in ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
        configPath,
      );
    }

    if (!Value.Check(ConvergentConfigSchema, parsed)) {
      const issues = describeSchemaErrors(Value.Errors(ConvergentConfigSchema, parsed));
      throw new ConfigError(`Invalid config at ${configPath}`, configPath, issues);
    }
    return parsed;
  }

  return { configPath, loadConfig };
}

export function loadConfig(deps?: ConfigIODeps): ConvergentConfig {
  return createConfigIO(deps).loadConfig();
}
