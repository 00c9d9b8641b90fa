import { Command } from "commander";

import { parseLogLevel, setLoggerSettings, type SubsystemLogger } from "../logging/subsystem.js";
import type { PluginRegistry } from "../plugins/registry.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { VERSION } from "../version.js";
import { registerPluginsCommand } from "./program/register.plugins.js";
import { registerToolCommand } from "./program/register.tool.js";

export type BuildProgramOptions = {
  registry: PluginRegistry;
  logger: SubsystemLogger;
  runtime?: RuntimeEnv;
};

export function buildProgram(options: BuildProgramOptions): Command {
  const runtime = options.runtime ?? defaultRuntime;
  const program = new Command();

  program
    .name("convergent")
    .description("Declarative OpenStack resource reconciliation")
    .version(VERSION)
    .option("--log-level <level>", "silent | error | warn | info | debug | trace")
    .option("--log-json", "emit JSON log lines")
    .hook("preAction", (thisCommand) => {
      const opts = thisCommand.opts<{ logLevel?: string; logJson?: boolean }>();
      if (opts.logLevel !== undefined) {
        const level = parseLogLevel(opts.logLevel);
        if (!level) throw new Error(`invalid --log-level "${opts.logLevel}"`);
        setLoggerSettings({ level });
      }
      if (opts.logJson) setLoggerSettings({ json: true });
    });

  registerPluginsCommand(program, options.registry, runtime);
  registerToolCommand(program, options.registry, runtime);

  for (const registration of options.registry.cliRegistrars) {
    registration.register({ program, logger: options.logger.child(registration.pluginId) });
  }

  return program;
}
