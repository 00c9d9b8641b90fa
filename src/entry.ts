#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { ConfigError, loadConfig } from "./config/io.js";
import { createSubsystemLogger, setLoggerSettings } from "./logging/subsystem.js";
import { BUNDLED_PLUGINS } from "./plugins/bundled.js";
import { loadPlugins, startPluginServices, stopPluginServices } from "./plugins/registry.js";

async function main(argv: string[]): Promise<void> {
  const config = loadConfig();
  if (config.logging) setLoggerSettings(config.logging);

  const logger = createSubsystemLogger("cli");
  const registry = loadPlugins({ plugins: [...BUNDLED_PLUGINS], config, logger: createSubsystemLogger("plugins") });

  const program = buildProgram({ registry, logger });

  await startPluginServices(registry);
  try {
    await program.parseAsync(argv);
  } finally {
    await stopPluginServices(registry);
  }
}

main(process.argv).catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`${err.message}${err.issues.length > 0 ? `\n  ${err.issues.join("\n  ")}` : ""}`);
  } else {
    console.error(err instanceof Error ? err.message : String(err));
  }
  process.exitCode = 1;
});
