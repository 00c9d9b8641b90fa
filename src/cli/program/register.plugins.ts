import type { Command } from "commander";

import type { PluginRecord, PluginRegistry } from "../../plugins/registry.js";
import type { RuntimeEnv } from "../../runtime.js";
import { theme } from "../../terminal/theme.js";

export function formatPluginRecord(record: PluginRecord): string {
  const status =
    record.status === "loaded"
      ? theme.success(record.status)
      : record.status === "error"
        ? theme.error(record.status)
        : theme.muted(record.status);
  const lines = [`${theme.heading(record.id)} ${status}  ${record.name}`];
  if (record.error) lines.push(`  ${theme.error(record.error)}`);
  if (record.toolNames.length > 0) lines.push(`  tools: ${record.toolNames.join(", ")}`);
  if (record.cliCommands.length > 0) lines.push(`  commands: ${record.cliCommands.join(", ")}`);
  if (record.gatewayMethods.length > 0) lines.push(`  methods: ${record.gatewayMethods.join(", ")}`);
  return lines.join("\n");
}

export function registerPluginsCommand(program: Command, registry: PluginRegistry, runtime: RuntimeEnv) {
  const plugins = program.command("plugins").description("Inspect bundled plugins");

  plugins
    .command("list")
    .description("List plugins and what they registered")
    .option("--json", "Output JSON instead of human-friendly text")
    .action((opts: { json?: boolean }) => {
      if (opts.json) {
        runtime.log(JSON.stringify(registry.plugins, null, 2));
        return;
      }
      runtime.log(registry.plugins.map(formatPluginRecord).join("\n\n"));
    });
}
