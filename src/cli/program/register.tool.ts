import fs from "node:fs";

import type { Command } from "commander";

import { invokeTool, ToolInvocationError, type PluginRegistry } from "../../plugins/registry.js";
import type { RuntimeEnv } from "../../runtime.js";
import { theme } from "../../terminal/theme.js";

type ToolRunOptions = { params?: string; paramsFile?: string; json?: boolean };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readToolParams(opts: ToolRunOptions): Record<string, unknown> {
  if (opts.params !== undefined && opts.paramsFile !== undefined) {
    throw new Error("use either --params or --params-file, not both");
  }
  const source = opts.paramsFile ?? "--params";
  const raw = opts.paramsFile !== undefined ? fs.readFileSync(opts.paramsFile, "utf-8") : (opts.params ?? "{}");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`invalid JSON in ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(parsed)) throw new Error(`${source} must be a JSON object`);
  return parsed;
}

function reportedFailure(details: unknown): boolean {
  return isRecord(details) && details.failed === true;
}

export function registerToolCommand(program: Command, registry: PluginRegistry, runtime: RuntimeEnv) {
  const tool = program.command("tool").description("Run plugin tools directly");

  tool
    .command("list")
    .description("List registered tools")
    .action(() => {
      const lines = [...registry.tools.values()].map(
        ({ pluginId, tool: t }) => `${theme.heading(t.name)} ${theme.muted(`[${pluginId}]`)}  ${t.description}`,
      );
      runtime.log(lines.join("\n"));
    });

  tool
    .command("run")
    .description("Validate parameters and run a tool once")
    .argument("<name>", "tool name")
    .option("--params <json>", "parameters as a JSON object")
    .option("--params-file <path>", "read parameters from a JSON file")
    .option("--json", "print the structured result instead of the text content")
    .action(async (name: string, opts: ToolRunOptions) => {
      try {
        const result = await invokeTool(registry, name, readToolParams(opts));
        if (opts.json) {
          runtime.log(JSON.stringify(result.details ?? null, null, 2));
        } else {
          runtime.log(result.content.map((c) => c.text).join("\n"));
        }
        if (reportedFailure(result.details)) runtime.setExitCode(1);
      } catch (err) {
        runtime.error(theme.error(`Error: ${err instanceof Error ? err.message : String(err)}`));
        if (err instanceof ToolInvocationError) {
          for (const issue of err.issues) runtime.error(`  ${issue}`);
        }
        runtime.setExitCode(1);
      }
    });
}
