/**
 * Plugin registry. Loads plugin definitions, hands each its API object, and
 * keeps track of the tools, CLI registrars, gateway methods and services they
 * register.
 */

import { Value } from "@sinclair/typebox/value";

import { describeSchemaErrors } from "../config/io.js";
import type { ConvergentConfig, PluginEntryConfig } from "../config/schema.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type {
  AgentToolResult,
  AnyAgentTool,
  ConvergentPluginApi,
  ConvergentPluginCliRegistrar,
  ConvergentPluginDefinition,
  ConvergentPluginService,
  GatewayRequestHandler,
  PluginLogger,
} from "../plugin-sdk/index.js";

// =============================================================================
// Types
// =============================================================================

export type PluginStatus = "loaded" | "disabled" | "error";

export type PluginRecord = {
  id: string;
  name: string;
  description?: string;
  version?: string;
  status: PluginStatus;
  error?: string;
  toolNames: string[];
  cliCommands: string[];
  gatewayMethods: string[];
  services: string[];
};

export type PluginCliRegistration = {
  pluginId: string;
  register: ConvergentPluginCliRegistrar;
  commands: string[];
};

export type PluginRegistry = {
  plugins: PluginRecord[];
  tools: Map<string, { pluginId: string; tool: AnyAgentTool }>;
  cliRegistrars: PluginCliRegistration[];
  gatewayHandlers: Map<string, { pluginId: string; handler: GatewayRequestHandler }>;
  services: Array<{ pluginId: string; service: ConvergentPluginService }>;
};

export type LoadPluginsOptions = {
  plugins: ConvergentPluginDefinition[];
  config?: ConvergentConfig;
  /** Host logger; each plugin gets a prefixed view of it. */
  logger?: PluginLogger;
};

export type GatewayResponse = { ok: boolean; payload?: unknown };

// =============================================================================
// Loading
// =============================================================================

function prefixedLogger(base: PluginLogger, pluginId: string): PluginLogger {
  const prefix = `[${pluginId}]`;
  return {
    debug: (message) => base.debug?.(`${prefix} ${message}`),
    info: (message) => base.info(`${prefix} ${message}`),
    warn: (message) => base.warn(`${prefix} ${message}`),
    error: (message) => base.error(`${prefix} ${message}`),
  };
}

function resolvePluginConfig(
  plugin: ConvergentPluginDefinition,
  entry: PluginEntryConfig | undefined,
): { ok: true; value: Record<string, unknown> } | { ok: false; error: string } {
  const raw = entry?.config ?? {};
  if (!plugin.configSchema) return { ok: true, value: raw };

  const value = Value.Default(plugin.configSchema, structuredClone(raw));
  if (!Value.Check(plugin.configSchema, value)) {
    const issues = describeSchemaErrors(Value.Errors(plugin.configSchema, value));
    return { ok: false, error: `invalid config: ${issues.join("; ")}` };
  }
  if (!isRecord(value)) return { ok: false, error: "config must be an object" };
  return { ok: true, value };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createEmptyRegistry(): PluginRegistry {
  return {
    plugins: [],
    tools: new Map(),
    cliRegistrars: [],
    gatewayHandlers: new Map(),
    services: [],
  };
}

export function loadPlugins(options: LoadPluginsOptions): PluginRegistry {
  const registry = createEmptyRegistry();
  const hostLogger = options.logger ?? createSubsystemLogger("plugins");
  const pluginsConfig = options.config?.plugins;

  for (const plugin of options.plugins) {
    const record: PluginRecord = {
      id: plugin.id,
      name: plugin.name,
      description: plugin.description,
      version: plugin.version,
      status: "loaded",
      toolNames: [],
      cliCommands: [],
      gatewayMethods: [],
      services: [],
    };
    registry.plugins.push(record);

    const entry = pluginsConfig?.entries?.[plugin.id];
    if (pluginsConfig?.enabled === false || entry?.enabled === false) {
      record.status = "disabled";
      continue;
    }

    const resolved = resolvePluginConfig(plugin, entry);
    if (!resolved.ok) {
      record.status = "error";
      record.error = resolved.error;
      hostLogger.error(`plugin ${plugin.id}: ${resolved.error}`);
      continue;
    }

    const api: ConvergentPluginApi = {
      id: plugin.id,
      name: plugin.name,
      pluginConfig: resolved.value,
      logger: prefixedLogger(hostLogger, plugin.id),
      registerTool: (tool) => {
        if (registry.tools.has(tool.name)) {
          throw new Error(`tool already registered: ${tool.name}`);
        }
        registry.tools.set(tool.name, { pluginId: plugin.id, tool });
        record.toolNames.push(tool.name);
      },
      registerCli: (register, opts) => {
        const commands = opts?.commands ?? [];
        registry.cliRegistrars.push({ pluginId: plugin.id, register, commands });
        record.cliCommands.push(...commands);
      },
      registerGatewayMethod: (method, handler) => {
        if (registry.gatewayHandlers.has(method)) {
          throw new Error(`gateway method already registered: ${method}`);
        }
        registry.gatewayHandlers.set(method, { pluginId: plugin.id, handler });
        record.gatewayMethods.push(method);
      },
      registerService: (service) => {
        registry.services.push({ pluginId: plugin.id, service });
        record.services.push(service.id);
      },
    };

    try {
      plugin.register(api);
    } catch (err) {
      record.status = "error";
      record.error = err instanceof Error ? err.message : String(err);
      hostLogger.error(`plugin ${plugin.id} failed to register: ${record.error}`);
    }
  }

  return registry;
}

// =============================================================================
// Invocation
// =============================================================================

export class ToolInvocationError extends Error {
  constructor(
    message: string,
    public toolName: string,
    public issues: string[] = [],
  ) {
    super(message);
    this.name = "ToolInvocationError";
  }
}

/**
 * Run a registered tool after validating its parameters against the tool's
 * schema (defaults applied first).
 */
export async function invokeTool(
  registry: PluginRegistry,
  name: string,
  params: unknown,
  opts?: { toolCallId?: string; signal?: AbortSignal },
): Promise<AgentToolResult> {
  const entry = registry.tools.get(name);
  if (!entry) throw new ToolInvocationError(`unknown tool: ${name}`, name);

  const schema = entry.tool.parameters;
  const withDefaults = Value.Default(schema, structuredClone(params ?? {}));
  if (!Value.Check(schema, withDefaults)) {
    const issues = describeSchemaErrors(Value.Errors(schema, withDefaults));
    throw new ToolInvocationError(`invalid parameters for ${name}: ${issues.join("; ")}`, name, issues);
  }

  return entry.tool.execute(opts?.toolCallId ?? `cli-${Date.now()}`, withDefaults, opts?.signal);
}

/** Dispatch a gateway method and collect the handler's response. */
export async function callGatewayMethod(
  registry: PluginRegistry,
  method: string,
  params: Record<string, unknown>,
): Promise<GatewayResponse> {
  const entry = registry.gatewayHandlers.get(method);
  if (!entry) return { ok: false, payload: { error: `unknown method: ${method}` } };

  let response: GatewayResponse | undefined;
  await entry.handler({
    params,
    respond: (ok, payload) => {
      response ??= { ok, payload };
    },
  });
  return response ?? { ok: false, payload: { error: `${method} did not respond` } };
}

export async function startPluginServices(registry: PluginRegistry): Promise<void> {
  for (const { service } of registry.services) {
    await service.start();
  }
}

export async function stopPluginServices(registry: PluginRegistry): Promise<void> {
  for (const { service } of [...registry.services].reverse()) {
    await service.stop?.();
  }
}
