/**
 * Plugin SDK: the contract between the convergent host and its extensions.
 *
 * Extensions import only from here; the host implements it in
 * `src/plugins/registry.ts`.
 */

import { Kind, Type, TypeRegistry, type TSchema, type TUnsafe } from "@sinclair/typebox";
import type { Command } from "commander";

// =============================================================================
// Logging
// =============================================================================

export type PluginLogger = {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

// =============================================================================
// Tools
// =============================================================================

export type AgentToolContent = { type: "text"; text: string };

export type AgentToolResult<TDetails = unknown> = {
  content: AgentToolContent[];
  details?: TDetails;
};

export type AgentTool<TParams extends TSchema = TSchema, TDetails = unknown> = {
  name: string;
  label?: string;
  description: string;
  parameters: TParams;
  execute: (
    toolCallId: string,
    params: unknown,
    signal?: AbortSignal,
  ) => Promise<AgentToolResult<TDetails>>;
};

export type AnyAgentTool = AgentTool<TSchema, unknown>;

// =============================================================================
// CLI / Gateway / Services
// =============================================================================

export { theme } from "../terminal/theme.js";

export type ConvergentPluginCliContext = {
  program: Command;
  logger: PluginLogger;
};

export type ConvergentPluginCliRegistrar = (ctx: ConvergentPluginCliContext) => void;

export type GatewayRespond = (ok: boolean, payload?: unknown) => void;

export type GatewayRequestHandler = (opts: {
  params: Record<string, unknown>;
  respond: GatewayRespond;
}) => Promise<void> | void;

export type ConvergentPluginService = {
  id: string;
  start: () => Promise<void> | void;
  stop?: () => Promise<void> | void;
};

// =============================================================================
// Plugin API
// =============================================================================

export type ConvergentPluginApi = {
  id: string;
  name: string;
  /** Plugin-specific config, validated against the plugin's `configSchema`. */
  pluginConfig?: Record<string, unknown>;
  logger: PluginLogger;
  registerTool: (tool: AnyAgentTool) => void;
  registerCli: (registrar: ConvergentPluginCliRegistrar, opts?: { commands?: string[] }) => void;
  registerGatewayMethod: (method: string, handler: GatewayRequestHandler) => void;
  registerService: (service: ConvergentPluginService) => void;
};

export type ConvergentPluginDefinition = {
  id: string;
  name: string;
  description?: string;
  version?: string;
  configSchema?: TSchema;
  register: (api: ConvergentPluginApi) => void;
};

// =============================================================================
// Schema helpers
// =============================================================================

TypeRegistry.Set<{ enum: string[] }>(
  "StringEnum",
  (schema, value) => typeof value === "string" && schema.enum.includes(value),
);

/**
 * String enum schema that serialises as `{ type: "string", enum: [...] }`
 * instead of TypeBox's `anyOf` of literals. Registered with the TypeBox type
 * registry so `Value.Check` understands it.
 */
export function stringEnum<const T extends readonly string[]>(
  values: T,
  options: { description?: string; default?: T[number] } = {},
): TUnsafe<T[number]> {
  return Type.Unsafe<T[number]>({ [Kind]: "StringEnum", type: "string", enum: [...values], ...options });
}
