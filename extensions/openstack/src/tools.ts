/**
 * Agent tools: openstack_keystone_service, openstack_keystone_endpoint,
 * openstack_heat_stack.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { stringEnum, type AgentTool, type AgentToolResult, type PluginLogger } from "../../../src/plugin-sdk/index.js";
import type { OpenStackPluginConfig } from "./types.js";
import { OPENSTACK_INTERFACES } from "./config.js";
import {
  runHeatStackModule,
  runKeystoneEndpointModule,
  runKeystoneServiceModule,
  type ModuleContext,
  type ModuleResult,
} from "./modules.js";

// =============================================================================
// Parameter Schemas
// =============================================================================

const commonParams = {
  auth: Type.Optional(
    Type.Object(
      {
        auth_url: Type.Optional(Type.String({ description: "Keystone URL (falls back to OS_AUTH_URL)" })),
        username: Type.Optional(Type.String({ description: "Falls back to OS_USERNAME" })),
        password: Type.Optional(Type.String({ description: "Falls back to OS_PASSWORD" })),
        project_name: Type.Optional(Type.String({ description: "Tenant; falls back to OS_TENANT_NAME" })),
      },
      { description: "Credentials; unset fields come from the OS_* environment" },
    ),
  ),
  region_name: Type.Optional(Type.String({ description: "Service catalog region" })),
  interface: Type.Optional(stringEnum(OPENSTACK_INTERFACES, { description: "Service catalog interface" })),
  check_mode: Type.Optional(Type.Boolean({ description: "Report what would change without changing it" })),
};

const presence = stringEnum(["present", "absent"] as const, { description: "Desired state", default: "present" });

export const KeystoneServiceParams = Type.Object({
  ...commonParams,
  name: Type.String({ description: "Service name, e.g. glance" }),
  service_type: Type.String({ description: "Service type, e.g. image" }),
  description: Type.Optional(Type.String({ description: 'Defaults to "Not provided"' })),
  state: Type.Optional(presence),
});

export const KeystoneEndpointParams = Type.Object({
  ...commonParams,
  service_name: Type.String({ description: "Name of the service the endpoint belongs to" }),
  region: Type.Optional(Type.String({ description: "Endpoint region" })),
  public_url: Type.String({ description: "Public URL" }),
  internal_url: Type.Optional(Type.String({ description: "Internal URL" })),
  admin_url: Type.Optional(Type.String({ description: "Admin URL" })),
  state: Type.Optional(presence),
});

export const HeatStackParams = Type.Object({
  ...commonParams,
  stack_name: Type.String({ description: "Stack name" }),
  template: Type.Optional(Type.String({ description: "Path to the template file (required for create)" })),
  template_parameters: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  environment: Type.Optional(Type.String({ description: "Path to an environment file" })),
  tags: Type.Optional(
    Type.Union([Type.Array(Type.String()), Type.Record(Type.String(), Type.String())], {
      description: 'List of tags, or a map rendered as "key=value"',
    }),
  ),
  action: Type.Optional(
    stringEnum(["create", "delete"] as const, { description: "Stack action", default: "create" }),
  ),
  disable_rollback: Type.Optional(Type.Boolean()),
  wait: Type.Optional(Type.Boolean({ description: "Wait for the operation to finish", default: true })),
  timeout: Type.Optional(Type.Number({ minimum: 1, description: "Timeout in seconds" })),
});

// =============================================================================
// Tool Construction
// =============================================================================

export type OpenStackToolsContext = {
  config: OpenStackPluginConfig;
  logger?: PluginLogger;
  /** Test seam for the module context (auth provider, env, poll overrides). */
  moduleContext?: Omit<ModuleContext, "config" | "logger" | "signal">;
};

function toolResult(result: ModuleResult): AgentToolResult<ModuleResult> {
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
    details: result,
  };
}

/**
 * Build a tool whose parameters are checked against its schema before the
 * module runs. The host validates too; this narrows the type.
 */
function moduleTool<S extends TSchema>(
  definition: { name: string; label: string; description: string; parameters: S },
  run: (params: Static<S>, ctx: ModuleContext) => Promise<ModuleResult>,
  tools: OpenStackToolsContext,
): AgentTool<S, ModuleResult> {
  return {
    ...definition,
    async execute(_toolCallId, params, signal) {
      if (!Value.Check(definition.parameters, params)) {
        const first = Value.Errors(definition.parameters, params).First();
        const where = first?.path || "/";
        return toolResult({
          changed: false,
          failed: true,
          msg: `invalid parameters: ${where}: ${first?.message ?? "does not match schema"}`,
        });
      }
      const result = await run(params, {
        ...tools.moduleContext,
        config: tools.config,
        logger: tools.logger,
        signal,
      });
      return toolResult(result);
    },
  };
}

export function createOpenStackTools(ctx: OpenStackToolsContext) {
  return [
    moduleTool(
      {
        name: "openstack_keystone_service",
        label: "Keystone Service",
        description:
          "Ensure a Keystone service entry is present or absent. Matches by name; creates or deletes only when needed.",
        parameters: KeystoneServiceParams,
      },
      runKeystoneServiceModule,
      ctx,
    ),
    moduleTool(
      {
        name: "openstack_keystone_endpoint",
        label: "Keystone Endpoint",
        description:
          "Ensure a Keystone endpoint for a named service is present or absent. Matches on service, region and all three URLs.",
        parameters: KeystoneEndpointParams,
      },
      runKeystoneEndpointModule,
      ctx,
    ),
    moduleTool(
      {
        name: "openstack_heat_stack",
        label: "Heat Stack",
        description:
          "Create or delete a Heat orchestration stack from a template file and wait for the operation to finish.",
        parameters: HeatStackParams,
      },
      runHeatStackModule,
      ctx,
    ),
  ];
}
