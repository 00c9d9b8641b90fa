/**
 * Plugin Entry Point
 *
 * Registers the Keystone service/endpoint and Heat stack modules as agent
 * tools, CLI commands and gateway methods.
 */

import { Value } from "@sinclair/typebox/value";
import type { TSchema, Static } from "@sinclair/typebox";
import type { ConvergentPluginApi, ConvergentPluginDefinition, GatewayRequestHandler } from "../../src/plugin-sdk/index.js";
import { openstackConfigSchema, resolveOpenStackConfig } from "./src/config.js";
import {
  enableOpenStackDiagnostics,
  disableOpenStackDiagnostics,
  onOpenStackDiagnosticEvent,
  type OpenStackDiagnosticEvent,
} from "./src/diagnostics.js";
import { formatErrorMessage } from "./src/retry.js";
import {
  runHeatStackModule,
  runKeystoneEndpointModule,
  runKeystoneServiceModule,
  type ModuleContext,
  type ModuleResult,
} from "./src/modules.js";
import { createOpenStackTools, HeatStackParams, KeystoneEndpointParams, KeystoneServiceParams } from "./src/tools.js";
import { createOpenStackCli } from "./src/cli.js";

function describeEvent(event: OpenStackDiagnosticEvent): string {
  const head = `${event.type} ${event.service}.${event.operation}`;
  switch (event.type) {
    case "openstack.api.call":
      return `${head} ${event.durationMs}ms`;
    case "openstack.api.error": {
      const parts = [head];
      if (event.durationMs !== undefined) parts.push(`${event.durationMs}ms`);
      if (event.statusCode !== undefined) parts.push(`HTTP ${event.statusCode}`);
      parts.push(event.error);
      return parts.join(" ");
    }
    case "openstack.auth.token":
      return event.tenantId ? `${head} tenant ${event.tenantId}` : head;
    case "openstack.resource.change":
      return `${head} ${event.target} (${event.resourceId})`;
    case "openstack.stack.poll":
      return `${head} ${event.stackName} ${event.stackStatus} [poll ${event.attempt}]`;
  }
}

/** Gateway handler that validates params against a tool schema, then runs a module. */
function gatewayModule<S extends TSchema>(
  schema: S,
  run: (params: Static<S>, ctx: ModuleContext) => Promise<ModuleResult>,
  ctx: () => ModuleContext,
): GatewayRequestHandler {
  return async ({ params, respond }) => {
    const withDefaults = Value.Default(schema, structuredClone(params));
    if (!Value.Check(schema, withDefaults)) {
      const first = Value.Errors(schema, withDefaults).First();
      respond(false, { error: `invalid params: ${first?.path || "/"}: ${first?.message ?? "does not match schema"}` });
      return;
    }
    try {
      const result = await run(withDefaults, ctx());
      respond(!result.failed, result);
    } catch (err) {
      respond(false, { error: formatErrorMessage(err) });
    }
  };
}

const plugin: ConvergentPluginDefinition = {
  id: "openstack",
  name: "OpenStack Identity & Orchestration",
  description: "Declarative Keystone service/endpoint and Heat stack management",
  configSchema: openstackConfigSchema,

  register(api: ConvergentPluginApi) {
    const config = resolveOpenStackConfig(api.pluginConfig);
    const moduleContext = (): ModuleContext => ({ config, logger: api.logger });

    for (const tool of createOpenStackTools({ config, logger: api.logger })) {
      api.registerTool(tool);
    }

    api.registerCli((ctx) => createOpenStackCli({ config })(ctx), { commands: ["openstack"] });

    api.registerGatewayMethod(
      "openstack/service",
      gatewayModule(KeystoneServiceParams, runKeystoneServiceModule, moduleContext),
    );
    api.registerGatewayMethod(
      "openstack/endpoint",
      gatewayModule(KeystoneEndpointParams, runKeystoneEndpointModule, moduleContext),
    );
    api.registerGatewayMethod("openstack/stack", gatewayModule(HeatStackParams, runHeatStackModule, moduleContext));

    let unsubscribe: (() => void) | null = null;

    api.registerService({
      id: "openstack",
      start: () => {
        if (config.diagnostics?.enabled) {
          enableOpenStackDiagnostics();
          const verbose = config.diagnostics.verbose ?? false;
          unsubscribe = onOpenStackDiagnosticEvent((event) => {
            if (event.type === "openstack.api.error") {
              api.logger.warn(describeEvent(event));
            } else if (verbose) {
              api.logger.info(describeEvent(event));
            } else {
              api.logger.debug?.(describeEvent(event));
            }
          });
        }
        api.logger.info("OpenStack plugin started");
      },
      stop: () => {
        unsubscribe?.();
        unsubscribe = null;
        disableOpenStackDiagnostics();
      },
    });
  },
};

export default plugin;
