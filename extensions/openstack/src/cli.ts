/**
 * CLI commands: convergent openstack service/endpoint/stack.
 */

import { InvalidArgumentError, type Command } from "commander";
import { theme, type ConvergentPluginCliContext } from "../../../src/plugin-sdk/index.js";
import type { OpenStackInterface, OpenStackPluginConfig, PresenceState, StackAction } from "./types.js";
import {
  runHeatStackModule,
  runKeystoneEndpointModule,
  runKeystoneServiceModule,
  type CommonModuleParams,
  type ModuleContext,
  type ModuleResult,
} from "./modules.js";
import { createStackProgress } from "./progress.js";
import { formatErrorMessage } from "./retry.js";

type CommonOptions = {
  authUrl?: string;
  username?: string;
  password?: string;
  projectName?: string;
  regionName?: string;
  interface?: string;
  check?: boolean;
  json?: boolean;
};

export type OpenStackCliDeps = {
  config: OpenStackPluginConfig;
  /** Test seam for the module context. */
  moduleContext?: Omit<ModuleContext, "config" | "logger">;
};

// =============================================================================
// Option Parsing
// =============================================================================

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--auth-url <url>", "Keystone URL (default: $OS_AUTH_URL)")
    .option("--username <name>", "user name (default: $OS_USERNAME)")
    .option("--password <password>", "password (default: $OS_PASSWORD)")
    .option("--project-name <name>", "tenant (default: $OS_TENANT_NAME)")
    .option("--region-name <region>", "service catalog region (default: $OS_REGION_NAME)")
    .option("--interface <interface>", "catalog interface: public | internal | admin")
    .option("--check", "report what would change without changing it")
    .option("--json", "print the result as JSON");
}

function parseInterface(value: string | undefined): OpenStackInterface | undefined {
  if (value === undefined) return undefined;
  if (value === "public" || value === "internal" || value === "admin") return value;
  throw new Error(`invalid --interface "${value}" (expected public, internal or admin)`);
}

function parseState(value: string): PresenceState {
  if (value === "present" || value === "absent") return value;
  throw new Error(`invalid --state "${value}" (expected present or absent)`);
}

function parseAction(value: string): StackAction {
  if (value === "create" || value === "delete") return value;
  throw new Error(`invalid --action "${value}" (expected create or delete)`);
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("expected a positive whole number of seconds");
  }
  return parsed;
}

/** `--param key=value`, repeatable. */
function collectPair(value: string, previous: Record<string, string>): Record<string, string> {
  const eq = value.indexOf("=");
  if (eq <= 0) throw new Error(`expected key=value, got "${value}"`);
  return { ...previous, [value.slice(0, eq)]: value.slice(eq + 1) };
}

function commonParams(opts: CommonOptions): CommonModuleParams {
  return {
    auth: {
      auth_url: opts.authUrl,
      username: opts.username,
      password: opts.password,
      project_name: opts.projectName,
    },
    region_name: opts.regionName,
    interface: parseInterface(opts.interface),
    check_mode: opts.check ?? false,
  };
}

// =============================================================================
// Output
// =============================================================================

export function formatModuleResult(result: ModuleResult): string {
  const lines: string[] = [];
  const state = result.failed
    ? theme.error("failed")
    : result.changed
      ? theme.success("changed")
      : theme.muted("unchanged");
  lines.push(`${state}${result.id ? ` ${theme.muted(`(${result.id})`)}` : ""}`);
  if (result.msg) lines.push(`  ${result.msg}`);
  if (result.stackStatus) lines.push(`  status: ${result.stackStatus}`);
  if (result.outputs && Object.keys(result.outputs).length > 0) {
    lines.push("  outputs:");
    for (const [key, value] of Object.entries(result.outputs)) {
      lines.push(`    ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`);
    }
  }
  return lines.join("\n");
}

function report(result: ModuleResult, json: boolean | undefined): void {
  console.log(json ? JSON.stringify(result, null, 2) : formatModuleResult(result));
  if (result.failed) process.exitCode = 1;
}

function reportError(err: unknown): void {
  console.error(theme.error(`Error: ${formatErrorMessage(err)}`));
  process.exitCode = 1;
}

// =============================================================================
// Commands
// =============================================================================

export function createOpenStackCli(deps: OpenStackCliDeps) {
  return (ctx: ConvergentPluginCliContext) => {
    const moduleContext = (): ModuleContext => ({
      ...deps.moduleContext,
      config: deps.config,
      logger: ctx.logger,
    });

    const openstack = ctx.program.command("openstack").description("OpenStack Keystone and Heat resources");

    withCommonOptions(
      openstack
        .command("service")
        .description("Ensure a Keystone service is present or absent")
        .argument("<name>", "service name")
        .requiredOption("--type <type>", "service type, e.g. image")
        .option("--description <text>", "service description")
        .option("--state <state>", "present | absent", "present"),
    ).action(async (name: string, opts: CommonOptions & { type: string; description?: string; state: string }) => {
      try {
        const result = await runKeystoneServiceModule(
          {
            ...commonParams(opts),
            name,
            service_type: opts.type,
            description: opts.description,
            state: parseState(opts.state),
          },
          moduleContext(),
        );
        report(result, opts.json);
      } catch (err) {
        reportError(err);
      }
    });

    withCommonOptions(
      openstack
        .command("endpoint")
        .description("Ensure a Keystone endpoint is present or absent")
        .argument("<service>", "name of the service the endpoint belongs to")
        .requiredOption("--public-url <url>", "public URL")
        .option("--internal-url <url>", "internal URL")
        .option("--admin-url <url>", "admin URL")
        .option("--region <region>", "endpoint region")
        .option("--state <state>", "present | absent", "present"),
    ).action(
      async (
        service: string,
        opts: CommonOptions & {
          publicUrl: string;
          internalUrl?: string;
          adminUrl?: string;
          region?: string;
          state: string;
        },
      ) => {
        try {
          const result = await runKeystoneEndpointModule(
            {
              ...commonParams(opts),
              service_name: service,
              region: opts.region,
              public_url: opts.publicUrl,
              internal_url: opts.internalUrl,
              admin_url: opts.adminUrl,
              state: parseState(opts.state),
            },
            moduleContext(),
          );
          report(result, opts.json);
        } catch (err) {
          reportError(err);
        }
      },
    );

    withCommonOptions(
      openstack
        .command("stack")
        .description("Create or delete a Heat stack")
        .argument("<name>", "stack name")
        .option("--action <action>", "create | delete", "create")
        .option("--template <path>", "template file (required for create)")
        .option("--environment <path>", "environment file")
        .option("--param <key=value>", "template parameter (repeatable)", collectPair, {})
        .option("--tag <key=value>", "stack tag (repeatable)", collectPair, {})
        .option("--disable-rollback", "keep resources of a failed create")
        .option("--timeout <seconds>", "operation timeout in seconds", parsePositiveInt)
        .option("--no-wait", "return once the request is accepted"),
    ).action(
      async (
        name: string,
        opts: CommonOptions & {
          action: string;
          template?: string;
          environment?: string;
          param: Record<string, string>;
          tag: Record<string, string>;
          disableRollback?: boolean;
          timeout?: number;
          wait: boolean;
        },
      ) => {
        try {
          const action = parseAction(opts.action);
          const progress = createStackProgress(`${action} ${name}`, { silent: opts.json });
          const base = moduleContext();
          const result = await runHeatStackModule(
            {
              ...commonParams(opts),
              stack_name: name,
              action,
              template: opts.template,
              environment: opts.environment,
              template_parameters: opts.param,
              tags: Object.keys(opts.tag).length > 0 ? opts.tag : undefined,
              disable_rollback: opts.disableRollback,
              timeout: opts.timeout,
              wait: opts.wait,
            },
            { ...base, poll: { ...base.poll, onPoll: (stack, attempt) => progress.update(stack, attempt) } },
          );
          progress.done(result.stackStatus);
          report(result, opts.json);
        } catch (err) {
          reportError(err);
        }
      },
    );
  };
}
