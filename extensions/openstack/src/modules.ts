/**
 * Module Runners
 *
 * Turn a module parameter record into a `ModuleResult`: authenticate, build
 * the clients from the service catalog, reconcile, and fold any error into
 * the result instead of throwing.
 */

import type { PluginLogger } from "../../../src/plugin-sdk/index.js";
import type { OpenStackInterface, OpenStackPluginConfig, PresenceState, StackAction } from "./types.js";
import { OpenStackError } from "./errors.js";
import {
  KeystoneAuthProvider,
  resolveCredentials,
  type AuthParams,
  type AuthProvider,
  type AuthSession,
} from "./credentials/index.js";
import {
  KeystoneEndpointClient,
  KeystoneServiceClient,
  ensureEndpointAbsent,
  ensureEndpointPresent,
  ensureServiceAbsent,
  ensureServicePresent,
} from "./keystone/index.js";
import {
  HeatStackClient,
  ensureStack,
  loadTemplate,
  normalizeTags,
  type StackOutcome,
  type StackTagsInput,
} from "./heat/index.js";
import type { OpenStackClientOptions } from "./client.js";
import type { StackPollOptions } from "./polling.js";

// =============================================================================
// Types
// =============================================================================

export type CommonModuleParams = {
  auth?: AuthParams;
  /** Catalog region; falls back to plugin config, then `OS_REGION_NAME`. */
  region_name?: string;
  interface?: OpenStackInterface;
  check_mode?: boolean;
};

export type ServiceModuleParams = CommonModuleParams & {
  name: string;
  service_type: string;
  description?: string;
  state?: PresenceState;
};

export type EndpointModuleParams = CommonModuleParams & {
  service_name: string;
  region?: string;
  public_url: string;
  internal_url?: string;
  admin_url?: string;
  state?: PresenceState;
};

export type StackModuleParams = CommonModuleParams & {
  stack_name: string;
  /** Path to the template file; required for `create`. */
  template?: string;
  template_parameters?: Record<string, unknown>;
  /** Path to an environment file. */
  environment?: string;
  tags?: StackTagsInput;
  action?: StackAction;
  disable_rollback?: boolean;
  wait?: boolean;
  /** Seconds; bounds both Heat's own timeout and the wait. */
  timeout?: number;
};

export type ModuleResult = {
  changed: boolean;
  id?: string;
  msg?: string;
  failed?: boolean;
  stackStatus?: string;
  outputs?: Record<string, unknown>;
};

export type ModuleContext = {
  config?: OpenStackPluginConfig;
  env?: NodeJS.ProcessEnv;
  authProvider?: AuthProvider;
  logger?: PluginLogger;
  signal?: AbortSignal;
  /** Overrides for the stack poll loop (sleep, clock, onPoll). */
  poll?: Omit<StackPollOptions, "signal">;
};

// =============================================================================
// Session
// =============================================================================

type ModuleSession = {
  session: AuthSession;
  region?: string;
  clientOptions: (baseUrl: string) => OpenStackClientOptions;
};

async function openSession(params: CommonModuleParams, ctx: ModuleContext): Promise<ModuleSession> {
  const env = ctx.env ?? process.env;
  const provider = ctx.authProvider ?? new KeystoneAuthProvider(ctx.config?.retry);
  const session = await provider.authenticate(resolveCredentials(params.auth, env), ctx.signal);
  const region = params.region_name || ctx.config?.defaultRegion || env.OS_REGION_NAME || undefined;

  return {
    session,
    region,
    clientOptions: (baseUrl) => ({
      baseUrl,
      getToken: async () => session.token,
      retry: ctx.config?.retry,
      region,
      signal: ctx.signal,
    }),
  };
}

/** Identity management lives on the admin interface unless told otherwise. */
function identityUrl(params: CommonModuleParams, ctx: ModuleContext, s: ModuleSession): string {
  return (
    ctx.config?.identityUrl ??
    s.session.endpointFor("identity", { region: s.region, interface: params.interface ?? "admin" })
  );
}

function orchestrationUrl(params: CommonModuleParams, ctx: ModuleContext, s: ModuleSession): string {
  return (
    ctx.config?.orchestrationUrl ??
    s.session.endpointFor("orchestration", {
      region: s.region,
      interface: params.interface ?? ctx.config?.interface ?? "public",
    })
  );
}

// =============================================================================
// Result Folding
// =============================================================================

/**
 * In check mode a raised error still reports `changed`, so a dry run never
 * hides that the real run would act (or fail).
 */
export function errorResult(error: unknown, checkMode: boolean): ModuleResult {
  const message = error instanceof Error ? error.message : String(error);
  const msg = `exception: ${message}`;
  return checkMode ? { changed: true, msg } : { changed: false, failed: true, msg };
}

async function runModule(
  name: string,
  params: CommonModuleParams,
  ctx: ModuleContext,
  body: () => Promise<ModuleResult>,
): Promise<ModuleResult> {
  const checkMode = params.check_mode ?? false;
  try {
    const result = await body();
    if (result.failed) {
      ctx.logger?.warn(`${name}: ${result.msg ?? "failed"}`);
    } else if (result.changed) {
      ctx.logger?.info(`${name}: ${result.msg ?? "changed"}`);
    } else {
      ctx.logger?.debug?.(`${name}: ${result.msg ?? "unchanged"}`);
    }
    return result;
  } catch (err) {
    const result = errorResult(err, checkMode);
    const kind = err instanceof OpenStackError ? err.name : "Error";
    ctx.logger?.error(`${name}: ${kind}: ${result.msg}`);
    return result;
  }
}

// =============================================================================
// Keystone Service
// =============================================================================

export async function runKeystoneServiceModule(
  params: ServiceModuleParams,
  ctx: ModuleContext = {},
): Promise<ModuleResult> {
  return runModule("openstack_keystone_service", params, ctx, async () => {
    const s = await openSession(params, ctx);
    const services = new KeystoneServiceClient(s.clientOptions(identityUrl(params, ctx, s)));
    const checkMode = params.check_mode ?? false;

    const outcome =
      (params.state ?? "present") === "present"
        ? await ensureServicePresent(
            services,
            { name: params.name, type: params.service_type, description: params.description },
            checkMode,
          )
        : await ensureServiceAbsent(services, params.name, checkMode);

    return { changed: outcome.changed, id: outcome.id, msg: outcome.message };
  });
}

// =============================================================================
// Keystone Endpoint
// =============================================================================

export async function runKeystoneEndpointModule(
  params: EndpointModuleParams,
  ctx: ModuleContext = {},
): Promise<ModuleResult> {
  return runModule("openstack_keystone_endpoint", params, ctx, async () => {
    const s = await openSession(params, ctx);
    const options = s.clientOptions(identityUrl(params, ctx, s));
    const services = new KeystoneServiceClient(options);
    const endpoints = new KeystoneEndpointClient(options);
    const checkMode = params.check_mode ?? false;
    const input = {
      serviceName: params.service_name,
      region: params.region,
      publicUrl: params.public_url,
      internalUrl: params.internal_url,
      adminUrl: params.admin_url,
    };

    const outcome =
      (params.state ?? "present") === "present"
        ? await ensureEndpointPresent(services, endpoints, input, checkMode)
        : await ensureEndpointAbsent(services, endpoints, input, checkMode);

    return { changed: outcome.changed, id: outcome.id, msg: outcome.message };
  });
}

// =============================================================================
// Heat Stack
// =============================================================================

function stackResult(outcome: StackOutcome): ModuleResult {
  const result: ModuleResult = { changed: outcome.changed, msg: outcome.message };
  if (outcome.id !== undefined) result.id = outcome.id;
  if (outcome.failed) result.failed = true;
  if (outcome.status !== undefined) result.stackStatus = outcome.status;
  if (outcome.outputs !== undefined) result.outputs = outcome.outputs;
  return result;
}

export async function runHeatStackModule(
  params: StackModuleParams,
  ctx: ModuleContext = {},
): Promise<ModuleResult> {
  return runModule("openstack_heat_stack", params, ctx, async () => {
    const action = params.action ?? "create";
    const timeoutSeconds = params.timeout;
    if (timeoutSeconds !== undefined && !(Number.isFinite(timeoutSeconds) && timeoutSeconds > 0)) {
      throw new OpenStackError(`timeout must be a positive number of seconds, got ${timeoutSeconds}`);
    }

    // Read local files before touching the remote side
    let template = "";
    let environment: string | undefined;
    if (action === "create") {
      if (!params.template) throw new OpenStackError("template is required when action is create");
      template = await loadTemplate(params.template);
      if (params.environment) environment = await loadTemplate(params.environment);
    }

    const s = await openSession(params, ctx);
    const stacks = new HeatStackClient(s.clientOptions(orchestrationUrl(params, ctx, s)));

    const poll: StackPollOptions = {
      intervalMs: ctx.config?.pollIntervalMs,
      timeoutMs: timeoutSeconds !== undefined ? timeoutSeconds * 1000 : ctx.config?.pollTimeoutMs,
      ...ctx.poll,
      signal: ctx.signal,
    };
    const reconcile = {
      checkMode: params.check_mode ?? false,
      wait: params.wait ?? true,
      poll,
    };

    const outcome =
      action === "create"
        ? await ensureStack(
            stacks,
            {
              action,
              request: {
                name: params.stack_name,
                template,
                parameters: params.template_parameters ?? {},
                environment,
                tags: normalizeTags(params.tags),
                disableRollback: params.disable_rollback,
                timeoutMins: timeoutSeconds !== undefined ? Math.ceil(timeoutSeconds / 60) : undefined,
              },
            },
            reconcile,
          )
        : await ensureStack(stacks, { action, name: params.stack_name }, reconcile);

    return stackResult(outcome);
  });
}
