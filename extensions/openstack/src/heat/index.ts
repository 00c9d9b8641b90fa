/**
 * Heat Stack Management
 *
 * Client for the Heat v1 orchestration API and create/delete reconciliation
 * of a named stack, including the wait for the asynchronous operation.
 */

import { readFile } from "node:fs/promises";
import type { HeatStack, ReconciliationOutcome, StackCreateRequest, StackOperation } from "../types.js";
import { NotFoundError, OperationFailedError } from "../errors.js";
import { isRecord, readArray, readRecord, readString, requireString } from "../api.js";
import { OpenStackServiceClient } from "../client.js";
import { emitOpenStackDiagnosticEvent } from "../diagnostics.js";
import type { ResourceClient } from "../reconcile.js";
import { pollStackOperation, type StackPollOptions } from "../polling.js";

// =============================================================================
// Types
// =============================================================================

/** Tags as key/value pairs (`{k: v}` becomes `"k=v"`) or as plain strings. */
export type StackTagsInput = string[] | Record<string, string>;

export type StackTarget =
  | { action: "create"; request: StackCreateRequest }
  | { action: "delete"; name: string };

export type StackReconcileOptions = {
  checkMode?: boolean;
  /** Wait for the operation to settle (default true). */
  wait?: boolean;
  poll?: StackPollOptions;
};

export type StackOutcome = ReconciliationOutcome & {
  status?: string;
  outputs?: Record<string, unknown>;
  /** Set when the stack vanished while being created. */
  failed?: boolean;
};

// =============================================================================
// Request Building
// =============================================================================

export function normalizeTags(tags: StackTagsInput | undefined): string[] | undefined {
  if (tags === undefined) return undefined;
  if (Array.isArray(tags)) return tags;
  return Object.entries(tags).map(([key, value]) => `${key}=${value}`);
}

/** Heat create body; optional fields left undefined are not sent. */
export function buildStackBody(request: StackCreateRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    stack_name: request.name,
    template: request.template,
    parameters: request.parameters,
  };
  if (request.environment !== undefined) body.environment = request.environment;
  if (request.tags !== undefined && request.tags.length > 0) body.tags = request.tags.join(",");
  if (request.disableRollback !== undefined) body.disable_rollback = request.disableRollback;
  if (request.timeoutMins !== undefined) body.timeout_mins = request.timeoutMins;
  return body;
}

export async function loadTemplate(path: string): Promise<string> {
  return readFile(path, "utf8");
}

function mapOutputs(raw: unknown[]): Record<string, unknown> {
  const outputs: Record<string, unknown> = {};
  for (const item of raw) {
    const key = readString(item, "output_key");
    if (key !== undefined && isRecord(item)) outputs[key] = item.output_value;
  }
  return outputs;
}

function mapStack(raw: unknown): HeatStack {
  return {
    id: requireString(raw, "id", "stack"),
    name: requireString(raw, "stack_name", "stack"),
    status: requireString(raw, "stack_status", "stack"),
    statusReason: readString(raw, "stack_status_reason"),
    creationTime: readString(raw, "creation_time"),
    outputs: mapOutputs(readArray(raw, "outputs")),
  };
}

// =============================================================================
// Client
// =============================================================================

export class HeatStackClient
  extends OpenStackServiceClient
  implements Pick<ResourceClient<HeatStack, StackCreateRequest>, "kind" | "get" | "create">
{
  readonly kind = "stack";
  protected readonly service = "orchestration";

  /**
   * Look a stack up by name, id or `name/id`. Heat redirects name lookups to
   * the canonical `stacks/{name}/{id}` URL; fetch follows it.
   */
  async get(identity: string): Promise<HeatStack> {
    const path = identity.split("/").map(encodeURIComponent).join("/");
    const data = await this.read(`stacks/${path}`, "stacks.get");
    const stack = readRecord(data, "stack");
    if (!stack) throw new NotFoundError(`Stack ${identity} not found`);
    return mapStack(stack);
  }

  /** Returns the accepted stack in its initial CREATE_IN_PROGRESS state. */
  async create(request: StackCreateRequest): Promise<HeatStack> {
    const data = await this.mutate("stacks", "stacks.create", "POST", buildStackBody(request));
    return {
      id: requireString(readRecord(data, "stack"), "id", "stack create"),
      name: request.name,
      status: "CREATE_IN_PROGRESS",
      outputs: {},
    };
  }

  async deleteStack(name: string, id: string): Promise<void> {
    await this.mutate(
      `stacks/${encodeURIComponent(name)}/${encodeURIComponent(id)}`,
      "stacks.delete",
      "DELETE",
    );
  }

  /** `get` that reports a missing stack as undefined. */
  async find(identity: string): Promise<HeatStack | undefined> {
    try {
      return await this.get(identity);
    } catch (err) {
      if (err instanceof NotFoundError) return undefined;
      throw err;
    }
  }
}

// =============================================================================
// Reconciliation
// =============================================================================

async function waitForStack(
  client: HeatStackClient,
  stack: { name: string; id: string },
  operation: StackOperation,
  poll: StackPollOptions | undefined,
): Promise<StackOutcome> {
  const outcome = await pollStackOperation(() => client.get(`${stack.name}/${stack.id}`), operation, poll);

  switch (outcome.tag) {
    case "complete":
      return {
        changed: true,
        id: outcome.stack.id,
        status: outcome.stack.status,
        outputs: outcome.stack.outputs,
        message: `Stack ${operation} complete`,
      };
    case "failed":
      throw new OperationFailedError(operation, outcome.stack.status, outcome.stack.statusReason);
    case "deleted":
      return { changed: true, id: stack.id, message: "Stack Deleted" };
    case "not-found":
      return { changed: true, id: stack.id, failed: true, message: "Stack Not Found" };
  }
}

/**
 * Where a stack that already exists stands for a create request: `settled`
 * stacks are left alone, `creating` ones are waited on, `broken` ones
 * (failed, rolled back or being deleted) fail the request.
 */
export function classifyExistingStack(status: string): "settled" | "creating" | "broken" {
  if (status === "CREATE_IN_PROGRESS") return "creating";
  if (status.endsWith("_FAILED") || status.startsWith("ROLLBACK_") || status.startsWith("DELETE_")) {
    return "broken";
  }
  return "settled";
}

async function settleExistingStack(
  client: HeatStackClient,
  existing: HeatStack,
  options: StackReconcileOptions | undefined,
): Promise<StackOutcome> {
  switch (classifyExistingStack(existing.status)) {
    case "broken":
      throw new OperationFailedError(
        "CREATE",
        existing.status,
        existing.statusReason ?? `stack ${existing.name} is ${existing.status}`,
      );
    case "creating": {
      if (options?.checkMode || options?.wait === false) {
        return {
          changed: false,
          id: existing.id,
          status: existing.status,
          message: `stack ${existing.name} is still being created`,
        };
      }
      const outcome = await waitForStack(client, existing, "CREATE", options?.poll);
      // Another run submitted the create.
      return outcome.failed ? outcome : { ...outcome, changed: false };
    }
    case "settled":
      return {
        changed: false,
        id: existing.id,
        status: existing.status,
        outputs: existing.outputs,
        message: `stack ${existing.name} already exists`,
      };
  }
}

/**
 * Create a stack that does not exist yet, or delete one that does.
 *
 * @throws OperationFailedError when Heat reports `<OPERATION>_FAILED`.
 */
export async function ensureStack(
  client: HeatStackClient,
  target: StackTarget,
  options?: StackReconcileOptions,
): Promise<StackOutcome> {
  return target.action === "create"
    ? createStack(client, target.request, options)
    : deleteStack(client, target.name, options);
}

async function createStack(
  client: HeatStackClient,
  request: StackCreateRequest,
  options?: StackReconcileOptions,
): Promise<StackOutcome> {
  const existing = await client.find(request.name);
  if (existing) return settleExistingStack(client, existing, options);
  if (options?.checkMode) {
    return { changed: true, message: `would create stack ${request.name}` };
  }

  const created = await client.create(request);
  emitOpenStackDiagnosticEvent({
    type: "openstack.resource.change",
    service: client.kind,
    operation: "create",
    resourceId: created.id,
    target: request.name,
  });
  if (options?.wait === false) {
    return {
      changed: true,
      id: created.id,
      status: created.status,
      message: `submitted create of stack ${request.name}`,
    };
  }
  return waitForStack(client, created, "CREATE", options?.poll);
}

async function deleteStack(
  client: HeatStackClient,
  name: string,
  options?: StackReconcileOptions,
): Promise<StackOutcome> {
  const existing = await client.find(name);
  if (!existing) {
    return { changed: false, message: `stack ${name} already absent` };
  }
  if (options?.checkMode) {
    return { changed: true, id: existing.id, message: `would delete stack ${name}` };
  }

  await client.deleteStack(existing.name, existing.id);
  emitOpenStackDiagnosticEvent({
    type: "openstack.resource.change",
    service: client.kind,
    operation: "delete",
    resourceId: existing.id,
    target: existing.name,
  });
  if (options?.wait === false) {
    return {
      changed: true,
      id: existing.id,
      status: "DELETE_IN_PROGRESS",
      message: `submitted delete of stack ${name}`,
    };
  }
  return waitForStack(client, existing, "DELETE", options?.poll);
}
