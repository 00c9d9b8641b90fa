/**
 * Resource Reconciler
 *
 * Lookup-then-mutate convergence for resources with synchronous create and
 * delete calls (Keystone services and endpoints). The remote system is the
 * only source of truth; nothing is cached between calls.
 */

import type { ReconciliationOutcome, RemoteResource } from "./types.js";
import { AmbiguousResourceError } from "./errors.js";
import { emitOpenStackDiagnosticEvent } from "./diagnostics.js";

// =============================================================================
// Types
// =============================================================================

export interface ResourceClient<R extends RemoteResource, A> {
  /** Singular resource name used in messages, e.g. "service". */
  readonly kind: string;
  list(): Promise<R[]>;
  create(attributes: A): Promise<R>;
  delete(id: string): Promise<void>;
  /** Throws `NotFoundError` when nothing matches. */
  get(idOrName: string): Promise<R>;
}

/** Identifies a resource by a conjunctive match over its attributes. */
export type MatchDescriptor<R> = {
  label: string;
  matches: (resource: R) => boolean;
};

export type ResourceDescriptor<R, A> = MatchDescriptor<R> & {
  attributes: A;
};

// =============================================================================
// Lookup
// =============================================================================

/**
 * Return the single resource matching the descriptor, undefined when none
 * does. More than one match is a consistency violation and is never resolved
 * by picking one.
 */
export async function findUnique<R extends RemoteResource>(
  client: Pick<ResourceClient<R, unknown>, "kind" | "list">,
  descriptor: MatchDescriptor<R>,
): Promise<R | undefined> {
  const matches = (await client.list()).filter((resource) => descriptor.matches(resource));
  if (matches.length > 1) {
    throw new AmbiguousResourceError(client.kind, matches.length, descriptor.label);
  }
  return matches[0];
}

// =============================================================================
// Reconciliation
// =============================================================================

export async function ensurePresent<R extends RemoteResource, A>(
  client: ResourceClient<R, A>,
  descriptor: ResourceDescriptor<R, A>,
  checkMode = false,
): Promise<ReconciliationOutcome> {
  const existing = await findUnique(client, descriptor);
  if (existing) {
    return {
      changed: false,
      id: existing.id,
      message: `${client.kind} ${descriptor.label} already present`,
    };
  }

  if (checkMode) {
    return { changed: true, message: `would create ${client.kind} ${descriptor.label}` };
  }

  const created = await client.create(descriptor.attributes);
  emitOpenStackDiagnosticEvent({
    type: "openstack.resource.change",
    service: client.kind,
    operation: "create",
    resourceId: created.id,
    target: descriptor.label,
  });
  return {
    changed: true,
    id: created.id,
    message: `created ${client.kind} ${descriptor.label}`,
  };
}

export async function ensureAbsent<R extends RemoteResource>(
  client: Pick<ResourceClient<R, unknown>, "kind" | "list" | "delete">,
  descriptor: MatchDescriptor<R>,
  checkMode = false,
): Promise<ReconciliationOutcome> {
  const existing = await findUnique(client, descriptor);
  if (!existing) {
    return { changed: false, message: `${client.kind} ${descriptor.label} already absent` };
  }

  if (checkMode) {
    return { changed: true, message: `would delete ${client.kind} ${descriptor.label}` };
  }

  await client.delete(existing.id);
  emitOpenStackDiagnosticEvent({
    type: "openstack.resource.change",
    service: client.kind,
    operation: "delete",
    resourceId: existing.id,
    target: descriptor.label,
  });
  return { changed: true, message: `deleted ${client.kind} ${descriptor.label}` };
}
