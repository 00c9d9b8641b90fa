/**
 * Keystone Service & Endpoint Management
 *
 * Clients for the Keystone v2.0 admin API (`OS-KSADM/services`, `endpoints`)
 * and the present/absent reconciliation built on them.
 */

import type {
  KeystoneEndpoint,
  KeystoneEndpointAttributes,
  KeystoneService,
  KeystoneServiceAttributes,
  ReconciliationOutcome,
} from "../types.js";
import { NotFoundError, OpenStackError } from "../errors.js";
import { isRecord, readArray, readRecord, readString, requireString } from "../api.js";
import { OpenStackServiceClient } from "../client.js";
import {
  ensureAbsent,
  ensurePresent,
  findUnique,
  type MatchDescriptor,
  type ResourceClient,
  type ResourceDescriptor,
} from "../reconcile.js";

// =============================================================================
// Types
// =============================================================================

export type ServiceDescriptorInput = {
  name: string;
  type: string;
  description?: string;
};

export type EndpointDescriptorInput = {
  serviceName: string;
  region?: string;
  publicUrl: string;
  internalUrl?: string;
  adminUrl?: string;
};

export const DEFAULT_SERVICE_DESCRIPTION = "Not provided";

const SERVICE_KEY = "OS-KSADM:service";
const SERVICES_KEY = "OS-KSADM:services";

// =============================================================================
// Services
// =============================================================================

function mapService(raw: unknown): KeystoneService {
  return {
    id: requireString(raw, "id", "service"),
    name: requireString(raw, "name", "service"),
    type: readString(raw, "type") ?? "",
    description: readString(raw, "description"),
  };
}

export class KeystoneServiceClient
  extends OpenStackServiceClient
  implements ResourceClient<KeystoneService, KeystoneServiceAttributes>
{
  readonly kind = "service";
  protected readonly service = "identity";

  async list(): Promise<KeystoneService[]> {
    const data = await this.read("OS-KSADM/services", "services.list");
    return readArray(data, SERVICES_KEY).filter(isRecord).map(mapService);
  }

  async get(idOrName: string): Promise<KeystoneService> {
    const found = await findUnique(this, {
      label: `id or name ${idOrName}`,
      matches: (s) => s.id === idOrName || s.name === idOrName,
    });
    if (!found) throw new NotFoundError(`No service with id or name ${idOrName}`);
    return found;
  }

  async create(attributes: KeystoneServiceAttributes): Promise<KeystoneService> {
    const service: Record<string, string> = { name: attributes.name, type: attributes.type };
    if (attributes.description !== undefined) service.description = attributes.description;

    const data = await this.mutate("OS-KSADM/services", "services.create", "POST", { [SERVICE_KEY]: service });
    const created = readRecord(data, SERVICE_KEY);
    if (!created) throw new OpenStackError(`Malformed service response: missing "${SERVICE_KEY}"`);
    return mapService(created);
  }

  async delete(id: string): Promise<void> {
    await this.mutate(`OS-KSADM/services/${encodeURIComponent(id)}`, "services.delete", "DELETE");
  }
}

/** Services are matched by name alone; Keystone keeps names unique. */
export function serviceDescriptor(
  input: ServiceDescriptorInput,
): ResourceDescriptor<KeystoneService, KeystoneServiceAttributes> {
  return {
    label: `name=${input.name}`,
    matches: (service) => service.name === input.name,
    attributes: {
      name: input.name,
      type: input.type,
      description: input.description ?? DEFAULT_SERVICE_DESCRIPTION,
    },
  };
}

export async function ensureServicePresent(
  client: KeystoneServiceClient,
  input: ServiceDescriptorInput,
  checkMode = false,
): Promise<ReconciliationOutcome> {
  return ensurePresent(client, serviceDescriptor(input), checkMode);
}

export async function ensureServiceAbsent(
  client: KeystoneServiceClient,
  name: string,
  checkMode = false,
): Promise<ReconciliationOutcome> {
  return ensureAbsent(client, { label: `name=${name}`, matches: (s) => s.name === name }, checkMode);
}

// =============================================================================
// Endpoints
// =============================================================================

function mapEndpoint(raw: unknown): KeystoneEndpoint {
  return {
    id: requireString(raw, "id", "endpoint"),
    serviceId: requireString(raw, "service_id", "endpoint"),
    region: readString(raw, "region"),
    publicUrl: readString(raw, "publicurl"),
    internalUrl: readString(raw, "internalurl"),
    adminUrl: readString(raw, "adminurl"),
  };
}

export class KeystoneEndpointClient
  extends OpenStackServiceClient
  implements ResourceClient<KeystoneEndpoint, KeystoneEndpointAttributes>
{
  readonly kind = "endpoint";
  protected readonly service = "identity";

  async list(): Promise<KeystoneEndpoint[]> {
    const data = await this.read("endpoints", "endpoints.list");
    return readArray(data, "endpoints").filter(isRecord).map(mapEndpoint);
  }

  async get(id: string): Promise<KeystoneEndpoint> {
    const found = (await this.list()).find((e) => e.id === id);
    if (!found) throw new NotFoundError(`No endpoint with id ${id}`);
    return found;
  }

  async create(attributes: KeystoneEndpointAttributes): Promise<KeystoneEndpoint> {
    const endpoint: Record<string, string> = {
      service_id: attributes.serviceId,
      publicurl: attributes.publicUrl,
    };
    if (attributes.region !== undefined) endpoint.region = attributes.region;
    if (attributes.internalUrl !== undefined) endpoint.internalurl = attributes.internalUrl;
    if (attributes.adminUrl !== undefined) endpoint.adminurl = attributes.adminUrl;

    const data = await this.mutate("endpoints", "endpoints.create", "POST", { endpoint });
    const created = readRecord(data, "endpoint");
    if (!created) throw new OpenStackError('Malformed endpoint response: missing "endpoint"');
    return mapEndpoint(created);
  }

  async delete(id: string): Promise<void> {
    await this.mutate(`endpoints/${encodeURIComponent(id)}`, "endpoints.delete", "DELETE");
  }
}

/**
 * Every field takes part in the match; an unset optional field only matches
 * an unset remote field.
 */
export function endpointDescriptor(
  serviceId: string,
  input: EndpointDescriptorInput,
): ResourceDescriptor<KeystoneEndpoint, KeystoneEndpointAttributes> {
  const label = [
    `service_id=${serviceId}`,
    `region=${input.region ?? "<none>"}`,
    `public_url=${input.publicUrl}`,
    `internal_url=${input.internalUrl ?? "<none>"}`,
    `admin_url=${input.adminUrl ?? "<none>"}`,
  ].join(", ");

  return {
    label,
    matches: (endpoint) =>
      endpoint.serviceId === serviceId &&
      endpoint.region === input.region &&
      endpoint.publicUrl === input.publicUrl &&
      endpoint.internalUrl === input.internalUrl &&
      endpoint.adminUrl === input.adminUrl,
    attributes: {
      serviceId,
      region: input.region,
      publicUrl: input.publicUrl,
      internalUrl: input.internalUrl,
      adminUrl: input.adminUrl,
    },
  };
}

function serviceByName(name: string): MatchDescriptor<KeystoneService> {
  return { label: `name=${name}`, matches: (s) => s.name === name };
}

/** Both endpoint paths need the owning service; an unknown name is fatal. */
async function requireService(services: KeystoneServiceClient, name: string): Promise<KeystoneService> {
  const service = await findUnique(services, serviceByName(name));
  if (!service) throw new NotFoundError(`No service with name ${name}`);
  return service;
}

export async function ensureEndpointPresent(
  services: KeystoneServiceClient,
  endpoints: KeystoneEndpointClient,
  input: EndpointDescriptorInput,
  checkMode = false,
): Promise<ReconciliationOutcome> {
  const service = await requireService(services, input.serviceName);
  return ensurePresent(endpoints, endpointDescriptor(service.id, input), checkMode);
}

export async function ensureEndpointAbsent(
  services: KeystoneServiceClient,
  endpoints: KeystoneEndpointClient,
  input: EndpointDescriptorInput,
  checkMode = false,
): Promise<ReconciliationOutcome> {
  const service = await requireService(services, input.serviceName);
  return ensureAbsent(endpoints, endpointDescriptor(service.id, input), checkMode);
}
