/**
 * Credentials & Keystone Authentication
 *
 * Resolves credentials from explicit parameters or the `OS_*` environment
 * and exchanges them for a Keystone v2.0 token plus service catalog.
 */

import type { OpenStackInterface, OpenStackRetryOptions } from "../types.js";
import { AuthenticationError, NotFoundError } from "../errors.js";
import {
  isRecord,
  joinUrl,
  openstackRequest,
  readArray,
  readRecord,
  readString,
  requireString,
} from "../api.js";
import { withOpenStackRetry } from "../retry.js";
import { emitOpenStackDiagnosticEvent } from "../diagnostics.js";

// =============================================================================
// Types
// =============================================================================

/** Password credentials scoped to a tenant (project). */
export type Credentials = {
  authUrl: string;
  username: string;
  password: string;
  tenantName: string;
};

/** Explicit credential overrides, as module parameters spell them. */
export type AuthParams = {
  auth_url?: string;
  username?: string;
  password?: string;
  project_name?: string;
};

export type CatalogEndpoint = {
  region?: string;
  publicURL?: string;
  internalURL?: string;
  adminURL?: string;
};

export type CatalogEntry = {
  type: string;
  name?: string;
  endpoints: CatalogEndpoint[];
};

export type AuthSession = {
  token: string;
  tenantId?: string;
  expiresAt?: string;
  catalog: CatalogEntry[];
  /** Pick a URL for a service type from the catalog. */
  endpointFor: (
    serviceType: string,
    opts?: { region?: string; interface?: OpenStackInterface },
  ) => string;
};

export interface AuthProvider {
  authenticate(credentials: Credentials, signal?: AbortSignal): Promise<AuthSession>;
}

// =============================================================================
// Credential Resolution
// =============================================================================

/**
 * Read credentials from the standard OpenStack environment variables.
 * Missing values come back as empty strings; `assertCredentials` rejects them.
 */
export function credentialsFromEnv(env: NodeJS.ProcessEnv = process.env): Credentials {
  return {
    authUrl: env.OS_AUTH_URL ?? "",
    username: env.OS_USERNAME ?? "",
    password: env.OS_PASSWORD ?? "",
    tenantName: env.OS_TENANT_NAME || env.OS_PROJECT_NAME || "",
  };
}

/** Explicit parameters win over the environment, field by field. */
export function resolveCredentials(
  params: AuthParams | undefined,
  env: NodeJS.ProcessEnv = process.env,
): Credentials {
  const fromEnv = credentialsFromEnv(env);
  return {
    authUrl: params?.auth_url || fromEnv.authUrl,
    username: params?.username || fromEnv.username,
    password: params?.password || fromEnv.password,
    tenantName: params?.project_name || fromEnv.tenantName,
  };
}

export function assertCredentials(credentials: Credentials): void {
  const missing: string[] = [];
  if (!credentials.authUrl.trim()) missing.push("auth_url (OS_AUTH_URL)");
  if (!credentials.username.trim()) missing.push("username (OS_USERNAME)");
  if (!credentials.password) missing.push("password (OS_PASSWORD)");
  if (!credentials.tenantName.trim()) missing.push("project_name (OS_TENANT_NAME)");
  if (missing.length > 0) {
    throw new AuthenticationError(`Missing OpenStack credentials: ${missing.join(", ")}`);
  }
}

// =============================================================================
// Service Catalog
// =============================================================================

function parseCatalog(raw: unknown[]): CatalogEntry[] {
  const entries: CatalogEntry[] = [];
  for (const item of raw) {
    const type = readString(item, "type");
    if (!type) continue;
    entries.push({
      type,
      name: readString(item, "name"),
      endpoints: readArray(item, "endpoints")
        .filter(isRecord)
        .map((e) => ({
          region: readString(e, "region"),
          publicURL: readString(e, "publicURL"),
          internalURL: readString(e, "internalURL"),
          adminURL: readString(e, "adminURL"),
        })),
    });
  }
  return entries;
}

function catalogUrl(endpoint: CatalogEndpoint, iface: OpenStackInterface): string | undefined {
  switch (iface) {
    case "public":
      return endpoint.publicURL;
    case "internal":
      return endpoint.internalURL;
    case "admin":
      return endpoint.adminURL;
  }
}

export function findCatalogEndpoint(
  catalog: CatalogEntry[],
  serviceType: string,
  opts?: { region?: string; interface?: OpenStackInterface },
): string {
  const iface = opts?.interface ?? "public";
  const entry = catalog.find((e) => e.type === serviceType);
  const candidates = (entry?.endpoints ?? []).filter(
    (e) => !opts?.region || e.region === opts.region,
  );

  for (const endpoint of candidates) {
    const url = catalogUrl(endpoint, iface);
    if (url) return url;
  }

  const where = opts?.region ? ` in region ${opts.region}` : "";
  throw new NotFoundError(`No ${iface} ${serviceType} endpoint${where} in the service catalog`);
}

// =============================================================================
// Keystone v2.0 Auth Provider
// =============================================================================

export class KeystoneAuthProvider implements AuthProvider {
  private retryOptions: OpenStackRetryOptions;

  constructor(retryOptions?: OpenStackRetryOptions) {
    this.retryOptions = retryOptions ?? {};
  }

  /**
   * Exchange password credentials for a token scoped to the tenant.
   * Empty credentials fail before any request is made.
   */
  async authenticate(credentials: Credentials, signal?: AbortSignal): Promise<AuthSession> {
    assertCredentials(credentials);

    const body = {
      auth: {
        passwordCredentials: {
          username: credentials.username,
          password: credentials.password,
        },
        tenantName: credentials.tenantName,
      },
    };

    const data = await withOpenStackRetry(
      () =>
        openstackRequest(joinUrl(credentials.authUrl, "tokens"), undefined, {
          method: "POST",
          body,
          signal,
        }),
      this.retryOptions,
    );

    const access = readRecord(data, "access");
    const token = readRecord(access, "token");
    if (!access || !token) {
      throw new AuthenticationError("Keystone returned no token for the supplied credentials");
    }

    const catalog = parseCatalog(readArray(access, "serviceCatalog"));
    const session: AuthSession = {
      token: requireString(token, "id", "token"),
      tenantId: readString(readRecord(token, "tenant"), "id"),
      expiresAt: readString(token, "expires"),
      catalog,
      endpointFor: (serviceType, opts) => findCatalogEndpoint(catalog, serviceType, opts),
    };

    emitOpenStackDiagnosticEvent({
      type: "openstack.auth.token",
      service: "identity",
      operation: "authenticate",
      tenantId: session.tenantId,
      expiresAt: session.expiresAt,
    });

    return session;
  }
}
