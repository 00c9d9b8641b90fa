/**
 * Shared Types
 *
 * Core type definitions used across the Keystone and Heat modules.
 */

// =============================================================================
// Common Configuration
// =============================================================================

export type OpenStackRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

/** Which catalog URL to use for a service. */
export type OpenStackInterface = "public" | "internal" | "admin";

export type OpenStackPluginConfig = {
  defaultRegion?: string;
  interface?: OpenStackInterface;
  /** Overrides the identity admin URL taken from the service catalog. */
  identityUrl?: string;
  /** Overrides the orchestration URL taken from the service catalog. */
  orchestrationUrl?: string;
  pollIntervalMs?: number;
  pollTimeoutMs?: number;
  retry?: OpenStackRetryOptions;
  diagnostics?: {
    enabled?: boolean;
    verbose?: boolean;
  };
};

// =============================================================================
// Reconciliation
// =============================================================================

export type PresenceState = "present" | "absent";

export type StackAction = "create" | "delete";

export type StackOperation = "CREATE" | "DELETE";

/** Result of reconciling one resource against its desired state. */
export type ReconciliationOutcome = {
  changed: boolean;
  id?: string;
  message: string;
};

/**
 * Anything the remote system hands back that can be matched and deleted.
 */
export type RemoteResource = {
  id: string;
};

// =============================================================================
// Keystone
// =============================================================================

export type KeystoneService = RemoteResource & {
  name: string;
  type: string;
  description?: string;
};

export type KeystoneServiceAttributes = {
  name: string;
  type: string;
  description?: string;
};

export type KeystoneEndpoint = RemoteResource & {
  serviceId: string;
  region?: string;
  publicUrl?: string;
  internalUrl?: string;
  adminUrl?: string;
};

export type KeystoneEndpointAttributes = {
  serviceId: string;
  region?: string;
  publicUrl: string;
  internalUrl?: string;
  adminUrl?: string;
};

// =============================================================================
// Heat
// =============================================================================

export type HeatStack = RemoteResource & {
  name: string;
  status: string;
  statusReason?: string;
  creationTime?: string;
  outputs: Record<string, unknown>;
};

/**
 * Stack create request. Optional fields left undefined are omitted from the
 * request body.
 */
export type StackCreateRequest = {
  name: string;
  template: string;
  parameters: Record<string, unknown>;
  environment?: string;
  tags?: string[];
  disableRollback?: boolean;
  timeoutMins?: number;
};
