/**
 * Diagnostics
 *
 * Event emitter for API call tracing, token issuance, resource changes and
 * stack poll ticks.
 */

// =============================================================================
// Types
// =============================================================================

type EventBase = {
  timestamp: number;
  seq: number;
  /** Catalog service type, or the resource kind for change events. */
  service: string;
  operation: string;
  region?: string;
};

export type OpenStackApiCallEvent = EventBase & {
  type: "openstack.api.call";
  durationMs: number;
};

export type OpenStackApiErrorEvent = EventBase & {
  type: "openstack.api.error";
  durationMs?: number;
  statusCode?: number;
  error: string;
};

export type OpenStackAuthTokenEvent = EventBase & {
  type: "openstack.auth.token";
  tenantId?: string;
  expiresAt?: string;
};

export type OpenStackResourceChangeEvent = EventBase & {
  type: "openstack.resource.change";
  resourceId: string;
  /** Descriptor label or stack name. */
  target: string;
};

export type OpenStackStackPollEvent = EventBase & {
  type: "openstack.stack.poll";
  stackName: string;
  stackId: string;
  stackStatus: string;
  attempt: number;
};

export type OpenStackDiagnosticEvent =
  | OpenStackApiCallEvent
  | OpenStackApiErrorEvent
  | OpenStackAuthTokenEvent
  | OpenStackResourceChangeEvent
  | OpenStackStackPollEvent;

export type OpenStackDiagnosticEventType = OpenStackDiagnosticEvent["type"];

type WithoutStamp<E> = E extends unknown ? Omit<E, "timestamp" | "seq"> : never;

/** An event as emitted, before sequencing. */
export type OpenStackDiagnosticEventInput = WithoutStamp<OpenStackDiagnosticEvent>;

export type OpenStackDiagnosticListener = (event: OpenStackDiagnosticEvent) => void;

// =============================================================================
// Global State
// =============================================================================

let diagnosticsEnabled = false;
let seq = 0;
const listeners = new Set<OpenStackDiagnosticListener>();

// =============================================================================
// Public API
// =============================================================================

export function enableOpenStackDiagnostics(): void {
  diagnosticsEnabled = true;
}

export function disableOpenStackDiagnostics(): void {
  diagnosticsEnabled = false;
}

export function isOpenStackDiagnosticsEnabled(): boolean {
  return diagnosticsEnabled;
}

/** Subscribe to diagnostic events. Returns an unsubscribe function. */
export function onOpenStackDiagnosticEvent(listener: OpenStackDiagnosticListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function emitOpenStackDiagnosticEvent(event: OpenStackDiagnosticEventInput): void {
  if (!diagnosticsEnabled) return;

  const fullEvent: OpenStackDiagnosticEvent = {
    ...event,
    timestamp: Date.now(),
    seq: ++seq,
  };

  for (const listener of listeners) {
    try {
      listener(fullEvent);
    } catch (err) {
      // Listener errors never reach the observed call
      process.emitWarning(
        `openstack diagnostics listener failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}

/**
 * Wrap an API call with diagnostic instrumentation.
 */
export async function instrumentedOpenStackCall<T>(
  service: string,
  operation: string,
  fn: () => Promise<T>,
  options?: { region?: string },
): Promise<T> {
  if (!diagnosticsEnabled) return fn();

  const start = Date.now();

  try {
    const result = await fn();

    emitOpenStackDiagnosticEvent({
      type: "openstack.api.call",
      service,
      operation,
      durationMs: Date.now() - start,
      region: options?.region,
    });

    return result;
  } catch (error) {
    const statusCode =
      typeof error === "object" && error !== null ? Reflect.get(error, "statusCode") : undefined;

    emitOpenStackDiagnosticEvent({
      type: "openstack.api.error",
      service,
      operation,
      durationMs: Date.now() - start,
      statusCode: typeof statusCode === "number" ? statusCode : undefined,
      error: error instanceof Error ? error.message : String(error),
      region: options?.region,
    });

    throw error;
  }
}

/**
 * Reset diagnostics state for tests.
 */
export function resetOpenStackDiagnosticsForTest(): void {
  diagnosticsEnabled = false;
  seq = 0;
  listeners.clear();
}
