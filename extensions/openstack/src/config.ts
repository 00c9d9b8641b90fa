import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { stringEnum } from "../../../src/plugin-sdk/index.js";
import type { OpenStackPluginConfig } from "./types.js";
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_POLL_TIMEOUT_MS } from "./polling.js";

export const OPENSTACK_INTERFACES = ["public", "internal", "admin"] as const;

export const openstackConfigSchema = Type.Object(
  {
    defaultRegion: Type.Optional(Type.String({ description: "Catalog region used when a call names none" })),
    interface: Type.Optional(
      stringEnum(OPENSTACK_INTERFACES, { description: "Catalog interface for orchestration calls" }),
    ),
    identityUrl: Type.Optional(Type.String({ description: "Identity admin URL; overrides the service catalog" })),
    orchestrationUrl: Type.Optional(
      Type.String({ description: "Orchestration URL; overrides the service catalog" }),
    ),
    pollIntervalMs: Type.Number({ minimum: 1, default: DEFAULT_POLL_INTERVAL_MS }),
    pollTimeoutMs: Type.Number({ minimum: 1, default: DEFAULT_POLL_TIMEOUT_MS }),
    retry: Type.Optional(
      Type.Object({
        maxAttempts: Type.Optional(Type.Integer({ minimum: 1 })),
        minDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
        maxDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
        jitterFactor: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
      }),
    ),
    diagnostics: Type.Optional(
      Type.Object({
        enabled: Type.Optional(Type.Boolean()),
        verbose: Type.Optional(Type.Boolean()),
      }),
    ),
  },
  { additionalProperties: false },
);

/**
 * Narrow the host-validated plugin config. Anything that does not match the
 * schema falls back to defaults.
 */
export function resolveOpenStackConfig(raw: Record<string, unknown> | undefined): OpenStackPluginConfig {
  const value = Value.Default(openstackConfigSchema, structuredClone(raw ?? {}));
  if (Value.Check(openstackConfigSchema, value)) return value;
  return { pollIntervalMs: DEFAULT_POLL_INTERVAL_MS, pollTimeoutMs: DEFAULT_POLL_TIMEOUT_MS };
}
