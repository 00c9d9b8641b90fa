import { Type, type Static } from "@sinclair/typebox";

import { stringEnum } from "../plugin-sdk/index.js";
import { LOG_LEVELS } from "../logging/subsystem.js";

export const PluginEntrySchema = Type.Object({
  enabled: Type.Optional(Type.Boolean({ description: "Load this plugin (default true)" })),
  config: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export const ConvergentConfigSchema = Type.Object({
  logging: Type.Optional(
    Type.Object({
      level: Type.Optional(stringEnum(LOG_LEVELS, { description: "Minimum log level" })),
      json: Type.Optional(Type.Boolean({ description: "Emit JSON log lines" })),
    }),
  ),
  plugins: Type.Optional(
    Type.Object({
      enabled: Type.Optional(Type.Boolean({ description: "Load plugins at all (default true)" })),
      entries: Type.Optional(Type.Record(Type.String(), PluginEntrySchema)),
    }),
  ),
});

export type PluginEntryConfig = Static<typeof PluginEntrySchema>;
export type ConvergentConfig = Static<typeof ConvergentConfigSchema>;
