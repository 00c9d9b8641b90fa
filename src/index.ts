export { VERSION } from "./version.js";
export { buildProgram, type BuildProgramOptions } from "./cli/program.js";
export { loadConfig, createConfigIO, ConfigError } from "./config/io.js";
export type { ConvergentConfig, PluginEntryConfig } from "./config/schema.js";
export { createSubsystemLogger, setLoggerSettings, type LogLevel } from "./logging/subsystem.js";
export { BUNDLED_PLUGINS } from "./plugins/bundled.js";
export {
  callGatewayMethod,
  invokeTool,
  loadPlugins,
  startPluginServices,
  stopPluginServices,
  ToolInvocationError,
  type PluginRecord,
  type PluginRegistry,
} from "./plugins/registry.js";
export * from "./plugin-sdk/index.js";
export {
  runHeatStackModule,
  runKeystoneEndpointModule,
  runKeystoneServiceModule,
  type ModuleContext,
  type ModuleResult,
} from "../extensions/openstack/src/modules.js";
