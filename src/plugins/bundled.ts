import type { ConvergentPluginDefinition } from "../plugin-sdk/index.js";
import openstackPlugin from "../../extensions/openstack/index.js";

/** Extensions shipped with the CLI, in load order. */
export const BUNDLED_PLUGINS: readonly ConvergentPluginDefinition[] = [openstackPlugin];
