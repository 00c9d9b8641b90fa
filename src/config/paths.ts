import os from "node:os";
import path from "node:path";

export const STATE_DIRNAME = ".convergent";
export const CONFIG_FILENAME = "config.json";

function resolveUserPath(input: string, homedir: () => string): string {
  const trimmed = input.trim();
  if (trimmed.startsWith("~")) {
    return path.resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return path.resolve(trimmed);
}

/**
 * State directory for convergent (config, caches).
 * `CONVERGENT_STATE_DIR` overrides the default `~/.convergent`.
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.CONVERGENT_STATE_DIR?.trim();
  if (override) return resolveUserPath(override, homedir);
  return path.join(homedir(), STATE_DIRNAME);
}

/**
 * Config file path. `CONVERGENT_CONFIG_PATH` wins over the state directory.
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  stateDir: string = resolveStateDir(env, os.homedir),
  homedir: () => string = os.homedir,
): string {
  const override = env.CONVERGENT_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override, homedir);
  return path.join(stateDir, CONFIG_FILENAME);
}
