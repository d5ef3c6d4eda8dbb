/**
 * Path resolution for tapforge's data and configuration.
 *
 * Runs are stored per run identifier under `<dataDir>/runs/<runId>/`, next to
 * their structured log. The locations follow platform conventions through
 * `env-paths`:
 *
 * - Linux: `~/.local/share/tapforge` (respects `XDG_DATA_HOME`)
 * - macOS: `~/Library/Application Support/tapforge`
 * - Windows: `%APPDATA%\tapforge`
 *
 * `TAPFORGE_HOME` replaces both the data and the config directory, which keeps
 * a whole installation inside one folder.
 *
 * Nothing here touches the filesystem; callers receive the resolved paths and
 * pass them explicitly into the services that need them.
 *
 * @module
 */

import * as path from "node:path";
import envPaths from "env-paths";

/** Application name used for platform directories. */
export const APP_NAME = "tapforge";

/** Environment variable overriding every tapforge directory. */
export const HOME_ENV_VAR = "TAPFORGE_HOME";

/**
 * Resolved locations used by the CLI.
 */
export interface AppPaths {
  /** Root directory for persistent data. */
  readonly dataDir: string;

  /** Directory holding one sub-directory per run. */
  readonly runsDir: string;

  /** Default location of the optional YAML configuration. */
  readonly configFile: string;
}

/**
 * Resolves application paths.
 *
 * @param env - Environment to read overrides from (default: `process.env`)
 */
export function resolveAppPaths(env: NodeJS.ProcessEnv = process.env): AppPaths {
  const home = env[HOME_ENV_VAR]?.trim();

  if (home) {
    const dataDir = path.resolve(home);
    return Object.freeze({
      dataDir,
      runsDir: path.join(dataDir, "runs"),
      configFile: path.join(dataDir, "config.yaml"),
    });
  }

  // suffix: "" prevents adding "-nodejs" to the directory name
  const platformPaths = envPaths(APP_NAME, { suffix: "" });
  const dataDir = path.normalize(platformPaths.data);

  return Object.freeze({
    dataDir,
    runsDir: path.join(dataDir, "runs"),
    configFile: path.join(path.normalize(platformPaths.config), "config.yaml"),
  });
}
