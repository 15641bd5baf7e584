import { existsSync } from "fs";
import { homedir } from "os";
import { resolve } from "path";

export interface Paths {
  unitDir: string;
  configDir: string;
  /** Env file shared by every unit; only wired in once it exists. */
  globalEnvFile: string;
  manifest: string;
}

export const DEFAULT_MANIFEST = "unitab.toml";

export function resolvePaths(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
  cwd: string = process.cwd(),
): Paths {
  const xdg = env.XDG_CONFIG_HOME || resolve(home, ".config");
  const configDir = env.UNITAB_CONFIG_DIR || resolve(xdg, "unitab");
  return {
    unitDir: env.UNITAB_UNIT_DIR || resolve(xdg, "systemd/user"),
    configDir,
    globalEnvFile: resolve(configDir, "env"),
    manifest: resolve(cwd, env.UNITAB_MANIFEST || DEFAULT_MANIFEST),
  };
}

export function activeGlobalEnvFile(paths: Paths): string | undefined {
  return existsSync(paths.globalEnvFile) ? paths.globalEnvFile : undefined;
}

export const GLOBAL_ENV_TEMPLATE = `# unitab global environment
# Every managed timer and service loads this file.
# Format: KEY=VALUE, one per line.
#
# PATH=/usr/local/bin:/usr/bin:/bin
# PYTHONUNBUFFERED=1
`;
