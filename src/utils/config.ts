import path from 'path';

/**
 * Launcher configuration.
 * Defaults come from the package's own location and the running process;
 * environment variables and explicit overrides are layered on top.
 */
export interface LauncherConfig {
  /** Directory the engine binary is installed into (`<package>/bin` by default). */
  installDir: string;
  platform: NodeJS.Platform;
  arch: string;
  env: NodeJS.ProcessEnv;
  debug: boolean;
}

export const ENV_BIN_DIR = 'AGENT_PRECOMMIT_BIN_DIR';
export const ENV_DEBUG = 'AGENT_PRECOMMIT_DEBUG';
export const ENV_SKIP_INSTALL = 'AGENT_PRECOMMIT_SKIP_INSTALL';

export function getPackageRoot(): string {
  // src/utils or dist/utils
  return path.resolve(__dirname, '..', '..');
}

export function getDefaultInstallDir(): string {
  return path.join(getPackageRoot(), 'bin');
}

export function loadLauncherConfig(overrides: Partial<LauncherConfig> = {}): LauncherConfig {
  const env = overrides.env ?? process.env;
  const envDir = env[ENV_BIN_DIR];

  return {
    installDir: overrides.installDir ?? (envDir ? path.resolve(envDir) : getDefaultInstallDir()),
    platform: overrides.platform ?? process.platform,
    arch: overrides.arch ?? process.arch,
    env,
    debug: overrides.debug ?? Boolean(env[ENV_DEBUG]),
  };
}

export function shouldSkipInstall(env: NodeJS.ProcessEnv = process.env): boolean {
  return env[ENV_SKIP_INSTALL] === '1';
}
