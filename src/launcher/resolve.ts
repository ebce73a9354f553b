import fs from 'fs';
import path from 'path';
import { ExecutableNotFoundError } from '../errors';
import { loadLauncherConfig } from '../utils/config';
import { silentLogger, Logger } from '../utils/logger';
import { binaryName } from '../utils/platform';
import { createSearchPathResolver, SearchPathResolver } from '../utils/search-path';

export interface ResolveOptions {
  installDir?: string;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  searchPath?: SearchPathResolver;
  logger?: Logger;
}

/**
 * Locate the engine binary: first next to the launcher (the install
 * directory), then on the search path.
 *
 * @throws ExecutableNotFoundError when neither location has it.
 */
export function resolveExecutable(options: ResolveOptions = {}): string {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const installDir = options.installDir ?? loadLauncherConfig({ env, platform }).installDir;
  const logger = options.logger ?? silentLogger;
  const name = binaryName(platform);

  const colocated = path.resolve(installDir, name);
  if (fs.existsSync(colocated)) {
    logger.debug(`Using bundled binary at ${colocated}`);
    return colocated;
  }

  logger.debug(`No binary at ${colocated}, searching PATH for ${name}`);
  const searchPath = options.searchPath ?? createSearchPathResolver({ env, platform });
  const found = searchPath.find(name);
  if (found) {
    logger.debug(`Using ${found} from PATH`);
    return found;
  }

  throw new ExecutableNotFoundError(colocated, name);
}
