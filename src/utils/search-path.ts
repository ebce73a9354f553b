import fs from 'fs';
import path from 'path';
import { isWindows } from './platform';

/**
 * Finds an executable by name, the way a shell would.
 * Returns an absolute path, or null when nothing matches.
 */
export interface SearchPathResolver {
  find(name: string): string | null;
}

export interface SearchPathOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

export function createSearchPathResolver(options: SearchPathOptions = {}): SearchPathResolver {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const windows = isWindows(platform);
  const delimiter = windows ? path.win32.delimiter : path.posix.delimiter;

  return {
    find(name: string): string | null {
      const searchPath = (windows ? env.PATH ?? env.Path : env.PATH) ?? '';
      const dirs = searchPath.split(delimiter).filter((dir) => dir.length > 0);
      const candidates = candidateNames(name, windows, env.PATHEXT);

      for (const dir of dirs) {
        for (const candidate of candidates) {
          const fullPath = path.resolve(dir, candidate);
          if (isExecutableFile(fullPath, windows)) {
            return fullPath;
          }
        }
      }
      return null;
    },
  };
}

function candidateNames(name: string, windows: boolean, pathExt: string | undefined): string[] {
  if (!windows || path.win32.extname(name)) {
    return [name];
  }
  const extensions = (pathExt ?? DEFAULT_PATHEXT).split(';').filter(Boolean);
  return [name, ...extensions.map((ext) => `${name}${ext.toLowerCase()}`)];
}

function isExecutableFile(filePath: string, windows: boolean): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) {
      return false;
    }
    // Windows has no execute bit; the extension decides.
    if (!windows) {
      fs.accessSync(filePath, fs.constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}
