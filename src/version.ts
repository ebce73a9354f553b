import fs from 'fs';
import path from 'path';

const FALLBACK_VERSION = '0.0.0';

let launcherVersion: string | undefined;

/** Version of this package, which is also the engine release it installs. */
export function getLauncherVersion(): string {
  if (launcherVersion === undefined) {
    launcherVersion = readPackageVersion(path.resolve(__dirname, '..', 'package.json'));
  }
  return launcherVersion;
}

export function readPackageVersion(pkgPath: string): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // unreadable or not JSON
  }
  return FALLBACK_VERSION;
}
