import { UnsupportedPlatformError } from '../errors';

export const ENGINE_NAME = 'apc';

export type ArchiveFormat = 'zip' | 'tar.gz';

const TARGET_TRIPLES: Record<string, string> = {
  'darwin-x64': 'x86_64-apple-darwin',
  'darwin-arm64': 'aarch64-apple-darwin',
  'linux-x64': 'x86_64-unknown-linux-gnu',
  'linux-arm64': 'aarch64-unknown-linux-gnu',
  'win32-x64': 'x86_64-pc-windows-msvc',
  'win32-arm64': 'aarch64-pc-windows-msvc',
};

export function isWindows(platform: NodeJS.Platform): boolean {
  return platform === 'win32';
}

export function binaryName(platform: NodeJS.Platform = process.platform): string {
  return isWindows(platform) ? `${ENGINE_NAME}.exe` : ENGINE_NAME;
}

export function platformKey(platform: NodeJS.Platform = process.platform, arch: string = process.arch): string {
  return `${platform}-${arch}`;
}

export function supportedPlatformKeys(): string[] {
  return Object.keys(TARGET_TRIPLES);
}

export function targetTriple(platform: NodeJS.Platform = process.platform, arch: string = process.arch): string {
  const key = platformKey(platform, arch);
  const triple = TARGET_TRIPLES[key];
  if (!triple) {
    throw new UnsupportedPlatformError(key, supportedPlatformKeys());
  }
  return triple;
}

export function archiveFormat(platform: NodeJS.Platform = process.platform): ArchiveFormat {
  return isWindows(platform) ? 'zip' : 'tar.gz';
}
