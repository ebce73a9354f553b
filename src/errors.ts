export class LauncherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LauncherError';
  }
}

export class ExecutableNotFoundError extends LauncherError {
  expectedPath: string;
  binaryName: string;
  constructor(expectedPath: string, binaryName: string) {
    super(`Could not find ${binaryName} binary. Expected at ${expectedPath} or in PATH.`);
    this.name = 'ExecutableNotFoundError';
    this.expectedPath = expectedPath;
    this.binaryName = binaryName;
  }
}

export class UnsupportedPlatformError extends LauncherError {
  platformKey: string;
  constructor(platformKey: string, supported: string[]) {
    super(`Unsupported platform: ${platformKey}. Supported platforms: ${supported.join(', ')}`);
    this.name = 'UnsupportedPlatformError';
    this.platformKey = platformKey;
  }
}

export class InstallError extends LauncherError {
  constructor(message: string) {
    super(message);
    this.name = 'InstallError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
