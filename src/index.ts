export { resolveExecutable } from './launcher/resolve';
export type { ResolveOptions } from './launcher/resolve';
export { Launcher, run, runCaptured, toExitCode } from './launcher/launcher';
export type { LauncherOptions, CapturedResult, SpawnFunction } from './launcher/launcher';
export { BinaryInstaller, planInstall } from './installer/installer';
export type { BinaryInstallerOptions, InstallPlan } from './installer/installer';
export { createHttpsDownloader } from './installer/download';
export type { Downloader } from './installer/download';
export { archiveExtractor, createArchiveExtractor } from './installer/extract';
export type { Extractor } from './installer/extract';
export { createSearchPathResolver } from './utils/search-path';
export type { SearchPathResolver } from './utils/search-path';
export { loadLauncherConfig } from './utils/config';
export type { LauncherConfig } from './utils/config';
export { createLogger } from './utils/logger';
export type { Logger } from './utils/logger';
export { binaryName, targetTriple } from './utils/platform';
export { LauncherError, ExecutableNotFoundError, UnsupportedPlatformError, InstallError } from './errors';
export { getLauncherVersion } from './version';
