import fs from 'fs';
import path from 'path';
import { InstallError } from '../errors';
import { LauncherConfig, loadLauncherConfig } from '../utils/config';
import { silentLogger, Logger } from '../utils/logger';
import { archiveFormat, ArchiveFormat, binaryName, ENGINE_NAME, isWindows, platformKey, targetTriple } from '../utils/platform';
import { getLauncherVersion } from '../version';
import { createHttpsDownloader, Downloader } from './download';
import { archiveExtractor, Extractor } from './extract';

export const RELEASE_REPO = 'agent-precommit/agent-precommit';

export interface InstallPlan {
  platformKey: string;
  targetTriple: string;
  archiveFormat: ArchiveFormat;
  url: string;
  archivePath: string;
  binaryPath: string;
}

export interface PlanInstallOptions {
  version: string;
  platform: NodeJS.Platform;
  arch: string;
  installDir: string;
}

export function planInstall(options: PlanInstallOptions): InstallPlan {
  const triple = targetTriple(options.platform, options.arch);
  const format = archiveFormat(options.platform);
  const filename = `${ENGINE_NAME}-v${options.version}-${triple}.${format}`;

  return {
    platformKey: platformKey(options.platform, options.arch),
    targetTriple: triple,
    archiveFormat: format,
    url: `https://github.com/${RELEASE_REPO}/releases/download/v${options.version}/${filename}`,
    archivePath: path.join(options.installDir, `${ENGINE_NAME}.${format}`),
    binaryPath: path.join(options.installDir, binaryName(options.platform)),
  };
}

export interface BinaryInstallerOptions {
  version?: string;
  config?: Partial<LauncherConfig>;
  downloader?: Downloader;
  extractor?: Extractor;
  logger?: Logger;
}

/**
 * Downloads the prebuilt engine release for the host platform and unpacks
 * it into the launcher's install directory.
 */
export class BinaryInstaller {
  readonly config: LauncherConfig;
  readonly version: string;
  private readonly downloader: Downloader;
  private readonly extractor: Extractor;
  private readonly logger: Logger;

  constructor(options: BinaryInstallerOptions = {}) {
    this.config = loadLauncherConfig(options.config);
    this.version = options.version ?? getLauncherVersion();
    this.downloader = options.downloader ?? createHttpsDownloader();
    this.extractor = options.extractor ?? archiveExtractor;
    this.logger = options.logger ?? silentLogger;
  }

  plan(): InstallPlan {
    return planInstall({
      version: this.version,
      platform: this.config.platform,
      arch: this.config.arch,
      installDir: this.config.installDir,
    });
  }

  async install(): Promise<InstallPlan> {
    const plan = this.plan();
    const { installDir } = this.config;

    this.logger.info(`Platform: ${plan.platformKey}`);
    this.logger.info(`Target: ${plan.targetTriple}`);
    this.logger.info(`Downloading from: ${plan.url}`);

    await fs.promises.mkdir(installDir, { recursive: true });
    await this.downloader.download(plan.url, plan.archivePath);
    this.logger.info('Download complete');

    await this.extractor.extract(plan.archivePath, installDir, plan.archiveFormat);
    this.logger.info('Extraction complete');

    await fs.promises.rm(plan.archivePath, { force: true });

    if (!fs.existsSync(plan.binaryPath)) {
      throw new InstallError(`Binary not found at ${plan.binaryPath} after extraction`);
    }
    if (!isWindows(this.config.platform)) {
      await fs.promises.chmod(plan.binaryPath, 0o755);
    }

    this.logger.info('Installation complete!');
    return plan;
  }
}
