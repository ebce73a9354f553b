import path from 'path';
import { errorMessage } from '../errors';
import { BinaryInstaller, BinaryInstallerOptions } from '../installer/installer';
import { ENV_SKIP_INSTALL, loadLauncherConfig, shouldSkipInstall } from '../utils/config';
import { createLogger, Logger } from '../utils/logger';

export interface InstallCommandOptions {
  dir?: string;
  release?: string;
  strict?: boolean;
}

const MANUAL_HINTS = [
  'You can try installing manually:',
  '  cargo install agent-precommit',
  '  # or',
  '  pip install agent-precommit',
];

export class InstallCommand {
  constructor(private readonly deps: BinaryInstallerOptions = {}) {}

  async run(options: InstallCommandOptions = {}): Promise<number> {
    const config = loadLauncherConfig({
      ...this.deps.config,
      ...(options.dir ? { installDir: path.resolve(options.dir) } : {}),
    });
    const logger: Logger = this.deps.logger ?? createLogger({ debug: config.debug });

    if (shouldSkipInstall(config.env)) {
      logger.info(`Skipping binary download (${ENV_SKIP_INSTALL}=1)`);
      return 0;
    }

    const installer = new BinaryInstaller({
      ...this.deps,
      config,
      version: options.release ?? this.deps.version,
      logger,
    });

    try {
      const plan = await installer.install();
      logger.debug(`Installed ${plan.binaryPath}`);
      return 0;
    } catch (error) {
      logger.error(`Installation failed: ${errorMessage(error)}`);
      for (const hint of MANUAL_HINTS) {
        logger.error(hint);
      }
      // The launcher reports the missing binary on first use, so a failed
      // download only fails the command in strict mode.
      return options.strict ? 1 : 0;
    }
  }
}
