import { ExecutableNotFoundError, LauncherError } from '../errors';
import { Launcher, LauncherOptions } from '../launcher/launcher';
import { loadLauncherConfig } from '../utils/config';
import { createLogger, Logger } from '../utils/logger';

const INSTALL_HINTS = [
  'The prebuilt binary could not be downloaded during installation.',
  '',
  'You can install agent-precommit manually:',
  '  npx apc-install',
  '  # or',
  '  cargo install agent-precommit',
  '  # or',
  '  pip install agent-precommit',
  '',
  'Or download directly from:',
  '  https://github.com/agent-precommit/agent-precommit/releases',
];

/**
 * Pass-through entry: every argument goes to the engine untouched and the
 * engine's exit code is returned as ours.
 */
export class RunCommand {
  private readonly logger: Logger;
  private readonly options: LauncherOptions;

  constructor(options: LauncherOptions = {}) {
    const config = loadLauncherConfig(options.config);
    this.logger = options.logger ?? createLogger({ debug: config.debug });
    this.options = { ...options, config, logger: this.logger };
  }

  async run(args: string[]): Promise<number> {
    try {
      return await new Launcher(this.options).run(args);
    } catch (error) {
      if (error instanceof ExecutableNotFoundError) {
        this.logger.error('Error: Binary not found.');
        this.logger.error(error.message);
        for (const hint of INSTALL_HINTS) {
          this.logger.error(hint);
        }
        return 1;
      }
      if (error instanceof LauncherError) {
        this.logger.error(error.message);
        return 1;
      }
      throw error;
    }
  }
}
