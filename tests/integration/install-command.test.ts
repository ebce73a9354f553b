import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { execSync } from 'child_process';
import fs from 'fs';
import path from 'path';
import { InstallCommand } from '../../src/commands/install';
import { InstallError } from '../../src/errors';
import type { Downloader } from '../../src/installer/download';
import { Launcher } from '../../src/launcher/launcher';
import { createLoggerSpy, installFakeEngine, makeTempDir } from '../helpers/engine';

describe('apc-install', () => {
  let root: string;
  let installDir: string;
  let archive: string;

  beforeEach(() => {
    root = makeTempDir('install');
    installDir = path.join(root, 'bin');

    // A real release-shaped tarball holding the fake engine
    const staging = path.join(root, 'staging');
    fs.mkdirSync(staging);
    installFakeEngine(staging);
    archive = path.join(root, 'release.tar.gz');
    execSync(`tar czf ${JSON.stringify(archive)} apc`, { cwd: staging, stdio: 'pipe' });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function copyingDownloader(): Downloader {
    return {
      download: vi.fn(async (_url: string, dest: string) => {
        fs.copyFileSync(archive, dest);
      }),
    };
  }

  it('installs a binary the launcher can run', async () => {
    const logger = createLoggerSpy();
    const command = new InstallCommand({
      version: '0.1.0',
      config: { installDir, platform: 'linux', arch: 'x64', env: {} },
      downloader: copyingDownloader(),
      logger,
    });

    const exitCode = await command.run();

    expect(exitCode).toBe(0);
    expect(fs.existsSync(path.join(installDir, 'apc.tar.gz'))).toBe(false);
    expect(logger.info).toHaveBeenCalledWith('Platform: linux-x64');
    expect(logger.info).toHaveBeenCalledWith('Target: x86_64-unknown-linux-gnu');
    expect(logger.info).toHaveBeenLastCalledWith('Installation complete!');

    const launcher = new Launcher({
      config: { installDir, platform: 'linux', env: { PATH: process.env.PATH } },
      searchPath: { find: () => null },
    });
    const result = await launcher.runCaptured(['detect']);
    expect(result).toEqual({ stdout: 'detect\n', stderr: 'fake-apc stderr\n', exitCode: 0 });
  });

  it('installs into --dir when given', async () => {
    const downloader = copyingDownloader();
    const otherDir = path.join(root, 'elsewhere');
    const command = new InstallCommand({
      version: '0.1.0',
      config: { installDir, platform: 'linux', arch: 'x64', env: {} },
      downloader,
      logger: createLoggerSpy(),
    });

    await command.run({ dir: otherDir });

    expect(downloader.download).toHaveBeenCalledWith(
      'https://github.com/agent-precommit/agent-precommit/releases/download/v0.1.0/apc-v0.1.0-x86_64-unknown-linux-gnu.tar.gz',
      path.join(otherDir, 'apc.tar.gz'),
    );
    expect(fs.existsSync(path.join(otherDir, 'apc'))).toBe(true);
  });

  it('resolves a relative --dir against the working directory', async () => {
    const downloader = copyingDownloader();
    const logger = createLoggerSpy();
    const otherDir = path.join(root, 'relative');
    const command = new InstallCommand({
      version: '0.1.0',
      config: { installDir, platform: 'linux', arch: 'x64', env: {} },
      downloader,
      logger,
    });

    const exitCode = await command.run({ dir: path.relative(process.cwd(), otherDir) });

    expect(exitCode).toBe(0);
    expect(downloader.download).toHaveBeenCalledWith(expect.any(String), path.join(otherDir, 'apc.tar.gz'));
    expect(fs.existsSync(path.join(otherDir, 'apc'))).toBe(true);
  });

  it('downloads the release named by --release', async () => {
    const downloader = copyingDownloader();
    const command = new InstallCommand({
      config: { installDir, platform: 'linux', arch: 'arm64', env: {} },
      downloader,
      logger: createLoggerSpy(),
    });

    await command.run({ release: '2.0.0' });

    expect(downloader.download).toHaveBeenCalledWith(
      'https://github.com/agent-precommit/agent-precommit/releases/download/v2.0.0/apc-v2.0.0-aarch64-unknown-linux-gnu.tar.gz',
      path.join(installDir, 'apc.tar.gz'),
    );
  });

  it('skips the download when AGENT_PRECOMMIT_SKIP_INSTALL=1', async () => {
    const downloader = copyingDownloader();
    const logger = createLoggerSpy();
    const command = new InstallCommand({
      config: { installDir, platform: 'linux', arch: 'x64', env: { AGENT_PRECOMMIT_SKIP_INSTALL: '1' } },
      downloader,
      logger,
    });

    const exitCode = await command.run();

    expect(exitCode).toBe(0);
    expect(downloader.download).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith('Skipping binary download (AGENT_PRECOMMIT_SKIP_INSTALL=1)');
  });

  describe('when the download fails', () => {
    const failingDownloader: Downloader = {
      download: async () => {
        throw new InstallError('Failed to download: HTTP 404');
      },
    };

    it('reports the failure without failing the command', async () => {
      const logger = createLoggerSpy();
      const command = new InstallCommand({
        config: { installDir, platform: 'linux', arch: 'x64', env: {} },
        downloader: failingDownloader,
        logger,
      });

      const exitCode = await command.run();

      expect(exitCode).toBe(0);
      expect(logger.error).toHaveBeenCalledWith('Installation failed: Failed to download: HTTP 404');
      expect(logger.error).toHaveBeenCalledWith('  cargo install agent-precommit');
    });

    it('fails the command in strict mode', async () => {
      const command = new InstallCommand({
        config: { installDir, platform: 'linux', arch: 'x64', env: {} },
        downloader: failingDownloader,
        logger: createLoggerSpy(),
      });

      expect(await command.run({ strict: true })).toBe(1);
    });
  });
});
