import { spawn, ChildProcess, SpawnOptions } from 'child_process';
import os from 'os';
import { LauncherError } from '../errors';
import { LauncherConfig, loadLauncherConfig } from '../utils/config';
import { silentLogger, Logger } from '../utils/logger';
import { SearchPathResolver } from '../utils/search-path';
import { resolveExecutable } from './resolve';

export type SpawnFunction = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface LauncherOptions {
  config?: Partial<LauncherConfig>;
  searchPath?: SearchPathResolver;
  spawn?: SpawnFunction;
  logger?: Logger;
}

export interface CapturedResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs the engine binary. Each call is one resolve-then-spawn invocation;
 * nothing is kept between calls.
 */
export class Launcher {
  readonly config: LauncherConfig;
  private readonly searchPath?: SearchPathResolver;
  private readonly spawnProcess: SpawnFunction;
  private readonly logger: Logger;

  constructor(options: LauncherOptions = {}) {
    this.config = loadLauncherConfig(options.config);
    this.searchPath = options.searchPath;
    this.spawnProcess = options.spawn ?? spawn;
    this.logger = options.logger ?? silentLogger;
  }

  resolveExecutable(): string {
    return resolveExecutable({
      installDir: this.config.installDir,
      platform: this.config.platform,
      env: this.config.env,
      searchPath: this.searchPath,
      logger: this.logger,
    });
  }

  /** Streams the child's stdio through and resolves with its exit code. */
  async run(args: readonly string[]): Promise<number> {
    const executable = this.resolveExecutable();
    this.logger.debug(`Running ${executable} with ${args.length} argument(s)`);

    return new Promise((resolve, reject) => {
      const child = this.spawnProcess(executable, [...args], {
        stdio: 'inherit',
        env: this.config.env,
      });

      child.on('error', (error) => reject(new LauncherError(`Failed to execute binary: ${error.message}`)));
      child.on('close', (code, signal) => resolve(toExitCode(code, signal)));
    });
  }

  async runCaptured(args: readonly string[]): Promise<CapturedResult> {
    const executable = this.resolveExecutable();
    this.logger.debug(`Running ${executable} (captured) with ${args.length} argument(s)`);

    return new Promise((resolve, reject) => {
      const child = this.spawnProcess(executable, [...args], {
        stdio: ['inherit', 'pipe', 'pipe'],
        env: this.config.env,
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => reject(new LauncherError(`Failed to execute binary: ${error.message}`)));
      child.on('close', (code, signal) => {
        resolve({
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: Buffer.concat(stderr).toString('utf-8'),
          exitCode: toExitCode(code, signal),
        });
      });
    });
  }
}

function isKnownSignal(signal: string): signal is keyof typeof os.constants.signals {
  return signal in os.constants.signals;
}

export function toExitCode(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal && isKnownSignal(signal)) {
    return 128 + os.constants.signals[signal];
  }
  return 1;
}

export async function run(args: readonly string[], options: LauncherOptions = {}): Promise<number> {
  return new Launcher(options).run(args);
}

export async function runCaptured(args: readonly string[], options: LauncherOptions = {}): Promise<CapturedResult> {
  return new Launcher(options).runCaptured(args);
}
