#!/usr/bin/env node
import { Command } from 'commander';
import { getLauncherVersion } from './version';

const program = new Command();
program
  .name('apc-install')
  .description('Download the prebuilt apc binary for this platform')
  .version(getLauncherVersion(), '-v, --version', 'Show launcher version')
  .option('--dir <path>', 'Install directory (defaults to the package bin/ directory)')
  .option('--release <version>', 'Engine release to download (defaults to the launcher version)')
  .option('--strict', 'Exit with an error when the download fails')
  .action(async (options: { dir?: string; release?: string; strict?: boolean }) => {
    const { InstallCommand } = await import('./commands/install');
    const exitCode = await new InstallCommand().run(options);
    process.exit(exitCode);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
