import { spawn } from 'child_process';
import { InstallError } from '../errors';
import type { SpawnFunction } from '../launcher/launcher';
import { ArchiveFormat } from '../utils/platform';

export interface Extractor {
  extract(archivePath: string, destDir: string, format: ArchiveFormat): Promise<void>;
}

/** Quotes a value as a PowerShell single-quoted literal. */
export function powershellLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function expandArchiveCommand(archivePath: string, destDir: string): string {
  return `Expand-Archive -LiteralPath ${powershellLiteral(archivePath)} -DestinationPath ${powershellLiteral(destDir)} -Force`;
}

export function createArchiveExtractor(spawnProcess: SpawnFunction = spawn): Extractor {
  const runTool = (command: string, args: string[], label: string): Promise<void> =>
    new Promise((resolve, reject) => {
      const child = spawnProcess(command, args, { stdio: 'inherit' });
      child.on('error', (error) => reject(new InstallError(`${label} extraction failed: ${error.message}`)));
      child.on('close', (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new InstallError(`${label} extraction failed with code ${code}`));
        }
      });
    });

  return {
    extract(archivePath, destDir, format) {
      if (format === 'zip') {
        return runTool('powershell', ['-NoProfile', '-Command', expandArchiveCommand(archivePath, destDir)], 'zip');
      }
      return runTool('tar', ['xzf', archivePath, '-C', destDir], 'tar');
    },
  };
}

export const archiveExtractor: Extractor = createArchiveExtractor();
