/**
 * gamecrate import / backup: move already-downloaded files around
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  DEFAULT_MANIFEST_PATH,
  backupFiles,
  importFiles,
  loadManifest,
} from '@gamecrate/catalog-sync';
import { reportCommandError } from '../utils/errors.js';
import { plural } from '../utils/format.js';
import { createLogger } from '../utils/logger.js';
import type { GlobalOptions } from '../utils/options.js';

function manifestPath(opts: GlobalOptions): string {
  return opts.manifest ?? process.env['GAMECRATE_MANIFEST'] ?? DEFAULT_MANIFEST_PATH;
}

export function registerImportCommand(program: Command): void {
  program
    .command('import')
    .description('Copy files found under <src> whose checksum matches the manifest into <dest>')
    .argument('<src>', 'Directory to scan')
    .argument('<dest>', 'Download directory')
    .action(async (src: string, dest: string, _opts: GlobalOptions, cmd: Command) => {
      try {
        const manifest = await loadManifest(manifestPath(cmd.optsWithGlobals<GlobalOptions>()));
        const result = await importFiles(manifest, src, dest, createLogger());

        for (const file of result.copied) {
          console.log(chalk.green(`  ✓ ${file.itemId}/${file.filename}`) + chalk.dim(` <- ${file.source}`));
        }
        console.log(
          `Scanned ${plural(result.scanned, 'file')}: ${result.matched} matched, ` +
            `${result.copied.length} imported, ${result.alreadyPresent} already in place.`
        );
      } catch (error) {
        reportCommandError(error);
      }
    });
}

export function registerBackupCommand(program: Command): void {
  program
    .command('backup')
    .description('Copy complete downloads from <src> to <dest>')
    .argument('<src>', 'Download directory')
    .argument('<dest>', 'Backup directory')
    .action(async (src: string, dest: string, _opts: GlobalOptions, cmd: Command) => {
      try {
        const manifest = await loadManifest(manifestPath(cmd.optsWithGlobals<GlobalOptions>()));
        const result = await backupFiles(manifest, src, dest, createLogger());

        console.log(
          chalk.green(`Backed up ${plural(result.copied.length, 'file')}`) +
            `, ${result.upToDate} already up to date.`
        );
        if (result.unexpectedSize.length > 0) {
          console.log(chalk.yellow(`  ${plural(result.unexpectedSize.length, 'file')} skipped, size differs from the manifest:`));
          for (const skipped of result.unexpectedSize) {
            console.log(chalk.yellow(`    - ${skipped}`));
          }
        }
      } catch (error) {
        reportCommandError(error);
      }
    });
}
