/**
 * gamecrate verify: re-check downloaded files against the manifest
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { IntegrityVerifier, type VerifySummary } from '@gamecrate/catalog-sync';
import { reportCommandError } from '../utils/errors.js';
import { plural } from '../utils/format.js';
import { createLogger } from '../utils/logger.js';
import { toVerifyConfig, type VerifyOptions } from '../utils/options.js';

export function printVerifySummary(summary: VerifySummary): void {
  for (const item of summary.items) {
    if (item.status === 'passed') {
      continue;
    }
    console.log(`${item.itemId} ${chalk.dim(item.title)}`);
    for (const record of item.files) {
      if (record.status === 'missing') {
        console.log(chalk.yellow(`  ? ${record.filename}: missing`));
      }
      for (const failure of record.failures) {
        const deleted = record.deleted ? ' (deleted)' : '';
        console.log(chalk.red(`  ✗ ${record.filename}: [${failure.code}] ${failure.message}${deleted}`));
      }
    }
  }

  const { totals } = summary;
  const line =
    `Verified ${plural(totals.present, 'file')}: ${totals.passed} passed, ${totals.failed} failed, ` +
    `${totals.missing} missing`;
  console.log(totals.failed > 0 ? chalk.red(line) : chalk.green(line));
  if (totals.failed > 0) {
    console.log(
      chalk.dim(
        `  checksum: ${totals.checksumMismatches}, size: ${totals.sizeMismatches}, ` +
          `archive: ${totals.archiveFailures}, deleted: ${totals.deleted}`
      )
    );
  }
}

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Check downloaded files against manifest checksums and sizes')
    .argument('[dir]', 'Directory holding the downloads (default: GAMECRATE_DOWNLOAD_DIR or .)')
    .option('--id <id>', 'Only this item')
    .option('--skip-checksum', 'Do not compare checksums')
    .option('--skip-size', 'Do not compare sizes')
    .option('--skip-archive', 'Do not scan zip archives')
    .option('--delete', 'Delete files that fail verification')
    .action(async (dir: string | undefined, _opts: VerifyOptions, cmd: Command) => {
      try {
        const config = toVerifyConfig(dir, cmd.optsWithGlobals<VerifyOptions>());
        const verifier = new IntegrityVerifier(config, createLogger());
        printVerifySummary(await verifier.run());
      } catch (error) {
        reportCommandError(error);
      }
    });
}
