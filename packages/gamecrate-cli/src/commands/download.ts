/**
 * gamecrate download: fetch the files the manifest describes
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  DownloadManager,
  type DownloadRunSummary,
  type FetchResult,
  type ScheduledTask,
  type SkipReason,
} from '@gamecrate/catalog-sync';
import { reportCommandError } from '../utils/errors.js';
import { formatBytes, formatDuration, plural } from '../utils/format.js';
import { createLogger } from '../utils/logger.js';
import {
  collectTags,
  parseHours,
  parsePositiveInt,
  toDownloadConfig,
  type DownloadOptions,
} from '../utils/options.js';
import { optionalTransferAuth } from '../utils/session.js';

const SKIP_LABELS: Record<SkipReason, string> = {
  'already-present': 'already present',
  'dry-run': 'would download',
  halted: 'not started',
};

export function formatResultLine(result: FetchResult): string {
  const name = `${result.task.item.id}/${result.task.file.filename}`;
  switch (result.state) {
    case 'completed':
      return chalk.green(`  ✓ ${name} (${formatBytes(result.task.file.size)})`);
    case 'skipped':
      return chalk.dim(`  - ${name} (${SKIP_LABELS[result.skipReason ?? 'already-present']})`);
    case 'failed':
      return chalk.red(`  ✗ ${name}: ${result.failure?.message ?? 'failed'}`);
  }
}

export function printDownloadSummary(summary: DownloadRunSummary, dryRun: boolean): void {
  if (summary.planned === 0) {
    console.log(chalk.yellow('Nothing to download: no manifest file matches the filters.'));
    return;
  }

  const verb = dryRun ? 'Planned' : 'Downloaded';
  console.log(
    chalk.green(
      `${verb} ${plural(summary.planned, 'file')}: ${summary.completed} completed, ` +
        `${summary.skipped} skipped, ${summary.failed} failed ` +
        `(${formatBytes(summary.bytesTransferred)} in ${formatDuration(summary.durationMs)}).`
    )
  );
  if (summary.failed > 0) {
    console.log(chalk.yellow('  Failed files are retried on the next run.'));
  }
}

/**
 * A run stopped by a fatal failure fails the command, after its summary.
 */
export function reportHalt(summary: DownloadRunSummary): void {
  if (summary.haltedBy === undefined) {
    return;
  }
  console.error(chalk.red(`${summary.haltedBy.code}:`), summary.haltedBy.message);
  if (summary.haltedBy.code === 'AuthExpired') {
    console.error('Run "gamecrate auth login --token <token>" and download again; finished files are kept.');
  }
  process.exitCode = 1;
}

export function registerDownloadCommand(program: Command): void {
  program
    .command('download')
    .description('Download manifest files into <dir>/<item-id>/')
    .argument('[dir]', 'Target directory (default: GAMECRATE_DOWNLOAD_DIR or .)')
    .option('--os <list>', 'Only files for these operating systems', collectTags)
    .option('--lang <list>', 'Only files in these languages', collectTags)
    .option('--id <id>', 'Only this item')
    .option('--skip-games', 'Skip installers, patches and language packs')
    .option('--skip-extras', 'Skip bonus material')
    .option('--dry-run', 'Show what would be downloaded')
    .option('--wait <hours>', 'Wait before starting', parseHours)
    .option('--concurrency <n>', 'Parallel transfers (max 4)', parsePositiveInt)
    .action(async (dir: string | undefined, _opts: DownloadOptions, cmd: Command) => {
      try {
        const opts = cmd.optsWithGlobals<DownloadOptions>();
        const config = toDownloadConfig(dir, opts);
        const logger = createLogger();

        const manager = new DownloadManager(config, logger, { ...optionalTransferAuth() });
        manager.on('planned', (tasks: ScheduledTask[]) => {
          const pending = tasks.filter((task) => !task.preSatisfied).length;
          console.log(chalk.blue(`${plural(tasks.length, 'file')} selected, ${pending} to fetch.`));
        });
        manager.on('taskDone', (result) => {
          console.log(formatResultLine(result));
        });

        const summary = await manager.run();
        printDownloadSummary(summary, config.dryRun);
        reportHalt(summary);
      } catch (error) {
        reportCommandError(error);
      }
    });
}
