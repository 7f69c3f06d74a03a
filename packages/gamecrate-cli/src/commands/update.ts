/**
 * gamecrate update: merge the remote catalog into the manifest
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  HttpCatalogClient,
  SyncEngine,
  type SyncRunResult,
} from '@gamecrate/catalog-sync';
import { reportCommandError } from '../utils/errors.js';
import { formatDuration, plural } from '../utils/format.js';
import { createLogger } from '../utils/logger.js';
import { collectTags, parsePolicy, toSyncConfig, type UpdateOptions } from '../utils/options.js';
import { requireSession } from '../utils/session.js';

function requestTimeoutMs(): number {
  const raw = Number(process.env['GAMECRATE_REQUEST_TIMEOUT_MS']);
  return Number.isInteger(raw) && raw > 0 ? raw : 30_000;
}

export function printUpdateSummary(result: SyncRunResult, durationMs: number): void {
  console.log(
    chalk.green(
      `Updated ${plural(result.updated.length, 'item')} ` +
        `(${result.enumerated} in catalog, ${result.selected.length} selected by "${result.policy}") ` +
        `in ${formatDuration(durationMs)}.`
    )
  );
  if (result.failures.length > 0) {
    console.log(chalk.yellow(`  ${plural(result.failures.length, 'item')} could not be fetched:`));
    for (const failure of result.failures) {
      console.log(chalk.red(`    - ${failure.itemId} [${failure.code}] ${failure.message}`));
    }
  }
}

export function registerUpdateCommand(program: Command): void {
  program
    .command('update')
    .description('Fetch catalog metadata and merge it into the manifest')
    .option('--policy <policy>', 'all, skip-known, updated-only or single-id', parsePolicy)
    .option('--id <id>', 'Fetch only this item (implies --policy single-id)')
    .option('--os <list>', 'Keep only files for these operating systems', collectTags)
    .option('--lang <list>', 'Keep only files in these languages', collectTags)
    .action(async (_opts: UpdateOptions, cmd: Command) => {
      try {
        const opts = cmd.optsWithGlobals<UpdateOptions>();
        const config = toSyncConfig(opts);
        const { session, apiUrl } = requireSession();

        const logger = createLogger();
        const client = new HttpCatalogClient({ baseUrl: apiUrl, timeoutMs: requestTimeoutMs() });
        const engine = new SyncEngine(config, client, logger);

        const startTime = Date.now();
        const result = await engine.run(session);
        printUpdateSummary(result, Date.now() - startTime);
      } catch (error) {
        reportCommandError(error);
      }
    });
}
