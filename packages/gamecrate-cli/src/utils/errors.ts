import chalk from 'chalk';
import { GamecrateError, errorMessage } from '@gamecrate/catalog-sync';

/**
 * Print an error that ended a command and mark the process as failed.
 * Reached only by errors that aborted the whole run; per-file and per-item
 * failures are part of the command's summary instead.
 */
export function reportCommandError(err: unknown): void {
  const label = err instanceof GamecrateError ? err.code : 'Error';
  console.error(chalk.red(`${label}:`), errorMessage(err));
  process.exitCode = 1;
}
