/**
 * gamecrate auth commands: login, logout, status
 *
 * The catalog service hands out access tokens on its account page; login
 * stores one (and optionally the API URL) for later runs.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  readCredentials,
  writeCredentials,
  clearCredentials,
  getCredentialsPath,
  isExpired,
} from '../utils/credentials.js';
import { reportCommandError } from '../utils/errors.js';
import { resolveApiUrl } from '../utils/session.js';

interface LoginOptions {
  token: string;
  apiUrl?: string;
  expiresAt?: string;
}

function parseTimestamp(value: string): string {
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    throw new Error(`Not a valid date: ${value}`);
  }
  return date.toISOString();
}

/**
 * Register the "gamecrate auth" command group with login, logout, and status subcommands.
 */
export function registerAuthCommand(program: Command): void {
  const authCmd = program
    .command('auth')
    .description('Manage the catalog access token');

  // --- gamecrate auth login ---
  authCmd
    .command('login')
    .description('Store an access token for the catalog API')
    .requiredOption('--token <token>', 'Access token from your account page')
    .option('--api-url <url>', 'Catalog API base URL')
    .option('--expires-at <date>', 'When the token expires')
    .action((opts: LoginOptions) => {
      try {
        const apiUrl = opts.apiUrl?.replace(/\/+$/, '');
        if (apiUrl !== undefined) {
          new URL(apiUrl);
        }

        writeCredentials({
          token: opts.token,
          apiUrl,
          storedAt: new Date().toISOString(),
          expiresAt: opts.expiresAt === undefined ? undefined : parseTimestamp(opts.expiresAt),
        });

        console.log(chalk.green('Logged in.'));
        console.log(chalk.dim(`Credentials saved to ${getCredentialsPath()}`));
      } catch (error) {
        reportCommandError(error);
      }
    });

  // --- gamecrate auth logout ---
  authCmd
    .command('logout')
    .description('Clear the stored access token')
    .action(() => {
      const removed = clearCredentials();
      if (removed) {
        console.log(chalk.green('Logged out. Credentials cleared.'));
      } else {
        console.log(chalk.yellow('Not logged in.'));
      }
    });

  // --- gamecrate auth status ---
  authCmd
    .command('status')
    .description('Show current authentication status')
    .action(() => {
      const creds = readCredentials();

      if (!creds) {
        console.log(chalk.yellow('Not logged in.'));
        console.log('Run "gamecrate auth login --token <token>" to authenticate.');
        return;
      }

      if (isExpired(creds)) {
        console.log(chalk.red('Session expired.'));
        console.log('Run "gamecrate auth login --token <token>" to re-authenticate.');
        return;
      }

      console.log(chalk.green('Logged in'));
      console.log(`  Stored at:  ${creds.storedAt}`);
      if (creds.expiresAt) {
        console.log(`  Expires at: ${creds.expiresAt}`);
      }
      try {
        console.log(`  API URL:    ${resolveApiUrl(creds)}`);
      } catch {
        console.log(chalk.yellow('  API URL:    not set (use GAMECRATE_API_URL or --api-url)'));
      }
    });
}
