#!/usr/bin/env node

/**
 * gamecrate - keep a manifest of your game library, download it, verify it
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { registerAuthCommand } from './commands/auth.js';
import { registerUpdateCommand } from './commands/update.js';
import { registerDownloadCommand } from './commands/download.js';
import { registerVerifyCommand } from './commands/verify.js';
import { registerListCommand } from './commands/list.js';
import { registerBackupCommand, registerImportCommand } from './commands/library.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');
const version =
  pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();

program
  .name('gamecrate')
  .description('Catalog sync, resumable downloads and integrity checks for your game library')
  .version(version)
  .option('--manifest <path>', 'Manifest file (default: GAMECRATE_MANIFEST or ./gamecrate-manifest.yaml)');

registerAuthCommand(program);
registerUpdateCommand(program);
registerDownloadCommand(program);
registerVerifyCommand(program);
registerListCommand(program);
registerImportCommand(program);
registerBackupCommand(program);

await program.parseAsync();
