/**
 * gamecrate list: show what the manifest knows
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  DEFAULT_MANIFEST_PATH,
  UnknownItemError,
  loadManifest,
  queryManifest,
  type Manifest,
  type ManifestFilter,
} from '@gamecrate/catalog-sync';
import { reportCommandError } from '../utils/errors.js';
import { formatBytes } from '../utils/format.js';
import { collectTags, type GlobalOptions } from '../utils/options.js';

type ListOptions = GlobalOptions & {
  id?: string;
  os?: string[];
  lang?: string[];
};

/** Manifest contents as printable lines, one block per item. */
export function renderListing(manifest: Manifest, filter: ManifestFilter): string[] {
  const lines: string[] = [];
  let currentItem: string | null = null;

  for (const { item, file } of queryManifest(manifest, filter)) {
    if (item.id !== currentItem) {
      currentItem = item.id;
      lines.push(`${chalk.bold(item.id)}  ${item.title}`);
    }
    const marker = file.updated ? ` ${chalk.yellow('*updated')}` : '';
    lines.push(
      `    ${file.filename}  ${chalk.dim(`${file.kind} ${file.os}/${file.lang} ${formatBytes(file.size)}`)}${marker}`
    );
  }

  return lines;
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List manifest items and their files')
    .option('--id <id>', 'Only this item')
    .option('--os <list>', 'Only files for these operating systems', collectTags)
    .option('--lang <list>', 'Only files in these languages', collectTags)
    .action(async (_opts: ListOptions, cmd: Command) => {
      try {
        const opts = cmd.optsWithGlobals<ListOptions>();
        const manifest = await loadManifest(opts.manifest ?? process.env['GAMECRATE_MANIFEST'] ?? DEFAULT_MANIFEST_PATH);

        if (opts.id !== undefined && !manifest.items.has(opts.id)) {
          throw new UnknownItemError(opts.id, 'the manifest');
        }
        if (manifest.items.size === 0) {
          console.log('The manifest is empty. Run "gamecrate update" first.');
          return;
        }

        const filter: ManifestFilter = { os: opts.os ?? [], lang: opts.lang ?? [] };
        if (opts.id !== undefined) filter.itemId = opts.id;

        for (const line of renderListing(manifest, filter)) {
          console.log(line);
        }
      } catch (error) {
        reportCommandError(error);
      }
    });
}
