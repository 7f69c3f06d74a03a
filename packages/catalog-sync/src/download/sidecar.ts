/**
 * Human-readable metadata written next to an item's downloads.
 */

import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import { toFilesystemError } from '../errors.js';
import type { Item } from '../manifest/types.js';
import { INFO_FILENAME, SERIAL_FILENAME } from './layout.js';

function field(label: string, value: string): string {
  return `${label.padEnd(14, '.')} ${value}`;
}

export function renderInfo(item: Item): string {
  const lines = [
    `-- ${item.title} --`,
    '',
    field('id', item.id),
    field('title', item.title),
    field('synced', item.syncedAt),
  ];

  if (item.notes.trim() !== '') {
    lines.push('', 'notes.........');
    for (const line of item.notes.split(/\r?\n/)) {
      lines.push(`    ${line}`);
    }
  }

  lines.push('', 'files.........');
  for (const file of item.files) {
    lines.push(
      `    [${file.filename}] kind=${file.kind} os=${file.os} lang=${file.lang} ` +
        `size=${file.size} checksum=${file.checksum ?? 'none'}`
    );
  }

  return lines.join('\n') + '\n';
}

/**
 * Write `!info.txt`, and `!serial.txt` when the item carries a serial.
 * Returns the paths written.
 */
export async function writeSidecars(itemDir: string, item: Item): Promise<string[]> {
  const written: string[] = [];
  const infoPath = path.join(itemDir, INFO_FILENAME);
  try {
    await fsp.mkdir(itemDir, { recursive: true });
    await fsp.writeFile(infoPath, renderInfo(item), 'utf-8');
    written.push(infoPath);
  } catch (err) {
    throw toFilesystemError(infoPath, err);
  }

  if (item.serial !== undefined && item.serial.trim() !== '') {
    const serialPath = path.join(itemDir, SERIAL_FILENAME);
    try {
      await fsp.writeFile(serialPath, item.serial, 'utf-8');
      written.push(serialPath);
    } catch (err) {
      throw toFilesystemError(serialPath, err);
    }
  }

  return written;
}
