import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { importFiles } from '../library/import.js';
import { backupFiles } from '../library/backup.js';
import { copyAtomic, walkFiles } from '../library/copy.js';
import { createEmptyManifest, upsertItem } from '../manifest/manifest-store.js';
import type { Manifest } from '../manifest/types.js';
import { FilesystemError } from '../errors.js';
import { createTestLogger, makeFile, makeItem, md5 } from './helpers.js';

const ORIGINAL = 'original!!';

function write(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
}

describe('library', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gamecrate-library-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('importFiles', () => {
    function manifest(): Manifest {
      const m = createEmptyManifest();
      upsertItem(
        m,
        makeItem('alpha', [
          makeFile({ filename: 'game.exe', size: 10, checksum: md5(ORIGINAL) }),
          makeFile({ filename: 'nochecksum.exe', size: 10, checksum: null }),
        ])
      );
      return m;
    }

    it('should copy files whose content matches a manifest checksum', async () => {
      const sourceDir = path.join(tmpDir, 'incoming');
      const destRoot = path.join(tmpDir, 'library');
      write(path.join(sourceDir, 'nested', 'renamed.bin'), ORIGINAL);
      write(path.join(sourceDir, 'decoy.bin'), 'tampered!!');
      write(path.join(sourceDir, 'other.txt'), 'a different size');

      const result = await importFiles(manifest(), sourceDir, destRoot, createTestLogger());

      const target = path.join(destRoot, 'alpha', 'game.exe');
      expect(result.scanned).toBe(3);
      expect(result.matched).toBe(1);
      expect(result.copied).toEqual([
        { source: path.join(sourceDir, 'nested', 'renamed.bin'), target, itemId: 'alpha', filename: 'game.exe' },
      ]);
      expect(fs.readFileSync(target, 'utf-8')).toBe(ORIGINAL);
      expect(fs.existsSync(path.join(sourceDir, 'nested', 'renamed.bin'))).toBe(true);
    });

    it('should count an identical file already in place instead of copying it', async () => {
      const sourceDir = path.join(tmpDir, 'incoming');
      const destRoot = path.join(tmpDir, 'library');
      write(path.join(sourceDir, 'renamed.bin'), ORIGINAL);
      write(path.join(destRoot, 'alpha', 'game.exe'), ORIGINAL);

      const result = await importFiles(manifest(), sourceDir, destRoot, createTestLogger());

      expect(result.matched).toBe(1);
      expect(result.alreadyPresent).toBe(1);
      expect(result.copied).toEqual([]);
    });

    it('should replace a same-size target with different content', async () => {
      const sourceDir = path.join(tmpDir, 'incoming');
      const destRoot = path.join(tmpDir, 'library');
      write(path.join(sourceDir, 'renamed.bin'), ORIGINAL);
      write(path.join(destRoot, 'alpha', 'game.exe'), 'tampered!!');

      const result = await importFiles(manifest(), sourceDir, destRoot, createTestLogger());

      expect(result.copied).toHaveLength(1);
      expect(fs.readFileSync(path.join(destRoot, 'alpha', 'game.exe'), 'utf-8')).toBe(ORIGINAL);
    });
  });

  describe('backupFiles', () => {
    function manifest(): Manifest {
      const m = createEmptyManifest();
      upsertItem(
        m,
        makeItem('alpha', [makeFile({ filename: 'game.exe' }), makeFile({ filename: 'absent.exe' })], {
          serial: 'KEY-1',
        })
      );
      upsertItem(m, makeItem('beta', [makeFile({ filename: 'b.exe' })]));
      return m;
    }

    it('should copy complete files and their sidecars', async () => {
      const sourceRoot = path.join(tmpDir, 'library');
      const destRoot = path.join(tmpDir, 'backup');
      write(path.join(sourceRoot, 'alpha', 'game.exe'), ORIGINAL);
      write(path.join(sourceRoot, 'alpha', '!info.txt'), 'info');
      write(path.join(sourceRoot, 'alpha', '!serial.txt'), 'KEY-1');
      write(path.join(sourceRoot, 'beta', 'b.exe'), 'short');

      const result = await backupFiles(manifest(), sourceRoot, destRoot, createTestLogger());

      expect(result.copied).toEqual([
        path.join(destRoot, 'alpha', 'game.exe'),
        path.join(destRoot, 'alpha', '!info.txt'),
        path.join(destRoot, 'alpha', '!serial.txt'),
      ]);
      expect(result.unexpectedSize).toEqual([path.join(sourceRoot, 'beta', 'b.exe')]);
      expect(result.upToDate).toBe(0);
      expect(fs.existsSync(path.join(destRoot, 'beta'))).toBe(false);
    });

    it('should leave files already backed up alone', async () => {
      const sourceRoot = path.join(tmpDir, 'library');
      const destRoot = path.join(tmpDir, 'backup');
      write(path.join(sourceRoot, 'alpha', 'game.exe'), ORIGINAL);

      await backupFiles(manifest(), sourceRoot, destRoot, createTestLogger());
      const second = await backupFiles(manifest(), sourceRoot, destRoot, createTestLogger());

      expect(second.copied).toEqual([]);
      expect(second.upToDate).toBe(1);
    });
  });

  describe('walkFiles', () => {
    it('should list regular files recursively in name order', async () => {
      write(path.join(tmpDir, 'b.txt'), 'b');
      write(path.join(tmpDir, 'a', 'z.txt'), 'z');
      write(path.join(tmpDir, 'a', 'y.txt'), 'y');

      expect(await walkFiles(tmpDir)).toEqual([
        path.join(tmpDir, 'a', 'y.txt'),
        path.join(tmpDir, 'a', 'z.txt'),
        path.join(tmpDir, 'b.txt'),
      ]);
    });

    it('should throw FilesystemError for a missing directory', async () => {
      await expect(walkFiles(path.join(tmpDir, 'nope'))).rejects.toBeInstanceOf(FilesystemError);
    });
  });

  describe('copyAtomic', () => {
    it('should create parent directories and leave no partial file', async () => {
      const src = path.join(tmpDir, 'src.bin');
      const dest = path.join(tmpDir, 'deep', 'dir', 'dest.bin');
      write(src, ORIGINAL);

      await copyAtomic(src, dest);

      expect(fs.readFileSync(dest, 'utf-8')).toBe(ORIGINAL);
      expect(fs.readdirSync(path.dirname(dest))).toEqual(['dest.bin']);
    });

    it('should throw FilesystemError when the source is missing', async () => {
      await expect(copyAtomic(path.join(tmpDir, 'missing'), path.join(tmpDir, 'out'))).rejects.toBeInstanceOf(
        FilesystemError
      );
    });
  });
});
