import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { renderInfo, writeSidecars } from '../download/sidecar.js';
import { makeFile, makeItem } from './helpers.js';

describe('sidecars', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gamecrate-sidecar-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should render item metadata and its files', () => {
    const item = makeItem(
      'alpha',
      [
        makeFile({ filename: 'a.exe' }),
        makeFile({ filename: 'map.pdf', kind: 'extra', os: 'any', lang: 'any', size: 3, checksum: 'abc' }),
      ],
      { notes: 'line one\nline two' }
    );

    expect(renderInfo(item)).toBe(
      [
        '-- Title of alpha --',
        '',
        'id............ alpha',
        'title......... Title of alpha',
        'synced........ 2024-05-01T12:00:00.000Z',
        '',
        'notes.........',
        '    line one',
        '    line two',
        '',
        'files.........',
        '    [a.exe] kind=installer os=windows lang=en size=10 checksum=none',
        '    [map.pdf] kind=extra os=any lang=any size=3 checksum=abc',
        '',
      ].join('\n')
    );
  });

  it('should leave out the notes section when there are none', () => {
    expect(renderInfo(makeItem('beta'))).not.toContain('notes');
  });

  it('should write the serial file only for items that have a serial', async () => {
    const withSerial = path.join(tmpDir, 'alpha');
    const without = path.join(tmpDir, 'beta');

    expect(await writeSidecars(withSerial, makeItem('alpha', [], { serial: 'KEY-1' }))).toEqual([
      path.join(withSerial, '!info.txt'),
      path.join(withSerial, '!serial.txt'),
    ]);
    expect(await writeSidecars(without, makeItem('beta', [], { serial: '   ' }))).toEqual([
      path.join(without, '!info.txt'),
    ]);
    expect(fs.readFileSync(path.join(withSerial, '!serial.txt'), 'utf-8')).toBe('KEY-1');
  });
});
