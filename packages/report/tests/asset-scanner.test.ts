import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { classifyAsset, parseAssetDay, scanAssets } from '../src/asset-scanner.js';

describe('classifyAsset', () => {
  it('matches image extensions in any case', () => {
    expect(classifyAsset('shot.PNG')).toBe('image');
    expect(classifyAsset('diagram.svg')).toBe('image');
    expect(classifyAsset('notes.pdf')).toBe('other');
    expect(classifyAsset('README')).toBe('other');
    expect(classifyAsset('photo.heic', ['.heic'])).toBe('image');
  });
});

describe('parseAssetDay', () => {
  it('reads a valid date prefix', () => {
    expect(parseAssetDay('2026-01-06-later.png')).toBe('2026-01-06');
    expect(parseAssetDay('2026-01-32-bad.png')).toBeUndefined();
    expect(parseAssetDay('2026-01-06.png')).toBeUndefined();
    expect(parseAssetDay('demo.png')).toBeUndefined();
  });
});

describe('scanAssets', () => {
  let root: string;
  const january = { year: 2026, month: 1 };

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'worklog-assets-'));
    const dir = path.join(root, '2026-01');
    fs.mkdirSync(path.join(dir, 'sub'), { recursive: true });
    for (const name of [
      'demo.png',
      'notes.pdf',
      '2026-01-06-later.png',
      '2026-01-32-bad.png',
      '2026-02-03-wrong-month.png',
      'overview.JPG',
      '.DS_Store',
      'sub/nested.png',
    ]) {
      fs.writeFileSync(path.join(dir, name), 'x');
    }
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('lists files sorted by name with kinds and days', () => {
    const assets = scanAssets(root, january, { exclude: ['**/.*'] });

    expect(assets.map((a) => [a.name, a.kind, a.associatedDay])).toEqual([
      ['2026-01-06-later.png', 'image', '2026-01-06'],
      ['2026-01-32-bad.png', 'image', undefined],
      ['2026-02-03-wrong-month.png', 'image', undefined],
      ['demo.png', 'image', undefined],
      ['notes.pdf', 'other', undefined],
      ['overview.JPG', 'image', undefined],
    ]);
    expect(assets[3].path).toBe(path.join(root, '2026-01', 'demo.png'));
  });

  it('includes dotfiles unless excluded', () => {
    const assets = scanAssets(root, january);
    expect(assets[0]).toMatchObject({ name: '.DS_Store', kind: 'other' });
    expect(assets).toHaveLength(7);
  });

  it('keeps only the requested day and period-level assets for a day run', () => {
    const fifth = scanAssets(root, { ...january, day: 5 }, { exclude: ['**/.*'] });
    expect(fifth.map((a) => a.name)).not.toContain('2026-01-06-later.png');
    expect(fifth).toHaveLength(5);

    const sixth = scanAssets(root, { ...january, day: 6 }, { exclude: ['**/.*'] });
    expect(sixth.map((a) => a.name)).toContain('2026-01-06-later.png');
    expect(sixth).toHaveLength(6);
  });

  it('returns nothing when the period has no asset directory', () => {
    expect(scanAssets(root, { year: 2026, month: 2 })).toEqual([]);
    expect(scanAssets(path.join(root, 'missing'), january)).toEqual([]);
  });

  it('returns nothing when the assets root is a file', () => {
    const file = path.join(root, '2026-01', 'notes.pdf');
    expect(scanAssets(file, january)).toEqual([]);
  });
});
