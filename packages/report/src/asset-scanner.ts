/**
 * Asset scanner.
 * Lists `<assetsRoot>/<YYYY-MM>/`, classifies each file and binds
 * `YYYY-MM-DD-` prefixed files to their day.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import {
  DEFAULT_IMAGE_EXTENSIONS,
  IOError,
  getLogger,
  isErrnoException,
  type AssetEntry,
  type AssetKind,
  type Period,
} from '@worklog/core';
import { parseDayKey, periodKey, periodLabel } from './period.js';

export interface ScanOptions {
  /** Lowercase extensions with a leading dot */
  imageExtensions?: readonly string[];
  /** Globs matched against `YYYY-MM/<file name>` */
  exclude?: readonly string[];
}

const DAY_PREFIX = /^(\d{4}-\d{2}-\d{2})-/;

/** `image` for a recognised image extension (any case), else `other` */
export function classifyAsset(
  fileName: string,
  imageExtensions: readonly string[] = DEFAULT_IMAGE_EXTENSIONS
): AssetKind {
  const ext = path.extname(fileName).toLowerCase();
  return ext !== '' && imageExtensions.includes(ext) ? 'image' : 'other';
}

/** The `YYYY-MM-DD` a file name starts with, when it is a real date */
export function parseAssetDay(fileName: string): string | undefined {
  const match = DAY_PREFIX.exec(fileName);
  return match ? parseDayKey(match[1]) : undefined;
}

/**
 * Scan the period's asset directory. A missing directory yields no
 * assets. For a single-day period, assets bound to other days are
 * dropped and period-level assets are kept.
 */
export function scanAssets(
  assetsRoot: string,
  period: Period,
  options: ScanOptions = {}
): AssetEntry[] {
  const { imageExtensions = DEFAULT_IMAGE_EXTENSIONS, exclude = [] } = options;
  const logger = getLogger();
  const key = periodKey(period);
  const dir = path.join(assetsRoot, key);

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      logger.debug('assets', 'No asset directory for period', { dir });
      return [];
    }
    throw new IOError('Cannot list asset directory', dir, { cause: error });
  }

  const assets: AssetEntry[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    const name = entry.name;
    if (exclude.some((pattern) => minimatch(`${key}/${name}`, pattern))) {
      logger.debug('assets', 'Excluded asset', { name });
      continue;
    }

    const day = parseAssetDay(name);
    const associatedDay = day?.startsWith(`${key}-`) ? day : undefined;

    if (period.day !== undefined && associatedDay !== undefined && associatedDay !== periodLabel(period)) {
      continue;
    }

    assets.push({
      path: path.join(dir, name),
      name,
      kind: classifyAsset(name, imageExtensions),
      ...(associatedDay !== undefined ? { associatedDay } : {}),
    });
  }

  assets.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  logger.info('assets', `Found ${assets.length} assets in ${dir}`, {
    images: assets.filter((a) => a.kind === 'image').length,
    dayBound: assets.filter((a) => a.associatedDay !== undefined).length,
  });
  return assets;
}
