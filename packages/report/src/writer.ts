/**
 * Writes the rendered worklog to `<outputDir>/<YYYY-MM>.md`.
 *
 * The document is written to a temporary file beside the target and
 * renamed over it, so the target is either the old or the new content.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { IOError, getLogger, readTextIfExists, type Period } from '@worklog/core';
import { periodKey } from './period.js';

/** Output file for a period */
export function outputPathFor(outputDir: string, period: Period): string {
  return path.join(outputDir, `${periodKey(period)}.md`);
}

/** Current content of the period's file, or null when there is none */
export function readExistingWorklog(outputDir: string, period: Period): string | null {
  return readTextIfExists(outputPathFor(outputDir, period), 'Cannot read existing worklog');
}

/**
 * Create the output directory if needed and replace the period's file
 * with `content`. Returns the written path.
 */
export function writeWorklog(outputDir: string, period: Period, content: string): string {
  const target = outputPathFor(outputDir, period);
  const temp = `${target}.${process.pid}.tmp`;

  try {
    fs.mkdirSync(outputDir, { recursive: true });
  } catch (error) {
    throw new IOError('Cannot create output directory', outputDir, { cause: error });
  }

  try {
    fs.writeFileSync(temp, content, 'utf-8');
    fs.renameSync(temp, target);
  } catch (error) {
    fs.rmSync(temp, { force: true });
    throw new IOError('Cannot write worklog', target, { cause: error });
  }

  getLogger().info('writer', `Wrote ${target}`, { bytes: Buffer.byteLength(content) });
  return target;
}
