/**
 * Worklog generation pipeline.
 * Resolves the period, reads commits, scans assets, renders and writes
 * the month document. Every input from the environment (working
 * directory, clock, git handle) is passed in.
 */

import * as path from 'node:path';
import {
  getLogger,
  type GitClient,
  type Period,
  type ReportStats,
  type WorklogConfig,
} from '@worklog/core';
import { resolvePeriod, periodLabel } from './period.js';
import { readCommits } from './commit-reader.js';
import { groupCommitsByDay } from './grouper.js';
import { scanAssets } from './asset-scanner.js';
import { computeStats } from './stats.js';
import { loadTemplate } from './template.js';
import {
  assetsByDay,
  renderAssetsSection,
  renderDaySection,
  renderWorklog,
  type RenderOptions,
} from './renderer.js';
import { mergeAssetsSection, mergeDaySection } from './merge.js';
import { outputPathFor, readExistingWorklog, writeWorklog } from './writer.js';

export interface GenerateOptions {
  /** Project directory; config paths resolve against it */
  cwd: string;
  now: Date;
  git: GitClient;
  config: WorklogConfig;
  /** Positional `YYYY-MM` */
  positional?: string;
  /** `--month YYYY-MM` */
  month?: string;
  /** `--day YYYY-MM-DD` */
  day?: string;
  author?: string;
  /** Render only; leave the output file alone */
  dryRun?: boolean;
}

export interface GenerateResult {
  period: Period;
  outputPath: string;
  document: string;
  stats: ReportStats;
  /** False for dry runs */
  written: boolean;
  /** True when a day run was spliced into an existing month file */
  merged: boolean;
}

export async function generateWorklog(options: GenerateOptions): Promise<GenerateResult> {
  const { cwd, now, git, config } = options;
  const logger = getLogger();

  const period = resolvePeriod({
    positional: options.positional,
    month: options.month,
    day: options.day,
    now,
  });
  logger.info('generate', `Generating worklog for ${periodLabel(period)}`, { cwd });

  const commits = await readCommits(git, period, { author: options.author });
  const groups = groupCommitsByDay(commits);
  const assets = scanAssets(path.resolve(cwd, config.assets.dir), period, {
    imageExtensions: config.assets.imageExtensions,
    exclude: config.assets.exclude,
  });
  const stats = computeStats(commits, groups, assets);

  const outputDir = path.resolve(cwd, config.outputDir);
  const outputPath = outputPathFor(outputDir, period);
  const renderOptions: RenderOptions = {
    details: config.report.details,
    maxFilesPerCommit: config.report.maxFilesPerCommit,
    emptyDays: config.report.emptyDays,
  };

  let document: string | undefined;
  let merged = false;

  if (period.day !== undefined) {
    const existing = readExistingWorklog(outputDir, period);
    if (existing !== null) {
      const day = periodLabel(period);
      const dayCommits = groups.get(day) ?? [];
      const dayAssets = assetsByDay(assets).get(day) ?? [];
      const hasActivity = dayCommits.length > 0 || dayAssets.length > 0;
      const section =
        hasActivity || renderOptions.emptyDays === 'placeholder'
          ? renderDaySection(day, dayCommits, dayAssets, outputDir, renderOptions)
          : null;
      document = mergeAssetsSection(
        mergeDaySection(existing, day, section, dayCommits.length > 0),
        renderAssetsSection(assets, outputDir)
      );
      merged = true;
      logger.debug('generate', 'Merged day and assets sections into existing worklog', {
        day,
        hasActivity,
      });
    }
  }

  if (document === undefined) {
    document = renderWorklog({
      period,
      groups,
      assets,
      template: loadTemplate(path.resolve(cwd, config.template)),
      stats,
      generatedAt: now,
      outputDir,
      options: renderOptions,
    });
  }

  if (options.dryRun) {
    logger.info('generate', 'Dry run, output not written', { outputPath });
    return { period, outputPath, document, stats, written: false, merged };
  }

  writeWorklog(outputDir, period, document);
  return { period, outputPath, document, stats, written: true, merged };
}
