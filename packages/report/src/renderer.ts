/**
 * Markdown worklog renderer.
 *
 * Layout:
 *   header (template with placeholders resolved)
 *   "no activity" line when the period has no commits
 *   one `### YYYY-MM-DD — Commits summary` section per day, ascending
 *   `## Assets` with period-level assets
 */

import * as path from 'node:path';
import {
  toPosixPath,
  type AssetEntry,
  type CommitRecord,
  type DayGroup,
  type EmptyDayPolicy,
  type Period,
  type ReportStats,
} from '@worklog/core';
import { enumerateDays, periodLabel } from './period.js';
import { applyPlaceholders } from './template.js';

export interface RenderOptions {
  /** Per-commit date, files and message body under `#### Details` */
  details: boolean;
  maxFilesPerCommit: number;
  emptyDays: EmptyDayPolicy;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  details: true,
  maxFilesPerCommit: 20,
  emptyDays: 'omit',
};

export interface RenderInput {
  period: Period;
  groups: DayGroup;
  assets: readonly AssetEntry[];
  template: string;
  stats: ReportStats;
  generatedAt: Date;
  /** Directory the document is written to; asset links are relative to it */
  outputDir: string;
  options?: Partial<RenderOptions>;
}

export const ASSETS_HEADING = '## Assets';
export const EMPTY_DAY_LINE = '_No recorded activity._';

export function noActivityLine(period: Period): string {
  return `_No activity recorded for ${periodLabel(period)}._`;
}

export function dayHeading(day: string): string {
  return `### ${day} — Commits summary`;
}

export function shortHash(hash: string): string {
  return hash.slice(0, 7);
}

/** `- abc1234 — subject (Author)` */
export function formatCommitLine(commit: CommitRecord): string {
  return `- ${shortHash(commit.hash)} — ${commit.message} (${commit.author})`;
}

/** `YYYY-MM-DD HH:MM:SS +0000` */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, ' +0000');
}

/** Asset path relative to the output directory, each segment percent-encoded */
export function assetLink(asset: AssetEntry, outputDir: string): string {
  return toPosixPath(path.relative(outputDir, asset.path))
    .split('/')
    .map(encodeURIComponent)
    .join('/');
}

/** Images as inline image syntax, everything else as a link list */
function renderAssetBlocks(assets: readonly AssetEntry[], outputDir: string): string[] {
  const blocks: string[] = [];
  const images = assets.filter((a) => a.kind === 'image');
  const others = assets.filter((a) => a.kind !== 'image');
  if (images.length > 0) {
    blocks.push(images.map((a) => `![${a.name}](${assetLink(a, outputDir)})`).join('\n'));
  }
  if (others.length > 0) {
    blocks.push(others.map((a) => `- [${a.name}](${assetLink(a, outputDir)})`).join('\n'));
  }
  return blocks;
}

function renderCommitDetails(commit: CommitRecord, maxFiles: number): string {
  const lines = [formatCommitLine(commit), `  - Date: ${formatTimestamp(commit.timestamp)}`];

  if (commit.files.length === 0) {
    lines.push('  - Files: (none)');
  } else {
    lines.push('  - Files:');
    for (const file of commit.files.slice(0, maxFiles)) {
      lines.push(`    - ${file}`);
    }
    const hidden = commit.files.length - maxFiles;
    if (hidden > 0) lines.push(`    - … and ${hidden} more`);
  }

  if (commit.body) {
    lines.push('  - Message:');
    for (const line of commit.body.split('\n')) {
      lines.push(line.trim() ? `    ${line.trimEnd()}` : '');
    }
  }

  return lines.join('\n');
}

/** One day's section: commit bullets, then its assets, then details */
export function renderDaySection(
  day: string,
  commits: readonly CommitRecord[],
  assets: readonly AssetEntry[],
  outputDir: string,
  options: RenderOptions = DEFAULT_RENDER_OPTIONS
): string {
  const blocks = [dayHeading(day)];

  if (commits.length > 0) {
    blocks.push(commits.map(formatCommitLine).join('\n'));
  }
  blocks.push(...renderAssetBlocks(assets, outputDir));

  if (commits.length === 0 && assets.length === 0) {
    blocks.push(EMPTY_DAY_LINE);
  }

  if (options.details && commits.length > 0) {
    blocks.push('#### Details');
    blocks.push(
      commits.map((c) => renderCommitDetails(c, options.maxFilesPerCommit)).join('\n\n')
    );
  }

  return blocks.join('\n\n');
}

/** Assets bound to a day, keyed by that day */
export function assetsByDay(assets: readonly AssetEntry[]): Map<string, AssetEntry[]> {
  const byDay = new Map<string, AssetEntry[]>();
  for (const asset of assets) {
    if (asset.associatedDay === undefined) continue;
    const bucket = byDay.get(asset.associatedDay) ?? [];
    bucket.push(asset);
    byDay.set(asset.associatedDay, bucket);
  }
  return byDay;
}

/** The trailing `## Assets` section for period-level assets, or null when there are none */
export function renderAssetsSection(
  assets: readonly AssetEntry[],
  outputDir: string
): string | null {
  const periodAssets = assets.filter((a) => a.associatedDay === undefined);
  if (periodAssets.length === 0) return null;
  return [ASSETS_HEADING, ...renderAssetBlocks(periodAssets, outputDir)].join('\n\n');
}

/**
 * Days that get a section: every day of the period under the
 * `placeholder` policy, otherwise only days with commits or assets.
 */
export function sectionDays(
  period: Period,
  groups: DayGroup,
  dayAssets: Map<string, AssetEntry[]>,
  emptyDays: EmptyDayPolicy
): string[] {
  if (emptyDays === 'placeholder') return enumerateDays(period);
  return Array.from(new Set([...groups.keys(), ...dayAssets.keys()])).sort();
}

/** Render the full document. Ends with exactly one newline. */
export function renderWorklog(input: RenderInput): string {
  const { period, groups, assets, template, stats, generatedAt, outputDir } = input;
  const options: RenderOptions = { ...DEFAULT_RENDER_OPTIONS, ...input.options };

  const blocks = [applyPlaceholders(template, { period, stats, generatedAt }).trim()];

  if (stats.commits === 0) {
    blocks.push(noActivityLine(period));
  }

  const dayAssets = assetsByDay(assets);
  for (const day of sectionDays(period, groups, dayAssets, options.emptyDays)) {
    blocks.push(
      renderDaySection(day, groups.get(day) ?? [], dayAssets.get(day) ?? [], outputDir, options)
    );
  }

  const assetsSection = renderAssetsSection(assets, outputDir);
  if (assetsSection !== null) blocks.push(assetsSection);

  return blocks.filter((b) => b.length > 0).join('\n\n') + '\n';
}
