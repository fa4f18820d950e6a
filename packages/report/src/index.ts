/**
 * @worklog/report - Monthly worklog generation from git history.
 * Resolves the period, reads and groups commits, scans dated assets and
 * renders the month's Markdown document.
 */

// ─── Main API ─────────────────────────────────────────────────────

export { generateWorklog, type GenerateOptions, type GenerateResult } from './generator.js';

// ─── Period ───────────────────────────────────────────────────────

export {
  resolvePeriod,
  periodRange,
  periodKey,
  periodLabel,
  dayKey,
  daysInMonth,
  enumerateDays,
  formatMonthName,
  parseDayKey,
  type PeriodInput,
} from './period.js';

// ─── Data Collection ──────────────────────────────────────────────

export { readCommits, type ReadCommitsOptions } from './commit-reader.js';
export { groupCommitsByDay, flattenGroups } from './grouper.js';
export { scanAssets, classifyAsset, parseAssetDay, type ScanOptions } from './asset-scanner.js';
export { computeStats, closedIssues } from './stats.js';

// ─── Rendering ────────────────────────────────────────────────────

export {
  DEFAULT_TEMPLATE,
  PLACEHOLDERS,
  applyPlaceholders,
  loadTemplate,
  type PlaceholderContext,
} from './template.js';
export {
  renderWorklog,
  renderDaySection,
  renderAssetsSection,
  dayHeading,
  formatCommitLine,
  formatTimestamp,
  assetLink,
  noActivityLine,
  DEFAULT_RENDER_OPTIONS,
  ASSETS_HEADING,
  EMPTY_DAY_LINE,
  type RenderInput,
  type RenderOptions,
} from './renderer.js';
export { mergeDaySection, mergeAssetsSection } from './merge.js';

// ─── Output ───────────────────────────────────────────────────────

export { writeWorklog, outputPathFor, readExistingWorklog } from './writer.js';
