/**
 * Header template loading and placeholder substitution.
 *
 * Placeholders are `{{name}}` tokens (plus the legacy `{Month YYYY}`),
 * resolved in one pass through a fixed table of formatters. Unknown
 * names resolve to the empty string.
 */

import { getLogger, readTextIfExists, type Period, type ReportStats } from '@worklog/core';
import { formatMonthName, periodLabel } from './period.js';

export interface PlaceholderContext {
  period: Period;
  stats: ReportStats;
  generatedAt: Date;
}

type Formatter = (ctx: PlaceholderContext) => string;

export const DEFAULT_TEMPLATE = `# {{month}} — Monthly Worklog

_Generated: {{generated}}_

- Commits: {{commits}}
- Authors: {{authors}}
- Active days: {{days}}
- Assets: {{assets}}
`;

export const PLACEHOLDERS: ReadonlyMap<string, Formatter> = new Map<string, Formatter>([
  ['month', (ctx) => formatMonthName(ctx.period)],
  ['period', (ctx) => periodLabel(ctx.period)],
  ['commits', (ctx) => String(ctx.stats.commits)],
  ['authors', (ctx) => String(ctx.stats.authors)],
  ['days', (ctx) => String(ctx.stats.activeDays)],
  ['assets', (ctx) => String(ctx.stats.assets)],
  ['prs', (ctx) => String(ctx.stats.prs)],
  ['issues', (ctx) => String(ctx.stats.issues)],
  // No deployment source is read
  ['deploys', () => '0'],
  ['generated', (ctx) => ctx.generatedAt.toISOString()],
]);

const TOKEN = /\{\{\s*([A-Za-z][\w-]*)\s*\}\}|\{Month YYYY\}/g;

/** Substitute every placeholder in a single pass */
export function applyPlaceholders(template: string, ctx: PlaceholderContext): string {
  return template.replace(TOKEN, (_match, name: string | undefined) => {
    const formatter = PLACEHOLDERS.get(name ?? 'month');
    return formatter ? formatter(ctx) : '';
  });
}

/**
 * Load the header template, or the built-in default when the file is
 * absent. Other read failures are IOErrors.
 */
export function loadTemplate(templatePath: string): string {
  const content = readTextIfExists(templatePath, 'Cannot read template');
  if (content === null) {
    getLogger().debug('template', 'Template not found, using default header', {
      templatePath,
    });
    return DEFAULT_TEMPLATE;
  }
  getLogger().debug('template', 'Loaded header template', { templatePath });
  return content;
}
