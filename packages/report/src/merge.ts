/**
 * Splices a single regenerated day section, and the trailing assets
 * section, into an existing month document. The header and the other
 * days are left untouched.
 */

import { ASSETS_HEADING, dayHeading } from './renderer.js';

const DAY_HEADING = /^### (\d{4}-\d{2}-\d{2}) — Commits summary$/;
const NO_ACTIVITY = /^_No activity recorded for .+\._$/;

function isBoundary(line: string): boolean {
  return DAY_HEADING.test(line) || line === ASSETS_HEADING;
}

/**
 * Replace the section for `day` (or insert it in date order). A null
 * section removes the day. When the day has commits, a stale
 * "no activity" line in the header area is dropped.
 */
export function mergeDaySection(
  existing: string,
  day: string,
  section: string | null,
  hasCommits = section !== null
): string {
  const lines = existing.trimEnd().split('\n');

  const start = lines.indexOf(dayHeading(day));
  let insertAt: number;
  let removeCount = 0;

  if (start !== -1) {
    let end = lines.findIndex((line, i) => i > start && isBoundary(line));
    if (end === -1) end = lines.length;
    insertAt = start;
    removeCount = end - start;
  } else {
    insertAt = lines.findIndex((line) => {
      const match = DAY_HEADING.exec(line);
      return (match !== null && match[1] > day) || line === ASSETS_HEADING;
    });
    if (insertAt === -1) insertAt = lines.length;
  }

  const replacement = section === null ? [] : [...section.split('\n'), ''];
  if (replacement.length > 0 && insertAt === lines.length && lines[insertAt - 1] !== '') {
    replacement.unshift('');
  }
  lines.splice(insertAt, removeCount, ...replacement);

  if (hasCommits) {
    const stale = lines.findIndex((line) => NO_ACTIVITY.test(line));
    if (stale !== -1) lines.splice(stale, lines[stale + 1] === '' ? 2 : 1);
  }

  return lines.join('\n').trimEnd() + '\n';
}

/**
 * Replace the trailing `## Assets` section with `section`, append it when
 * the document has none, or drop it when `section` is null.
 */
export function mergeAssetsSection(existing: string, section: string | null): string {
  const lines = existing.trimEnd().split('\n');
  const start = lines.indexOf(ASSETS_HEADING);
  const body = (start === -1 ? lines : lines.slice(0, start)).join('\n').trimEnd();
  return (section === null ? body : `${body}\n\n${section}`) + '\n';
}
