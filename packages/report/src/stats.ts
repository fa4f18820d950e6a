/**
 * Aggregate counts for the header placeholders.
 */

import type { AssetEntry, CommitRecord, DayGroup, ReportStats } from '@worklog/core';

// "Merge pull request #12 from ..." or a squash merge subject ending in "(#12)"
const PR_SUBJECT = /^Merge pull request #\d+\b|\(#\d+\)\s*$/;
const ISSUE_CLOSING = /\b(?:close[sd]?|fix(?:e[sd])?|resolve[sd]?)\s+#(\d+)\b/gi;

/** Distinct issue numbers closed by a commit message */
export function closedIssues(commit: CommitRecord): string[] {
  const text = `${commit.message}\n${commit.body}`;
  return Array.from(new Set(Array.from(text.matchAll(ISSUE_CLOSING), (m) => m[1])));
}

export function computeStats(
  commits: readonly CommitRecord[],
  groups: DayGroup,
  assets: readonly AssetEntry[]
): ReportStats {
  const authors = new Set(commits.map((c) => (c.email || c.author).toLowerCase()));
  const issues = new Set(commits.flatMap(closedIssues));

  return {
    commits: commits.length,
    authors: authors.size,
    activeDays: groups.size,
    assets: assets.length,
    prs: commits.filter((c) => PR_SUBJECT.test(c.message)).length,
    issues: issues.size,
  };
}
