/**
 * Commit history reader.
 * Reads the log once and selects the period by author date.
 */

import {
  getCommitLog,
  getLogger,
  type CommitRecord,
  type GitClient,
  type Period,
} from '@worklog/core';
import { periodLabel, periodRange } from './period.js';

export interface ReadCommitsOptions {
  /** Passed to git as --author */
  author?: string;
}

/**
 * Read all commits whose author date falls in [start, end) of the
 * period, oldest first. git failures surface as ExternalToolError.
 */
export async function readCommits(
  git: GitClient,
  period: Period,
  options: ReadCommitsOptions = {}
): Promise<CommitRecord[]> {
  const { start, end } = periodRange(period);

  const log = await getCommitLog(git, { author: options.author });

  // Rebases can leave author dates out of graph order; the sort is stable
  const commits = log
    .filter((c) => {
      const t = c.timestamp.getTime();
      return t >= start.getTime() && t < end.getTime();
    })
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

  getLogger().info('commits', `Read ${commits.length} commits for ${periodLabel(period)}`, {
    scanned: log.length,
    start: start.toISOString(),
    end: end.toISOString(),
    ...(options.author ? { author: options.author } : {}),
  });

  return commits;
}
