/**
 * Groups commits by UTC calendar day.
 */

import type { CommitRecord, DayGroup } from '@worklog/core';
import { dayKey } from './period.js';

/**
 * Partition commits into one entry per distinct day, keeping the input
 * order within each day. Days without commits get no entry.
 */
export function groupCommitsByDay(commits: readonly CommitRecord[]): DayGroup {
  const groups: DayGroup = new Map();
  for (const commit of commits) {
    const key = dayKey(commit.timestamp);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(commit);
    } else {
      groups.set(key, [commit]);
    }
  }
  return groups;
}

/** Flatten a grouping back into a single list, day by day */
export function flattenGroups(groups: DayGroup): CommitRecord[] {
  return Array.from(groups.values()).flat();
}
