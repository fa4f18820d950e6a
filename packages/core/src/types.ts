/**
 * Shared type definitions for worklog generation.
 * All interfaces and types used across packages are defined here.
 */

// ─── Period Types ──────────────────────────────────────────────────

/** The year-month a run targets, optionally narrowed to one day */
export interface Period {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31, validated against the month */
  day?: number;
}

/** Half-open UTC interval [start, end) */
export interface PeriodRange {
  start: Date;
  end: Date;
}

// ─── Commit Types ──────────────────────────────────────────────────

/** One commit as reported by git. Never mutated after parsing. */
export interface CommitRecord {
  readonly hash: string;
  readonly author: string;
  readonly email: string;
  /** Author date */
  readonly timestamp: Date;
  /** Subject line */
  readonly message: string;
  /** Remaining message text, trimmed; empty when the commit has none */
  readonly body: string;
  readonly files: readonly string[];
}

/** Commits keyed by UTC calendar day (`YYYY-MM-DD`), in retrieval order */
export type DayGroup = Map<string, CommitRecord[]>;

// ─── Asset Types ───────────────────────────────────────────────────

export type AssetKind = 'image' | 'other';

/** A supplementary file found in the period's asset directory */
export interface AssetEntry {
  /** Absolute path */
  path: string;
  /** File name */
  name: string;
  kind: AssetKind;
  /** `YYYY-MM-DD` from a filename prefix; absent for period-level assets */
  associatedDay?: string;
}

// ─── Report Types ──────────────────────────────────────────────────

/** Aggregate counts substituted into the header template */
export interface ReportStats {
  commits: number;
  authors: number;
  activeDays: number;
  assets: number;
  /** Merge commits and squash-merged commits that reference a pull request */
  prs: number;
  /** Distinct issue numbers closed by commit messages */
  issues: number;
}

/** How days without commits or assets are rendered */
export type EmptyDayPolicy = 'omit' | 'placeholder';
