/**
 * Git helper utilities using simple-git.
 * Provides the commit log query and its parser.
 */

import { simpleGit, type SimpleGit } from 'simple-git';
import type { CommitRecord } from './types.js';
import { ExternalToolError } from './errors.js';
import { getLogger } from './logger.js';

/** Create a git client for the given directory */
export function createGitClient(cwd: string): SimpleGit {
  try {
    return simpleGit(cwd);
  } catch (error: unknown) {
    // simple-git refuses a base directory that does not exist
    const message = error instanceof Error ? error.message : String(error);
    throw new ExternalToolError('git', message, { cause: error });
  }
}

/** The part of simple-git the log reader needs; tests pass a fake */
export interface GitClient {
  raw(args: string[]): Promise<string>;
}

// Record separator before each commit, unit separator between fields.
// The file list printed by --name-only follows the last separator.
const RECORD_SEP = '\x1e';
const FIELD_SEP = '\x1f';

export const LOG_FORMAT = '%x1e' + ['%H', '%aI', '%an', '%ae', '%s', '%b', ''].join('%x1f');

/** Run a raw git command, mapping any failure to ExternalToolError */
export async function runGit(git: GitClient, args: string[]): Promise<string> {
  const logger = getLogger();
  logger.gitCommand(args);
  try {
    return await git.raw(args);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message.trim() : String(error);
    logger.gitError(args, message);
    throw new ExternalToolError('git', message || 'unknown error', { cause: error });
  }
}

/**
 * Build the `git log` arguments. No --since/--until: git matches those
 * against the committer date, while periods select by author date.
 */
export function buildLogArgs(options: { author?: string } = {}): string[] {
  const args = [
    'log',
    '--reverse',
    '--date=iso-strict',
    '--name-only',
    `--pretty=format:${LOG_FORMAT}`,
  ];
  if (options.author) args.push(`--author=${options.author}`);
  return args;
}

/**
 * Query the history reachable from HEAD, oldest first as git lists it
 * with --reverse. Callers select the period by author date.
 */
export async function getCommitLog(
  git: GitClient,
  options: { author?: string } = {}
): Promise<CommitRecord[]> {
  const raw = await runGit(git, buildLogArgs(options));
  return parseLogOutput(raw);
}

/**
 * Parse output produced with LOG_FORMAT and --name-only.
 * Records with missing fields or an unreadable date are skipped.
 */
export function parseLogOutput(raw: string): CommitRecord[] {
  const logger = getLogger();
  const commits: CommitRecord[] = [];

  for (const record of raw.split(RECORD_SEP)) {
    if (!record.trim()) continue;

    const fields = record.split(FIELD_SEP);
    if (fields.length < 7) {
      logger.warn('git', 'Skipping malformed log record', {
        preview: record.slice(0, 80),
      });
      continue;
    }

    const [hash, dateStr, author, email, subject, body] = fields;
    const fileList = fields.slice(6).join(FIELD_SEP);
    const timestamp = new Date(dateStr.trim());
    if (!hash.trim() || Number.isNaN(timestamp.getTime())) {
      logger.warn('git', 'Skipping log record with unreadable hash or date', {
        hash: hash.trim(),
        date: dateStr,
      });
      continue;
    }

    commits.push(
      Object.freeze({
        hash: hash.trim(),
        author: author.trim(),
        email: email.trim(),
        timestamp,
        message: subject.trim(),
        body: body.trim(),
        files: Object.freeze(
          fileList
            .split('\n')
            .map((f) => f.trim())
            .filter((f) => f.length > 0)
        ),
      })
    );
  }

  return commits;
}
