import { vi } from 'vitest';
import type { CommitRecord, GitClient } from '@worklog/core';

const RS = '\x1e';
const FS = '\x1f';

export function makeCommit(overrides: Partial<CommitRecord> = {}): CommitRecord {
  return {
    hash: 'a1b2c3d4e5f60718293a4b5c6d7e8f9012345678',
    author: 'Alice',
    email: 'alice@example.com',
    timestamp: new Date('2026-01-05T10:00:00Z'),
    message: 'Add parser',
    body: '',
    files: [],
    ...overrides,
  };
}

/** One record in the shape `git log --pretty=format:LOG_FORMAT --name-only` prints */
export function logRecord(commit: CommitRecord): string {
  const fields = [
    commit.hash,
    commit.timestamp.toISOString(),
    commit.author,
    commit.email,
    commit.message,
    commit.body,
  ];
  const files = commit.files.length > 0 ? `\n${commit.files.join('\n')}\n` : '\n';
  return `${RS}${fields.join(FS)}${FS}${files}`;
}

/** A git client whose `raw` answers every call with the given commits */
export function fakeGit(commits: readonly CommitRecord[]) {
  const raw = vi
    .fn<(args: string[]) => Promise<string>>()
    .mockResolvedValue(commits.map(logRecord).join(''));
  const git: GitClient = { raw };
  return { git, raw };
}

/** A git client that always fails the way git does outside a repository */
export function failingGit() {
  const raw = vi
    .fn<(args: string[]) => Promise<string>>()
    .mockRejectedValue(new Error('fatal: not a git repository'));
  const git: GitClient = { raw };
  return { git, raw };
}
