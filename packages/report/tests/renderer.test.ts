import { describe, it, expect } from 'vitest';
import type { AssetEntry, ReportStats } from '@worklog/core';
import {
  assetLink,
  formatCommitLine,
  formatTimestamp,
  renderDaySection,
  renderWorklog,
} from '../src/renderer.js';
import { groupCommitsByDay } from '../src/grouper.js';
import { makeCommit } from './helpers.js';

const outputDir = '/proj/worklogs';
const january = { year: 2026, month: 1 };
const generatedAt = new Date('2026-02-01T08:00:00Z');

const parser = makeCommit({
  hash: 'a1b2c3d4e5f6a7b8',
  author: 'Alice',
  timestamp: new Date('2026-01-05T10:00:00Z'),
  message: 'Add parser',
  body: 'Longer body\n\nsecond para',
  files: ['src/a.ts', 'src/b.ts', 'src/c.ts'],
});

const fix = makeCommit({
  hash: 'b2c3d4e5f6a7b8c9',
  author: 'Bob',
  email: 'bob@example.com',
  timestamp: new Date('2026-01-07T08:30:05Z'),
  message: 'Fix bug',
});

const screenshot: AssetEntry = {
  path: '/proj/assets/2026-01/2026-01-07-shot.png',
  name: '2026-01-07-shot.png',
  kind: 'image',
  associatedDay: '2026-01-07',
};

const notes: AssetEntry = {
  path: '/proj/assets/2026-01/my notes.pdf',
  name: 'my notes.pdf',
  kind: 'other',
};

function statsFor(commits: number): ReportStats {
  return { commits, authors: 2, activeDays: 2, assets: 2, prs: 0, issues: 0 };
}

describe('line formatting', () => {
  it('formats a commit bullet with a short hash', () => {
    expect(formatCommitLine(parser)).toBe('- a1b2c3d — Add parser (Alice)');
  });

  it('formats timestamps in UTC', () => {
    expect(formatTimestamp(fix.timestamp)).toBe('2026-01-07 08:30:05 +0000');
  });

  it('links assets relative to the output directory', () => {
    expect(assetLink(screenshot, outputDir)).toBe('../assets/2026-01/2026-01-07-shot.png');
    expect(assetLink(notes, outputDir)).toBe('../assets/2026-01/my%20notes.pdf');
  });

  it('encodes characters that would end the link path', () => {
    const shot: AssetEntry = {
      path: '/proj/assets/2026-01/shot#1?v=2.png',
      name: 'shot#1?v=2.png',
      kind: 'image',
    };
    expect(assetLink(shot, outputDir)).toBe('../assets/2026-01/shot%231%3Fv%3D2.png');
  });
});

describe('renderDaySection', () => {
  it('renders bullets followed by per-commit details', () => {
    const section = renderDaySection('2026-01-05', [parser], [], outputDir, {
      details: true,
      maxFilesPerCommit: 2,
      emptyDays: 'omit',
    });

    expect(section).toBe(
      [
        '### 2026-01-05 — Commits summary',
        '',
        '- a1b2c3d — Add parser (Alice)',
        '',
        '#### Details',
        '',
        '- a1b2c3d — Add parser (Alice)',
        '  - Date: 2026-01-05 10:00:00 +0000',
        '  - Files:',
        '    - src/a.ts',
        '    - src/b.ts',
        '    - … and 1 more',
        '  - Message:',
        '    Longer body',
        '',
        '    second para',
      ].join('\n')
    );
  });

  it('notes commits without files', () => {
    const section = renderDaySection('2026-01-07', [fix], [], outputDir);
    expect(section.split('\n').slice(-3)).toEqual([
      '- b2c3d4e — Fix bug (Bob)',
      '  - Date: 2026-01-07 08:30:05 +0000',
      '  - Files: (none)',
    ]);
  });

  it('marks a day with nothing to show', () => {
    expect(renderDaySection('2026-01-06', [], [], outputDir)).toBe(
      '### 2026-01-06 — Commits summary\n\n_No recorded activity._'
    );
  });
});

describe('renderWorklog', () => {
  it('renders header, day sections and period assets', () => {
    const document = renderWorklog({
      period: january,
      groups: groupCommitsByDay([parser, fix]),
      assets: [screenshot, notes],
      template: '# {Month YYYY}\n\nCommits: {{commits}}\n',
      stats: statsFor(2),
      generatedAt,
      outputDir,
      options: { details: false },
    });

    expect(document).toBe(
      [
        '# January 2026',
        '',
        'Commits: 2',
        '',
        '### 2026-01-05 — Commits summary',
        '',
        '- a1b2c3d — Add parser (Alice)',
        '',
        '### 2026-01-07 — Commits summary',
        '',
        '- b2c3d4e — Fix bug (Bob)',
        '',
        '![2026-01-07-shot.png](../assets/2026-01/2026-01-07-shot.png)',
        '',
        '## Assets',
        '',
        '- [my notes.pdf](../assets/2026-01/my%20notes.pdf)',
        '',
      ].join('\n')
    );
  });

  it('renders a header and no-activity line for an empty month', () => {
    const document = renderWorklog({
      period: january,
      groups: new Map(),
      assets: [],
      template: '# {Month YYYY}\n',
      stats: statsFor(0),
      generatedAt,
      outputDir,
    });
    expect(document).toBe('# January 2026\n\n_No activity recorded for 2026-01._\n');
  });

  it('gives every day a section under the placeholder policy', () => {
    const document = renderWorklog({
      period: january,
      groups: groupCommitsByDay([parser]),
      assets: [],
      template: '# {Month YYYY}\n',
      stats: statsFor(1),
      generatedAt,
      outputDir,
      options: { details: false, emptyDays: 'placeholder' },
    });

    const headings = document.split('\n').filter((line) => line.startsWith('### '));
    expect(headings).toHaveLength(31);
    expect(headings[0]).toBe('### 2026-01-01 — Commits summary');
    expect(headings[30]).toBe('### 2026-01-31 — Commits summary');
    expect(document).toContain('### 2026-01-04 — Commits summary\n\n_No recorded activity._\n\n');
  });

  it('is deterministic for the same input', () => {
    const input = {
      period: january,
      groups: groupCommitsByDay([parser, fix]),
      assets: [screenshot, notes],
      template: '# {{month}} ({{generated}})\n',
      stats: statsFor(2),
      generatedAt,
      outputDir,
    };
    expect(renderWorklog(input)).toBe(renderWorklog(input));
  });
});
