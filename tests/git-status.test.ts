import { describe, expect, test } from 'vitest';
import {
  isDirty,
  parseAheadBehind,
  parsePorcelainStatus,
  parseRemotes,
} from '../src/git/status.ts';

describe('parsePorcelainStatus', () => {
  test('counts index, worktree and untracked columns separately', () => {
    const output = [
      'M  src/staged.ts',
      ' M src/modified.ts',
      'MM src/both.ts',
      'A  src/added.ts',
      '?? notes.txt',
      '?? scratch/',
    ].join('\n');

    expect(parsePorcelainStatus(output)).toEqual({
      success: true,
      data: { staged: 3, modified: 2, untracked: 2 },
    });
  });

  test('returns zero counts for empty output', () => {
    expect(parsePorcelainStatus('')).toEqual({
      success: true,
      data: { staged: 0, modified: 0, untracked: 0 },
    });
  });

  test('skips ignored entries', () => {
    expect(parsePorcelainStatus('!! build/')).toEqual({
      success: true,
      data: { staged: 0, modified: 0, untracked: 0 },
    });
  });

  test('counts renames as staged', () => {
    expect(parsePorcelainStatus('R  old.ts -> new.ts')).toEqual({
      success: true,
      data: { staged: 1, modified: 0, untracked: 0 },
    });
  });

  test('rejects lines that are not porcelain v1', () => {
    expect(parsePorcelainStatus('On branch main')).toEqual({
      success: false,
      error: 'Unexpected status line: On branch main',
    });
  });
});

describe('parseAheadBehind', () => {
  test('parses tab separated counts', () => {
    expect(parseAheadBehind('3\t1')).toEqual({
      success: true,
      data: { ahead: 3, behind: 1 },
    });
  });

  test('tolerates surrounding whitespace', () => {
    expect(parseAheadBehind('  0 12 \n')).toEqual({
      success: true,
      data: { ahead: 0, behind: 12 },
    });
  });

  test('fails on anything else', () => {
    expect(parseAheadBehind('fatal: no upstream')).toEqual({
      success: false,
      error: 'Unexpected rev-list output: fatal: no upstream',
    });
  });
});

describe('parseRemotes', () => {
  test('returns one name per line', () => {
    expect(parseRemotes('origin\nupstream\n')).toEqual(['origin', 'upstream']);
  });

  test('returns an empty list for a repo without remotes', () => {
    expect(parseRemotes('')).toEqual([]);
  });
});

describe('isDirty', () => {
  test('is false only when every count is zero', () => {
    expect(isDirty({ staged: 0, modified: 0, untracked: 0 })).toBe(false);
    expect(isDirty({ staged: 0, modified: 0, untracked: 1 })).toBe(true);
    expect(isDirty({ staged: 1, modified: 0, untracked: 0 })).toBe(true);
  });
});
