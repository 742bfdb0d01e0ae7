import { describe, expect, test } from 'vitest';
import { initialState } from '../src/fleet/state.ts';
import type { RepositoryState } from '../src/fleet/state.ts';
import { filterRepos, nextSortColumn, sortRepos, statusRank } from '../src/fleet/view.ts';

function repo(path: string, fields: Partial<RepositoryState> = {}): RepositoryState {
  return { ...initialState(path), status: { kind: 'clean' }, upstream: 'origin/main', ...fields };
}

describe('filterRepos', () => {
  const repos = [
    repo('/code/api', { branch: 'main' }),
    repo('/code/web', { branch: 'feature/login' }),
    repo('/work/tools', { branch: 'main' }),
  ];

  test('matches name, path or branch without regard to case', () => {
    expect(filterRepos(repos, 'LOGIN').map((r) => r.name)).toEqual(['web']);
    expect(filterRepos(repos, '/work').map((r) => r.name)).toEqual(['tools']);
    expect(filterRepos(repos, 'main').map((r) => r.name)).toEqual(['api', 'tools']);
  });

  test('returns everything for blank text', () => {
    expect(filterRepos(repos, '  ')).toHaveLength(3);
  });
});

describe('statusRank', () => {
  test('puts repos needing attention first', () => {
    expect(
      [
        repo('/a', { status: { kind: 'unknown' } }),
        repo('/b'),
        repo('/c', { behind: 1 }),
        repo('/d', { ahead: 1 }),
        repo('/e', { ahead: 1, behind: 1 }),
        repo('/f', { dirty: true }),
        repo('/g', { status: { kind: 'refreshing' } }),
        repo('/h', {
          status: { kind: 'error', failure: { kind: 'command-failed', message: 'x' } },
        }),
      ].map(statusRank)
    ).toEqual([7, 6, 5, 4, 3, 2, 1, 0]);
  });
});

describe('sortRepos', () => {
  test('sorts by status and breaks ties by name', () => {
    const sorted = sortRepos(
      [repo('/z/zeta'), repo('/a/alpha', { dirty: true }), repo('/b/beta')],
      { column: 'status', ascending: true }
    );
    expect(sorted.map((r) => r.name)).toEqual(['alpha', 'beta', 'zeta']);
  });

  test('sorts by most recent sync first and can be reversed', () => {
    const repos = [
      repo('/a/old', { lastSync: 10 }),
      repo('/a/new', { lastSync: 30 }),
      repo('/a/never'),
    ];
    expect(sortRepos(repos, { column: 'synced', ascending: true }).map((r) => r.name)).toEqual([
      'new',
      'old',
      'never',
    ]);
    expect(sortRepos(repos, { column: 'synced', ascending: false }).map((r) => r.name)).toEqual([
      'never',
      'old',
      'new',
    ]);
  });

  test('does not reorder its input', () => {
    const repos = [repo('/b'), repo('/a')];
    sortRepos(repos, { column: 'name', ascending: true });
    expect(repos.map((r) => r.name)).toEqual(['b', 'a']);
  });
});

describe('nextSortColumn', () => {
  test('wraps in both directions', () => {
    expect(nextSortColumn('synced', 1)).toBe('name');
    expect(nextSortColumn('name', -1)).toBe('synced');
    expect(nextSortColumn('status', 1)).toBe('branch');
  });
});
