import type { SortColumn } from '../types.ts';
import type { RepositoryState } from './state.ts';

export const SORT_COLUMNS: readonly SortColumn[] = [
  'name',
  'status',
  'branch',
  'synced',
];

export type SortOrder = {
  column: SortColumn;
  ascending: boolean;
};

export function filterRepos(
  repos: readonly RepositoryState[],
  text: string
): RepositoryState[] {
  const needle = text.trim().toLowerCase();
  if (!needle) return [...repos];
  return repos.filter(
    (repo) =>
      repo.name.toLowerCase().includes(needle) ||
      repo.path.toLowerCase().includes(needle) ||
      (repo.branch?.toLowerCase().includes(needle) ?? false)
  );
}

// Lower ranks sort first: things needing attention before settled repos
export function statusRank(repo: RepositoryState): number {
  if (repo.status.kind === 'error') return 0;
  if (repo.status.kind === 'refreshing') return 1;
  if (repo.dirty) return 2;
  const ahead = repo.ahead ?? 0;
  const behind = repo.behind ?? 0;
  if (ahead > 0 && behind > 0) return 3;
  if (ahead > 0) return 4;
  if (behind > 0) return 5;
  if (repo.status.kind === 'unknown') return 7;
  return 6;
}

function compareBy(
  column: SortColumn
): (a: RepositoryState, b: RepositoryState) => number {
  switch (column) {
    case 'name':
      return (a, b) => a.name.localeCompare(b.name);
    case 'status':
      return (a, b) => statusRank(a) - statusRank(b);
    case 'branch':
      return (a, b) => (a.branch ?? '').localeCompare(b.branch ?? '');
    case 'synced':
      return (a, b) => (b.lastSync ?? 0) - (a.lastSync ?? 0);
  }
}

export function sortRepos(
  repos: readonly RepositoryState[],
  order: SortOrder
): RepositoryState[] {
  const compare = compareBy(order.column);
  const byName = compareBy('name');
  return [...repos].sort((a, b) => {
    const primary = order.ascending ? compare(a, b) : compare(b, a);
    return primary !== 0 ? primary : byName(a, b);
  });
}

export function nextSortColumn(column: SortColumn, step: 1 | -1): SortColumn {
  const index = SORT_COLUMNS.indexOf(column);
  const next = (index + step + SORT_COLUMNS.length) % SORT_COLUMNS.length;
  return SORT_COLUMNS[next] ?? 'name';
}
