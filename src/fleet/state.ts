import { basename } from 'node:path';
import type { FailureKind, OperationKind } from '../git/types.ts';
import type { RepoPath } from '../types.ts';

export type RepoFailure = {
  kind: FailureKind;
  message: string;
};

export type RepoStatus =
  | { kind: 'unknown' }
  | { kind: 'refreshing' }
  | { kind: 'clean' }
  | { kind: 'error'; failure: RepoFailure };

export type LastOperation = {
  operation: OperationKind;
  finishedAt: number;
  summary: string;
};

export type RepositoryState = Readonly<{
  path: RepoPath;
  name: string;
  branch?: string;
  upstream?: string;
  remotes: readonly string[];
  dirty: boolean;
  staged: number;
  modified: number;
  untracked: number;
  ahead?: number;
  behind?: number;
  lastSync?: number;
  status: RepoStatus;
  pendingOperation?: OperationKind;
  lastOperation?: LastOperation;
}>;

export type ReadonlyRepositoryTable = {
  readonly size: number;
  get(path: RepoPath): RepositoryState | undefined;
  has(path: RepoPath): boolean;
  list(): RepositoryState[];
};

export type RepositoryTable = ReadonlyRepositoryTable & {
  replace(record: RepositoryState): void;
};

export function initialState(path: RepoPath): RepositoryState {
  return {
    path,
    name: basename(path) || path,
    remotes: [],
    dirty: false,
    staged: 0,
    modified: 0,
    untracked: 0,
    status: { kind: 'unknown' },
  };
}

export function isBusy(record: RepositoryState): boolean {
  return record.pendingOperation !== undefined;
}

export function createRepositoryTable(
  paths: readonly RepoPath[]
): RepositoryTable {
  const records = new Map<RepoPath, RepositoryState>();
  for (const path of paths) {
    if (!records.has(path)) {
      records.set(path, Object.freeze(initialState(path)));
    }
  }

  return {
    get size() {
      return records.size;
    },
    get: (path) => records.get(path),
    has: (path) => records.has(path),
    list: () => [...records.values()],
    replace(record) {
      // Identity is fixed at startup; unknown paths are never added
      if (!records.has(record.path)) return;
      records.set(record.path, Object.freeze(record));
    },
  };
}
