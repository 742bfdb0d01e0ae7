import type {
  FailureKind,
  OperationData,
  OperationKind,
  Task,
  TaskCompletion,
} from '../git/types.ts';
import type { RepoPath } from '../types.ts';
import type { RepositoryState, RepositoryTable } from './state.ts';

export type ErrorLogEntry = {
  timestamp: number;
  repoPath: RepoPath;
  name: string;
  operation: OperationKind;
  kind: FailureKind;
  message: string;
};

export type StateAggregator = {
  markPending(task: Task): void;
  apply(completion: TaskCompletion): void;
  errors(): readonly ErrorLogEntry[];
};

export type AggregatorOptions = {
  now?: () => number;
  maxErrors?: number;
};

const PAST_TENSE: Record<OperationKind, string> = {
  refresh: 'refreshed',
  fetch: 'fetched',
  pull: 'pulled',
  push: 'pushed',
  prune: 'pruned',
  sync: 'synced',
};

export function describeSuccess(data: OperationData): string {
  const verb = PAST_TENSE[data.operation];
  if (data.operation === 'pull' || data.operation === 'sync') {
    return data.updated ? `${verb} (updated)` : `${verb} (up to date)`;
  }
  return verb;
}

function applySuccess(
  record: RepositoryState,
  data: OperationData,
  finishedAt: number
): RepositoryState {
  const lastOperation = {
    operation: data.operation,
    finishedAt,
    summary: describeSuccess(data),
  };

  if (data.operation !== 'refresh') {
    return {
      ...record,
      status: { kind: 'clean' },
      pendingOperation: undefined,
      lastOperation,
    };
  }

  const { status } = data;
  return {
    ...record,
    branch: status.branch,
    upstream: status.upstream,
    remotes: status.remotes,
    dirty: status.dirty,
    staged: status.staged,
    modified: status.modified,
    untracked: status.untracked,
    ahead: status.ahead,
    behind: status.behind,
    lastSync: finishedAt,
    status: { kind: 'clean' },
    pendingOperation: undefined,
    lastOperation,
  };
}

/**
 * The only writer of the repository table. Results are applied in the order
 * they are handed over; each one replaces the repository's record whole.
 */
export function createStateAggregator(
  table: RepositoryTable,
  options: AggregatorOptions = {}
): StateAggregator {
  const now = options.now ?? Date.now;
  const maxErrors = options.maxErrors ?? 200;
  const errorLog: ErrorLogEntry[] = [];

  function markPending(task: Task): void {
    const record = table.get(task.repoPath);
    if (!record) return;
    table.replace({
      ...record,
      status: { kind: 'refreshing' },
      pendingOperation: task.operation,
    });
  }

  function apply({ task, outcome, finishedAt }: TaskCompletion): void {
    const record = table.get(task.repoPath);
    if (!record) return;

    if (outcome.success) {
      table.replace(applySuccess(record, outcome.data, finishedAt));
      return;
    }

    table.replace({
      ...record,
      status: {
        kind: 'error',
        failure: { kind: outcome.kind, message: outcome.error },
      },
      pendingOperation: undefined,
      lastOperation: {
        operation: task.operation,
        finishedAt,
        summary: `${task.operation} failed`,
      },
    });

    errorLog.push({
      timestamp: now(),
      repoPath: record.path,
      name: record.name,
      operation: task.operation,
      kind: outcome.kind,
      message: outcome.error,
    });
    if (errorLog.length > maxErrors) {
      errorLog.splice(0, errorLog.length - maxErrors);
    }
  }

  return {
    markPending,
    apply,
    errors: () => errorLog,
  };
}
