import type { OperationKind, Task } from '../git/types.ts';
import type { RepoPath } from '../types.ts';
import type { StateAggregator } from './aggregator.ts';
import type { Scheduler } from './scheduler.ts';
import { isBusy } from './state.ts';
import type { ReadonlyRepositoryTable, RepositoryState } from './state.ts';
import { filterRepos, nextSortColumn, sortRepos } from './view.ts';
import type { SortOrder } from './view.ts';

export type FleetCommand =
  | { type: 'refresh-one' }
  | { type: 'refresh-all' }
  | { type: 'fetch-selected' }
  | { type: 'pull-selected' }
  | { type: 'push-selected' }
  | { type: 'prune-selected' }
  | { type: 'sync-selected' }
  | { type: 'cancel-selected' }
  | { type: 'cancel-all' }
  | { type: 'quit' }
  | { type: 'navigate-up' }
  | { type: 'navigate-down' }
  | { type: 'navigate-top' }
  | { type: 'navigate-bottom' }
  | { type: 'toggle-select' }
  | { type: 'select-all' }
  | { type: 'clear-selection' }
  | { type: 'filter-by-text'; text: string }
  | { type: 'next-sort-column' }
  | { type: 'previous-sort-column' }
  | { type: 'reverse-sort' }
  | { type: 'hide-current' }
  | { type: 'unhide'; path: RepoPath };

export type Notice = {
  level: 'progress' | 'info' | 'error';
  message: string;
};

// Asynchronous effects the caller performs: scheduler-wide stops and
// persisting the sort order and hidden repos
export type DispatchEffect = 'quit' | 'cancel-all' | 'save-view';

export type DispatchResult = {
  submitted: Task[];
  notice?: Notice;
  effect?: DispatchEffect;
};

export type Selection = {
  cursor: number;
  cursorPath?: RepoPath;
  marked: RepoPath[];
  filter: string;
};

export type CommandDispatcher = {
  dispatch(command: FleetCommand): DispatchResult;
  submit(paths: readonly RepoPath[], operation: OperationKind): DispatchResult;
  refreshPaths(paths: readonly RepoPath[]): Task[];
  visible(): RepositoryState[];
  selection(): Selection;
  sortOrder(): SortOrder;
  hidden(): RepoPath[];
};

export type DispatcherOptions = {
  table: ReadonlyRepositoryTable;
  scheduler: Pick<Scheduler, 'submit' | 'cancel'>;
  aggregator: Pick<StateAggregator, 'markPending'>;
  sort?: SortOrder;
  hidden?: readonly RepoPath[];
};

const PROGRESS_VERB: Record<OperationKind, string> = {
  refresh: 'Refreshing',
  fetch: 'Fetching',
  pull: 'Pulling',
  push: 'Pushing',
  prune: 'Pruning',
  sync: 'Syncing',
};

const SELECTED_OPERATION: Partial<Record<FleetCommand['type'], OperationKind>> =
  {
    'fetch-selected': 'fetch',
    'pull-selected': 'pull',
    'push-selected': 'push',
    'prune-selected': 'prune',
    'sync-selected': 'sync',
  };

type SubmitSummary = {
  submitted: Task[];
  busy: string[];
  refused: boolean;
};

function describeTargets(tasks: Task[], table: ReadonlyRepositoryTable): string {
  const first = tasks[0];
  if (tasks.length === 1 && first) {
    return table.get(first.repoPath)?.name ?? first.repoPath;
  }
  return `${tasks.length} repos`;
}

export function createCommandDispatcher(
  options: DispatcherOptions
): CommandDispatcher {
  const { table, scheduler, aggregator } = options;

  let sort: SortOrder = options.sort ?? { column: 'name', ascending: true };
  let filter = '';
  let cursorPath: RepoPath | undefined;
  const marked = new Set<RepoPath>();
  const hidden = new Set<RepoPath>(options.hidden);

  function visible(): RepositoryState[] {
    const shown = table.list().filter((repo) => !hidden.has(repo.path));
    return sortRepos(filterRepos(shown, filter), sort);
  }

  function cursorIndex(rows: RepositoryState[]): number {
    if (rows.length === 0) return -1;
    const index = rows.findIndex((repo) => repo.path === cursorPath);
    return index === -1 ? 0 : index;
  }

  function cursorRepo(): RepositoryState | undefined {
    const rows = visible();
    return rows[cursorIndex(rows)];
  }

  function moveCursor(to: (index: number, count: number) => number): void {
    const rows = visible();
    if (rows.length === 0) return;
    const target = Math.min(
      rows.length - 1,
      Math.max(0, to(cursorIndex(rows), rows.length))
    );
    cursorPath = rows[target]?.path;
  }

  // Snapshot of the paths a *-selected command acts on
  function selectedPaths(): RepoPath[] {
    if (marked.size > 0) {
      return table
        .list()
        .map((repo) => repo.path)
        .filter((path) => marked.has(path));
    }
    const current = cursorRepo();
    return current ? [current.path] : [];
  }

  function submitAll(
    paths: readonly RepoPath[],
    operation: OperationKind
  ): SubmitSummary {
    const summary: SubmitSummary = { submitted: [], busy: [], refused: false };
    for (const path of paths) {
      const record = table.get(path);
      if (!record) continue;
      if (isBusy(record)) {
        summary.busy.push(record.name);
        continue;
      }
      const result = scheduler.submit(path, operation);
      if (!result.success) {
        if (result.error === 'already-in-progress') {
          summary.busy.push(record.name);
        } else {
          summary.refused = true;
        }
        continue;
      }
      aggregator.markPending(result.data.task);
      summary.submitted.push(result.data.task);
    }
    return summary;
  }

  function runOperation(
    paths: readonly RepoPath[],
    operation: OperationKind
  ): DispatchResult {
    if (paths.length === 0) {
      return {
        submitted: [],
        notice: { level: 'info', message: 'No repository selected' },
      };
    }

    const { submitted, busy, refused } = submitAll(paths, operation);

    if (submitted.length === 0) {
      if (refused) {
        return {
          submitted,
          notice: { level: 'error', message: 'Scheduler is stopping' },
        };
      }
      return {
        submitted,
        notice: {
          level: 'error',
          message: `Already in progress: ${busy.join(', ')}`,
        },
      };
    }

    const skipped =
      busy.length > 0 ? ` (${busy.length} already in progress)` : '';
    return {
      submitted,
      notice: {
        level: 'progress',
        message: `${PROGRESS_VERB[operation]} ${describeTargets(submitted, table)}...${skipped}`,
      },
    };
  }

  function cancelSelected(): DispatchResult {
    const cancelled = selectedPaths().filter((path) => scheduler.cancel(path));
    const message =
      cancelled.length > 0
        ? `Cancelling ${cancelled.length} task(s)`
        : 'Nothing to cancel';
    return { submitted: [], notice: { level: 'info', message } };
  }

  function hideCurrent(): DispatchResult {
    const rows = visible();
    const index = cursorIndex(rows);
    const current = rows[index];
    if (!current) {
      return {
        submitted: [],
        notice: { level: 'info', message: 'No repository selected' },
      };
    }
    hidden.add(current.path);
    marked.delete(current.path);
    cursorPath = (rows[index + 1] ?? rows[index - 1])?.path;
    return {
      submitted: [],
      effect: 'save-view',
      notice: { level: 'info', message: `Hid ${current.name} (I lists hidden repos)` },
    };
  }

  function unhide(path: RepoPath): DispatchResult {
    if (!hidden.delete(path)) return { submitted: [] };
    const name = table.get(path)?.name ?? path;
    return {
      submitted: [],
      effect: 'save-view',
      notice: { level: 'info', message: `Showing ${name} again` },
    };
  }

  function dispatch(command: FleetCommand): DispatchResult {
    switch (command.type) {
      case 'refresh-one': {
        const current = cursorRepo();
        return runOperation(current ? [current.path] : [], 'refresh');
      }
      case 'refresh-all':
        return runOperation(
          table.list().map((repo) => repo.path),
          'refresh'
        );
      case 'fetch-selected':
      case 'pull-selected':
      case 'push-selected':
      case 'prune-selected':
      case 'sync-selected': {
        const operation = SELECTED_OPERATION[command.type] ?? 'fetch';
        return runOperation(selectedPaths(), operation);
      }
      case 'cancel-selected':
        return cancelSelected();
      case 'cancel-all':
        return {
          submitted: [],
          effect: 'cancel-all',
          notice: { level: 'progress', message: 'Stopping all tasks...' },
        };
      case 'quit':
        return { submitted: [], effect: 'quit' };
      case 'navigate-up':
        moveCursor((index) => index - 1);
        break;
      case 'navigate-down':
        moveCursor((index) => index + 1);
        break;
      case 'navigate-top':
        moveCursor(() => 0);
        break;
      case 'navigate-bottom':
        moveCursor((_, count) => count - 1);
        break;
      case 'toggle-select': {
        const current = cursorRepo();
        if (!current) break;
        if (marked.has(current.path)) {
          marked.delete(current.path);
        } else {
          marked.add(current.path);
        }
        cursorPath = current.path;
        moveCursor((index) => index + 1);
        break;
      }
      case 'select-all':
        for (const repo of visible()) marked.add(repo.path);
        break;
      case 'clear-selection':
        marked.clear();
        break;
      case 'filter-by-text':
        filter = command.text;
        break;
      case 'next-sort-column':
        sort = { ...sort, column: nextSortColumn(sort.column, 1) };
        return { submitted: [], effect: 'save-view' };
      case 'previous-sort-column':
        sort = { ...sort, column: nextSortColumn(sort.column, -1) };
        return { submitted: [], effect: 'save-view' };
      case 'reverse-sort':
        sort = { ...sort, ascending: !sort.ascending };
        return { submitted: [], effect: 'save-view' };
      case 'hide-current':
        return hideCurrent();
      case 'unhide':
        return unhide(command.path);
    }
    return { submitted: [] };
  }

  return {
    dispatch,
    submit: runOperation,
    refreshPaths: (paths) => submitAll(paths, 'refresh').submitted,
    visible,
    selection() {
      const rows = visible();
      const cursor = cursorIndex(rows);
      return {
        cursor,
        cursorPath: rows[cursor]?.path,
        marked: table
          .list()
          .map((repo) => repo.path)
          .filter((path) => marked.has(path)),
        filter,
      };
    },
    sortOrder: () => sort,
    // Paths outside the table stay listed so a later run can still match them
    hidden: () => [...hidden].sort(),
  };
}
