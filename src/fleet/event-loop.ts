import type { ViewSettings } from '../config.ts';
import type { TaskCompletion } from '../git/types.ts';
import type { OperationResult } from '../types.ts';
import { editFilter, HELP_LINES, translateKey } from '../tui/keymap.ts';
import { describeSuccess } from './aggregator.ts';
import type { ErrorLogEntry, StateAggregator } from './aggregator.ts';
import type {
  CommandDispatcher,
  DispatchEffect,
  FleetCommand,
  Notice,
} from './dispatcher.ts';
import type { EventQueue } from './queue.ts';
import type { Scheduler } from './scheduler.ts';
import type { ReadonlyRepositoryTable, RepositoryState } from './state.ts';
import { SPINNER_FRAMES } from './ui.ts';
import type {
  FleetEvent,
  InputEvent,
  InputSource,
  KeyEvent,
  Overlay,
  Renderer,
  StatusMessage,
  UiSnapshot,
} from './ui.ts';

// Non-error status messages disappear after this long
export const STATUS_TTL_MS = 2000;

export type EventLoopOptions = {
  queue: EventQueue<FleetEvent>;
  table: ReadonlyRepositoryTable;
  dispatcher: CommandDispatcher;
  aggregator: StateAggregator;
  scheduler: Pick<Scheduler, 'cancelAll' | 'shutdown' | 'activity'>;
  input: InputSource;
  renderer: Renderer;
  tickMs?: number;
  // 0 disables periodic refresh
  autoRefreshMs?: number;
  // Dispatched once, before the first event is read
  initialCommand?: FleetCommand;
  // Persists sort order and hidden repos after they change
  saveView?: (view: ViewSettings) => Promise<OperationResult>;
  now?: () => number;
};

export type EventLoop = {
  run(): Promise<void>;
  snapshot(): UiSnapshot;
};

function formatTime(timestamp: number): string {
  return new Date(timestamp).toTimeString().slice(0, 8);
}

export function errorLogLines(entries: readonly ErrorLogEntry[]): string[] {
  return entries.flatMap((entry) => [
    `[${formatTime(entry.timestamp)}] ${entry.name}: ${entry.operation} (${entry.kind})`,
    ...entry.message.split('\n').map((line) => `  ${line}`),
    '',
  ]);
}

export function detailLines(repo: RepositoryState): string[] {
  const lines = [
    `Path: ${repo.path}`,
    `Branch: ${repo.branch ?? '-'}`,
    `Upstream: ${repo.upstream ?? '(none)'}`,
    `Remotes: ${repo.remotes.length > 0 ? repo.remotes.join(', ') : '(none)'}`,
  ];
  if (repo.upstream !== undefined) {
    lines.push(`Ahead: ${repo.ahead ?? 0}, Behind: ${repo.behind ?? 0}`);
  }
  lines.push(
    `Staged: ${repo.staged}, Modified: ${repo.modified}, Untracked: ${repo.untracked}`
  );
  if (repo.lastOperation) {
    const { operation, finishedAt, summary } = repo.lastOperation;
    lines.push(`Last: ${operation} at ${formatTime(finishedAt)} (${summary})`);
  }
  if (repo.status.kind === 'error') {
    const { kind, message } = repo.status.failure;
    lines.push('', `Error (${kind}):`, ...message.split('\n').map((line) => `  ${line}`));
  }
  return lines;
}

/**
 * Single consumer of the fleet event queue. Each event is handled to
 * completion and followed by one render; the only suspension points are the
 * wait for the next event and the scheduler-wide stop/quit.
 */
export function createEventLoop(options: EventLoopOptions): EventLoop {
  const { queue, table, dispatcher, aggregator, scheduler, input, renderer } =
    options;
  const tickMs = options.tickMs ?? 100;
  const autoRefreshMs = options.autoRefreshMs ?? 0;
  const now = options.now ?? Date.now;

  let status: StatusMessage | undefined;
  let overlay: Overlay | undefined;
  let filterEditing = false;
  let spinnerFrame = 0;
  let lastAutoRefresh = 0;

  function setStatus(level: StatusMessage['level'], text: string): void {
    status = { level, text, since: now() };
  }

  function showNotice(notice: Notice): void {
    setStatus(notice.level, notice.message);
  }

  function snapshot(): UiSnapshot {
    const selection = dispatcher.selection();
    return {
      repos: dispatcher.visible(),
      cursor: selection.cursor,
      marked: selection.marked,
      filter: selection.filter,
      filterEditing,
      sort: dispatcher.sortOrder(),
      activity: scheduler.activity(),
      errorCount: aggregator.errors().length,
      spinnerFrame,
      status,
      overlay,
    };
  }

  function handleCompletion(completion: TaskCompletion): void {
    aggregator.apply(completion);

    const { task, outcome } = completion;
    const name = table.get(task.repoPath)?.name ?? task.repoPath;

    if (!outcome.success && outcome.kind === 'cancelled') {
      setStatus('info', `${name}: ${task.operation} cancelled`);
      return;
    }
    if (!outcome.success) {
      setStatus(
        'error',
        `${name}: ${task.operation} failed (${outcome.kind}), press E for details`
      );
      return;
    }

    if (outcome.data.operation !== 'refresh') {
      setStatus('done', `${name}: ${describeSuccess(outcome.data)}`);
      // Counters are stale after anything that talks to a remote
      dispatcher.refreshPaths([task.repoPath]);
      return;
    }

    const { running, queued } = scheduler.activity();
    if (status?.level === 'progress' && running + queued === 0) {
      setStatus('done', `Refreshed ${table.size} repos`);
    }
  }

  function handleTick(): void {
    spinnerFrame = (spinnerFrame + 1) % SPINNER_FRAMES.length;

    if (
      status &&
      (status.level === 'done' || status.level === 'info') &&
      now() - status.since >= STATUS_TTL_MS
    ) {
      status = undefined;
    }

    if (autoRefreshMs > 0 && now() - lastAutoRefresh >= autoRefreshMs) {
      lastAutoRefresh = now();
      dispatcher.refreshPaths(table.list().map((repo) => repo.path));
    }
  }

  function openHiddenList(selected: number): void {
    const paths = dispatcher.hidden();
    if (paths.length === 0) {
      overlay = undefined;
      setStatus('info', 'No hidden repositories');
      return;
    }
    overlay = {
      kind: 'hidden',
      title: `Hidden repos (${paths.length}), Enter shows one again`,
      lines: paths,
      offset: 0,
      selected: Math.min(selected, paths.length - 1),
    };
  }

  function handleOverlayKey(
    current: Overlay,
    key: KeyEvent
  ): DispatchEffect | undefined {
    const down = key.name === 'down' || key.sequence === 'j';
    const up = key.name === 'up' || key.sequence === 'k';
    const enter = key.name === 'return' || key.name === 'enter';

    if (current.selected !== undefined) {
      const last = current.lines.length - 1;
      if (down || up) {
        const step = down ? 1 : -1;
        overlay = {
          ...current,
          selected: Math.min(last, Math.max(0, current.selected + step)),
        };
        return undefined;
      }
      const path = current.lines[current.selected];
      if (enter && path !== undefined) {
        const result = dispatcher.dispatch({ type: 'unhide', path });
        openHiddenList(current.selected);
        if (result.notice) showNotice(result.notice);
        return result.effect;
      }
    } else if (down) {
      overlay = {
        ...current,
        offset: Math.min(current.offset + 1, Math.max(0, current.lines.length - 1)),
      };
      return undefined;
    } else if (up) {
      overlay = { ...current, offset: Math.max(0, current.offset - 1) };
      return undefined;
    } else if (enter) {
      overlay = undefined;
      return undefined;
    }

    if (
      key.name === 'escape' ||
      key.sequence === 'q' ||
      key.sequence === '?' ||
      key.sequence === 'E' ||
      key.sequence === 'I'
    ) {
      overlay = undefined;
    }
    return undefined;
  }

  function handleFilterKey(key: KeyEvent): void {
    const edit = editFilter(dispatcher.selection().filter, key);
    if (!edit) return;
    if (edit.type === 'update') {
      dispatcher.dispatch({ type: 'filter-by-text', text: edit.text });
    } else if (edit.type === 'cancel') {
      dispatcher.dispatch({ type: 'filter-by-text', text: '' });
      filterEditing = false;
    } else {
      filterEditing = false;
    }
  }

  function handleInput(event: InputEvent): DispatchEffect | undefined {
    if (event.type === 'resize') return undefined;

    if (overlay) return handleOverlayKey(overlay, event);
    if (filterEditing) {
      handleFilterKey(event);
      return undefined;
    }

    const action = translateKey(event);
    if (!action) return undefined;

    switch (action.type) {
      case 'start-filter':
        filterEditing = true;
        return undefined;
      case 'toggle-help':
        overlay = { kind: 'help', title: 'Help', lines: HELP_LINES, offset: 0 };
        return undefined;
      case 'show-details': {
        const path = dispatcher.selection().cursorPath;
        const repo = path !== undefined ? table.get(path) : undefined;
        if (!repo) {
          setStatus('info', 'No repository selected');
        } else {
          overlay = {
            kind: 'details',
            title: repo.name,
            lines: detailLines(repo),
            offset: 0,
          };
        }
        return undefined;
      }
      case 'show-hidden':
        openHiddenList(0);
        return undefined;
      case 'show-errors': {
        const entries = aggregator.errors();
        if (entries.length === 0) {
          setStatus('info', 'No errors logged');
        } else {
          overlay = {
            kind: 'errors',
            title: `Errors (${entries.length})`,
            lines: errorLogLines(entries),
            offset: 0,
          };
        }
        return undefined;
      }
      case 'command': {
        const result = dispatcher.dispatch(action.command);
        if (result.notice) showNotice(result.notice);
        return result.effect;
      }
    }
  }

  function handle(event: FleetEvent): DispatchEffect | undefined {
    switch (event.type) {
      case 'completion':
        handleCompletion(event.completion);
        return undefined;
      case 'tick':
        handleTick();
        return undefined;
      case 'input':
        return handleInput(event.event);
    }
  }

  function render(): void {
    renderer.render(snapshot());
  }

  async function saveView(): Promise<void> {
    if (!options.saveView) return;
    const result = await options.saveView({
      sort: dispatcher.sortOrder(),
      hidden: dispatcher.hidden(),
    });
    if (!result.success) {
      setStatus('error', `Could not save view settings: ${result.error}`);
    }
  }

  async function stopAll(): Promise<void> {
    await scheduler.cancelAll();
    // Cancellations are already queued; apply them before reporting the stop
    for (const event of queue.drain()) {
      if (event.type === 'completion') {
        aggregator.apply(event.completion);
      } else {
        queue.push(event);
      }
    }
    setStatus('done', 'Stopped all tasks');
  }

  async function run(): Promise<void> {
    input.start((event) => queue.push({ type: 'input', event }));
    const timer = setInterval(() => queue.push({ type: 'tick' }), tickMs);
    lastAutoRefresh = now();
    if (options.initialCommand) {
      const result = dispatcher.dispatch(options.initialCommand);
      if (result.notice) showNotice(result.notice);
    }
    render();

    try {
      for (;;) {
        const effect = handle(await queue.next());
        if (effect === 'quit') break;
        if (effect === 'cancel-all') await stopAll();
        if (effect === 'save-view') await saveView();
        render();
      }
    } finally {
      clearInterval(timer);
      input.stop();
      await scheduler.shutdown();
      // Cancellations delivered during shutdown still clear their repos
      for (const event of queue.drain()) {
        if (event.type === 'completion') aggregator.apply(event.completion);
      }
    }
  }

  return { run, snapshot };
}
