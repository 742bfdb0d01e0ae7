import { createExecutor } from '../git/executor.ts';
import type { ExecuteTask, SpawnGit, TaskCompletion } from '../git/types.ts';
import type { RepoPath } from '../types.ts';
import { createStateAggregator } from './aggregator.ts';
import type { StateAggregator } from './aggregator.ts';
import { createCommandDispatcher } from './dispatcher.ts';
import type { CommandDispatcher } from './dispatcher.ts';
import { createEventQueue } from './queue.ts';
import type { EventQueue } from './queue.ts';
import { createScheduler, defaultConcurrency } from './scheduler.ts';
import type { Scheduler } from './scheduler.ts';
import { createRepositoryTable } from './state.ts';
import type { RepositoryTable } from './state.ts';
import type { FleetEvent } from './ui.ts';
import type { SortOrder } from './view.ts';

export const DEFAULT_TIMEOUT_MS = 120_000;

export type FleetSessionOptions = {
  paths: readonly RepoPath[];
  concurrency?: number;
  timeoutMs?: number;
  // Time a cancelled git child gets between SIGTERM and SIGKILL
  killGraceMs?: number;
  sort?: SortOrder;
  hidden?: readonly RepoPath[];
  spawn?: SpawnGit;
  execute?: ExecuteTask;
  now?: () => number;
};

export type FleetSession = {
  table: RepositoryTable;
  queue: EventQueue<FleetEvent>;
  aggregator: StateAggregator;
  scheduler: Scheduler;
  dispatcher: CommandDispatcher;
};

/**
 * Wires the engine together: every scheduler completion is posted onto the
 * event queue and reaches the table only when the queue's consumer applies
 * it through the aggregator.
 */
export function createFleetSession(options: FleetSessionOptions): FleetSession {
  const table = createRepositoryTable(options.paths);
  const queue = createEventQueue<FleetEvent>();
  const aggregator = createStateAggregator(table, { now: options.now });

  const execute =
    options.execute ??
    createExecutor({
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      spawn: options.spawn,
      killGraceMs: options.killGraceMs,
    });

  const scheduler = createScheduler({
    capacity: options.concurrency ?? defaultConcurrency(table.size),
    execute,
    onComplete: (completion) => queue.push({ type: 'completion', completion }),
    now: options.now,
  });

  const dispatcher = createCommandDispatcher({
    table,
    scheduler,
    aggregator,
    sort: options.sort,
    hidden: options.hidden,
  });

  return { table, queue, aggregator, scheduler, dispatcher };
}

/**
 * Headless consumer for commands without an event loop: applies the next
 * `count` completions from the session queue in arrival order.
 */
export async function applyCompletions(
  session: Pick<FleetSession, 'queue' | 'aggregator'>,
  count: number,
  onApplied?: (completion: TaskCompletion) => void
): Promise<void> {
  let remaining = count;
  while (remaining > 0) {
    const event = await session.queue.next();
    if (event.type !== 'completion') continue;
    session.aggregator.apply(event.completion);
    onApplied?.(event.completion);
    remaining--;
  }
}
