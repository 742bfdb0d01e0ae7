import type {
  ExecuteTask,
  OperationKind,
  Task,
  TaskCompletion,
  TaskOutcome,
} from '../git/types.ts';
import type { RepoPath } from '../types.ts';

export const DEFAULT_CONCURRENCY = 8;

export type SubmitRejection = 'already-in-progress' | 'cancelling' | 'closed';

export type SubmitResult =
  | { success: true; data: { task: Task; queued: boolean } }
  | { success: false; error: SubmitRejection };

export type SchedulerActivity = {
  running: number;
  queued: number;
  capacity: number;
};

export type Scheduler = {
  submit(repoPath: RepoPath, operation: OperationKind): SubmitResult;
  cancel(repoPath: RepoPath): boolean;
  cancelAll(): Promise<void>;
  shutdown(): Promise<void>;
  activity(): SchedulerActivity;
};

export type SchedulerOptions = {
  capacity: number;
  execute: ExecuteTask;
  // Called exactly once per accepted task; must not throw
  onComplete: (completion: TaskCompletion) => void;
  now?: () => number;
};

type RunningTask = {
  task: Task;
  controller: AbortController;
  settled: Promise<void>;
};

const CANCELLED: TaskOutcome = {
  success: false,
  kind: 'cancelled',
  error: 'Cancelled',
};

export function defaultConcurrency(repoCount: number): number {
  return Math.max(1, Math.min(repoCount, DEFAULT_CONCURRENCY));
}

/**
 * Bounded FIFO pool of git tasks, one claim per repository. A repository is
 * claimed from the moment `submit` accepts a task until its completion has
 * been handed to `onComplete`.
 */
export function createScheduler(options: SchedulerOptions): Scheduler {
  const { execute, onComplete } = options;
  const now = options.now ?? Date.now;
  const capacity = Math.max(1, Math.floor(options.capacity));

  const queue: Task[] = [];
  const running = new Map<RepoPath, RunningTask>();
  const claimed = new Set<RepoPath>();
  let nextId = 1;
  let cancelling = false;
  let closed = false;

  function complete(task: Task, outcome: TaskOutcome): void {
    claimed.delete(task.repoPath);
    onComplete({ task, outcome, finishedAt: now() });
  }

  function start(task: Task): void {
    const controller = new AbortController();
    const settled = execute(task, controller.signal)
      .catch((err: unknown): TaskOutcome => {
        const message = err instanceof Error ? err.message : String(err);
        return { success: false, kind: 'command-failed', error: message };
      })
      .then((outcome) => {
        running.delete(task.repoPath);
        complete(task, outcome);
        pump();
      });
    running.set(task.repoPath, { task, controller, settled });
  }

  function pump(): void {
    while (running.size < capacity && queue.length > 0) {
      const task = queue.shift();
      if (task) start(task);
    }
  }

  function submit(repoPath: RepoPath, operation: OperationKind): SubmitResult {
    if (closed) return { success: false, error: 'closed' };
    if (cancelling) return { success: false, error: 'cancelling' };
    if (claimed.has(repoPath)) {
      return { success: false, error: 'already-in-progress' };
    }

    claimed.add(repoPath);
    const task: Task = { id: nextId++, repoPath, operation, submittedAt: now() };
    queue.push(task);
    pump();
    return { success: true, data: { task, queued: !running.has(repoPath) } };
  }

  function cancel(repoPath: RepoPath): boolean {
    const index = queue.findIndex((task) => task.repoPath === repoPath);
    const queuedTask = queue[index];
    if (queuedTask) {
      queue.splice(index, 1);
      complete(queuedTask, CANCELLED);
      return true;
    }

    const entry = running.get(repoPath);
    if (!entry) return false;
    entry.controller.abort();
    return true;
  }

  async function cancelAll(): Promise<void> {
    cancelling = true;
    try {
      for (const task of queue.splice(0)) {
        complete(task, CANCELLED);
      }
      const inFlight = [...running.values()];
      for (const entry of inFlight) entry.controller.abort();
      await Promise.all(inFlight.map((entry) => entry.settled));
    } finally {
      cancelling = false;
    }
  }

  async function shutdown(): Promise<void> {
    closed = true;
    await cancelAll();
  }

  return {
    submit,
    cancel,
    cancelAll,
    shutdown,
    activity: () => ({ running: running.size, queued: queue.length, capacity }),
  };
}
