import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createScheduler, defaultConcurrency } from '../src/fleet/scheduler.ts';
import { createFleetSession } from '../src/fleet/session.ts';
import type { TaskCompletion } from '../src/git/types.ts';
import { createControlledExecute, flush } from './fake-execute.ts';
import { createFakeGit } from './fake-git.ts';

function setup(capacity: number) {
  const control = createControlledExecute();
  const completions: TaskCompletion[] = [];
  const scheduler = createScheduler({
    capacity,
    execute: control.execute,
    onComplete: (completion) => completions.push(completion),
    now: () => 0,
  });
  return { ...control, completions, scheduler };
}

function paths(completions: TaskCompletion[]): string[] {
  return completions.map((completion) => completion.task.repoPath);
}

describe('defaultConcurrency', () => {
  test('is the repo count clamped to 1..8', () => {
    expect(defaultConcurrency(0)).toBe(1);
    expect(defaultConcurrency(3)).toBe(3);
    expect(defaultConcurrency(20)).toBe(8);
  });
});

describe('submit', () => {
  test('starts up to capacity tasks and queues the rest in order', () => {
    const { scheduler, started } = setup(2);

    const a = scheduler.submit('/r/a', 'fetch');
    scheduler.submit('/r/b', 'fetch');
    const c = scheduler.submit('/r/c', 'fetch');

    expect(a).toEqual({
      success: true,
      data: {
        task: { id: 1, repoPath: '/r/a', operation: 'fetch', submittedAt: 0 },
        queued: false,
      },
    });
    expect(c.success && c.data.queued).toBe(true);
    expect(started.map((task) => task.repoPath)).toEqual(['/r/a', '/r/b']);
    expect(scheduler.activity()).toEqual({ running: 2, queued: 1, capacity: 2 });
  });

  test('starts the next queued task when one finishes', async () => {
    const { scheduler, started, finish, completions } = setup(2);
    scheduler.submit('/r/a', 'fetch');
    scheduler.submit('/r/b', 'fetch');
    scheduler.submit('/r/c', 'fetch');

    finish('/r/a');
    await flush();

    expect(paths(completions)).toEqual(['/r/a']);
    expect(started.map((task) => task.repoPath)).toEqual(['/r/a', '/r/b', '/r/c']);
    expect(scheduler.activity()).toEqual({ running: 2, queued: 0, capacity: 2 });
  });

  test('refuses a second task for a repository until the first is delivered', async () => {
    const { scheduler, finish } = setup(4);
    scheduler.submit('/r/a', 'refresh');

    expect(scheduler.submit('/r/a', 'push')).toEqual({
      success: false,
      error: 'already-in-progress',
    });

    finish('/r/a');
    await flush();

    expect(scheduler.submit('/r/a', 'push').success).toBe(true);
  });

  test('delivers each task exactly once with increasing ids', async () => {
    const { scheduler, finish, completions } = setup(1);
    scheduler.submit('/r/a', 'fetch');
    scheduler.submit('/r/b', 'fetch');

    finish('/r/a');
    await flush();
    finish('/r/b');
    await flush();
    finish('/r/a');
    await flush();

    expect(completions.map((completion) => completion.task.id)).toEqual([1, 2]);
  });

  test('turns a rejected execute into a command failure', async () => {
    const completions: TaskCompletion[] = [];
    const scheduler = createScheduler({
      capacity: 1,
      execute: () => Promise.reject(new Error('boom')),
      onComplete: (completion) => completions.push(completion),
    });

    scheduler.submit('/r/a', 'fetch');
    await flush();

    expect(completions[0]?.outcome).toEqual({
      success: false,
      kind: 'command-failed',
      error: 'boom',
    });
  });
});

describe('cancel', () => {
  test('removes a queued task and delivers it as cancelled at once', () => {
    const { scheduler, started, completions } = setup(1);
    scheduler.submit('/r/a', 'fetch');
    scheduler.submit('/r/b', 'fetch');

    expect(scheduler.cancel('/r/b')).toBe(true);

    expect(completions.map((completion) => completion.outcome)).toEqual([
      { success: false, kind: 'cancelled', error: 'Cancelled' },
    ]);
    expect(paths(completions)).toEqual(['/r/b']);
    expect(started.map((task) => task.repoPath)).toEqual(['/r/a']);
    expect(scheduler.submit('/r/b', 'fetch').success).toBe(true);
  });

  test('aborts a running task', async () => {
    const { scheduler, completions } = setup(1);
    scheduler.submit('/r/a', 'fetch');

    expect(scheduler.cancel('/r/a')).toBe(true);
    await flush();

    expect(completions[0]?.outcome).toEqual({
      success: false,
      kind: 'cancelled',
      error: 'Cancelled',
    });
  });

  test('returns false for an idle repository', () => {
    const { scheduler } = setup(1);
    expect(scheduler.cancel('/r/a')).toBe(false);
  });
});

describe('cancelAll', () => {
  test('delivers queued tasks first, then the aborted running ones', async () => {
    const { scheduler, completions } = setup(1);
    scheduler.submit('/r/a', 'fetch');
    scheduler.submit('/r/b', 'fetch');
    scheduler.submit('/r/c', 'fetch');

    await scheduler.cancelAll();

    expect(paths(completions)).toEqual(['/r/b', '/r/c', '/r/a']);
    expect(
      completions.every(
        (completion) =>
          !completion.outcome.success && completion.outcome.kind === 'cancelled'
      )
    ).toBe(true);
    expect(scheduler.activity()).toEqual({ running: 0, queued: 0, capacity: 1 });
  });

  test('refuses submissions while stopping and accepts them afterwards', async () => {
    const { scheduler } = setup(1);
    scheduler.submit('/r/a', 'fetch');

    const stopping = scheduler.cancelAll();
    expect(scheduler.submit('/r/b', 'fetch')).toEqual({
      success: false,
      error: 'cancelling',
    });
    await stopping;

    expect(scheduler.submit('/r/b', 'fetch').success).toBe(true);
  });
});

describe('shutdown', () => {
  test('cancels everything and closes the scheduler for good', async () => {
    const { scheduler, completions } = setup(2);
    scheduler.submit('/r/a', 'fetch');

    await scheduler.shutdown();

    expect(paths(completions)).toEqual(['/r/a']);
    expect(scheduler.submit('/r/b', 'fetch')).toEqual({
      success: false,
      error: 'closed',
    });
  });
});

describe('bounded pool', () => {
  test('never runs more than capacity tasks and delivers every one', async () => {
    const { scheduler, finish, completions } = setup(2);
    const repos = ['/r/a', '/r/b', '/r/c', '/r/d', '/r/e'];
    let highest = 0;
    const observe = (): void => {
      highest = Math.max(highest, scheduler.activity().running);
    };

    for (const repo of repos) {
      scheduler.submit(repo, 'fetch');
      observe();
    }
    for (const repo of repos) {
      finish(repo);
      await flush();
      observe();
    }

    expect(highest).toBe(2);
    expect(paths(completions)).toEqual(repos);
    expect(scheduler.activity()).toEqual({ running: 0, queued: 0, capacity: 2 });
  });
});

describe('shutdown through the git executor', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'gitfleet-scheduler-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('leaves no git process behind and delivers nothing afterwards', async () => {
    const repos = ['alpha', 'beta', 'gamma'].map((name) => join(root, name));
    for (const repo of repos) await mkdir(repo);
    const git = createFakeGit((call) =>
      call.cwd === repos[1] ? { hang: true, ignoreTerm: true } : { hang: true }
    );
    const session = createFleetSession({
      paths: repos,
      concurrency: 2,
      timeoutMs: 5000,
      killGraceMs: 10,
      spawn: git.spawn,
    });

    const { submitted } = session.dispatcher.dispatch({ type: 'refresh-all' });
    expect(submitted).toHaveLength(3);
    await vi.waitFor(() => expect(git.live()).toBe(2));

    await session.scheduler.shutdown();

    expect(git.live()).toBe(0);
    const delivered = session.queue.drain();
    expect(delivered).toHaveLength(3);
    for (const event of delivered) {
      expect(event.type === 'completion' && event.completion.outcome).toEqual({
        success: false,
        kind: 'cancelled',
        error: 'Cancelled',
      });
    }
    expect(git.calls.find((call) => call.cwd === repos[1])?.kills).toEqual([
      'SIGTERM',
      'SIGKILL',
    ]);

    await flush();
    expect(session.queue.size).toBe(0);
  });
});
