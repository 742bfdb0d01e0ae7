import { isDirectory, runGitCommand } from './core.ts';
import {
  DETACHED_HEAD,
  isDirty,
  parseAheadBehind,
  parsePorcelainStatus,
  parseRemotes,
} from './status.ts';
import type {
  ExecuteTask,
  FailureKind,
  GitCommandResult,
  OperationData,
  OperationKind,
  RepoStatusData,
  SpawnGit,
  TaskOutcome,
} from './types.ts';

export type ExecutorOptions = {
  timeoutMs: number;
  spawn?: SpawnGit;
  killGraceMs?: number;
};

type AbortReason = 'timeout' | 'cancelled';

// setTimeout fires at once for anything longer
const MAX_TIMER_MS = 2 ** 31 - 1;

class TaskFailure extends Error {
  constructor(
    readonly kind: FailureKind,
    message: string
  ) {
    super(message);
  }
}

type Git = (args: string[]) => Promise<GitCommandResult>;

function commandFailure(
  result: GitCommandResult,
  fallback: string
): TaskFailure {
  const message = result.stderr || fallback;
  if (/not a git repository/i.test(message)) {
    return new TaskFailure('repo-unavailable', message);
  }
  return new TaskFailure('command-failed', message);
}

async function expectSuccess(
  git: Git,
  args: string[],
  fallback: string
): Promise<GitCommandResult> {
  const result = await git(args);
  if (result.exitCode !== 0) {
    throw commandFailure(result, fallback);
  }
  return result;
}

async function readStatus(git: Git): Promise<RepoStatusData> {
  const inside = await expectSuccess(
    git,
    ['rev-parse', '--is-inside-work-tree'],
    'Not a git repository'
  );
  if (inside.stdout.trim() !== 'true') {
    throw new TaskFailure('repo-unavailable', 'Not a git working tree');
  }

  const head = await git(['symbolic-ref', '--quiet', '--short', 'HEAD']);
  let branch: string;
  if (head.exitCode === 0) {
    branch = head.stdout.trim();
  } else if (head.exitCode === 1) {
    branch = DETACHED_HEAD;
  } else {
    throw commandFailure(head, 'Failed to read HEAD');
  }

  const remotes = await expectSuccess(git, ['remote'], 'Failed to list remotes');

  // Non-zero here just means no upstream is configured
  const upstream = await git([
    'rev-parse',
    '--abbrev-ref',
    '--symbolic-full-name',
    '@{upstream}',
  ]);
  const hasUpstream = upstream.exitCode === 0 && upstream.stdout.trim() !== '';

  let divergence: { ahead: number; behind: number } | undefined;
  if (hasUpstream) {
    const counts = await expectSuccess(
      git,
      ['rev-list', '--left-right', '--count', 'HEAD...@{upstream}'],
      'Failed to count commits'
    );
    const parsed = parseAheadBehind(counts.stdout);
    if (!parsed.success) {
      throw new TaskFailure('parse-error', counts.stdout);
    }
    divergence = parsed.data;
  }

  const status = await expectSuccess(
    git,
    ['status', '--porcelain'],
    'Failed to check status'
  );
  const tree = parsePorcelainStatus(status.stdout);
  if (!tree.success) {
    throw new TaskFailure('parse-error', status.stdout);
  }

  return {
    branch,
    upstream: hasUpstream ? upstream.stdout.trim() : undefined,
    remotes: parseRemotes(remotes.stdout),
    dirty: isDirty(tree.data),
    ...tree.data,
    ahead: divergence?.ahead,
    behind: divergence?.behind,
  };
}

async function pullFastForward(git: Git): Promise<boolean> {
  const result = await expectSuccess(
    git,
    ['pull', '--ff-only'],
    'Failed to pull'
  );
  return !result.stdout.includes('Already up to date');
}

async function runOperation(
  operation: OperationKind,
  git: Git
): Promise<OperationData> {
  switch (operation) {
    case 'refresh':
      return { operation, status: await readStatus(git) };
    case 'fetch':
      await expectSuccess(git, ['fetch', '--all'], 'Failed to fetch');
      return { operation };
    case 'pull':
      return { operation, updated: await pullFastForward(git) };
    case 'push':
      await expectSuccess(git, ['push'], 'Failed to push');
      return { operation };
    case 'prune': {
      const remotes = await expectSuccess(
        git,
        ['remote'],
        'Failed to list remotes'
      );
      for (const remote of parseRemotes(remotes.stdout)) {
        await expectSuccess(
          git,
          ['remote', 'prune', remote],
          `Failed to prune ${remote}`
        );
      }
      return { operation };
    }
    case 'sync': {
      await expectSuccess(git, ['fetch', '--all'], 'Failed to fetch');
      const updated = await pullFastForward(git);
      await expectSuccess(git, ['push'], 'Failed to push');
      return { operation, updated };
    }
  }
}

function abortFailure(reason: AbortReason, timeoutMs: number): TaskFailure {
  if (reason === 'timeout') {
    return new TaskFailure('timed-out', `Timed out after ${timeoutMs}ms`);
  }
  return new TaskFailure('cancelled', 'Cancelled');
}

/**
 * Builds the function the scheduler calls for every task. Each task gets its
 * own deadline; when it passes, or when the scheduler aborts `signal`, the
 * running git child is killed and awaited before the outcome is returned.
 */
export function createExecutor(options: ExecutorOptions): ExecuteTask {
  const { timeoutMs, spawn, killGraceMs } = options;

  return async (task, signal) => {
    if (signal.aborted) {
      return { success: false, kind: 'cancelled', error: 'Cancelled' };
    }

    const controller = new AbortController();
    let reason: AbortReason | undefined;
    const abort = (why: AbortReason): void => {
      reason ??= why;
      controller.abort();
    };
    const onCancel = (): void => abort('cancelled');
    const timer = setTimeout(
      () => abort('timeout'),
      Math.min(timeoutMs, MAX_TIMER_MS)
    );
    signal.addEventListener('abort', onCancel, { once: true });

    const git: Git = async (args) => {
      if (reason) throw abortFailure(reason, timeoutMs);
      let result: GitCommandResult;
      try {
        result = await runGitCommand(args, task.repoPath, {
          signal: controller.signal,
          spawn,
          killGraceMs,
        });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new TaskFailure(
          'repo-unavailable',
          `Failed to start git: ${message}`
        );
      }
      if (reason) throw abortFailure(reason, timeoutMs);
      return result;
    };

    try {
      if (!(await isDirectory(task.repoPath))) {
        return {
          success: false,
          kind: 'repo-unavailable',
          error: `Path not found: ${task.repoPath}`,
        };
      }
      const data = await runOperation(task.operation, git);
      return { success: true, data };
    } catch (err) {
      if (err instanceof TaskFailure) {
        return { success: false, kind: err.kind, error: err.message };
      }
      const message = err instanceof Error ? err.message : 'Unknown error';
      return { success: false, kind: 'command-failed', error: message };
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onCancel);
    }
  };
}
