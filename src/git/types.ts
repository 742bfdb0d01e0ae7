import type { Readable } from 'node:stream';
import type { RepoPath } from '../types.ts';

export type GitCommandResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal: NodeJS.Signals | null;
};

// The slice of ChildProcess that runGitCommand relies on
export type GitChildProcess = {
  pid?: number;
  stdout: Readable | null;
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(
    event: 'close',
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
};

export type SpawnGit = (
  args: string[],
  options: { cwd?: string; env: NodeJS.ProcessEnv }
) => GitChildProcess;

export type OperationKind =
  | 'refresh'
  | 'fetch'
  | 'pull'
  | 'push'
  | 'prune'
  | 'sync';

export type FailureKind =
  | 'repo-unavailable'
  | 'command-failed'
  | 'timed-out'
  | 'cancelled'
  | 'parse-error';

export type WorkingTreeCounts = {
  staged: number;
  modified: number;
  untracked: number;
};

export type RepoStatusData = WorkingTreeCounts & {
  branch: string;
  upstream?: string;
  remotes: string[];
  dirty: boolean;
  ahead?: number;
  behind?: number;
};

export type OperationData =
  | { operation: 'refresh'; status: RepoStatusData }
  | { operation: 'fetch' | 'push' | 'prune' }
  | { operation: 'pull' | 'sync'; updated: boolean };

export type TaskOutcome =
  | { success: true; data: OperationData }
  | { success: false; kind: FailureKind; error: string };

export type Task = {
  id: number;
  repoPath: RepoPath;
  operation: OperationKind;
  submittedAt: number;
};

export type TaskCompletion = {
  task: Task;
  outcome: TaskOutcome;
  finishedAt: number;
};

export type ExecuteTask = (
  task: Task,
  signal: AbortSignal
) => Promise<TaskOutcome>;
