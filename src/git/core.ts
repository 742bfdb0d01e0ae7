import { spawn } from 'node:child_process';
import { stat } from 'node:fs/promises';
import type { GitChildProcess, GitCommandResult, SpawnGit } from './types.ts';

export type KillGroup = (pid: number, signal: NodeJS.Signals) => void;

export type RunGitOptions = {
  signal?: AbortSignal;
  spawn?: SpawnGit;
  // Time between SIGTERM and SIGKILL once the signal fires
  killGraceMs?: number;
  killGroup?: KillGroup;
};

// git leads its own process group so its transport helpers share its fate
const USE_PROCESS_GROUPS = process.platform !== 'win32';

export const spawnGit: SpawnGit = (args, options) =>
  spawn('git', args, {
    cwd: options.cwd,
    env: options.env,
    stdio: ['ignore', 'pipe', 'pipe'],
    detached: USE_PROCESS_GROUPS,
  });

const killProcessGroup: KillGroup = (pid, signal) => {
  process.kill(-pid, signal);
};

/**
 * Signals the child's whole process group (ssh, git-remote-https and the
 * like hold its pipes open), or the child alone where there is no group.
 */
export function signalProcessTree(
  proc: GitChildProcess,
  signal: NodeJS.Signals,
  killGroup: KillGroup = killProcessGroup
): void {
  if (USE_PROCESS_GROUPS && proc.pid !== undefined) {
    try {
      killGroup(proc.pid, signal);
      return;
    } catch {
      // No such group: the child was not spawned as a leader or is gone
      proc.kill(signal);
      return;
    }
  }
  proc.kill(signal);
}

/**
 * Runs one git invocation and resolves once the child has exited and its
 * output streams are closed. When `signal` aborts, the child is terminated
 * and the promise still waits for it to be reaped. Rejects only when the
 * process could not be started.
 */
export function runGitCommand(
  args: string[],
  cwd?: string,
  options: RunGitOptions = {}
): Promise<GitCommandResult> {
  const { signal, killGraceMs = 2000, killGroup } = options;
  const spawnProcess = options.spawn ?? spawnGit;

  return new Promise((resolve, reject) => {
    const proc = spawnProcess(args, {
      cwd,
      // Failures are classified by git's English messages
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0', LC_ALL: 'C' },
    });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let killTimer: NodeJS.Timeout | undefined;

    proc.stdout?.setEncoding('utf8');
    proc.stderr?.setEncoding('utf8');
    proc.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    const terminate = (): void => {
      signalProcessTree(proc, 'SIGTERM', killGroup);
      killTimer = setTimeout(() => {
        signalProcessTree(proc, 'SIGKILL', killGroup);
      }, killGraceMs);
    };

    const cleanup = (): void => {
      settled = true;
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', terminate);
    };

    proc.once('error', (err) => {
      if (settled) return;
      cleanup();
      reject(err);
    });

    proc.once('close', (code, exitSignal) => {
      if (settled) return;
      cleanup();
      // Leading whitespace is significant in porcelain output
      resolve({
        stdout: stdout.trimEnd(),
        stderr: stderr.trim(),
        exitCode: code ?? -1,
        signal: exitSignal,
      });
    });

    if (signal?.aborted) {
      terminate();
    } else {
      signal?.addEventListener('abort', terminate, { once: true });
    }
  });
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}
