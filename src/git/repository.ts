import { runGitCommand } from './core.ts';
import type { SpawnGit } from './types.ts';

export async function isGitRepo(dir: string, spawn?: SpawnGit): Promise<boolean> {
  try {
    const result = await runGitCommand(
      ['rev-parse', '--is-inside-work-tree'],
      dir,
      { spawn }
    );
    return result.exitCode === 0 && result.stdout.trim() === 'true';
  } catch {
    return false;
  }
}
