import type { OperationResult } from '../types.ts';
import type { WorkingTreeCounts } from './types.ts';

export const DETACHED_HEAD = '(detached)';

const PORCELAIN_LINE = /^[ MTADRCU?!]{2} ./;

// Parses `git status --porcelain` (v1) output into per-column counts
export function parsePorcelainStatus(
  output: string
): OperationResult<WorkingTreeCounts> {
  const counts: WorkingTreeCounts = { staged: 0, modified: 0, untracked: 0 };

  for (const line of output.split('\n')) {
    if (line === '') continue;
    if (!PORCELAIN_LINE.test(line)) {
      return { success: false, error: `Unexpected status line: ${line}` };
    }

    const index = line.charAt(0);
    const worktree = line.charAt(1);

    if (index === '!') continue;
    if (index === '?') {
      counts.untracked++;
      continue;
    }
    if (index !== ' ') counts.staged++;
    if (worktree !== ' ') counts.modified++;
  }

  return { success: true, data: counts };
}

// `git rev-list --left-right --count HEAD...@{upstream}` prints "<ahead>\t<behind>"
export function parseAheadBehind(
  output: string
): OperationResult<{ ahead: number; behind: number }> {
  const match = output.trim().match(/^(\d+)\s+(\d+)$/);
  if (!match || match[1] === undefined || match[2] === undefined) {
    return { success: false, error: `Unexpected rev-list output: ${output}` };
  }
  return {
    success: true,
    data: { ahead: Number(match[1]), behind: Number(match[2]) },
  };
}

export function parseRemotes(output: string): string[] {
  return output
    .split('\n')
    .map((name) => name.trim())
    .filter(Boolean);
}

export function isDirty(counts: WorkingTreeCounts): boolean {
  return counts.staged > 0 || counts.modified > 0 || counts.untracked > 0;
}
