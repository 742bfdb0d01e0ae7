import type { CommandContext } from './context.ts';
import { cancelOnInterrupt, prepareSession } from './context.ts';
import { normalizeRepoPath } from '../config.ts';
import { applyCompletions, createFleetSession } from '../fleet/session.ts';
import type { ReadonlyRepositoryTable } from '../fleet/state.ts';
import type { OperationKind } from '../git/types.ts';
import { formatCompletion, print, printError, printStatus } from '../output.ts';
import type { OperationResult, RepoPath } from '../types.ts';

export type BulkOperation = Exclude<OperationKind, 'refresh'>;

export const BULK_OPERATIONS: readonly BulkOperation[] = [
  'fetch',
  'pull',
  'push',
  'prune',
  'sync',
];

const PROGRESS: Record<BulkOperation, string> = {
  fetch: 'Fetching',
  pull: 'Pulling',
  push: 'Pushing',
  prune: 'Pruning',
  sync: 'Syncing',
};

const DONE: Record<BulkOperation, string> = {
  fetch: 'Fetched',
  pull: 'Pulled',
  push: 'Pushed',
  prune: 'Pruned',
  sync: 'Synced',
};

// Names match a repository's directory name or its path; hidden repos are
// skipped unless named
export function resolveTargets(
  table: ReadonlyRepositoryTable,
  names: readonly string[],
  hidden: readonly RepoPath[] = []
): OperationResult<RepoPath[]> {
  const repos = table.list();
  if (names.length === 0) {
    return {
      success: true,
      data: repos
        .map((repo) => repo.path)
        .filter((path) => !hidden.includes(path)),
    };
  }

  const targets: RepoPath[] = [];
  for (const name of names) {
    const match =
      repos.find((repo) => repo.name === name) ??
      repos.find((repo) => repo.path === normalizeRepoPath(name));
    if (!match) {
      return { success: false, error: `Unknown repo: ${name}` };
    }
    if (!targets.includes(match.path)) targets.push(match.path);
  }
  return { success: true, data: targets };
}

export async function bulkCommand(
  ctx: CommandContext,
  operation: BulkOperation,
  names: readonly string[]
): Promise<void> {
  const { options } = await prepareSession(ctx);
  const session = createFleetSession(options);

  const targets = resolveTargets(
    session.table,
    names,
    session.dispatcher.hidden()
  );
  if (!targets.success) {
    printError(`Error: ${targets.error}`);
    process.exit(1);
  }
  if (targets.data.length === 0) {
    print('No repos found.');
    return;
  }

  const { submitted } = session.dispatcher.submit(targets.data, operation);
  printStatus(`${PROGRESS[operation]} ${submitted.length} repo(s)...`);

  let failed = 0;
  const release = cancelOnInterrupt(session.scheduler);
  try {
    await applyCompletions(session, submitted.length, (completion) => {
      if (!completion.outcome.success) failed++;
      const name =
        session.table.get(completion.task.repoPath)?.name ??
        completion.task.repoPath;
      print(formatCompletion(name, completion));
    });
  } finally {
    release();
    await session.scheduler.shutdown();
  }

  print(
    `\n${DONE[operation]} ${submitted.length - failed} repo(s), ${failed} failed`
  );
  if (failed > 0) process.exitCode = 1;
}
