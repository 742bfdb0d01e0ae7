import type { CommandContext } from './context.ts';
import { cancelOnInterrupt, prepareSession } from './context.ts';
import { applyCompletions, createFleetSession } from '../fleet/session.ts';
import { print } from '../output.ts';
import { renderSummaryRow } from '../tui/render.ts';

export async function statusCommand(ctx: CommandContext): Promise<void> {
  const { options } = await prepareSession(ctx);
  const session = createFleetSession(options);

  if (session.table.size === 0) {
    print('No repos found. Use "gitfleet add <path>" to add one.');
    return;
  }

  const { submitted } = session.dispatcher.dispatch({ type: 'refresh-all' });
  const release = cancelOnInterrupt(session.scheduler);
  try {
    await applyCompletions(session, submitted.length);
  } finally {
    release();
    await session.scheduler.shutdown();
  }

  const repos = session.dispatcher.visible();
  for (const repo of repos) {
    print(renderSummaryRow(repo));
  }

  const failed = repos.filter((repo) => repo.status.kind === 'error').length;
  const dirty = repos.filter((repo) => repo.dirty).length;
  const hidden = session.dispatcher.hidden().length;
  print(
    `\n${repos.length} repo(s), ${dirty} dirty, ${failed} failed` +
      (hidden > 0 ? `, ${hidden} hidden` : '')
  );
  if (failed > 0) process.exitCode = 1;
}
