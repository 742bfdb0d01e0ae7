import {
  getConcurrency,
  getHidden,
  getScanDepth,
  getSortOrder,
  getTimeoutMs,
  loadConfig,
} from '../config.ts';
import { discoverRepos } from '../discovery.ts';
import type { Scheduler } from '../fleet/scheduler.ts';
import type { FleetSessionOptions } from '../fleet/session.ts';
import type { SpawnGit } from '../git/types.ts';
import { printError, printStatus } from '../output.ts';
import type { FleetConfig } from '../types.ts';

export type CommandContext = {
  configPath: string;
  // Scan roots from --path; replace the configured repos and roots
  roots?: string[];
  concurrency?: number;
  timeoutSeconds?: number;
  spawn?: SpawnGit;
};

export type PreparedSession = {
  config: FleetConfig;
  options: FleetSessionOptions;
};

export async function prepareSession(
  ctx: CommandContext
): Promise<PreparedSession> {
  const config = await loadConfig(ctx.configPath);

  const paths = ctx.roots
    ? await discoverRepos({ roots: ctx.roots, maxDepth: getScanDepth(config) })
    : await discoverRepos({
        repos: config.repos,
        roots: config.roots,
        maxDepth: getScanDepth(config),
      });

  return {
    config,
    options: {
      paths,
      concurrency: ctx.concurrency ?? getConcurrency(config),
      timeoutMs:
        ctx.timeoutSeconds !== undefined
          ? ctx.timeoutSeconds * 1000
          : getTimeoutMs(config),
      sort: getSortOrder(config),
      hidden: getHidden(config),
      spawn: ctx.spawn,
    },
  };
}

type SignalSource = Pick<NodeJS.EventEmitter, 'once' | 'off'>;

/**
 * git runs in its own process group and misses the terminal's Ctrl-C, so the
 * first SIGINT cancels the session's tasks and the command ends normally.
 * Returns the function that removes the handler.
 */
export function cancelOnInterrupt(
  scheduler: Pick<Scheduler, 'cancelAll'>,
  signals: SignalSource = process
): () => void {
  const onInterrupt = (): void => {
    printStatus('Interrupted, cancelling...');
    scheduler.cancelAll().catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      printError(`Error: ${message}`);
    });
  };
  signals.once('SIGINT', onInterrupt);
  return () => {
    signals.off('SIGINT', onInterrupt);
  };
}
