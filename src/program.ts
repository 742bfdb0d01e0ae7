import { Command, InvalidArgumentError } from '@commander-js/extra-typings';
import { version } from '../package.json';
import { getConfigPath, MAX_TIMEOUT_SECONDS } from './config.ts';
import { addCommand } from './commands/add.ts';
import { adoptCommand } from './commands/adopt.ts';
import { BULK_OPERATIONS, bulkCommand } from './commands/bulk.ts';
import type { BulkOperation } from './commands/bulk.ts';
import type { CommandContext } from './commands/context.ts';
import { listCommand } from './commands/list.ts';
import { removeCommand } from './commands/remove.ts';
import { statusCommand } from './commands/status.ts';
import { uiCommand } from './commands/ui.ts';
import type { SpawnGit } from './git/types.ts';

const BULK_DESCRIPTIONS: Record<BulkOperation, string> = {
  fetch: 'Fetch all remotes (all repos, or the named ones)',
  pull: 'Fast-forward pull (all repos, or the named ones)',
  push: 'Push the current branch (all repos, or the named ones)',
  prune: 'Prune stale remote-tracking branches (all repos, or the named ones)',
  sync: 'Fetch, pull and push (all repos, or the named ones)',
};

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseTimeoutSeconds(value: string): number {
  const parsed = parsePositiveInt(value);
  if (parsed > MAX_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(
      `Must be at most ${MAX_TIMEOUT_SECONDS} seconds.`
    );
  }
  return parsed;
}

export type ProgramOptions = {
  spawn?: SpawnGit;
};

export function createProgram(programOptions: ProgramOptions = {}) {
  const program = new Command()
    .name('gitfleet')
    .description('Manage a fleet of local git repositories')
    .version(version, '-v, --version')
    .option('-c, --config <path>', 'Config file to use')
    .option('-p, --path <dir...>', 'Scan these directories instead of the config')
    .option('-j, --concurrency <n>', 'Maximum parallel git tasks', parsePositiveInt)
    .option('-t, --timeout <seconds>', 'Per-task timeout', parseTimeoutSeconds);

  function getCommandContext(): CommandContext {
    const opts = program.opts();
    return {
      configPath: opts.config ?? getConfigPath(),
      roots: opts.path,
      concurrency: opts.concurrency,
      timeoutSeconds: opts.timeout,
      spawn: programOptions.spawn,
    };
  }

  program
    .command('ui', { isDefault: true })
    .description('Open the interactive repository list')
    .action(async () => {
      await uiCommand(getCommandContext());
    });

  program
    .command('status')
    .description('Refresh every repo and print its status')
    .action(async () => {
      await statusCommand(getCommandContext());
    });

  for (const operation of BULK_OPERATIONS) {
    program
      .command(operation)
      .description(BULK_DESCRIPTIONS[operation])
      .argument('[names...]', 'Repo names or paths')
      .action(async (names) => {
        await bulkCommand(getCommandContext(), operation, names);
      });
  }

  program
    .command('list')
    .description('List discovered repositories')
    .action(async () => {
      await listCommand(getCommandContext());
    });

  program
    .command('add')
    .description('Add an existing repository to the config')
    .argument('<path>', 'Path to the working tree')
    .action(async (path) => {
      await addCommand(getCommandContext(), path);
    });

  program
    .command('remove')
    .description('Remove a repository from the config')
    .argument('<repo>', 'Repo path or name')
    .action(async (repo) => {
      await removeCommand(getCommandContext(), repo);
    });

  program
    .command('adopt')
    .description('Add every repository found under a directory')
    .argument('[dir]', 'Directory to scan', '.')
    .action(async (dir) => {
      await adoptCommand(getCommandContext(), dir);
    });

  return program;
}
