import { basename } from 'node:path';
import type { CommandContext } from './context.ts';
import {
  addRepoToConfig,
  findRepo,
  getScanDepth,
  loadConfig,
  normalizeRepoPath,
  writeConfig,
} from '../config.ts';
import { discoverRepos } from '../discovery.ts';
import { print, printError } from '../output.ts';
import type { FleetConfig } from '../types.ts';

export async function adoptCommand(
  ctx: CommandContext,
  directory: string
): Promise<void> {
  const initialConfig = await loadConfig(ctx.configPath);
  const found = await discoverRepos({
    roots: [normalizeRepoPath(directory)],
    maxDepth: getScanDepth(initialConfig),
  });

  if (found.length === 0) {
    print('No git repos found in directory');
    return;
  }

  const newRepos = found.filter((path) => !findRepo(initialConfig, path));
  if (newRepos.length === 0) {
    print('All repos are already tracked');
    return;
  }

  print(`Found ${newRepos.length} untracked repo(s)\n`);

  let config: FleetConfig = initialConfig;
  for (const path of newRepos) {
    config = addRepoToConfig(config, path);
    print(`  ✓ ${basename(path)}`);
  }

  const writeResult = await writeConfig(ctx.configPath, config);
  if (!writeResult.success) {
    printError(`\nError saving config: ${writeResult.error}`);
    process.exit(1);
  }

  print(`\nAdopted ${newRepos.length} repo(s)`);
}
