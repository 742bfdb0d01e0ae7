import type { CommandContext } from './context.ts';
import {
  findRepo,
  readConfig,
  removeRepoFromConfig,
  writeConfig,
} from '../config.ts';
import { print, printError } from '../output.ts';

export async function removeCommand(
  ctx: CommandContext,
  pathOrName: string
): Promise<void> {
  const configResult = await readConfig(ctx.configPath);
  if (!configResult.success) {
    printError(`Error reading config: ${configResult.error}`);
    process.exit(1);
  }

  const repoPath = findRepo(configResult.data, pathOrName);
  if (!repoPath) {
    printError(`Error: "${pathOrName}" not found in config`);
    process.exit(1);
  }

  const newConfig = removeRepoFromConfig(configResult.data, repoPath);
  const writeResult = await writeConfig(ctx.configPath, newConfig);
  if (!writeResult.success) {
    printError(`Error saving config: ${writeResult.error}`);
    process.exit(1);
  }

  print(`Removed "${repoPath}" from config`);
}
