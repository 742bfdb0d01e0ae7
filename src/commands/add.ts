import type { CommandContext } from './context.ts';
import {
  addRepoToConfig,
  findRepo,
  normalizeRepoPath,
  readConfig,
  writeConfig,
} from '../config.ts';
import { isGitRepo } from '../git/index.ts';
import { print, printError } from '../output.ts';

export async function addCommand(
  ctx: CommandContext,
  path: string
): Promise<void> {
  const repoPath = normalizeRepoPath(path);

  const configResult = await readConfig(ctx.configPath);
  if (!configResult.success) {
    printError(`Error reading config: ${configResult.error}`);
    process.exit(1);
  }

  if (findRepo(configResult.data, repoPath)) {
    printError(`Error: "${repoPath}" is already tracked`);
    process.exit(1);
  }

  if (!(await isGitRepo(repoPath, ctx.spawn))) {
    printError(`Error: "${repoPath}" is not a git repository`);
    process.exit(1);
  }

  const writeResult = await writeConfig(
    ctx.configPath,
    addRepoToConfig(configResult.data, repoPath)
  );
  if (!writeResult.success) {
    printError(`Error saving config: ${writeResult.error}`);
    process.exit(1);
  }

  print(`Added "${repoPath}"`);
}
