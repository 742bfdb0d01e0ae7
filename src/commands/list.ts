import type { CommandContext } from './context.ts';
import { prepareSession } from './context.ts';
import { print } from '../output.ts';

export async function listCommand(ctx: CommandContext): Promise<void> {
  const { options } = await prepareSession(ctx);

  if (options.paths.length === 0) {
    print('No repos found. Use "gitfleet add <path>" to add one.');
    return;
  }

  for (const path of options.paths) {
    print(path);
  }
}
