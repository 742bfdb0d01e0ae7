import type { CommandContext } from './context.ts';
import { prepareSession } from './context.ts';
import { getRefreshIntervalMs, saveViewSettings } from '../config.ts';
import { createEventLoop } from '../fleet/event-loop.ts';
import { createFleetSession } from '../fleet/session.ts';
import { printError } from '../output.ts';
import { createTerminalInput } from '../tui/input.ts';
import { createTerminalRenderer } from '../tui/render.ts';

export async function uiCommand(ctx: CommandContext): Promise<void> {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    printError('Error: the interactive view needs a terminal (try "gitfleet status")');
    process.exit(1);
  }

  const { config, options } = await prepareSession(ctx);
  const session = createFleetSession(options);
  const renderer = createTerminalRenderer(process.stdout);

  const loop = createEventLoop({
    queue: session.queue,
    table: session.table,
    dispatcher: session.dispatcher,
    aggregator: session.aggregator,
    scheduler: session.scheduler,
    input: createTerminalInput(process.stdin, process.stdout),
    renderer,
    autoRefreshMs: getRefreshIntervalMs(config),
    initialCommand: { type: 'refresh-all' },
    saveView: (view) => saveViewSettings(ctx.configPath, view),
  });

  renderer.open();
  try {
    await loop.run();
  } finally {
    renderer.close();
  }
}
