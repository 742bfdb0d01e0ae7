import { emitKeypressEvents } from 'node:readline';
import type { Key } from 'node:readline';
import type { InputEvent, InputSource, KeyEvent } from '../fleet/ui.ts';

export function toKeyEvent(str: string | undefined, key: Key | undefined): KeyEvent {
  return {
    type: 'key',
    name: key?.name,
    sequence: key?.sequence ?? str ?? '',
    ctrl: key?.ctrl ?? false,
    shift: key?.shift ?? false,
  };
}

/**
 * Raw-mode keypress and resize events from the controlling terminal. Can be
 * started again after `stop()`.
 */
export function createTerminalInput(
  stdin: NodeJS.ReadStream = process.stdin,
  stdout: NodeJS.WriteStream = process.stdout
): InputSource {
  let onKeypress: ((str: string | undefined, key: Key | undefined) => void) | undefined;
  let onResize: (() => void) | undefined;

  return {
    start(listener: (event: InputEvent) => void) {
      emitKeypressEvents(stdin);
      if (stdin.isTTY) stdin.setRawMode(true);

      onKeypress = (str, key) => listener(toKeyEvent(str, key));
      onResize = () => listener({ type: 'resize' });
      stdin.on('keypress', onKeypress);
      stdout.on('resize', onResize);
      stdin.resume();
    },
    stop() {
      if (onKeypress) stdin.off('keypress', onKeypress);
      if (onResize) stdout.off('resize', onResize);
      onKeypress = undefined;
      onResize = undefined;
      if (stdin.isTTY) stdin.setRawMode(false);
      stdin.pause();
    },
  };
}
