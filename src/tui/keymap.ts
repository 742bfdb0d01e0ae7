import type { FleetCommand } from '../fleet/dispatcher.ts';
import type { KeyEvent } from '../fleet/ui.ts';

export type KeyAction =
  | { type: 'command'; command: FleetCommand }
  | { type: 'start-filter' }
  | { type: 'toggle-help' }
  | { type: 'show-errors' }
  | { type: 'show-details' }
  | { type: 'show-hidden' };

export type FilterEdit =
  | { type: 'update'; text: string }
  | { type: 'commit' }
  | { type: 'cancel' };

const NAMED_KEYS: Record<string, FleetCommand> = {
  up: { type: 'navigate-up' },
  down: { type: 'navigate-down' },
  home: { type: 'navigate-top' },
  end: { type: 'navigate-bottom' },
  left: { type: 'previous-sort-column' },
  right: { type: 'next-sort-column' },
  escape: { type: 'quit' },
  space: { type: 'toggle-select' },
};

const CHARACTER_KEYS: Record<string, FleetCommand> = {
  q: { type: 'quit' },
  j: { type: 'navigate-down' },
  k: { type: 'navigate-up' },
  g: { type: 'navigate-top' },
  G: { type: 'navigate-bottom' },
  x: { type: 'toggle-select' },
  ' ': { type: 'toggle-select' },
  a: { type: 'select-all' },
  X: { type: 'clear-selection' },
  r: { type: 'refresh-one' },
  R: { type: 'refresh-all' },
  f: { type: 'fetch-selected' },
  l: { type: 'pull-selected' },
  h: { type: 'push-selected' },
  p: { type: 'prune-selected' },
  s: { type: 'sync-selected' },
  c: { type: 'cancel-selected' },
  S: { type: 'cancel-all' },
  v: { type: 'reverse-sort' },
  i: { type: 'hide-current' },
};

export const HELP_LINES = [
  'Navigation',
  '  j/k ↑/↓     move',
  '  g/G         first / last',
  '  ←/→         sort column',
  '  v           reverse sort',
  '  /           filter (Enter keeps, Esc clears)',
  '',
  'Selection',
  '  space/x     mark and move down',
  '  a           mark all visible',
  '  X           clear marks',
  '  i           hide current repo',
  '  I           hidden repos (Enter shows one again)',
  '',
  'Git (marked repos, or the current one)',
  '  r           refresh current',
  '  R           refresh all',
  '  f           fetch --all',
  '  l           pull --ff-only',
  '  h           push',
  '  p           prune remotes',
  '  s           sync (fetch, pull, push)',
  '  c           cancel',
  '  S           stop all tasks',
  '',
  'Other',
  '  Enter       details of the current repo',
  '  E           error log',
  '  ?           this help',
  '  q/Esc       quit',
];

function printable(key: KeyEvent): string | undefined {
  if (key.ctrl || key.sequence.length !== 1) return undefined;
  return key.sequence >= ' ' && key.sequence !== '\x7f'
    ? key.sequence
    : undefined;
}

export function translateKey(key: KeyEvent): KeyAction | undefined {
  if (key.ctrl && key.name === 'c') {
    return { type: 'command', command: { type: 'quit' } };
  }

  const char = printable(key);
  if (char === '/') return { type: 'start-filter' };
  if (char === '?') return { type: 'toggle-help' };
  if (char === 'E') return { type: 'show-errors' };
  if (char === 'I') return { type: 'show-hidden' };
  if (key.name === 'return' || key.name === 'enter') {
    return { type: 'show-details' };
  }

  const command =
    (char !== undefined ? CHARACTER_KEYS[char] : undefined) ??
    (key.name !== undefined ? NAMED_KEYS[key.name] : undefined);
  return command ? { type: 'command', command } : undefined;
}

export function editFilter(text: string, key: KeyEvent): FilterEdit | undefined {
  if (key.name === 'escape') return { type: 'cancel' };
  if (key.name === 'return' || key.name === 'enter') return { type: 'commit' };
  if (key.name === 'backspace') {
    return { type: 'update', text: text.slice(0, -1) };
  }
  if (key.ctrl && key.name === 'u') return { type: 'update', text: '' };

  const char = printable(key);
  return char !== undefined ? { type: 'update', text: text + char } : undefined;
}
