import stringWidth from 'string-width';
import type { OperationKind } from '../git/types.ts';
import type { RepositoryState } from '../fleet/state.ts';
import { SPINNER_FRAMES } from '../fleet/ui.ts';
import type { Renderer, StatusMessage, UiSnapshot } from '../fleet/ui.ts';

export type FrameOptions = {
  columns: number;
  rows: number;
  color: boolean;
};

const NAME_WIDTH = 24;
const BRANCH_WIDTH = 20;
const STATUS_WIDTH = 30;

const ACTIVE_VERB: Record<OperationKind, string> = {
  refresh: 'refreshing',
  fetch: 'fetching',
  pull: 'pulling',
  push: 'pushing',
  prune: 'pruning',
  sync: 'syncing',
};

const KEY_HINTS =
  'j/k:move space:mark r/R:refresh f:fetch l:pull h:push s:sync /:filter ?:help q:quit';

const ANSI = {
  bold: '1',
  inverse: '7',
  red: '31',
  green: '32',
  yellow: '33',
  cyan: '36',
  gray: '90',
} as const;

function paint(code: string, text: string, enabled: boolean): string {
  return enabled ? `\x1b[${code}m${text}\x1b[0m` : text;
}

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

// Longest prefix of `text` that fits in `width` terminal cells
function takeCells(text: string, width: number): { text: string; cells: number } {
  let taken = '';
  let cells = 0;
  for (const { segment } of graphemes.segment(text)) {
    const next = stringWidth(segment);
    if (cells + next > width) break;
    taken += segment;
    cells += next;
  }
  return { text: taken, cells };
}

// Pads or truncates to exactly `width` cells; wide characters count twice
export function fit(text: string, width: number): string {
  if (width <= 0) return '';
  const cells = stringWidth(text);
  if (cells <= width) return text + ' '.repeat(width - cells);
  const head = takeCells(text, width - 1);
  return head.text + '…' + ' '.repeat(width - 1 - head.cells);
}

export function clip(text: string, width: number): string {
  if (stringWidth(text) <= width) return text;
  return takeCells(text, Math.max(0, width)).text;
}

export function statusIcon(repo: RepositoryState, spinnerFrame = 0): string {
  if (repo.pendingOperation) {
    return SPINNER_FRAMES[spinnerFrame % SPINNER_FRAMES.length] ?? '…';
  }
  if (repo.status.kind === 'error') return '✗';
  if (repo.status.kind === 'unknown') return '·';
  if (repo.upstream === undefined) return '?';
  if (repo.dirty) return '*';
  const ahead = repo.ahead ?? 0;
  const behind = repo.behind ?? 0;
  if (ahead > 0 && behind > 0) return '⇅';
  if (ahead > 0) return '↑';
  if (behind > 0) return '↓';
  return '✓';
}

export function statusText(repo: RepositoryState): string {
  if (repo.pendingOperation) return `${ACTIVE_VERB[repo.pendingOperation]}...`;
  if (repo.status.kind === 'error') {
    const { kind, message } = repo.status.failure;
    const firstLine = message.split('\n')[0] ?? '';
    return firstLine ? `${kind}: ${firstLine}` : kind;
  }
  if (repo.status.kind === 'unknown') return 'unknown';

  const parts: string[] = [];
  if (repo.upstream === undefined) parts.push('no upstream');

  const ahead = repo.ahead ?? 0;
  const behind = repo.behind ?? 0;
  if (ahead > 0 && behind > 0) {
    parts.push(`+${ahead}/-${behind}`);
  } else if (ahead > 0) {
    parts.push(`+${ahead} ahead`);
  } else if (behind > 0) {
    parts.push(`-${behind} behind`);
  }

  if (repo.modified > 0) parts.push('dirty');
  if (repo.staged > 0) parts.push(`${repo.staged} staged`);
  if (repo.untracked > 0) parts.push(`${repo.untracked} untracked`);

  return parts.length > 0 ? parts.join(', ') : 'synced';
}

export function renderRow(
  repo: RepositoryState,
  options: { marked: boolean; current: boolean; spinnerFrame?: number }
): string {
  const mark = options.marked ? '●' : ' ';
  const pointer = options.current ? '>' : ' ';
  return [
    `${mark}${pointer}`,
    statusIcon(repo, options.spinnerFrame),
    fit(repo.name, NAME_WIDTH),
    fit(repo.branch ?? '-', BRANCH_WIDTH),
    fit(statusText(repo), STATUS_WIDTH),
    repo.path,
  ].join(' ');
}

function headerLine(snapshot: UiSnapshot): string {
  const { activity, sort } = snapshot;
  const parts = [
    ' gitfleet',
    `${snapshot.repos.length} repos`,
    `${activity.running} running, ${activity.queued} queued`,
    `sort: ${sort.column} ${sort.ascending ? '▲' : '▼'}`,
  ];
  if (snapshot.marked.length > 0) parts.push(`${snapshot.marked.length} marked`);
  if (snapshot.filter && !snapshot.filterEditing) {
    parts.push(`filter: ${snapshot.filter}`);
  }
  return parts.join(' │ ');
}

function columnLine(): string {
  return [
    '   ',
    fit('Repository', NAME_WIDTH),
    fit('Branch', BRANCH_WIDTH),
    fit('Status', STATUS_WIDTH),
    'Path',
  ].join(' ');
}

function statusLine(
  snapshot: UiSnapshot
): { text: string; level?: StatusMessage['level'] } {
  if (snapshot.filterEditing) return { text: `/${snapshot.filter}_` };

  const errors =
    snapshot.errorCount > 0 ? `[${snapshot.errorCount} err] ` : '';
  const { status } = snapshot;
  if (!status) return { text: errors };

  const icon =
    status.level === 'progress'
      ? SPINNER_FRAMES[snapshot.spinnerFrame % SPINNER_FRAMES.length]
      : status.level === 'done'
        ? '✓'
        : status.level === 'error'
          ? '✗'
          : '·';
  return { text: `${errors}${icon} ${status.text}`, level: status.level };
}

function bodyLines(
  snapshot: UiSnapshot,
  height: number,
  options: FrameOptions
): string[] {
  const { columns, color } = options;

  if (snapshot.overlay) {
    const { title, lines, offset, selected } = snapshot.overlay;
    const room = height - 1;
    // A pick list scrolls with its highlighted line
    const start =
      selected === undefined ? offset : Math.max(0, selected - room + 1);
    return [
      paint(ANSI.bold, clip(` ${title} (Esc to close)`, columns), color),
      ...lines.slice(start, start + room).map((line, index) => {
        if (selected === undefined) return clip(` ${line}`, columns);
        const current = start + index === selected;
        const text = clip(`${current ? '>' : ' '} ${line}`, columns);
        return current ? paint(ANSI.inverse, text, color) : text;
      }),
    ];
  }

  if (snapshot.repos.length === 0) {
    const message = snapshot.filter
      ? ' No repositories match the filter.'
      : ' No repositories. Add one with "gitfleet add <path>" or scan with --path <dir>.';
    return [paint(ANSI.gray, clip(message, columns), color)];
  }

  // Keep the cursor row inside the window
  const start = Math.max(0, snapshot.cursor - height + 1);
  const marked = new Set(snapshot.marked);

  return snapshot.repos.slice(start, start + height).map((repo, offset) => {
    const current = start + offset === snapshot.cursor;
    const line = clip(
      renderRow(repo, {
        marked: marked.has(repo.path),
        current,
        spinnerFrame: snapshot.spinnerFrame,
      }),
      columns
    );
    if (current) return paint(ANSI.inverse, line, color);
    if (repo.status.kind === 'error') return paint(ANSI.red, line, color);
    return line;
  });
}

/**
 * Lays out one full frame: header, column titles, rows (or the open
 * overlay), status line and key hints. Always returns exactly `rows` lines.
 */
export function renderFrame(
  snapshot: UiSnapshot,
  options: FrameOptions
): string[] {
  const { columns, rows, color } = options;
  const height = Math.max(1, rows - 4);

  const body = bodyLines(snapshot, height, options);
  while (body.length < height) body.push('');

  const status = statusLine(snapshot);
  const statusColor =
    status.level === 'error'
      ? ANSI.red
      : status.level === 'done'
        ? ANSI.green
        : ANSI.yellow;

  return [
    paint(ANSI.cyan, clip(headerLine(snapshot), columns), color),
    paint(ANSI.bold, clip(columnLine(), columns), color),
    ...body,
    status.level
      ? paint(statusColor, clip(status.text, columns), color)
      : clip(status.text, columns),
    paint(ANSI.gray, clip(KEY_HINTS, columns), color),
  ];
}

export type TerminalRenderer = Renderer & {
  open(): void;
  close(): void;
};

export function createTerminalRenderer(
  stream: NodeJS.WriteStream = process.stdout
): TerminalRenderer {
  return {
    open() {
      // Alternate screen, hidden cursor
      stream.write('\x1b[?1049h\x1b[?25l');
    },
    close() {
      stream.write('\x1b[?25h\x1b[?1049l');
    },
    render(snapshot) {
      const lines = renderFrame(snapshot, {
        columns: stream.columns || 80,
        rows: stream.rows || 24,
        color: true,
      });
      stream.write('\x1b[H' + lines.map((line) => `${line}\x1b[K`).join('\n'));
    },
  };
}

// Plain row for non-interactive output
export function renderSummaryRow(repo: RepositoryState): string {
  return [
    statusIcon(repo),
    fit(repo.name, NAME_WIDTH),
    fit(repo.branch ?? '-', BRANCH_WIDTH),
    statusText(repo),
  ].join(' ');
}
