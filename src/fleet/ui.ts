import type { TaskCompletion } from '../git/types.ts';
import type { RepoPath } from '../types.ts';
import type { SchedulerActivity } from './scheduler.ts';
import type { RepositoryState } from './state.ts';
import type { SortOrder } from './view.ts';

export type KeyEvent = {
  type: 'key';
  name?: string;
  sequence: string;
  ctrl: boolean;
  shift: boolean;
};

export type InputEvent = KeyEvent | { type: 'resize' };

export type InputSource = {
  start(listener: (event: InputEvent) => void): void;
  stop(): void;
};

export type FleetEvent =
  | { type: 'input'; event: InputEvent }
  | { type: 'completion'; completion: TaskCompletion }
  | { type: 'tick' };

export type StatusMessage = {
  level: 'progress' | 'info' | 'error' | 'done';
  text: string;
  since: number;
};

export type OverlayKind = 'help' | 'errors' | 'details' | 'hidden';

export type Overlay = {
  kind: OverlayKind;
  title: string;
  lines: string[];
  offset: number;
  // Highlighted line in a pick list
  selected?: number;
};

export type UiSnapshot = {
  repos: readonly RepositoryState[];
  cursor: number;
  marked: readonly RepoPath[];
  filter: string;
  filterEditing: boolean;
  sort: SortOrder;
  activity: SchedulerActivity;
  errorCount: number;
  spinnerFrame: number;
  status?: StatusMessage;
  overlay?: Overlay;
};

export type Renderer = {
  render(snapshot: UiSnapshot): void;
};

export const SPINNER_FRAMES = [
  '⠋',
  '⠙',
  '⠹',
  '⠸',
  '⠼',
  '⠴',
  '⠦',
  '⠧',
  '⠇',
  '⠏',
] as const;
