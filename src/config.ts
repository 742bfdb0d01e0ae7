import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, dirname, join, resolve } from 'node:path';
import type { SortOrder } from './fleet/view.ts';
import { printError } from './output.ts';
import type {
  FleetConfig,
  FleetSettings,
  OperationResult,
  SortColumn,
} from './types.ts';

export const DEFAULT_SCAN_DEPTH = 5;

// Largest delay a Node timer accepts, in whole seconds
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export function getConfigPath(): string {
  const xdgConfigHome = process.env.XDG_CONFIG_HOME;
  const configDir = xdgConfigHome
    ? join(xdgConfigHome, 'gitfleet')
    : join(homedir(), '.config', 'gitfleet');
  return join(configDir, 'config.json');
}

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function normalizeRepoPath(path: string): string {
  return resolve(expandHome(path));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isSortColumn(value: unknown): value is SortColumn {
  return (
    value === 'name' ||
    value === 'status' ||
    value === 'branch' ||
    value === 'synced'
  );
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isFleetSettings(value: unknown): value is FleetSettings {
  if (!isRecord(value)) return false;
  if (value.concurrency !== undefined && !isPositiveNumber(value.concurrency)) {
    return false;
  }
  if (
    value.timeoutSeconds !== undefined &&
    (!isPositiveNumber(value.timeoutSeconds) ||
      value.timeoutSeconds > MAX_TIMEOUT_SECONDS)
  ) {
    return false;
  }
  if (
    value.refreshIntervalSeconds !== undefined &&
    (typeof value.refreshIntervalSeconds !== 'number' ||
      value.refreshIntervalSeconds < 0)
  ) {
    return false;
  }
  if (value.scanDepth !== undefined && !isPositiveNumber(value.scanDepth)) {
    return false;
  }
  if (value.sortColumn !== undefined && !isSortColumn(value.sortColumn)) {
    return false;
  }
  if (
    value.sortAscending !== undefined &&
    typeof value.sortAscending !== 'boolean'
  ) {
    return false;
  }
  return true;
}

function isFleetConfig(value: unknown): value is FleetConfig {
  if (!isRecord(value)) return false;
  if (!isStringArray(value.repos)) return false;
  if (value.roots !== undefined && !isStringArray(value.roots)) return false;
  if (value.hidden !== undefined && !isStringArray(value.hidden)) return false;
  if (value.config !== undefined && !isFleetSettings(value.config)) {
    return false;
  }
  return true;
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT';
}

export async function readConfig(
  configPath: string
): Promise<OperationResult<FleetConfig>> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) {
      return { success: true, data: { repos: [] } };
    }
    const message = err instanceof Error ? err.message : 'Unknown error';
    return { success: false, error: `Failed to read config: ${message}` };
  }

  try {
    const content: unknown = JSON.parse(text);
    if (!isFleetConfig(content)) {
      return { success: false, error: 'Invalid config file format' };
    }
    return { success: true, data: content };
  } catch {
    return { success: false, error: 'Failed to parse config file' };
  }
}

// Reads the config or exits: nothing can run without it
export async function loadConfig(configPath: string): Promise<FleetConfig> {
  const result = await readConfig(configPath);
  if (!result.success) {
    printError(`Error reading config: ${result.error}`);
    process.exit(1);
  }
  return result.data;
}

export async function writeConfig(
  configPath: string,
  config: FleetConfig
): Promise<OperationResult> {
  try {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, JSON.stringify(config, null, 2) + '\n');
    return { success: true, data: undefined };
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Unknown error';
    return { success: false, error: `Failed to write config: ${message}` };
  }
}

export function addRepoToConfig(config: FleetConfig, path: string): FleetConfig {
  return {
    ...config,
    repos: [...config.repos, path],
  };
}

export function removeRepoFromConfig(
  config: FleetConfig,
  path: string
): FleetConfig {
  return {
    ...config,
    repos: config.repos.filter((entry) => normalizeRepoPath(entry) !== path),
  };
}

// Matches a tracked repo by path first, then by directory name
export function findRepo(
  config: FleetConfig,
  pathOrName: string
): string | undefined {
  const wanted = normalizeRepoPath(pathOrName);
  const byPath = config.repos
    .map(normalizeRepoPath)
    .find((path) => path === wanted);
  if (byPath) return byPath;
  return config.repos
    .map(normalizeRepoPath)
    .find((path) => basename(path) === pathOrName);
}

export function getConcurrency(config: FleetConfig): number | undefined {
  return config.config?.concurrency;
}

export function getTimeoutMs(config: FleetConfig): number | undefined {
  const seconds = config.config?.timeoutSeconds;
  return seconds === undefined ? undefined : seconds * 1000;
}

export function getRefreshIntervalMs(config: FleetConfig): number {
  return (config.config?.refreshIntervalSeconds ?? 0) * 1000;
}

export function getScanDepth(config: FleetConfig): number {
  return config.config?.scanDepth ?? DEFAULT_SCAN_DEPTH;
}

export function getSortOrder(config: FleetConfig): SortOrder {
  return {
    column: config.config?.sortColumn ?? 'name',
    ascending: config.config?.sortAscending ?? true,
  };
}

export function getHidden(config: FleetConfig): string[] {
  return (config.hidden ?? []).map(normalizeRepoPath);
}

export type ViewSettings = {
  sort: SortOrder;
  hidden: readonly string[];
};

// Merges into the file as it is now, so edits made meanwhile survive
export async function saveViewSettings(
  configPath: string,
  view: ViewSettings
): Promise<OperationResult> {
  const current = await readConfig(configPath);
  if (!current.success) return current;

  const next: FleetConfig = {
    ...current.data,
    config: {
      ...current.data.config,
      sortColumn: view.sort.column,
      sortAscending: view.sort.ascending,
    },
  };
  if (view.hidden.length > 0) {
    next.hidden = [...view.hidden];
  } else {
    delete next.hidden;
  }
  return writeConfig(configPath, next);
}
