export type RepoPath = string;

export type SortColumn = 'name' | 'status' | 'branch' | 'synced';

export type FleetSettings = {
  concurrency?: number;
  timeoutSeconds?: number;
  refreshIntervalSeconds?: number;
  scanDepth?: number;
  sortColumn?: SortColumn;
  sortAscending?: boolean;
};

export type FleetConfig = {
  repos: string[];
  roots?: string[];
  // Repos left out of the list and of unnamed bulk runs
  hidden?: string[];
  config?: FleetSettings;
};

export type OperationResult<T = void> =
  | { success: true; data: T }
  | { success: false; error: string };
