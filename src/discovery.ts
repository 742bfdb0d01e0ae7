import { readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { basename, join } from 'node:path';
import { DEFAULT_SCAN_DEPTH, normalizeRepoPath } from './config.ts';
import type { RepoPath } from './types.ts';

export type DiscoveryOptions = {
  repos?: readonly string[];
  roots?: readonly string[];
  maxDepth?: number;
};

const SKIPPED_DIRECTORIES = new Set(['node_modules']);

async function listEntries(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch {
    return [];
  }
}

/**
 * Walks `root` looking for directories that contain a `.git` entry (a
 * directory for normal clones, a file for worktrees and submodules). Found
 * repositories are not descended into.
 */
export async function findGitRepos(
  root: string,
  maxDepth = DEFAULT_SCAN_DEPTH
): Promise<RepoPath[]> {
  const found: RepoPath[] = [];

  async function walk(dir: string, depth: number): Promise<void> {
    const entries = await listEntries(dir);
    if (entries.some((entry) => entry.name === '.git')) {
      found.push(dir);
      return;
    }
    if (depth >= maxDepth) return;

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      if (entry.name.startsWith('.')) continue;
      if (SKIPPED_DIRECTORIES.has(entry.name)) continue;
      await walk(join(dir, entry.name), depth + 1);
    }
  }

  await walk(normalizeRepoPath(root), 0);
  return found;
}

function byName(a: RepoPath, b: RepoPath): number {
  return basename(a).toLowerCase().localeCompare(basename(b).toLowerCase());
}

/**
 * Explicit repos come first in the order given, followed by everything found
 * under the roots sorted by name. Paths are de-duplicated; explicit paths
 * that do not exist are kept so the session can report them.
 */
export async function discoverRepos(
  options: DiscoveryOptions
): Promise<RepoPath[]> {
  const maxDepth = options.maxDepth ?? DEFAULT_SCAN_DEPTH;
  const seen = new Set<RepoPath>();
  const result: RepoPath[] = [];

  for (const repo of options.repos ?? []) {
    const path = normalizeRepoPath(repo);
    if (seen.has(path)) continue;
    seen.add(path);
    result.push(path);
  }

  const scanned: RepoPath[] = [];
  for (const root of options.roots ?? []) {
    scanned.push(...(await findGitRepos(root, maxDepth)));
  }

  for (const path of scanned.sort(byName)) {
    if (seen.has(path)) continue;
    seen.add(path);
    result.push(path);
  }

  return result;
}
