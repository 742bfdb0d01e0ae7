export * from './types.ts';
export { runGitCommand, spawnGit, isDirectory } from './core.ts';
export * from './status.ts';
export * from './executor.ts';
export * from './repository.ts';
