import { expect, test, vi } from 'vitest';
import { spawnGit } from '../src/git/core.ts';

const { spawn } = vi.hoisted(() => ({ spawn: vi.fn() }));

vi.mock('node:child_process', () => ({ spawn }));

test('starts git as the leader of its own process group', () => {
  spawnGit(['status', '--porcelain'], { cwd: '/work/a', env: { LC_ALL: 'C' } });

  expect(spawn).toHaveBeenCalledWith('git', ['status', '--porcelain'], {
    cwd: '/work/a',
    env: { LC_ALL: 'C' },
    stdio: ['ignore', 'pipe', 'pipe'],
    detached: process.platform !== 'win32',
  });
});
