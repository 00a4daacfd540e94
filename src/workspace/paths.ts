import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import type { LocatorPaths } from './types.js';

export function getLocatorPaths(cwd: string = process.cwd(), home: string = homedir()): LocatorPaths {
  const root = join(cwd, '.cloudloc');
  return {
    root,
    config: join(root, 'config.yaml'),
    profileStore: join(home, '.cloudloc', 'profiles.yaml'),
  };
}

/** Expand `~/` and resolve relative paths against `baseDir`. */
export function expandPath(path: string, baseDir: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return isAbsolute(path) ? path : resolve(baseDir, path);
}
