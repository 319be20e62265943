import fs from 'node:fs';
import path from 'node:path';
import type { ServerConfig } from './config';

const cachedRepoRoots = new Map<string, string>();

export function getRepoRootDir(startDir: string = process.cwd()): string {
  const cached = cachedRepoRoots.get(startDir);
  if (cached) return cached;

  let dir = startDir;
  for (let i = 0; i < 8; i++) {
    const hasMarkers =
      fs.existsSync(path.join(dir, 'package.json')) &&
      fs.existsSync(path.join(dir, 'apps')) &&
      fs.existsSync(path.join(dir, 'packages')) &&
      fs.existsSync(path.join(dir, 'data'));
    if (hasMarkers) {
      cachedRepoRoots.set(startDir, dir);
      return dir;
    }

    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  cachedRepoRoots.set(startDir, startDir);
  return startDir;
}

export function resetRepoRootCache(): void {
  cachedRepoRoots.clear();
}

export function resolveDatasetPath(config: Pick<ServerConfig, 'dataFile' | 'dataAnchor'>, cwd: string = process.cwd()): string {
  if (path.isAbsolute(config.dataFile)) return config.dataFile;
  const anchor = config.dataAnchor === 'cwd' ? cwd : getRepoRootDir(cwd);
  return path.join(anchor, config.dataFile);
}
