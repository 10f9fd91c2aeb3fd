/**
 * Filesystem scanner
 */

import * as fs from 'fs';
import * as path from 'path';
import { globSync } from 'glob';

export type PathKind = 'file' | 'directory' | 'other' | 'missing';

/** Lists candidate file paths under a root directory. */
export type FileLister = (rootPath: string) => string[];

/**
 * Every non-directory entry under `rootPath`, dot files included. Symlinked
 * directories are not followed.
 */
export function listFiles(rootPath: string): string[] {
  const files = globSync('**/*', {
    cwd: rootPath,
    dot: true,
    nodir: true,
    follow: false,
  });
  files.sort((a, b) => a.localeCompare(b));
  return files.map((file) => path.join(rootPath, file));
}

export function getPathKind(targetPath: string): PathKind {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(targetPath);
  } catch {
    return 'missing';
  }
  if (stats.isFile()) return 'file';
  if (stats.isDirectory()) return 'directory';
  return 'other';
}

/**
 * True for regular files, following symlinks. Broken links are not files.
 */
export function isRegularFile(filePath: string): boolean {
  return getPathKind(filePath) === 'file';
}
