import fg from 'fast-glob';
import { skipDirGlobs } from '../config.js';

export interface DiscoverOptions {
  root: string;
  /** Root-relative directories to search; `.` searches the whole root. */
  dirs: string[];
  /** File extension including the dot, e.g. `.py`. */
  extension: string;
  skipDirs: string[];
  /** Extra root-relative directories to leave out. */
  excludeDirs?: string[];
}

/**
 * Root-relative, `/`-separated paths of every matching file under the given
 * directories, sorted and deduplicated. Hidden files and directories are
 * never matched.
 */
export async function discoverFiles(options: DiscoverOptions): Promise<string[]> {
  const patterns = options.dirs.map((dir) => {
    const base = dir.replace(/\\/g, '/').replace(/^\.\/?/, '').replace(/\/+$/, '');
    return base === '' ? `**/*${options.extension}` : `${fg.escapePath(base)}/**/*${options.extension}`;
  });
  if (patterns.length === 0) {
    return [];
  }

  const ignore = [
    ...skipDirGlobs(options.skipDirs),
    ...(options.excludeDirs ?? []).map((dir) => `${dir.replace(/\/+$/, '')}/**`),
  ];

  const found = await fg(patterns, {
    cwd: options.root,
    ignore,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: false,
  });

  return [...new Set(found)].sort();
}
