import { PACKAGE_INDEX_FILE, SOURCE_EXTENSION } from '../config.js';

/**
 * Map a dotted module name to the root-relative file that defines it.
 *
 * Tries, in order:
 *   1. `a/b/c.py`
 *   2. `a/b/c/__init__.py`
 *
 * `isFile` decides whether a candidate exists, which keeps this function pure.
 * Returns null when neither candidate exists.
 */
export function resolveModulePath(
  module: string,
  isFile: (relPath: string) => boolean,
): string | null {
  const base = module.split('.').join('/');
  const candidates = [base + SOURCE_EXTENSION, `${base}/${PACKAGE_INDEX_FILE}`];

  for (const candidate of candidates) {
    if (isFile(candidate)) {
      return candidate;
    }
  }
  return null;
}
