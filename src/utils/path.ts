// Path: src/utils/path.ts
// Containment for template and artifact paths

import path from 'node:path';

/**
 * Resolve a path relative to `root`, refusing one that resolves to the root
 * itself or outside it. Template ids and artifact outputs both come through here.
 */
export function resolveWithin(root: string, relativePath: string): string {
  if (relativePath.includes('\0')) {
    throw new Error(`Path contains a NUL byte: ${JSON.stringify(relativePath)}`);
  }

  const base = path.resolve(root);
  const resolved = path.resolve(base, relativePath);
  const rel = path.relative(base, resolved);

  if (rel === '' || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new Error(`Path escapes base directory: ${relativePath}`);
  }
  return resolved;
}
