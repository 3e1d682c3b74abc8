// Path: src/lib/output-writer.ts
// Writes rendered artifacts under the build root

import fs from 'node:fs';
import path from 'node:path';
import { WriteError } from './errors.js';
import { outputLogger as log } from './logger.js';
import { ensureDir, writeAtomic } from '../utils/file.js';
import { resolveWithin } from '../utils/path.js';

/**
 * Present in the build root while a write is in progress, and left behind
 * when one fails, so a half-written build is never mistaken for a good one.
 */
export const INCOMPLETE_MARKER = '.incomplete';

const MARKER_CONTENT = 'Build did not complete. Do not copy this directory to boot media.\n';

export interface RenderedArtifact {
  id: string;
  /** Path relative to the build root, e.g. "ignition/config.ign" */
  relativePath: string;
  content: string;
  mode: number;
}

export interface WrittenFile {
  id: string;
  relativePath: string;
  /** Absolute path */
  path: string;
  mode: number;
  bytes: number;
  sha256: string;
}

function attempt<T>(target: string, op: () => T): T {
  try {
    return op();
  } catch (err) {
    throw new WriteError(target, err);
  }
}

/**
 * Write every artifact to its declared path under `outputRoot`.
 *
 * Declared targets are replaced unconditionally; other files already in the
 * build root are left alone.
 *
 * @throws WriteError on the first filesystem failure
 */
export function writeBuildOutput(outputRoot: string, artifacts: readonly RenderedArtifact[]): WrittenFile[] {
  const root = path.resolve(outputRoot);
  const marker = path.join(root, INCOMPLETE_MARKER);

  attempt(root, () => ensureDir(root));
  attempt(marker, () => fs.writeFileSync(marker, MARKER_CONTENT, { mode: 0o644 }));

  const written: WrittenFile[] = [];
  for (const artifact of artifacts) {
    const target = attempt(path.join(root, artifact.relativePath), () =>
      resolveWithin(root, artifact.relativePath)
    );
    const sha256 = attempt(target, () => writeAtomic(target, artifact.content, { mode: artifact.mode }));

    written.push({
      id: artifact.id,
      relativePath: artifact.relativePath,
      path: target,
      mode: artifact.mode,
      bytes: Buffer.byteLength(artifact.content, 'utf-8'),
      sha256,
    });
    log.info({ path: target, mode: artifact.mode.toString(8) }, 'Artifact written');
  }

  attempt(marker, () => fs.rmSync(marker, { force: true }));
  return written;
}
