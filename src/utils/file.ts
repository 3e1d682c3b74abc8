// Path: src/utils/file.ts
// Atomic file write utilities - prevent partial writes and ensure data integrity

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';

export interface AtomicWriteOptions {
  /**
   * File permissions (octal number, e.g., 0o600).
   * Applied with chmod, so the umask does not narrow it.
   * Defaults to 0o600.
   */
  mode?: number;

  /**
   * Force sync to disk before rename (fsync).
   * Defaults to false.
   */
  fsync?: boolean;

  /**
   * Create parent directories if they don't exist.
   * Defaults to true.
   */
  createDirs?: boolean;

  /**
   * Mode for created parent directories.
   * Defaults to 0o755.
   */
  dirMode?: number;
}

const DEFAULT_OPTIONS: Required<AtomicWriteOptions> = {
  mode: 0o600,
  fsync: false,
  createDirs: true,
  dirMode: 0o755,
};

/**
 * Write content to a file atomically.
 *
 * Uses temp file + rename pattern to ensure the file is either
 * fully written or not modified at all. An existing file is replaced.
 *
 * @param filePath - Absolute path to target file
 * @param content - Content to write (string or Buffer)
 * @param options - Write options
 * @returns Hash of written content (SHA-256)
 */
export function writeAtomic(
  filePath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {}
): string {
  if (!path.isAbsolute(filePath)) {
    throw new Error(`Path must be absolute: ${filePath}`);
  }

  const opts = { ...DEFAULT_OPTIONS, ...options };
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);

  if (opts.createDirs) {
    fs.mkdirSync(dir, { recursive: true, mode: opts.dirMode });
  }

  try {
    if (opts.fsync) {
      const fd = fs.openSync(tempPath, 'w', opts.mode);
      try {
        fs.writeSync(fd, typeof content === 'string' ? Buffer.from(content, 'utf-8') : content);
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
    } else {
      fs.writeFileSync(tempPath, content, { mode: opts.mode });
    }

    fs.chmodSync(tempPath, opts.mode);
    fs.renameSync(tempPath, filePath);

    return hashContent(content);
  } catch (err) {
    // Remove the temp file and rethrow
    fs.rmSync(tempPath, { force: true });
    throw err;
  }
}

/**
 * Calculate SHA-256 hash of content.
 *
 * @param content - Content to hash
 * @returns Hex-encoded hash
 */
export function hashContent(content: string | Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Ensure a directory exists.
 *
 * @param dirPath - Directory path
 * @param mode - Directory mode for newly created directories (default: 0o755)
 */
export function ensureDir(dirPath: string, mode: number = 0o755): void {
  fs.mkdirSync(dirPath, { recursive: true, mode });
}
