// Path: src/lib/output-writer.test.ts
// Tests for writing build output

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { WriteError } from './errors.js';
import { INCOMPLETE_MARKER, writeBuildOutput, type RenderedArtifact } from './output-writer.js';
import { hashContent } from '../utils/file.js';

const artifacts: RenderedArtifact[] = [
  { id: 'combustion', relativePath: 'combustion/script', content: '#!/bin/bash\necho ok\n', mode: 0o700 },
  { id: 'ignition', relativePath: 'ignition/config.ign', content: '{}\n', mode: 0o600 },
];

function modeOf(filePath: string): number {
  return fs.statSync(filePath).mode & 0o777;
}

describe('writeBuildOutput', () => {
  let tempDir: string;
  let root: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'provision-output-'));
    root = path.join(tempDir, '_build');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write every artifact with its mode', () => {
    writeBuildOutput(root, artifacts);

    expect(fs.readFileSync(path.join(root, 'combustion', 'script'), 'utf-8')).toBe('#!/bin/bash\necho ok\n');
    expect(fs.readFileSync(path.join(root, 'ignition', 'config.ign'), 'utf-8')).toBe('{}\n');
    expect(modeOf(path.join(root, 'combustion', 'script'))).toBe(0o700);
    expect(modeOf(path.join(root, 'ignition', 'config.ign'))).toBe(0o600);
  });

  it('should describe what was written', () => {
    const written = writeBuildOutput(root, artifacts);

    expect(written).toEqual([
      {
        id: 'combustion',
        relativePath: 'combustion/script',
        path: path.join(root, 'combustion', 'script'),
        mode: 0o700,
        bytes: 20,
        sha256: hashContent('#!/bin/bash\necho ok\n'),
      },
      {
        id: 'ignition',
        relativePath: 'ignition/config.ign',
        path: path.join(root, 'ignition', 'config.ign'),
        mode: 0o600,
        bytes: 3,
        sha256: hashContent('{}\n'),
      },
    ]);
  });

  it('should remove the incomplete marker after a successful write', () => {
    writeBuildOutput(root, artifacts);
    expect(fs.existsSync(path.join(root, INCOMPLETE_MARKER))).toBe(false);
    expect(fs.readdirSync(root).sort()).toEqual(['combustion', 'ignition']);
  });

  it('should replace existing artifacts', () => {
    fs.mkdirSync(path.join(root, 'ignition'), { recursive: true });
    fs.writeFileSync(path.join(root, 'ignition', 'config.ign'), 'stale');

    writeBuildOutput(root, artifacts);
    expect(fs.readFileSync(path.join(root, 'ignition', 'config.ign'), 'utf-8')).toBe('{}\n');
  });

  it('should leave undeclared files in the build root alone', () => {
    fs.mkdirSync(path.join(root, 'notes'), { recursive: true });
    fs.writeFileSync(path.join(root, 'notes', 'readme.txt'), 'keep me');

    writeBuildOutput(root, artifacts);
    expect(fs.readFileSync(path.join(root, 'notes', 'readme.txt'), 'utf-8')).toBe('keep me');
  });

  it('should fail with WriteError when the build root is a file', () => {
    fs.writeFileSync(root, 'not a directory');

    try {
      writeBuildOutput(root, artifacts);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(WriteError);
      if (err instanceof WriteError) {
        expect(err.code).toBe('WRITE_FAILED');
        expect(err.path).toBe(root);
        expect(err.message.startsWith(`Failed to write ${root}: `)).toBe(true);
      }
    }
  });

  it('should keep the marker and clean up temp files when a write fails', () => {
    // A directory where the Ignition config should go makes the rename fail
    fs.mkdirSync(path.join(root, 'ignition', 'config.ign'), { recursive: true });

    expect(() => writeBuildOutput(root, artifacts)).toThrow(WriteError);
    expect(fs.existsSync(path.join(root, INCOMPLETE_MARKER))).toBe(true);
    expect(fs.readdirSync(path.join(root, 'ignition'))).toEqual(['config.ign']);
  });

  it('should refuse artifact paths outside the build root', () => {
    const escaping: RenderedArtifact[] = [{ id: 'bad', relativePath: '../escape', content: 'x', mode: 0o600 }];

    expect(() => writeBuildOutput(root, escaping)).toThrow(WriteError);
    expect(fs.existsSync(path.join(tempDir, 'escape'))).toBe(false);
  });
});
