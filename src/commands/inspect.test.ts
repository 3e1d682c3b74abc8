// Path: src/commands/inspect.test.ts
// Tests for the inspect commands

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { registerInspectCommands } from './inspect.js';

function createProgram(): Command {
  const program = new Command().exitOverride();
  registerInspectCommands(program);
  return program;
}

describe('inspect commands', () => {
  let dir: string;
  let configPath: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'provision-inspect-cmd-'));
    configPath = path.join(dir, 'config.ign');
    fs.writeFileSync(configPath, JSON.stringify({
      storage: {
        files: [
          { path: '/etc/hostname', mode: 420, contents: { source: 'data:,homelab%0A' } },
          { path: '/etc/motd', mode: 420, contents: { source: 'data:,hi' } },
        ],
      },
      systemd: {
        units: [{ name: 'sshd.service', dropins: [{ name: 'override.conf', contents: '[Service]\n' }] }],
      },
    }));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should print selected files as JSON', () => {
    createProgram().parse(['inspect', 'files', 'files/etc/hostname', '-c', configPath, '--json'], { from: 'user' });

    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual([
      { path: '/etc/hostname', mode: '644', content: 'homelab\n' },
    ]);
  });

  it('should print drop-ins as JSON', () => {
    createProgram().parse(['inspect', 'dropins', '-c', configPath, '--json'], { from: 'user' });

    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual([
      { unit: 'sshd.service', name: 'override.conf', contents: '[Service]\n' },
    ]);
  });

  it('should fail on a missing config', () => {
    createProgram().parse(['inspect', 'files', '-c', path.join(dir, 'absent.ign'), '--json'], { from: 'user' });
    expect(process.exitCode).toBe(1);
  });
});
