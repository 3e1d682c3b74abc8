// Path: src/commands/check.test.ts
// Tests for the check command

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { registerCheckCommand } from './check.js';

function createProgram(): Command {
  const program = new Command().exitOverride();
  registerCheckCommand(program);
  return program;
}

describe('check command', () => {
  let dir: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'provision-check-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeEnv(lines: string[]): string {
    const filePath = path.join(dir, 'secrets.env');
    fs.writeFileSync(filePath, lines.join('\n') + '\n');
    return filePath;
  }

  it('should report every problem as JSON', () => {
    const envFile = writeEnv([
      'ROOT_PASSWD=test-root',
      'ADMIN_PASSWD=test-admin',
      'ADMIN_SSH_KEYS=key-a;key-b',
      'DISK_PASSWD=test-disk',
      'ADGUARD_MAC=bad',
    ]);

    createProgram().parse(['check', '--env-file', envFile, '--json'], { from: 'user' });

    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
      valid: false,
      problems: [
        { secret: 'ADMIN_OTP_SECRET', code: 'SECRET_MISSING', message: 'Required secret ADMIN_OTP_SECRET is not set' },
        {
          secret: 'ADGUARD_MAC',
          code: 'SECRET_MALFORMED',
          message: 'Secret ADGUARD_MAC is malformed: expected a MAC address such as 02:00:00:00:00:01',
        },
      ],
    });
    expect(process.exitCode).toBe(1);
  });

  it('should pass a complete set', () => {
    const envFile = writeEnv([
      'ROOT_PASSWD=test-root',
      'ADMIN_PASSWD=test-admin',
      'ADMIN_SSH_KEYS=key-a;key-b',
      'ADMIN_OTP_SECRET=00ff',
      'DISK_PASSWD=test-disk',
      'ADGUARD_MAC=02:00:00:aa:bb:cc',
    ]);

    createProgram().parse(['check', '--env-file', envFile, '--json'], { from: 'user' });

    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({ valid: true, problems: [] });
    expect(process.exitCode).toBeUndefined();
  });

  it('should fail when the named env file does not exist', () => {
    const envFile = path.join(dir, 'absent.env');

    createProgram().parse(['check', '--env-file', envFile, '--json'], { from: 'user' });

    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
      success: false,
      error: { code: 'ENV_FILE_NOT_FOUND', message: `Environment file not found: ${envFile}`, path: envFile },
    });
    expect(process.exitCode).toBe(1);
  });
});
