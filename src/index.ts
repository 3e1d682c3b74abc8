#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { registerBuildCommand } from './commands/build.js';
import { registerCheckCommand } from './commands/check.js';
import { registerInspectCommands } from './commands/inspect.js';
import { registerMacCommand } from './commands/mac.js';

// Read version from package.json at runtime
function getVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    // src/ and dist/ both sit one level below package.json
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}
const version = getVersion();

const program = new Command();

program
  .name('homelab-provision')
  .description('Render first-boot provisioning artifacts for the home server')
  .version(version);

// Register commands
registerBuildCommand(program);
registerCheckCommand(program);
registerInspectCommands(program);
registerMacCommand(program);

// Parse arguments
program.parse();
