// Path: src/commands/mac.ts
// Print a random MAC address for ADGUARD_MAC

import type { Command } from 'commander';
import { generateLocallyAdministeredMac } from '../lib/secrets/index.js';

export function registerMacCommand(program: Command): void {
  program
    .command('mac')
    .description('Generate a random locally administered MAC address (for ADGUARD_MAC)')
    .action(() => {
      console.log(generateLocallyAdministeredMac());
    });
}
