// Path: src/commands/inspect.ts
// Decode and print the contents of a built Ignition config

import type { Command } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { DEFAULT_OUTPUT_DIR } from '../lib/config.js';
import {
  formatSection,
  listDropins,
  listFiles,
  loadIgnitionConfig,
} from '../lib/ignition/index.js';
import { reportFailure } from './common.js';
import type { InspectCommandOptions } from './types.js';

const DEFAULT_CONFIG = path.join(DEFAULT_OUTPUT_DIR, 'ignition', 'config.ign');

export function registerInspectCommands(program: Command): void {
  const inspectCmd = program
    .command('inspect')
    .description('Inspect a built Ignition config')
    .addHelpText('after', `
Examples:
  homelab-provision inspect files                       # Every embedded file, decoded
  homelab-provision inspect files /etc/users.oath       # One file
  homelab-provision inspect dropins sshd.service        # Drop-ins of one unit
  homelab-provision inspect files -c other/config.ign   # Another config
`);

  inspectCmd
    .command('files [paths...]')
    .description('Print decoded files from the Ignition config')
    .option('-c, --config <file>', 'Path to the Ignition config', DEFAULT_CONFIG)
    .option('--json', 'Output as JSON')
    .action((paths: string[], options: InspectCommandOptions) => {
      try {
        const config = loadIgnitionConfig(path.resolve(options.config ?? DEFAULT_CONFIG));
        const files = listFiles(config, paths);

        if (options.json === true) {
          console.log(JSON.stringify(files, null, 2));
          return;
        }

        console.log();
        for (const file of files) {
          console.log(formatSection(chalk.bold(`${file.path} (mode: ${file.mode})`), file.content));
        }
        if (paths.length === 0) {
          console.log(chalk.green(`Decoded all ${files.length} files from ignition config.`));
        }
      } catch (err) {
        reportFailure(err, options.json === true);
      }
    });

  inspectCmd
    .command('dropins [units...]')
    .description('Print systemd drop-ins from the Ignition config')
    .option('-c, --config <file>', 'Path to the Ignition config', DEFAULT_CONFIG)
    .option('--json', 'Output as JSON')
    .action((units: string[], options: InspectCommandOptions) => {
      try {
        const config = loadIgnitionConfig(path.resolve(options.config ?? DEFAULT_CONFIG));
        const dropins = listDropins(config, units);

        if (options.json === true) {
          console.log(JSON.stringify(dropins, null, 2));
          return;
        }

        console.log();
        for (const dropin of dropins) {
          console.log(formatSection(chalk.bold(`Unit: ${dropin.unit}, Dropin: ${dropin.name}`), dropin.contents));
        }
      } catch (err) {
        reportFailure(err, options.json === true);
      }
    });
}
