// Path: src/commands/build.ts
// Render the provisioning artifacts into the build root

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { buildArtifacts } from '../lib/builder.js';
import { loadEnvironment, resolveBuildConfig } from '../lib/config.js';
import { WriteError } from '../lib/errors.js';
import { INCOMPLETE_MARKER } from '../lib/output-writer.js';
import { isPermissionError } from '../utils/error.js';
import { reportFailure } from './common.js';
import type { BuildCommandOptions } from './types.js';

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Render Combustion and Ignition artifacts from templates and secrets')
    .option('-o, --output <dir>', 'Build root (default: _build)')
    .option('-t, --templates <dir>', 'Templates directory')
    .option('-e, --env-file <path>', 'dotenv file with the secrets (default: .env if present)')
    .option('--dry-run', 'Render everything but write nothing')
    .option('--json', 'Output as JSON')
    .addHelpText('after', `
Secrets are read from ROOT_PASSWD, ADMIN_PASSWD, ADMIN_SSH_KEYS (";"-separated),
ADMIN_OTP_SECRET, DISK_PASSWD and ADGUARD_MAC.

Examples:
  homelab-provision build                    # Render into ./_build
  homelab-provision build -o /mnt/combustion # Render straight onto a mounted medium
  homelab-provision build --dry-run          # Check that everything renders
`)
    .action((options: BuildCommandOptions) => {
      const spinner = options.json === true ? undefined : ora('Rendering artifacts...').start();

      try {
        const config = resolveBuildConfig(options);
        const result = buildArtifacts({
          env: loadEnvironment(config),
          templatesDir: config.templatesDir,
          outputDir: config.outputDir,
          dryRun: options.dryRun === true,
        });

        if (options.json === true) {
          console.log(JSON.stringify({ success: true, ...result }, null, 2));
          return;
        }

        spinner?.succeed(result.dryRun ? 'Rendered (dry run, nothing written)' : `Built into ${result.outputDir}`);
        console.log();
        for (const file of result.files) {
          console.log(`  ${chalk.cyan(file.relativePath.padEnd(24))} ${file.mode.toString(8).padStart(4, '0')}  ${file.bytes} bytes  ${chalk.gray(file.sha256.substring(0, 12))}`);
        }
        console.log();
      } catch (err) {
        spinner?.fail('Build failed');
        reportFailure(err, options.json === true);
        if (options.json !== true && err instanceof WriteError) {
          console.error(chalk.yellow(`A partial build is marked with ${INCOMPLETE_MARKER} in the build root.`));
          if (isPermissionError(err.cause)) {
            console.error(chalk.yellow('Check that the build root is writable by the current user.'));
          }
        }
      }
    });
}
