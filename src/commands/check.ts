// Path: src/commands/check.ts
// Validate secrets without rendering anything

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadEnvironment, resolveBuildConfig } from '../lib/config.js';
import { SECRET_DEFINITIONS, SecretLoader, checkSecrets, formatCheckResult } from '../lib/secrets/index.js';
import { reportFailure } from './common.js';
import type { CheckCommandOptions } from './types.js';

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Validate every secret and report all problems')
    .option('-e, --env-file <path>', 'dotenv file with the secrets (default: .env if present)')
    .option('--json', 'Output as JSON')
    .action((options: CheckCommandOptions) => {
      try {
        const env = loadEnvironment(resolveBuildConfig({ envFile: options.envFile }));
        const missing = new SecretLoader(env).missing();

        // Check the secrets that are set, so one run reports every problem
        const present = SECRET_DEFINITIONS.filter((def) => !missing.includes(def.name));
        const problems = [
          ...missing.map((name) => ({ secret: name, code: 'SECRET_MISSING', message: `Required secret ${name} is not set` })),
          ...checkSecrets(new SecretLoader(env, present).load()).errors
            .map((err) => ({ secret: err.secretName, code: err.code, message: err.message })),
        ];

        if (options.json === true) {
          console.log(JSON.stringify({ valid: problems.length === 0, problems }, null, 2));
        } else if (problems.length === 0) {
          console.log(chalk.green('✓'), formatCheckResult({ valid: true, errors: [] }));
          for (const def of SECRET_DEFINITIONS) {
            console.log(`  ${chalk.cyan(def.name.padEnd(18))} ${chalk.gray(def.description)}`);
          }
        } else {
          console.error(chalk.red(`✗ ${problems.length} secret problem(s):`));
          for (const problem of problems) {
            console.error(`  - ${problem.message}`);
          }
        }

        if (problems.length > 0) {
          process.exitCode = 1;
        }
      } catch (err) {
        reportFailure(err, options.json === true);
      }
    });
}
