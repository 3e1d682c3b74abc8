// Path: src/commands/common.ts
// Shared command helpers

import chalk from 'chalk';
import { flushLogs } from '../lib/logger.js';
import { wrapError } from '../utils/error.js';

/**
 * Print a failure with its context and mark the process as failed
 */
export function reportFailure(err: unknown, json = false): void {
  const { code, message, metadata } = wrapError(err, 'UNEXPECTED');

  if (json) {
    console.log(JSON.stringify({ success: false, error: { code, message, ...metadata } }, null, 2));
  } else {
    console.error(chalk.red(`Error [${code}]:`), message);
    for (const [key, value] of Object.entries(metadata)) {
      if (value === undefined) continue;
      console.error(chalk.gray(`  ${key}: ${Array.isArray(value) ? value.join(', ') : String(value)}`));
    }
  }

  flushLogs();
  process.exitCode = 1;
}
