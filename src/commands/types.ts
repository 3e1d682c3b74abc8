// Path: src/commands/types.ts
// Type definitions for Commander.js command options

/**
 * Options for the 'build' command
 */
export interface BuildCommandOptions {
  output?: string;
  templates?: string;
  envFile?: string;
  dryRun?: boolean;
  json?: boolean;
}

/**
 * Options for the 'check' command
 */
export interface CheckCommandOptions {
  envFile?: string;
  json?: boolean;
}

/**
 * Options for the 'inspect' subcommands
 */
export interface InspectCommandOptions {
  config?: string;
  json?: boolean;
}
