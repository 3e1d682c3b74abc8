// Path: src/lib/config.ts
// Build configuration and environment sourcing

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';
import { configLogger as log } from './logger.js';
import type { EnvSource } from './secrets/types.js';
import { ProvisionError, extractErrorMessage } from '../utils/error.js';

export const DEFAULT_OUTPUT_DIR = '_build';
export const DEFAULT_ENV_FILE = '.env';

export interface BuildConfig {
  outputDir: string;
  templatesDir: string;
  envFile: string;
  /** The env file was named explicitly, so it must exist */
  envFileRequired: boolean;
}

export interface ConfigOverrides {
  output?: string;
  templates?: string;
  envFile?: string;
}

/**
 * Templates shipped with the package (src/lib -> ../../templates, same from dist/lib)
 */
export function getDefaultTemplatesDir(): string {
  return fileURLToPath(new URL('../../templates/', import.meta.url));
}

/**
 * Resolve build configuration.
 *
 * Precedence: command-line options, then environment variables, then defaults.
 *
 * Environment variables:
 * - PROVISION_OUTPUT_DIR: Build root (default: _build)
 * - PROVISION_TEMPLATES_DIR: Templates directory (default: bundled templates)
 * - PROVISION_ENV_FILE: dotenv file holding the secrets (default: .env, optional)
 */
export function resolveBuildConfig(
  overrides: ConfigOverrides = {},
  env: EnvSource = process.env,
  cwd: string = process.cwd()
): BuildConfig {
  const envFileSetting = overrides.envFile ?? env.PROVISION_ENV_FILE;

  return {
    outputDir: path.resolve(cwd, overrides.output ?? env.PROVISION_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR),
    templatesDir: path.resolve(cwd, overrides.templates ?? env.PROVISION_TEMPLATES_DIR ?? getDefaultTemplatesDir()),
    envFile: path.resolve(cwd, envFileSetting ?? DEFAULT_ENV_FILE),
    envFileRequired: envFileSetting !== undefined,
  };
}

/**
 * Parse a dotenv file.
 *
 * @param required - Fail when the file does not exist; otherwise treat it as empty
 */
export function loadEnvFile(filePath: string, required: boolean): Record<string, string> {
  if (!fs.existsSync(filePath)) {
    if (required) {
      throw new ProvisionError(`Environment file not found: ${filePath}`, 'ENV_FILE_NOT_FOUND', {
        metadata: { path: filePath },
      });
    }
    log.debug({ path: filePath }, 'No environment file, using process environment only');
    return {};
  }

  try {
    const vars = dotenv.parse(fs.readFileSync(filePath));
    log.debug({ path: filePath, keys: Object.keys(vars) }, 'Loaded environment file');
    return vars;
  } catch (err) {
    throw new ProvisionError(
      `Cannot read environment file ${filePath}: ${extractErrorMessage(err)}`,
      'ENV_FILE_UNREADABLE',
      { cause: err, metadata: { path: filePath } }
    );
  }
}

/**
 * Overlay the process environment on file values; variables already set in
 * the process win, as with dotenv's own loading.
 */
export function mergeEnvironment(fileVars: Readonly<Record<string, string>>, processEnv: EnvSource): EnvSource {
  const merged: Record<string, string | undefined> = { ...fileVars };
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return Object.freeze(merged);
}

/**
 * The environment a build reads its secrets from
 */
export function loadEnvironment(config: BuildConfig, processEnv: EnvSource = process.env): EnvSource {
  return mergeEnvironment(loadEnvFile(config.envFile, config.envFileRequired), processEnv);
}
