// Path: src/lib/ignition/inspector.ts
// Read back a built Ignition config: decoded files and systemd drop-ins

import fs from 'node:fs';
import { TemplateError } from '../errors.js';
import { extractErrorMessage } from '../../utils/error.js';
import { decodeDataSource } from './data-url.js';
import { parseIgnition } from './assembler.js';
import {
  getEntries,
  isRecord,
  type IgnitionConfig,
  type InspectedDropin,
  type InspectedFile,
} from './types.js';

const RULE_WIDTH = 88;

/**
 * Load a built Ignition config from disk
 */
export function loadIgnitionConfig(filePath: string): IgnitionConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new TemplateError(
      `Cannot read Ignition config ${filePath}: ${extractErrorMessage(err)}`,
      'IGNITION_INVALID',
      filePath,
      err
    );
  }
  return parseIgnition(text, filePath);
}

/**
 * Target path for a CLI argument that may name the template under files/
 *   files/etc/hosts -> /etc/hosts, etc/hosts -> /etc/hosts
 */
export function normalizeTargetPath(arg: string): string {
  const stripped = arg.replace(/^\.?\/?files\//, '');
  return stripped.startsWith('/') ? stripped : `/${stripped}`;
}

function formatMode(mode: unknown): string {
  return typeof mode === 'number' ? mode.toString(8) : '?';
}

/**
 * Files in the config with decoded contents, optionally filtered by path
 */
export function listFiles(config: IgnitionConfig, paths?: readonly string[]): InspectedFile[] {
  const wanted = paths && paths.length > 0 ? new Set(paths.map(normalizeTargetPath)) : undefined;
  const files: InspectedFile[] = [];

  for (const file of getEntries(config, 'storage', 'files')) {
    if (!isRecord(file) || typeof file.path !== 'string') continue;
    if (wanted && !wanted.has(file.path)) continue;

    const contents: Record<string, unknown> = isRecord(file.contents) ? file.contents : {};
    const source = typeof contents.source === 'string' ? contents.source : '';

    files.push({
      path: file.path,
      mode: formatMode(file.mode),
      content: decodeDataSource(source),
    });
  }

  return files;
}

/**
 * systemd drop-ins in the config, optionally filtered by unit name
 */
export function listDropins(config: IgnitionConfig, units?: readonly string[]): InspectedDropin[] {
  const wanted = units && units.length > 0 ? new Set(units) : undefined;
  const dropins: InspectedDropin[] = [];

  for (const unit of getEntries(config, 'systemd', 'units')) {
    if (!isRecord(unit) || typeof unit.name !== 'string') continue;
    if (wanted && !wanted.has(unit.name)) continue;
    if (!Array.isArray(unit.dropins)) continue;

    for (const dropin of unit.dropins) {
      if (!isRecord(dropin) || typeof dropin.name !== 'string') continue;
      dropins.push({
        unit: unit.name,
        name: dropin.name,
        contents: typeof dropin.contents === 'string' ? dropin.contents : 'No contents available.',
      });
    }
  }

  return dropins;
}

/**
 * Titled block with rules above and below the body
 */
export function formatSection(title: string, body: string): string {
  return [title, '='.repeat(RULE_WIDTH), body, '-'.repeat(RULE_WIDTH), ''].join('\n');
}
