// Path: src/lib/ignition/assembler.ts
// Second pass over a rendered Ignition config: embeds file and drop-in sources

import { TemplateError } from '../errors.js';
import { ignitionLogger as log } from '../logger.js';
import { readTemplate } from '../template/reader.js';
import { extractErrorMessage } from '../../utils/error.js';
import { createUtf8DataSource } from './data-url.js';
import { getEntries, isRecord, type IgnitionConfig } from './types.js';

/** Directory, under the templates root, holding file contents keyed by target path */
export const FILES_DIR = 'files';

/** Directory, under the templates root, holding systemd drop-ins as <unit>.d/<name> */
export const SYSTEMD_DIR = 'systemd';

const TEMPLATE_SYNTAX = /\{\{[^}]*\}\}/;

export interface AssembleContext {
  templatesDir: string;
  /** Renders a source against the run's bindings */
  render: (source: string, templateId: string) => string;
}

export interface AssembleStats {
  filesEmbedded: number;
  dropinsEmbedded: number;
}

function invalid(templateId: string, message: string, cause?: unknown): TemplateError {
  return new TemplateError(`Ignition config ${templateId} is invalid: ${message}`, 'IGNITION_INVALID', templateId, cause);
}

/**
 * Parse rendered Ignition text into an object
 */
export function parseIgnition(text: string, templateId: string): IgnitionConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw invalid(templateId, extractErrorMessage(err), err);
  }
  if (!isRecord(parsed)) {
    throw invalid(templateId, 'top level is not an object');
  }
  return parsed;
}

/**
 * Unit name without its type suffix: "sshd.service" -> "sshd"
 */
export function unitBaseName(unitName: string): string {
  const dot = unitName.lastIndexOf('.');
  return dot > 0 ? unitName.substring(0, dot) : unitName;
}

function embedFiles(config: IgnitionConfig, templateId: string, ctx: AssembleContext): number {
  let embedded = 0;

  for (const [index, file] of getEntries(config, 'storage', 'files').entries()) {
    if (!isRecord(file) || typeof file.path !== 'string') {
      throw invalid(templateId, `storage.files[${index}] has no path`);
    }
    const targetPath = file.path;

    const contents: unknown = file.contents ?? {};
    if (!isRecord(contents)) {
      throw invalid(templateId, `storage.files[${index}].contents is not an object`);
    }
    const source = contents.source ?? '';
    if (typeof source !== 'string') {
      throw invalid(templateId, `storage.files[${index}].contents.source is not a string`);
    }

    let content: string;
    if (source === '') {
      const relative = `${FILES_DIR}/${targetPath.replace(/^\/+/, '')}`;
      content = ctx.render(readTemplate(ctx.templatesDir, relative), relative);
    } else if (TEMPLATE_SYNTAX.test(source)) {
      content = ctx.render(source, `${templateId}#${targetPath}`);
    } else {
      continue;
    }

    contents.source = createUtf8DataSource(content);
    file.contents = contents;
    embedded++;
    log.debug({ path: targetPath }, 'Embedded file contents');
  }

  return embedded;
}

function embedDropins(config: IgnitionConfig, templateId: string, ctx: AssembleContext): number {
  let embedded = 0;

  for (const [index, unit] of getEntries(config, 'systemd', 'units').entries()) {
    if (!isRecord(unit) || typeof unit.name !== 'string') {
      throw invalid(templateId, `systemd.units[${index}] has no name`);
    }
    const unitName = unit.name;
    if (!Array.isArray(unit.dropins)) {
      continue;
    }

    for (const dropin of unit.dropins) {
      if (!isRecord(dropin) || typeof dropin.name !== 'string') {
        throw invalid(templateId, `systemd.units[${index}] (${unitName}) has a drop-in without a name`);
      }
      const dropinName = dropin.name;
      if (dropin.contents !== undefined && dropin.contents !== '') {
        continue;
      }

      const relative = `${SYSTEMD_DIR}/${unitBaseName(unitName)}.d/${dropinName}`;
      dropin.contents = ctx.render(readTemplate(ctx.templatesDir, relative), relative);
      embedded++;
      log.debug({ unit: unitName, dropin: dropinName }, 'Embedded systemd drop-in');
    }
  }

  return embedded;
}

/**
 * Complete a rendered Ignition config.
 *
 * - storage.files entries with an empty source are filled from files/<path>
 * - inline sources that still hold template syntax are rendered
 * - systemd drop-ins with empty contents are filled from systemd/<unit>.d/<name>
 *
 * Embedded file contents become base64 data URLs.
 *
 * @returns Serialized config, two-space indented, newline terminated
 */
export function assembleIgnition(
  rendered: string,
  templateId: string,
  ctx: AssembleContext
): { text: string; stats: AssembleStats } {
  const config = parseIgnition(rendered, templateId);

  const stats: AssembleStats = {
    filesEmbedded: embedFiles(config, templateId, ctx),
    dropinsEmbedded: embedDropins(config, templateId, ctx),
  };

  log.debug({ template: templateId, ...stats }, 'Ignition config assembled');
  return { text: JSON.stringify(config, null, 2) + '\n', stats };
}
