// Path: src/lib/template/reader.ts
// Reads template sources from the templates directory

import fs from 'node:fs';
import { TemplateError } from '../errors.js';
import { templateLogger as log } from '../logger.js';
import { extractErrorMessage, getErrorCode } from '../../utils/error.js';
import { resolveWithin } from '../../utils/path.js';

/**
 * Read a template source by its path relative to the templates directory.
 * The relative path doubles as the template id in error messages.
 */
export function readTemplate(templatesDir: string, relativePath: string): string {
  let filePath: string;
  try {
    filePath = resolveWithin(templatesDir, relativePath);
  } catch (err) {
    throw new TemplateError(extractErrorMessage(err), 'TEMPLATE_NOT_FOUND', relativePath, err);
  }

  try {
    const source = fs.readFileSync(filePath, 'utf-8');
    log.debug({ template: relativePath, bytes: source.length }, 'Template loaded');
    return source;
  } catch (err) {
    const code = getErrorCode(err);
    if (code === 'ENOENT' || code === 'EISDIR') {
      throw new TemplateError(`Template not found: ${filePath}`, 'TEMPLATE_NOT_FOUND', relativePath, err);
    }
    throw new TemplateError(
      `Template ${relativePath} is unreadable: ${extractErrorMessage(err)}`,
      'TEMPLATE_UNREADABLE',
      relativePath,
      err
    );
  }
}
