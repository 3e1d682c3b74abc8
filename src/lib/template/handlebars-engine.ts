// Path: src/lib/template/handlebars-engine.ts
// Strict Handlebars implementation of the template engine

import Handlebars from 'handlebars';
import { TemplateError, UndefinedVariableError } from '../errors.js';
import { templateLogger as log } from '../logger.js';
import { ProvisionError, extractErrorMessage } from '../../utils/error.js';
import type { TemplateBindings } from '../secrets/types.js';
import { collectReferences } from './references.js';
import type { TemplateEngine, TemplateReference } from './types.js';

/**
 * Message Handlebars strict mode throws for a missing lookup:
 *   "name" not defined in [object Object] - 3:7
 */
const STRICT_LOOKUP_PATTERN = /^"([^"]+)" not defined in .*?(?: - (\d+):\d+)?$/s;

/**
 * Quote a value as a single POSIX shell word
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Message V8 throws when strict mode looks a name up on a string item,
 * e.g. inside {{#each}} over a list binding
 */
const PRIMITIVE_LOOKUP_PATTERN = /^Cannot use 'in' operator to search for '([^']+)' in /;

/**
 * Helpers receive their parameters followed by the Handlebars options
 * object; a bare {{json}} gets the options alone.
 */
function singleArgument(helper: string, args: readonly unknown[]): unknown {
  if (args.length !== 2) {
    throw new Error(`${helper} helper expects exactly one argument, got ${Math.max(args.length - 1, 0)}`);
  }
  const [value] = args;
  if (value === undefined || value === null) {
    throw new Error(`${helper} helper received no value`);
  }
  return value;
}

/**
 * Register the helpers provisioning templates use:
 * - json:  {{json value}} emits a JSON literal (strings quoted and escaped)
 * - shell: {{shell value}} emits a single-quoted shell word
 */
function registerHelpers(env: typeof Handlebars): void {
  env.registerHelper('json', (...args: unknown[]) => JSON.stringify(singleArgument('json', args)));

  env.registerHelper('shell', (...args: unknown[]) => {
    const value = singleArgument('shell', args);
    if (typeof value !== 'string') {
      throw new Error('shell helper expects a string');
    }
    return shellQuote(value);
  });
}

export class HandlebarsEngine implements TemplateEngine {
  readonly name = 'handlebars';
  private readonly env: typeof Handlebars;

  constructor() {
    // Isolated environment: helpers never leak into the global instance
    this.env = Handlebars.create();
    registerHelpers(this.env);
  }

  private helperNames(): ReadonlySet<string> {
    return new Set(Object.keys(this.env.helpers));
  }

  private parse(source: string, templateId: string): hbs.AST.Program {
    try {
      return this.env.parse(source);
    } catch (err) {
      throw new TemplateError(
        `Template ${templateId} has a syntax error: ${extractErrorMessage(err)}`,
        'TEMPLATE_SYNTAX',
        templateId,
        err
      );
    }
  }

  references(source: string, templateId: string): TemplateReference[] {
    return collectReferences(this.parse(source, templateId), this.helperNames());
  }

  render(source: string, bindings: TemplateBindings, templateId: string): string {
    const program = this.parse(source, templateId);

    for (const ref of collectReferences(program, this.helperNames())) {
      if (!Object.hasOwn(bindings, ref.name)) {
        log.debug({ template: templateId, variable: ref.name }, 'Template references unbound variable');
        throw new UndefinedVariableError(ref.name, templateId, ref.line);
      }
    }

    const template = this.env.compile(program, {
      strict: true,
      noEscape: true,
    });

    try {
      return template(bindings);
    } catch (err) {
      throw this.translateError(err, templateId);
    }
  }

  private translateError(err: unknown, templateId: string): ProvisionError {
    if (err instanceof ProvisionError) {
      return err;
    }

    const message = extractErrorMessage(err);
    const strict = STRICT_LOOKUP_PATTERN.exec(message);
    if (strict) {
      const line = strict[2] !== undefined ? Number(strict[2]) : undefined;
      return new UndefinedVariableError(strict[1], templateId, line);
    }

    const primitive = PRIMITIVE_LOOKUP_PATTERN.exec(message);
    if (primitive) {
      return new UndefinedVariableError(primitive[1], templateId);
    }

    return new TemplateError(
      `Template ${templateId} failed to render: ${message}`,
      'TEMPLATE_HELPER',
      templateId,
      err
    );
  }
}
