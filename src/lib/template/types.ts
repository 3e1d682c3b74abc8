// Path: src/lib/template/types.ts
// Template engine contract

import type { TemplateBindings } from '../secrets/types.js';

/**
 * A binding referenced by a template, with the line it first appears on
 */
export interface TemplateReference {
  name: string;
  line: number;
}

/**
 * Pluggable substitution engine.
 *
 * Implementations must fail on any reference that the bindings do not
 * provide; a blank substitution is never acceptable.
 */
export interface TemplateEngine {
  readonly name: string;

  /**
   * Root bindings a template references, first occurrence order
   */
  references(source: string, templateId: string): TemplateReference[];

  /**
   * Render a template. Identical inputs always produce identical output.
   *
   * @throws UndefinedVariableError when a referenced binding is missing
   * @throws TemplateError on syntax errors or helper misuse
   */
  render(source: string, bindings: TemplateBindings, templateId: string): string;
}
