// Path: src/lib/template/references.ts
// Collects the root bindings a parsed Handlebars template refers to

/// <reference types="handlebars" />
import type { TemplateReference } from './types.js';

/**
 * Block helpers whose body runs against a different context.
 * Paths inside them are relative to the item, not to the bindings.
 */
const CONTEXT_HELPERS = new Set(['each', 'with']);

interface Scope {
  /** Paths resolved in this scope are looked up in the bindings */
  root: boolean;
}

function isMustache(node: hbs.AST.Node): node is hbs.AST.MustacheStatement {
  return node.type === 'MustacheStatement';
}

function isBlock(node: hbs.AST.Node): node is hbs.AST.BlockStatement {
  return node.type === 'BlockStatement';
}

function isPartial(node: hbs.AST.Node): node is hbs.AST.PartialStatement {
  return node.type === 'PartialStatement';
}

function isPath(node: hbs.AST.Node): node is hbs.AST.PathExpression {
  return node.type === 'PathExpression';
}

function isSubExpression(node: hbs.AST.Node): node is hbs.AST.SubExpression {
  return node.type === 'SubExpression';
}

class ReferenceCollector {
  private readonly found = new Map<string, TemplateReference>();

  constructor(private readonly helpers: ReadonlySet<string>) {}

  collect(program: hbs.AST.Program): TemplateReference[] {
    this.program(program, [{ root: true }]);
    return [...this.found.values()];
  }

  private program(program: hbs.AST.Program, scopes: Scope[]): void {
    for (const statement of program.body) {
      this.statement(statement, scopes);
    }
  }

  private statement(node: hbs.AST.Statement, scopes: Scope[]): void {
    if (isMustache(node)) {
      this.call(node.path, node.params, node.hash, scopes);
    } else if (isBlock(node)) {
      this.block(node, scopes);
    } else if (isPartial(node)) {
      this.arguments(node.params, node.hash, scopes);
    }
    // Content and comments reference nothing
  }

  private block(node: hbs.AST.BlockStatement, scopes: Scope[]): void {
    const callee: hbs.AST.Node = node.path;
    const name = isPath(callee) ? callee.original : '';
    const isHelper = this.helpers.has(name) || node.params.length > 0;
    let changesContext = CONTEXT_HELPERS.has(name);

    if (isHelper || !isPath(callee)) {
      this.arguments(node.params, node.hash, scopes);
    } else {
      // {{#name}}...{{/name}} iterates or enters the binding itself
      this.path(callee, scopes);
      changesContext = true;
    }

    if (node.program) {
      this.program(node.program, changesContext ? [...scopes, { root: false }] : scopes);
    }
    if (node.inverse) {
      this.program(node.inverse, scopes);
    }
  }

  private call(
    callee: hbs.AST.PathExpression | hbs.AST.Literal,
    params: hbs.AST.Expression[],
    hash: hbs.AST.Hash | undefined,
    scopes: Scope[]
  ): void {
    const hasArguments = params.length > 0 || (hash?.pairs.length ?? 0) > 0;
    if (isPath(callee) && !hasArguments && !this.helpers.has(callee.original)) {
      this.path(callee, scopes);
      return;
    }
    this.arguments(params, hash, scopes);
  }

  private arguments(params: hbs.AST.Expression[], hash: hbs.AST.Hash | undefined, scopes: Scope[]): void {
    for (const param of params) {
      this.expression(param, scopes);
    }
    for (const pair of hash?.pairs ?? []) {
      this.expression(pair.value, scopes);
    }
  }

  private expression(node: hbs.AST.Expression, scopes: Scope[]): void {
    if (isPath(node)) {
      this.path(node, scopes);
    } else if (isSubExpression(node)) {
      this.arguments(node.params, node.hash, scopes);
    }
    // Literals reference nothing
  }

  private path(node: hbs.AST.PathExpression, scopes: Scope[]): void {
    let name: string | undefined;

    if (node.data) {
      // @root.name reaches the bindings from any depth; other @data is per-block
      if (node.parts[0] === 'root' && node.parts.length > 1) {
        name = node.parts[1];
      }
    } else if (node.parts.length > 0) {
      const target = Math.max(0, scopes.length - 1 - node.depth);
      if (scopes[target]?.root) {
        name = node.parts[0];
      }
    }

    if (name !== undefined && !this.found.has(name)) {
      this.found.set(name, { name, line: node.loc.start.line });
    }
  }
}

/**
 * Root bindings referenced by a template, deduplicated, first occurrence order.
 *
 * @param program - Parsed template
 * @param helpers - Registered helper names; a bare `{{helper}}` is not a reference
 */
export function collectReferences(
  program: hbs.AST.Program,
  helpers: ReadonlySet<string>
): TemplateReference[] {
  return new ReferenceCollector(helpers).collect(program);
}
