// Path: src/lib/template/references.test.ts
// Tests for template reference collection

import { describe, it, expect } from 'vitest';
import { HandlebarsEngine } from './handlebars-engine.js';

const engine = new HandlebarsEngine();

function names(source: string): string[] {
  return engine.references(source, 'test.tpl').map((ref) => ref.name);
}

describe('references', () => {
  it('should list plain references with their first line', () => {
    expect(engine.references('{{a}}\n{{b}}\n{{a}}', 'test.tpl')).toEqual([
      { name: 'a', line: 1 },
      { name: 'b', line: 2 },
    ]);
  });

  it('should treat helper arguments as references but not helper names', () => {
    expect(names('{{json hash}} {{shell pass}}')).toEqual(['hash', 'pass']);
  });

  it('should only report the root part of a dotted path', () => {
    expect(names('{{user.name}}')).toEqual(['user']);
  });

  it('should skip paths relative to an each item', () => {
    expect(names('{{#each keys}}{{this}}{{label}}{{../prefix}}{{/each}}')).toEqual(['keys', 'prefix']);
  });

  it('should skip block data variables and literals', () => {
    expect(names('{{#each keys}}{{#unless @first}}, {{/unless}}{{json this}}{{/each}}{{json "x"}}')).toEqual([
      'keys',
    ]);
  });

  it('should follow @root from inside a block', () => {
    expect(names('{{#each keys}}{{@root.mac}}{{/each}}')).toEqual(['keys', 'mac']);
  });

  it('should read conditions and both branches of if blocks', () => {
    expect(names('{{#if flag}}{{yes}}{{else}}{{no}}{{/if}}')).toEqual(['flag', 'yes', 'no']);
  });

  it('should treat a bare section block as entering the binding', () => {
    expect(names('{{#section}}{{inner}}{{/section}}')).toEqual(['section']);
  });

  it('should return nothing for a template without placeholders', () => {
    expect(names('plain text\n')).toEqual([]);
  });
});
