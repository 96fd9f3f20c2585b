/**
 * X-presso Parser Tests: Scopes and Declarations
 */

import { describe, expect, it } from 'vitest';
import { parse } from '../../src/index.js';
import { parseBody } from '../helpers/source.js';

describe('Parser scopes', () => {
  it('records every declaration with its type and scope', () => {
    const { declarations, diagnostics } = parse(
      [
        'class Shop {',
        '  int count;',
        '  void total(int price) {',
        '    int sum = 0;',
        '    items.filter_by(n -> n > 2);',
        '  }',
        '}',
      ].join('\n')
    );

    expect(diagnostics).toEqual([]);
    expect(declarations.map((d) => [d.name, d.type, d.scope])).toEqual([
      ['Shop', 'class', 'global'],
      ['count', 'int', 'Shop'],
      ['total', 'void', 'Shop'],
      ['price', 'int', 'Shop.total'],
      ['sum', 'int', 'Shop.total'],
      ['n', 'lambda', 'Shop.total.lambda'],
    ]);
  });

  it('declares main and its argument', () => {
    const { declarations } = parse('class App { main(args) { } }');

    expect(declarations.map((d) => [d.name, d.type, d.scope])).toEqual([
      ['App', 'class', 'global'],
      ['main', 'void', 'App'],
      ['args', 'str[]', 'App.main'],
    ]);
  });

  it('records full type text for arrays and object types', () => {
    const { declarations } = parseBody('int[] xs; List<"Item"> items;');

    expect(declarations.slice(-2).map((d) => [d.name, d.type])).toEqual([
      ['xs', 'int[]'],
      ['items', 'List<"Item">'],
    ]);
  });

  it('opens a scope for loops and nested blocks', () => {
    const { declarations } = parseBody(
      'for (int i = 0; i < 3; i++) { int j; } { int k; }'
    );

    expect(declarations.slice(-3).map((d) => [d.name, d.scope])).toEqual([
      ['i', 'T.f.for'],
      ['j', 'T.f.for.block'],
      ['k', 'T.f.block'],
    ]);
  });

  it('reports a name declared twice in one scope', () => {
    const { diagnostics } = parseBody('int a; int a;');

    expect(diagnostics).toEqual([
      {
        kind: 'DUPLICATE_DECLARATION',
        phase: 'syntax',
        code: 'XP-S005',
        message: "'a' is already declared in this scope",
        line: 1,
        column: 33,
        suggestion: 'Rename one of the declarations',
      },
    ]);
  });

  it('treats a parameter and a body local as one scope', () => {
    const { diagnostics } = parse('class T { void f(int a) { int a; } }');

    expect(diagnostics.map((d) => d.kind)).toEqual(['DUPLICATE_DECLARATION']);
  });

  it('allows the same name in separate methods and nested blocks', () => {
    const { diagnostics } = parse(
      'class T { void f() { int a; { int a; } } void g() { int a; } }'
    );

    expect(diagnostics).toEqual([]);
  });

  it('closes every scope once parsing is done', () => {
    const { symbols } = parseBody('int x;');

    expect(symbols.depth).toBe(0);
    expect(symbols.lookup('x')).toBeUndefined();
    expect(symbols.lookup('T')).toMatchObject({ type: 'class' });
  });
});
