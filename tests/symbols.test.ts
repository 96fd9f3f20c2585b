/**
 * Symbol Table Tests
 */

import { describe, expect, it } from 'vitest';
import { GLOBAL_SCOPE, SymbolTable } from '../src/index.js';

describe('SymbolTable', () => {
  it('inserts into the global scope when no scope is open', () => {
    const table = new SymbolTable();

    expect(table.insert('Shop', 'class')).toBe(true);
    expect(table.currentScope).toBe(GLOBAL_SCOPE);
    expect(table.globals()).toEqual([
      { name: 'Shop', type: 'class', scopeId: 0, scope: 'global' },
    ]);
  });

  it('qualifies nested scope names', () => {
    const table = new SymbolTable();
    table.enterScope('Shop');
    table.enterScope('total');

    expect(table.currentScope).toBe('Shop.total');
    expect(table.depth).toBe(2);
  });

  it('rejects a duplicate in the same scope only', () => {
    const table = new SymbolTable();
    table.enterScope('A');
    table.insert('x', 'int');

    expect(table.insert('x', 'str')).toBe(false);
    table.enterScope('inner');
    expect(table.insert('x', 'str')).toBe(true);
  });

  it('looks up innermost first, then outward to global', () => {
    const table = new SymbolTable();
    table.insert('x', 'class');
    table.enterScope('A');
    table.insert('x', 'int');
    table.enterScope('B');

    expect(table.lookup('x')).toMatchObject({ type: 'int', scope: 'A' });
    expect(table.lookupLocal('x')).toBeUndefined();

    table.exitScope();
    table.exitScope();
    expect(table.lookup('x')).toMatchObject({ type: 'class', scope: 'global' });
  });

  it('discards entries when a scope closes', () => {
    const table = new SymbolTable();
    table.enterScope('A');
    table.insert('y', 'int');
    table.exitScope();

    expect(table.lookup('y')).toBeUndefined();
  });

  it('gives every scope a distinct id', () => {
    const table = new SymbolTable();
    table.enterScope('A');
    table.insert('a', 'int');
    const first = table.lookup('a')?.scopeId;
    table.exitScope();
    table.enterScope('A');
    table.insert('a', 'int');

    expect(table.lookup('a')?.scopeId).not.toBe(first);
  });

  it('refuses to close the global scope', () => {
    expect(() => new SymbolTable().exitScope()).toThrow(
      'exitScope called with no open scope'
    );
  });
});
