/**
 * Parse Tree Tests
 */

import { describe, expect, it } from 'vitest';
import { ParseTreeNode, renderTree, type Token } from '../src/index.js';

function ident(lexeme: string, column = 1): Token {
  return { kind: 'IDENTIFIER', lexeme, line: 1, column, offset: column - 1 };
}

describe('ParseTreeNode', () => {
  it('labels terminals with their lexeme', () => {
    const leaf = ParseTreeNode.terminal(ident('total'));

    expect(leaf.label).toBe('total');
    expect(leaf.isTerminal).toBe(true);
  });

  it('refuses children on a terminal', () => {
    const leaf = ParseTreeNode.terminal(ident('x'));

    expect(() => leaf.addChild(ParseTreeNode.nonTerminal('Block'))).toThrow(
      "Terminal node 'x' cannot have children"
    );
  });

  it('moves a child that already has a parent', () => {
    const a = ParseTreeNode.nonTerminal('A');
    const b = ParseTreeNode.nonTerminal('B');
    const leaf = a.addChild(ParseTreeNode.terminal(ident('x')));

    b.addChild(leaf);

    expect(a.children).toHaveLength(0);
    expect(leaf.parent).toBe(b);
  });

  it('finds, collects and prints nodes', () => {
    const root = ParseTreeNode.nonTerminal('Program');
    const cls = root.addChild(ParseTreeNode.nonTerminal('Class'));
    cls.addChild(ParseTreeNode.terminal(ident('A')));
    root.addChild(ParseTreeNode.nonTerminal('Class'));

    expect(root.find('Class')).toBe(cls);
    expect(root.findAll('Class')).toHaveLength(2);
    expect(root.text()).toBe('A');
    expect(root.toSExpression()).toBe('(Program (Class A) (Class))');
  });
});

describe('renderTree', () => {
  it('indents two spaces per level and shows token positions', () => {
    const root = ParseTreeNode.nonTerminal('Program');
    const cls = root.addChild(ParseTreeNode.nonTerminal('Class'));
    cls.addChild(ParseTreeNode.terminal(ident('Shop', 7)));

    expect(renderTree(root)).toBe(
      ['Program', '  Class', "    IDENTIFIER 'Shop' 1:7"].join('\n')
    );
  });
});
