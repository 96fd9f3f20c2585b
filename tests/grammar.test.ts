/**
 * Grammar Tests
 * FIRST sets, nullability, node modes and rule validation
 */

import { describe, expect, it } from 'vitest';
import {
  createGrammar,
  defineRules,
  describeKind,
  describeNonTerminal,
  describeSymbol,
  FirstSet,
  sym,
} from '../src/grammar/index.js';
import type { Token } from '../src/index.js';

function token(kind: Token['kind'], lexeme: string): Token {
  return { kind, lexeme, line: 1, column: 1, offset: 0 };
}

describe('Grammar', () => {
  const grammar = createGrammar();

  describe('FIRST sets', () => {
    it('starts a class with modifiers or the class keyword', () => {
      const first = grammar.first('Class');

      expect(first.has('RESERVED', 'class')).toBe(true);
      expect(first.has('RESERVED', 'public')).toBe(true);
      expect(first.has('IDENTIFIER')).toBe(false);
    });

    it('lists every case label start', () => {
      expect(grammar.first('CaseLabel').toArray()).toEqual([
        'ARITHMETIC_OP +',
        'ARITHMETIC_OP -',
        'BOOL_LIT',
        'DATE_LIT',
        'FLOAT_LIT',
        'FRAC_LIT',
        'IDENTIFIER',
        'INT_LIT',
        'STR_DELIM',
      ]);
    });

    it('includes statement keywords, blocks and expressions', () => {
      const first = grammar.first('Statement');

      expect(first.has('KEYWORD', 'if')).toBe(true);
      expect(first.has('KEYWORD', 'exit when')).toBe(true);
      expect(first.has('DELIM', '{')).toBe(true);
      expect(first.has('IDENTIFIER')).toBe(true);
      expect(first.has('RESERVED', 'int')).toBe(true);
    });

    it('starts a unary expression with prefix operators and casts', () => {
      const first = grammar.first('Unary');

      expect(first.has('UNARY_OP')).toBe(true);
      expect(first.has('ARITHMETIC_OP', '-')).toBe(true);
      expect(first.has('LOG_OP', '!')).toBe(true);
      expect(first.has('OBJ_DELIM', '<')).toBe(true);
    });

    it('computes FIRST of a single production', () => {
      const [declarator] = grammar.productions('Declarator');
      expect(declarator).toBeDefined();
      if (declarator === undefined) return;

      expect(grammar.firstOfProduction(declarator).toArray()).toEqual([
        'IDENTIFIER',
      ]);
    });

    it('matches tokens by kind or by kind and lexeme', () => {
      const set = FirstSet.of(['INT_LIT', 'KEYWORD if']);

      expect(set.matches(token('INT_LIT', '7'))).toBe(true);
      expect(set.matches(token('KEYWORD', 'if'))).toBe(true);
      expect(set.matches(token('KEYWORD', 'while'))).toBe(false);
      expect(FirstSet.EMPTY.isEmpty).toBe(true);
    });
  });

  describe('nullability', () => {
    it('marks rules that can match nothing', () => {
      expect(grammar.nullable('Program')).toBe(true);
      expect(grammar.nullable('ClassBody')).toBe(true);
      expect(grammar.nullable('Class')).toBe(false);
      expect(grammar.nullable('Parameters')).toBe(false);
    });
  });

  describe('node modes', () => {
    it('reports how each rule appears in the tree', () => {
      expect(grammar.nodeMode('Statement')).toBe('transparent');
      expect(grammar.nodeMode('ClassScope')).toBe('inline');
      expect(grammar.nodeMode('IfStatement')).toBe('node');
    });
  });

  describe('immutability', () => {
    it('freezes the grammar and its productions', () => {
      const productions = grammar.productions('Class');

      expect(Object.isFrozen(grammar)).toBe(true);
      expect(Object.isFrozen(productions)).toBe(true);
      expect(Object.isFrozen(productions[0])).toBe(true);
    });
  });

  describe('validation', () => {
    it('rejects a rule with no productions', () => {
      const rules = { ...defineRules(), Block: [] };

      expect(() => createGrammar(rules)).toThrow(
        'Rule Block has no productions'
      );
    });

    it('rejects text that is not a symbol', () => {
      expect(() => sym('foo')).toThrow('Not a grammar symbol: foo');
    });
  });

  describe('descriptions', () => {
    it('names rules in prose', () => {
      expect(describeNonTerminal('IfStatement')).toBe('if statement');
      expect(describeNonTerminal('Class')).toBe('class definition');
    });

    it('names token kinds and terminals', () => {
      expect(describeKind('INT_LIT')).toBe('integer');
      expect(describeKind('ARITHMETIC_OP')).toBe('arithmetic op');
      expect(describeSymbol(sym(';'))).toBe("';'");
    });
  });
});
