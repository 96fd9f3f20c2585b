/**
 * X-presso Lexer Tests: Operators and Delimiters
 */

import { describe, expect, it } from 'vitest';
import { tokenize, TOKEN_KINDS } from '../../src/index.js';
import { kinds } from '../helpers/source.js';

describe('Lexer operators', () => {
  describe('unary and binary signs', () => {
    it('treats a sign after an operand as binary', () => {
      expect(kinds('a - b')).toEqual([
        'IDENTIFIER:a',
        'ARITHMETIC_OP:-',
        'IDENTIFIER:b',
      ]);
      expect(kinds('(a) + b')).toEqual([
        'DELIM:(',
        'IDENTIFIER:a',
        'DELIM:)',
        'ARITHMETIC_OP:+',
        'IDENTIFIER:b',
      ]);
    });

    it('treats a sign after an operator or opener as unary', () => {
      expect(kinds('x = -b')).toEqual([
        'IDENTIFIER:x',
        'ASSIGN_OP:=',
        'UNARY_OP:-',
        'IDENTIFIER:b',
      ]);
      expect(kinds('(-b)')).toEqual([
        'DELIM:(',
        'UNARY_OP:-',
        'IDENTIFIER:b',
        'DELIM:)',
      ]);
    });

    it('leaves a sign after a keyword to the parser', () => {
      expect(kinds('exit when -x')).toEqual([
        'KEYWORD:exit when',
        'ARITHMETIC_OP:-',
        'IDENTIFIER:x',
      ]);
    });

    it('treats a sign at the start of the stream as unary', () => {
      expect(kinds('+1')).toEqual(['UNARY_OP:+', 'INT_LIT:1']);
    });

    it('looks past trivia for the previous token', () => {
      expect(kinds('a /* c */ - b')).toEqual([
        'IDENTIFIER:a',
        'ARITHMETIC_OP:-',
        'IDENTIFIER:b',
      ]);
    });
  });

  describe('longest match', () => {
    it('prefers three-character operators', () => {
      expect(kinds('a >>> 2')).toEqual([
        'IDENTIFIER:a',
        'BIT_OP:>>>',
        'INT_LIT:2',
      ]);
      expect(kinds('class A :>> B')).toEqual([
        'RESERVED:class',
        'IDENTIFIER:A',
        'INHERIT_OP::>>',
        'IDENTIFIER:B',
      ]);
    });

    it('prefers two-character operators over one', () => {
      expect(kinds('a >= b != c :: d')).toEqual([
        'IDENTIFIER:a',
        'REL_OP:>=',
        'IDENTIFIER:b',
        'REL_OP:!=',
        'IDENTIFIER:c',
        'METHOD_OP:::',
        'IDENTIFIER:d',
      ]);
    });

    it('scans ?= as an assignment operator', () => {
      expect(kinds('x ?= y')).toEqual([
        'IDENTIFIER:x',
        'ASSIGN_OP:?=',
        'IDENTIFIER:y',
      ]);
    });
  });

  describe('object types', () => {
    it('scans a bare type name between angle brackets', () => {
      expect(kinds('<String> s')).toEqual([
        'OBJ_DELIM:<',
        'STR_LIT:String',
        'OBJ_DELIM:>',
        'IDENTIFIER:s',
      ]);
    });

    it('scans a quoted type name between angle brackets', () => {
      expect(kinds('<"Item">')).toEqual([
        'OBJ_DELIM:<',
        'STR_DELIM:"',
        'STR_LIT:Item',
        'STR_DELIM:"',
        'OBJ_DELIM:>',
      ]);
    });

    it('falls back to a relational operator without a closing bracket', () => {
      expect(kinds('a < 10')).toEqual([
        'IDENTIFIER:a',
        'REL_OP:<',
        'INT_LIT:10',
      ]);
      expect(kinds('a<b')).toEqual([
        'IDENTIFIER:a',
        'REL_OP:<',
        'IDENTIFIER:b',
      ]);
    });
  });

  describe('periods', () => {
    it('scans one, two and three periods', () => {
      expect(kinds('a.b')).toEqual([
        'IDENTIFIER:a',
        'METHOD_OP:.',
        'IDENTIFIER:b',
      ]);
      expect(kinds('x...')).toEqual(['IDENTIFIER:x', 'LOOP_OP:...']);
    });

    it('reports runs longer than three from the fourth period', () => {
      const { tokens, diagnostics } = tokenize('....');

      expect(tokens.map((t) => `${t.kind}:${t.lexeme}`)).toEqual([
        'LOOP_OP:...',
        'UNKNOWN:.',
        'EOF:',
      ]);
      expect(diagnostics).toEqual([
        expect.objectContaining({
          kind: 'INVALID_OPERATOR',
          message:
            "Invalid operator '....': at most three consecutive periods are allowed",
          column: 4,
        }),
      ]);
    });

    it('covers the whole excess with one token', () => {
      const { tokens, diagnostics } = tokenize('x.....y');

      expect(tokens[2]).toMatchObject({
        kind: TOKEN_KINDS.UNKNOWN,
        lexeme: '..',
        column: 5,
      });
      expect(diagnostics).toHaveLength(1);
    });
  });

  describe('delimiters and punctuation', () => {
    it('scans punctuation', () => {
      expect(kinds(', ; : ? @')).toEqual([
        'PUNC_DELIM:,',
        'PUNC_DELIM:;',
        'PUNC_DELIM::',
        'PUNC_DELIM:?',
        'PUNC_DELIM:@',
      ]);
    });

    it('reports a closer that does not match the open delimiter', () => {
      const { tokens, diagnostics } = tokenize('(]');

      expect(tokens[1]).toMatchObject({ kind: TOKEN_KINDS.DELIM, lexeme: ']' });
      expect(diagnostics).toEqual([
        {
          kind: 'MISMATCHED_DELIMITERS',
          phase: 'lexical',
          code: 'XP-L010',
          message:
            "Mismatched delimiter ']': '(' opened at line 1, column 1 is still open",
          line: 1,
          column: 2,
          suggestion: "Close '(' with ')' first",
        },
      ]);
    });

    it('accepts balanced nesting', () => {
      expect(tokenize('({[]})').diagnostics).toEqual([]);
    });

    it('leaves a stray closer for the parser', () => {
      expect(tokenize(')').diagnostics).toEqual([]);
    });

    it('resynchronizes on the matching opener further down', () => {
      const { diagnostics } = tokenize('( { ) }');

      expect(diagnostics.map((d) => d.column)).toEqual([5]);
    });
  });
});
