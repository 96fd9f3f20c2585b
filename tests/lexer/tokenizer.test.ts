/**
 * X-presso Lexer Tests
 * Totality, positions, the pull interface and word classification
 */

import { describe, expect, it } from 'vitest';
import {
  createLexer,
  DiagnosticSink,
  nextToken,
  tokenize,
  tokenStream,
  TOKEN_KINDS,
} from '../../src/index.js';
import { kinds, significant } from '../helpers/source.js';

function roundTrip(source: string): string {
  return tokenize(source)
    .tokens.map((t) => t.lexeme)
    .join('');
}

describe('Lexer', () => {
  // ============================================================
  // TOTALITY
  // ============================================================

  describe('round trip', () => {
    it('reproduces well-formed source from lexemes', () => {
      const source = [
        'class Shop :> Base {',
        '  // note',
        '  Date due = [2024|09|20];',
        '  /* block */ str s = "a\\tb";',
        '  x = $(1,2) + [1|3];',
        '}',
        '',
      ].join('\n');

      expect(roundTrip(source)).toBe(source);
    });

    it('reproduces malformed source from lexemes', () => {
      const source = '"abc\n#$ @ ....[2024|13|01] my-var 5abc \'x';

      expect(roundTrip(source)).toBe(source);
    });

    it('keeps astral characters whole', () => {
      const { tokens } = tokenize('a 😀 b');

      expect(tokens.map((t) => t.lexeme).join('')).toBe('a 😀 b');
      expect(tokens[2]).toMatchObject({
        kind: TOKEN_KINDS.UNKNOWN,
        lexeme: '😀',
      });
    });

    it('ends every stream with one empty EOF token', () => {
      const { tokens } = tokenize('x');
      const eofs = tokens.filter((t) => t.kind === TOKEN_KINDS.EOF);

      expect(eofs).toHaveLength(1);
      expect(tokens[tokens.length - 1]).toMatchObject({
        kind: TOKEN_KINDS.EOF,
        lexeme: '',
      });
    });

    it('tokenizes empty source to EOF at 1:1', () => {
      const { tokens, diagnostics } = tokenize('');

      expect(tokens).toEqual([
        { kind: TOKEN_KINDS.EOF, lexeme: '', line: 1, column: 1, offset: 0 },
      ]);
      expect(diagnostics).toEqual([]);
    });
  });

  // ============================================================
  // POSITIONS
  // ============================================================

  describe('positions', () => {
    it('tracks 1-based lines and columns across newlines', () => {
      const tokens = significant('int x\n  = 5;');

      expect(tokens.map((t) => [t.lexeme, t.line, t.column])).toEqual([
        ['int', 1, 1],
        ['x', 1, 5],
        ['=', 2, 3],
        ['5', 2, 5],
        [';', 2, 6],
      ]);
    });

    it('records 0-based offsets', () => {
      const tokens = significant('a = bc');

      expect(tokens.map((t) => t.offset)).toEqual([0, 2, 4]);
    });

    it('groups a whitespace run with newlines into one token', () => {
      const { tokens } = tokenize('a \n\t b');

      expect(tokens[1]).toMatchObject({
        kind: TOKEN_KINDS.WHITESPACE,
        lexeme: ' \n\t ',
      });
    });
  });

  // ============================================================
  // PULL INTERFACE
  // ============================================================

  describe('pull interface', () => {
    it('hands out one token per call and repeats EOF', () => {
      const lexer = createLexer('a b');

      expect(nextToken(lexer).lexeme).toBe('a');
      expect(nextToken(lexer).kind).toBe(TOKEN_KINDS.WHITESPACE);
      expect(nextToken(lexer).lexeme).toBe('b');
      expect(nextToken(lexer).kind).toBe(TOKEN_KINDS.EOF);
      expect(nextToken(lexer).kind).toBe(TOKEN_KINDS.EOF);
    });

    it('yields tokens lazily up to EOF', () => {
      const seen = [...tokenStream('x;')].map((t) => t.kind);

      expect(seen).toEqual([
        TOKEN_KINDS.IDENTIFIER,
        TOKEN_KINDS.PUNC_DELIM,
        TOKEN_KINDS.EOF,
      ]);
    });
  });

  // ============================================================
  // OPTIONS
  // ============================================================

  describe('options', () => {
    it('reports into a shared sink', () => {
      const sink = new DiagnosticSink();
      tokenize('# x', { sink });

      expect(sink.count).toBe(1);
      expect(sink.all()[0]?.kind).toBe('INVALID_CHARACTER');
    });

    it('rejects a non-positive lookahead bound', () => {
      expect(() => tokenize('x', { maxLookahead: 0 })).toThrow(RangeError);
    });

    it('falls back to a delimiter when a bracket literal exceeds the bound', () => {
      const { tokens } = tokenize('[2024|09|20]', { maxLookahead: 5 });

      expect(tokens[0]).toMatchObject({ kind: TOKEN_KINDS.DELIM, lexeme: '[' });
    });

    it('bounds hyphenated words by the lookahead', () => {
      const { tokens } = tokenize('a-b-c-d', { maxLookahead: 2 });

      expect(tokens[0]).toMatchObject({
        kind: TOKEN_KINDS.UNKNOWN,
        lexeme: 'a-b',
      });
    });
  });

  // ============================================================
  // WORDS
  // ============================================================

  describe('words', () => {
    it('classifies keywords, reserved words, booleans and identifiers', () => {
      expect(kinds('while int true whileX')).toEqual([
        'KEYWORD:while',
        'RESERVED:int',
        'BOOL_LIT:true',
        'IDENTIFIER:whileX',
      ]);
    });

    it('joins two-word keywords separated by one space', () => {
      expect(kinds('exit when x')).toEqual([
        'KEYWORD:exit when',
        'IDENTIFIER:x',
      ]);
      expect(kinds('where type T')).toEqual([
        'KEYWORD:where type',
        'IDENTIFIER:T',
      ]);
    });

    it('keeps the words apart when the second does not end there', () => {
      expect(kinds('exit  when')).toEqual(['KEYWORD:exit', 'IDENTIFIER:when']);
      expect(kinds('exit whenever')).toEqual([
        'KEYWORD:exit',
        'IDENTIFIER:whenever',
      ]);
    });

    it('accepts switch-fall as a keyword', () => {
      expect(kinds('switch-fall')).toEqual(['KEYWORD:switch-fall']);
    });

    it('rejects other hyphenated words', () => {
      const { tokens, diagnostics } = tokenize('my-var');

      expect(tokens[0]).toMatchObject({
        kind: TOKEN_KINDS.UNKNOWN,
        lexeme: 'my-var',
      });
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toMatchObject({
        kind: 'INVALID_IDENTIFIER',
        message: "Invalid identifier 'my-var': identifiers cannot contain '-'",
        line: 1,
        column: 1,
      });
    });

    it('does not join words around operators', () => {
      expect(kinds('a - b')).toEqual([
        'IDENTIFIER:a',
        'ARITHMETIC_OP:-',
        'IDENTIFIER:b',
      ]);
      expect(kinds('a-1')).toEqual([
        'IDENTIFIER:a',
        'ARITHMETIC_OP:-',
        'INT_LIT:1',
      ]);
      expect(kinds('a--')).toEqual(['IDENTIFIER:a', 'UNARY_OP:--']);
      expect(kinds('a->b')).toEqual([
        'IDENTIFIER:a',
        'METHOD_OP:->',
        'IDENTIFIER:b',
      ]);
    });
  });

  // ============================================================
  // COMMENTS AND INVALID CHARACTERS
  // ============================================================

  describe('comments', () => {
    it('runs a line comment to the end of the line', () => {
      const { tokens } = tokenize('// hi\nx');

      expect(tokens.map((t) => `${t.kind}:${t.lexeme}`)).toEqual([
        'COMMENT:// hi',
        'WHITESPACE:\n',
        'IDENTIFIER:x',
        'EOF:',
      ]);
    });

    it('keeps an unterminated block comment as a comment token', () => {
      const { tokens, diagnostics } = tokenize('/* open');

      expect(tokens[0]).toMatchObject({
        kind: TOKEN_KINDS.COMMENT,
        lexeme: '/* open',
      });
      expect(diagnostics.map((d) => d.kind)).toEqual(['UNTERMINATED_COMMENT']);
    });
  });

  describe('invalid characters', () => {
    it('reports one diagnostic with the registry suggestion', () => {
      const { tokens, diagnostics } = tokenize('x # y');

      expect(tokens[2]).toMatchObject({
        kind: TOKEN_KINDS.UNKNOWN,
        lexeme: '#',
      });
      expect(diagnostics).toEqual([
        {
          kind: 'INVALID_CHARACTER',
          phase: 'lexical',
          code: 'XP-L001',
          message: "Unexpected character '#'",
          line: 1,
          column: 3,
          suggestion:
            'Remove the character or place it inside a string literal',
        },
      ]);
    });
  });
});
