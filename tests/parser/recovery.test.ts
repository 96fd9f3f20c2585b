/**
 * X-presso Parser Tests: Error Recovery
 * One diagnostic per problem, and parsing carries on after it
 */

import { describe, expect, it } from 'vitest';
import { parse, parseTokens, tokenize } from '../../src/index.js';
import { findNode, parseBody } from '../helpers/source.js';

describe('Parser recovery', () => {
  describe('members', () => {
    it('drops a broken field and keeps the next method', () => {
      const { tree, diagnostics } = parse(
        [
          'class Shop {',
          '  int = 5;',
          '  void total() { print("hi"); }',
          '}',
        ].join('\n')
      );

      expect(diagnostics).toEqual([
        {
          kind: 'UNEXPECTED_TOKEN',
          phase: 'syntax',
          code: 'XP-S001',
          message: "Expected identifier in declarator, found '='",
          line: 2,
          column: 7,
          suggestion: 'Remove or replace the token',
        },
      ]);
      expect(tree.find('Field')).toBeUndefined();
      expect(findNode(tree, 'Method').child(1)?.label).toBe('total');
    });

    it('resumes at a method whose return type is an identifier', () => {
      const { tree, diagnostics } = parse(
        [
          'class A {',
          '  int x',
          '  void total() { print("hi"); }',
          '  int y;',
          '}',
        ].join('\n')
      );

      expect(diagnostics).toEqual([
        expect.objectContaining({
          kind: 'MISSING_TOKEN',
          message: "Expected ';' in field, found 'void'",
          line: 3,
          column: 3,
        }),
      ]);
      expect(tree.findAll('Method')).toHaveLength(1);
      expect(findNode(tree, 'Method').child(1)?.label).toBe('total');
      expect(findNode(tree, 'Field').toSExpression()).toBe(
        '(Field (Type int) (Declarator y) ;)'
      );
    });

    it('rejects modifiers that a class cannot take', () => {
      const { tree, diagnostics } = parse('native class X { }');

      expect(diagnostics).toEqual([
        expect.objectContaining({
          kind: 'INVALID_SYNTAX',
          message: "Modifier 'native' is not allowed on a class",
          suggestion:
            'Use one of: public, private, protected, abstract, final, static',
        }),
      ]);
      expect(tree.find('Class')).toBeDefined();
    });
  });

  describe('statements', () => {
    it('suggests a keyword for a misspelled statement', () => {
      const { diagnostics } = parseBody('whle (x) { }');

      expect(diagnostics).toEqual([
        expect.objectContaining({
          kind: 'MISSING_TOKEN',
          message: "Expected ';' in expression statement, found '{'",
          suggestion: "Did you mean 'while'?",
        }),
      ]);
    });

    it('reports a missing semicolon', () => {
      const { diagnostics } = parseBody('x = 1\n y = 2;');

      expect(diagnostics).toEqual([
        expect.objectContaining({
          kind: 'MISSING_TOKEN',
          message: "Expected ';' in expression statement, found 'y'",
          line: 2,
          column: 2,
          suggestion: "Add ';' to end the statement",
        }),
      ]);
    });

    it('resumes at a declaration typed by a class name', () => {
      const { tree, diagnostics } = parseBody('x = 1\n Item it = 2;');

      expect(diagnostics.map((d) => d.message)).toEqual([
        "Expected ';' in expression statement, found 'Item'",
      ]);
      expect(findNode(tree, 'Declaration').toSExpression()).toBe(
        '(Declaration (Type Item) (Declarator it = 2) ;)'
      );
    });

    it('continues with the next statement after a failure', () => {
      const { tree, diagnostics } = parseBody('x = 1 + ; print("ok");');

      expect(diagnostics).toEqual([
        expect.objectContaining({
          kind: 'INVALID_SYNTAX',
          message: "Invalid right operand for '+'",
          suggestion: "Provide a valid expression after '+'",
        }),
      ]);
      expect(tree.find('PrintStatement')).toBeDefined();
    });

    it('rejects assignment to a literal', () => {
      const { diagnostics } = parseBody('1 = x;');

      expect(diagnostics.map((d) => [d.kind, d.message])).toEqual([
        ['INVALID_SYNTAX', 'Invalid assignment target'],
      ]);
    });

    it('leaves unknown tokens to the lexer diagnostic', () => {
      const { diagnostics } = parseBody('x = #;');

      expect(diagnostics.map((d) => d.kind)).toEqual(['INVALID_CHARACTER']);
    });
  });

  describe('program level', () => {
    it('skips to the next class definition', () => {
      const { tree, diagnostics } = parse('int x; class A { }');

      expect(diagnostics).toEqual([
        expect.objectContaining({
          kind: 'UNEXPECTED_TOKEN',
          message: "Expected class definition, found 'int'",
          line: 1,
          column: 1,
          suggestion: 'Start with a class definition',
        }),
      ]);
      expect(findNode(tree, 'Class').child(1)?.label).toBe('A');
    });
  });

  describe('end of input', () => {
    it('reports the open block and the open class body', () => {
      const { diagnostics } = parse('class A { void f() {');

      expect(diagnostics.map((d) => [d.kind, d.message, d.suggestion])).toEqual(
        [
          [
            'UNEXPECTED_EOF',
            "Expected '}' in block, found end of input",
            'Check for an unclosed brace',
          ],
          [
            'UNEXPECTED_EOF',
            'Unterminated class body',
            "Add '}' to close the class body",
          ],
        ]
      );
    });

    it('reports a missing operand at end of input', () => {
      const { diagnostics } = parse('class A { void f() { x = 1 +');

      expect(diagnostics[0]).toMatchObject({
        kind: 'UNEXPECTED_EOF',
        message: "Invalid right operand for '+'",
      });
    });
  });

  describe('token input', () => {
    it('drops trivia and supplies a missing EOF', () => {
      const tokens = tokenize('class A { }').tokens.slice(0, -1);
      const { tree, diagnostics } = parseTokens(tokens);

      expect(diagnostics).toEqual([]);
      expect(tree.toSExpression()).toBe(
        '(Program (Class class A { (ClassBody) }))'
      );
    });

    it('collects lexer and parser diagnostics in one list', () => {
      const { diagnostics } = parse(
        'class A { void f() { x = 1 + ; y = #; } }'
      );

      expect(diagnostics.map((d) => d.phase)).toEqual(['lexical', 'syntax']);
    });
  });
});
