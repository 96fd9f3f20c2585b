/**
 * Operator Lookup Tables
 */

import type { TokenKind } from '../types.js';
import { TOKEN_KINDS } from '../types.js';

export type OperatorTable = Readonly<Partial<Record<string, TokenKind>>>;

/** Three-character operators, tried before the shorter tables */
export const THREE_CHAR_OPERATORS: OperatorTable = {
  '>>>': TOKEN_KINDS.BIT_OP,
  ':>>': TOKEN_KINDS.INHERIT_OP,
  '...': TOKEN_KINDS.LOOP_OP,
};

export const TWO_CHAR_OPERATORS: OperatorTable = {
  '==': TOKEN_KINDS.REL_OP,
  '!=': TOKEN_KINDS.REL_OP,
  '<=': TOKEN_KINDS.REL_OP,
  '>=': TOKEN_KINDS.REL_OP,
  '&&': TOKEN_KINDS.LOG_OP,
  '||': TOKEN_KINDS.LOG_OP,
  '<<': TOKEN_KINDS.BIT_OP,
  '>>': TOKEN_KINDS.BIT_OP,
  '+=': TOKEN_KINDS.ASSIGN_OP,
  '-=': TOKEN_KINDS.ASSIGN_OP,
  '*=': TOKEN_KINDS.ASSIGN_OP,
  '/=': TOKEN_KINDS.ASSIGN_OP,
  '%=': TOKEN_KINDS.ASSIGN_OP,
  '?=': TOKEN_KINDS.ASSIGN_OP,
  '++': TOKEN_KINDS.UNARY_OP,
  '--': TOKEN_KINDS.UNARY_OP,
  '::': TOKEN_KINDS.METHOD_OP,
  '->': TOKEN_KINDS.METHOD_OP,
  '..': TOKEN_KINDS.LOOP_OP,
  ':>': TOKEN_KINDS.INHERIT_OP,
};

export const SINGLE_CHAR_OPERATORS: OperatorTable = {
  '+': TOKEN_KINDS.ARITHMETIC_OP,
  '-': TOKEN_KINDS.ARITHMETIC_OP,
  '*': TOKEN_KINDS.ARITHMETIC_OP,
  '/': TOKEN_KINDS.ARITHMETIC_OP,
  '%': TOKEN_KINDS.ARITHMETIC_OP,
  '^': TOKEN_KINDS.ARITHMETIC_OP,
  '=': TOKEN_KINDS.ASSIGN_OP,
  '<': TOKEN_KINDS.REL_OP,
  '>': TOKEN_KINDS.REL_OP,
  '!': TOKEN_KINDS.LOG_OP,
  '&': TOKEN_KINDS.BIT_OP,
  '|': TOKEN_KINDS.BIT_OP,
  '~': TOKEN_KINDS.BIT_OP,
  '.': TOKEN_KINDS.METHOD_OP,
};

/** Brackets; openers map to their closers */
export const DELIMITER_PAIRS: Readonly<Partial<Record<string, string>>> = {
  '(': ')',
  '[': ']',
  '{': '}',
};

export const CLOSING_DELIMITERS: ReadonlySet<string> = new Set([
  ')',
  ']',
  '}',
]);

export const PUNCTUATION: ReadonlySet<string> = new Set([
  ',',
  ';',
  ':',
  '?',
  '@',
]);

/** Escape letters accepted after a backslash inside quotes */
export const ESCAPE_CHARACTERS: ReadonlySet<string> = new Set([
  'n',
  't',
  'r',
  '"',
  '\\',
]);

/**
 * Token kind of a fixed symbol as the lexer classifies it outside any
 * context rule, or undefined for text that is not a symbol.
 */
export function classifySymbol(text: string): TokenKind | undefined {
  const op =
    THREE_CHAR_OPERATORS[text] ??
    TWO_CHAR_OPERATORS[text] ??
    SINGLE_CHAR_OPERATORS[text];
  if (op !== undefined) return op;
  if (DELIMITER_PAIRS[text] !== undefined || CLOSING_DELIMITERS.has(text)) {
    return TOKEN_KINDS.DELIM;
  }
  if (PUNCTUATION.has(text)) return TOKEN_KINDS.PUNC_DELIM;
  return undefined;
}
