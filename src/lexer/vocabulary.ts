/**
 * Word Tables
 * Keywords, reserved words and the word classes the parser dispatches on.
 */

import type { TokenKind } from '../types.js';
import { TOKEN_KINDS } from '../types.js';

export const KEYWORDS: ReadonlySet<string> = new Set([
  'break',
  'case',
  'day',
  'default',
  'do',
  'else',
  'exit',
  'exit when',
  'for',
  'get',
  'if',
  'in',
  'Input',
  'month',
  'Output',
  'print',
  'switch',
  'switch-fall',
  'while',
  'where type',
  'year',
]);

export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'abstract',
  'after',
  'ALIAS',
  'before',
  'bool',
  'byte',
  'char',
  'class',
  'Complex',
  'Date',
  'double',
  'exclude',
  'export_as',
  'Frac',
  'filter_by',
  'final',
  'float',
  'inline_query',
  'inspect',
  'int',
  'long',
  'main',
  'modify',
  'native',
  'private',
  'protected',
  'public',
  'short',
  'static',
  'STRICT',
  'strictfp',
  'str',
  'today',
  'toMixed',
  'transient',
  'validate',
  'volatile',
]);

export const BOOLEAN_LITERALS: ReadonlySet<string> = new Set(['true', 'false']);

/** First word of a two-word keyword mapped to its second word */
export const MULTI_WORD_KEYWORDS: Readonly<Record<string, string>> = {
  exit: 'when',
  where: 'type',
};

export const DATA_TYPES: ReadonlySet<string> = new Set([
  'int',
  'char',
  'bool',
  'str',
  'float',
  'double',
  'long',
  'short',
  'byte',
  'Date',
  'Frac',
  'Complex',
]);

export const MODIFIERS: ReadonlySet<string> = new Set([
  'public',
  'private',
  'protected',
  'abstract',
  'final',
  'static',
  'native',
  'strictfp',
  'transient',
  'volatile',
  'STRICT',
]);

export const CLASS_MODIFIERS: ReadonlySet<string> = new Set([
  'public',
  'private',
  'protected',
  'abstract',
  'final',
  'static',
]);

export function classifyWord(word: string): TokenKind {
  if (KEYWORDS.has(word)) return TOKEN_KINDS.KEYWORD;
  if (RESERVED_WORDS.has(word)) return TOKEN_KINDS.RESERVED;
  if (BOOLEAN_LITERALS.has(word)) return TOKEN_KINDS.BOOL_LIT;
  return TOKEN_KINDS.IDENTIFIER;
}
