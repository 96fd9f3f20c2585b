/**
 * Lexer Helper Functions
 * Character classification, token construction and emission
 */

import type { ErrorKind } from '../error-registry.js';
import type { SourceLocation, Token, TokenKind } from '../types.js';
import { isTrivia, TOKEN_KINDS } from '../types.js';
import {
  advance,
  isAtEnd,
  peek,
  textFrom,
  type LexerState,
} from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

export function isWhitespace(ch: string): boolean {
  return (
    ch === ' ' ||
    ch === '\t' ||
    ch === '\r' ||
    ch === '\n' ||
    ch === '\f' ||
    ch === '\v'
  );
}

export function makeToken(
  kind: TokenKind,
  lexeme: string,
  start: SourceLocation
): Token {
  return {
    kind,
    lexeme,
    line: start.line,
    column: start.column,
    offset: start.offset,
  };
}

/** Queue a token for the consumer and track the last significant one */
export function emit(state: LexerState, token: Token): Token {
  state.pending.push(token);
  if (!isTrivia(token)) {
    state.lastSignificant = token;
  }
  return token;
}

/** Emit a token whose lexeme runs from start to the current position */
export function emitFrom(
  state: LexerState,
  kind: TokenKind,
  start: SourceLocation
): Token {
  return emit(state, makeToken(kind, textFrom(state, start), start));
}

/**
 * Report a lexical diagnostic and cover the consumed text with an
 * UNKNOWN token so the stream still reproduces the source.
 */
export function emitError(
  state: LexerState,
  kind: ErrorKind,
  message: string,
  start: SourceLocation,
  suggestion?: string
): Token {
  state.sink.report(kind, message, start.line, start.column, suggestion);
  return emitFrom(state, TOKEN_KINDS.UNKNOWN, start);
}

/** Consume while predicate holds; returns the consumed text */
export function readWhile(
  state: LexerState,
  predicate: (ch: string) => boolean
): string {
  let text = '';
  while (!isAtEnd(state) && predicate(peek(state))) {
    text += advance(state);
  }
  return text;
}

/**
 * Count how many characters from pos + from satisfy the predicate without
 * consuming, stopping at limit.
 */
export function scanAhead(
  state: LexerState,
  from: number,
  predicate: (ch: string) => boolean,
  limit: number
): number {
  let n = 0;
  while (n < limit) {
    const ch = peek(state, from + n);
    if (ch === '' || !predicate(ch)) break;
    n++;
  }
  return n;
}
