/**
 * Parser State
 * Token navigation, result types and the shared services productions use
 */

import type { Diagnostic, DiagnosticSink } from '../diagnostics.js';
import type { Grammar, NonTerminal, TerminalSymbol } from '../grammar/index.js';
import type { SymbolEntry, SymbolTable } from '../symbols.js';
import type { Token } from '../types.js';
import { isTrivia, TOKEN_KINDS } from '../types.js';

// ============================================================
// RESULTS
// ============================================================

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure {
  readonly ok: false;
  /** The one diagnostic reported for this failure */
  readonly error: Diagnostic;
}

export type Parsed<T> = Success<T> | Failure;

export function succeed<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(error: Diagnostic): Failure {
  return { ok: false, error };
}

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  /** Significant tokens only, always ending in EOF */
  readonly tokens: readonly Token[];
  pos: number;
  readonly grammar: Grammar;
  readonly sink: DiagnosticSink;
  readonly symbols: SymbolTable;
  /** Every successful symbol insertion, in order */
  readonly declarations: SymbolEntry[];
  /** Enclosing non-terminals, innermost last */
  readonly contexts: NonTerminal[];
  /** Suggestion that replaces the hint table for the current statement */
  typoHint: string | undefined;
}

export interface ParserServices {
  readonly grammar: Grammar;
  readonly sink: DiagnosticSink;
  readonly symbols: SymbolTable;
}

export function createParserState(
  tokens: readonly Token[],
  services: ParserServices
): ParserState {
  const significant = tokens.filter((token) => !isTrivia(token));
  const last = significant[significant.length - 1];
  if (last === undefined || last.kind !== TOKEN_KINDS.EOF) {
    significant.push({
      kind: TOKEN_KINDS.EOF,
      lexeme: '',
      line: last?.line ?? 1,
      column: last === undefined ? 1 : last.column + last.lexeme.length,
      offset: last === undefined ? 0 : last.offset + last.lexeme.length,
    });
  }
  return {
    tokens: significant,
    pos: 0,
    grammar: services.grammar,
    sink: services.sink,
    symbols: services.symbols,
    declarations: [],
    contexts: [],
    typoHint: undefined,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token !== undefined) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last !== undefined) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).kind === TOKEN_KINDS.EOF;
}

/** @internal */
export function isLexeme(token: Token, lexeme: string): boolean {
  return token.lexeme === lexeme && token.kind !== TOKEN_KINDS.STR_LIT;
}

/** @internal */
export function check(state: ParserState, lexeme: string, offset = 0): boolean {
  return isLexeme(peek(state, offset), lexeme);
}

/** @internal */
export function matchesTerminal(token: Token, symbol: TerminalSymbol): boolean {
  return (
    token.kind === symbol.kind &&
    (symbol.lexeme === undefined || token.lexeme === symbol.lexeme)
  );
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (token.kind !== TOKEN_KINDS.EOF) state.pos++;
  return token;
}

/** Step back over the token just consumed */
export function pushback(state: ParserState): void {
  if (state.pos === 0) {
    throw new Error('Nothing to push back');
  }
  state.pos--;
}
