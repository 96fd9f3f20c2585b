/**
 * Lexer State
 * Source cursor plus the bookkeeping the scanners share: pending tokens,
 * the last significant token and the open-delimiter stack.
 */

import { DiagnosticSink } from '../diagnostics.js';
import type { SourceLocation, Token } from '../types.js';

/** Upper bound on characters examined by any speculative scan */
export const DEFAULT_MAX_LOOKAHEAD = 64;

export interface LexerOptions {
  /** Shared sink; a private one is created when omitted */
  readonly sink?: DiagnosticSink | undefined;
  readonly maxLookahead?: number | undefined;
}

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
  readonly maxLookahead: number;
  readonly sink: DiagnosticSink;
  /** Tokens scanned but not yet handed out */
  readonly pending: Token[];
  /** Most recent non-trivia token, for unary/binary decisions */
  lastSignificant: Token | null;
  readonly openDelimiters: Token[];
}

export function createLexerState(
  source: string,
  options: LexerOptions = {}
): LexerState {
  const maxLookahead = options.maxLookahead ?? DEFAULT_MAX_LOOKAHEAD;
  if (!Number.isInteger(maxLookahead) || maxLookahead < 1) {
    throw new RangeError(
      `maxLookahead must be a positive integer, got ${maxLookahead}`
    );
  }
  return {
    source,
    pos: 0,
    line: 1,
    column: 1,
    maxLookahead,
    sink: options.sink ?? new DiagnosticSink(),
    pending: [],
    lastSignificant: null,
    openDelimiters: [],
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

/** Character at pos + offset, or '' past the end */
export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

export function advance(state: LexerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Advance n characters and return the consumed text */
export function advanceBy(state: LexerState, n: number): string {
  const start = state.pos;
  for (let i = 0; i < n && !isAtEnd(state); i++) advance(state);
  return state.source.slice(start, state.pos);
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

export function textFrom(state: LexerState, start: SourceLocation): string {
  return state.source.slice(start.offset, state.pos);
}
