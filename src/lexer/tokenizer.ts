/**
 * Tokenizer
 * Dispatch on the first character of each scan, plus the pull interface
 * and whole-source helpers built on it.
 */

import type { Diagnostic } from '../diagnostics.js';
import type { Token } from '../types.js';
import { isTrivia, TOKEN_KINDS } from '../types.js';
import {
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { CLOSING_DELIMITERS, DELIMITER_PAIRS } from './operators.js';
import {
  readComment,
  readComplex,
  readDelimiter,
  readInvalidCharacter,
  readNumber,
  readOperator,
  readPeriods,
  readQuoted,
  readWhitespace,
  readWord,
  tryReadBracketLiteral,
  tryReadObjectType,
} from './readers.js';
import {
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerOptions,
  type LexerState,
  peek,
} from './state.js';

export interface LexResult {
  readonly tokens: Token[];
  readonly diagnostics: readonly Diagnostic[];
}

/** Consume the next construct, queueing one or more tokens */
function scan(state: LexerState): void {
  const ch = peek(state);

  if (isWhitespace(ch)) return readWhitespace(state);
  if (ch === '$') return readComplex(state);
  if (isIdentifierStart(ch)) return readWord(state);
  if (isDigit(ch)) return readNumber(state);
  if (ch === '"' || ch === "'") return readQuoted(state);
  if (ch === '/' && (peek(state, 1) === '/' || peek(state, 1) === '*')) {
    return readComment(state);
  }
  if (ch === '.') return readPeriods(state);

  if (ch === '[' && tryReadBracketLiteral(state)) return;
  if (ch === '<' && tryReadObjectType(state)) return;

  if (DELIMITER_PAIRS[ch] !== undefined || CLOSING_DELIMITERS.has(ch)) {
    return readDelimiter(state);
  }
  if (readOperator(state)) return;

  readInvalidCharacter(state);
}

/** Pull-based lexer over one source text */
export function createLexer(
  source: string,
  options: LexerOptions = {}
): LexerState {
  return createLexerState(source, options);
}

/**
 * Next token from the stream. After the input is exhausted every call
 * returns an EOF token with an empty lexeme.
 */
export function nextToken(state: LexerState): Token {
  for (;;) {
    const token = state.pending.shift();
    if (token !== undefined) return token;
    if (isAtEnd(state)) {
      return makeToken(TOKEN_KINDS.EOF, '', currentLocation(state));
    }
    scan(state);
  }
}

/** Lazily yields tokens up to and including EOF */
export function* tokenStream(
  source: string,
  options: LexerOptions = {}
): Generator<Token, void, undefined> {
  const state = createLexer(source, options);
  for (;;) {
    const token = nextToken(state);
    yield token;
    if (token.kind === TOKEN_KINDS.EOF) return;
  }
}

/**
 * Tokenize a whole source text. Never throws for malformed input: every
 * problem becomes a diagnostic and the scan continues.
 */
export function tokenize(
  source: string,
  options: LexerOptions = {}
): LexResult {
  const state = createLexer(source, options);
  const tokens: Token[] = [];
  for (;;) {
    const token = nextToken(state);
    tokens.push(token);
    if (token.kind === TOKEN_KINDS.EOF) break;
  }
  return { tokens, diagnostics: [...state.sink.all()] };
}

/** Drop whitespace and comments */
export function significantTokens(tokens: readonly Token[]): Token[] {
  return tokens.filter((token) => !isTrivia(token));
}
