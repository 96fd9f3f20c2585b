/**
 * Token Readers
 * One reader per first-character class. Each reader consumes at least one
 * character and emits the tokens (and at most one diagnostic per failure)
 * for what it consumed.
 */

import type { SourceLocation, Token } from '../types.js';
import { isOperatorKind, TOKEN_KINDS } from '../types.js';
import {
  emit,
  emitError,
  emitFrom,
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  isWhitespace,
  makeToken,
  readWhile,
  scanAhead,
} from './helpers.js';
import {
  CLOSING_DELIMITERS,
  DELIMITER_PAIRS,
  ESCAPE_CHARACTERS,
  type OperatorTable,
  PUNCTUATION,
  SINGLE_CHAR_OPERATORS,
  THREE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import {
  advance,
  advanceBy,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  textFrom,
} from './state.js';
import { classifyWord, KEYWORDS, MULTI_WORD_KEYWORDS } from './vocabulary.js';

// ============================================================
// WHITESPACE AND COMMENTS
// ============================================================

export function readWhitespace(state: LexerState): void {
  const start = currentLocation(state);
  readWhile(state, isWhitespace);
  emitFrom(state, TOKEN_KINDS.WHITESPACE, start);
}

/** Called on '//' or '/*' */
export function readComment(state: LexerState): void {
  const start = currentLocation(state);

  if (peek(state, 1) === '/') {
    readWhile(state, (ch) => ch !== '\n');
    emitFrom(state, TOKEN_KINDS.COMMENT, start);
    return;
  }

  advanceBy(state, 2);
  while (!isAtEnd(state)) {
    if (peek(state) === '*' && peek(state, 1) === '/') {
      advanceBy(state, 2);
      emitFrom(state, TOKEN_KINDS.COMMENT, start);
      return;
    }
    advance(state);
  }

  state.sink.report(
    'UNTERMINATED_COMMENT',
    'Unterminated block comment',
    start.line,
    start.column
  );
  emitFrom(state, TOKEN_KINDS.COMMENT, start);
}

// ============================================================
// WORDS
// ============================================================

/**
 * Identifier, keyword, reserved word or boolean literal.
 * Handles the two-word keywords and hyphen-joined words.
 */
export function readWord(state: LexerState): void {
  const start = currentLocation(state);
  const word = readWhile(state, isIdentifierChar);

  const second = MULTI_WORD_KEYWORDS[word];
  if (second !== undefined && matchesSecondWord(state, second)) {
    advanceBy(state, second.length + 1);
    emitFrom(state, TOKEN_KINDS.KEYWORD, start);
    return;
  }

  if (peek(state) === '-' && isIdentifierStart(peek(state, 1))) {
    readHyphenatedWord(state, start);
    return;
  }

  emitFrom(state, classifyWord(word), start);
}

function matchesSecondWord(state: LexerState, second: string): boolean {
  if (peekString(state, second.length + 1) !== ` ${second}`) return false;
  const after = peek(state, second.length + 1);
  return !isIdentifierChar(after) && after !== '-';
}

function readHyphenatedWord(state: LexerState, start: SourceLocation): void {
  let consumed = 0;
  while (peek(state) === '-' && isIdentifierStart(peek(state, 1))) {
    if (consumed >= state.maxLookahead) break;
    advance(state);
    consumed += 1 + readWhile(state, isIdentifierChar).length;
  }

  const text = textFrom(state, start);
  if (KEYWORDS.has(text)) {
    emitFrom(state, TOKEN_KINDS.KEYWORD, start);
    return;
  }

  emitError(
    state,
    'INVALID_IDENTIFIER',
    `Invalid identifier '${text}': identifiers cannot contain '-'`,
    start,
    "Use '_' instead of '-', or put spaces around '-' for subtraction"
  );
}

// ============================================================
// NUMBERS, DATES AND FRACTIONS
// ============================================================

/**
 * Integer or float. A second '.' is left unread for the period reader,
 * so `1..5` scans as `1`, `..`, `5`.
 */
export function readNumber(state: LexerState): void {
  const start = currentLocation(state);
  readWhile(state, isDigit);

  let kind: Token['kind'] = TOKEN_KINDS.INT_LIT;
  if (peek(state) === '.') {
    if (isDigit(peek(state, 1))) {
      advance(state);
      readWhile(state, isDigit);
      kind = TOKEN_KINDS.FLOAT_LIT;
    } else if (peek(state, 1) !== '.') {
      advance(state);
      emitError(
        state,
        'INVALID_NUMBER_FORMAT',
        `Invalid number '${textFrom(state, start)}': expected digits after '.'`,
        start
      );
      return;
    }
  }

  if (isIdentifierStart(peek(state))) {
    readWhile(state, isIdentifierChar);
    emitError(
      state,
      'INVALID_IDENTIFIER',
      `Invalid identifier '${textFrom(state, start)}': identifiers cannot start with a digit`,
      start
    );
    return;
  }

  emitFrom(state, kind, start);
}

/**
 * Called on '['. Succeeds when the bracket holds only digits and '|'
 * (at least one) before ']' within the lookahead bound; the number inside
 * is then redirected into date or fraction validation. Returns false to let
 * '[' scan as a delimiter.
 */
export function tryReadBracketLiteral(state: LexerState): boolean {
  const length = scanAhead(
    state,
    1,
    (ch) => isDigit(ch) || ch === '|',
    state.maxLookahead
  );
  if (peek(state, 1 + length) !== ']') return false;

  const inner = state.source.slice(state.pos + 1, state.pos + 1 + length);
  if (!inner.includes('|')) return false;

  const start = currentLocation(state);
  advanceBy(state, length + 2);

  const parts = inner.split('|');
  if (parts.length === 2) {
    const [numerator = '', denominator = ''] = parts;
    const problem = fractionProblem(numerator, denominator);
    if (problem !== undefined) {
      emitError(
        state,
        'INVALID_FRACTION_FORMAT',
        `Invalid fraction literal [${inner}]: ${problem}`,
        start
      );
      return true;
    }
    emitFrom(state, TOKEN_KINDS.FRAC_LIT, start);
    return true;
  }

  const [year = '', month = '', day = ''] = parts;
  const problem =
    parts.length === 3
      ? dateProblem(year, month, day)
      : `expected 3 parts, found ${parts.length}`;
  if (problem !== undefined) {
    emitError(
      state,
      'INVALID_DATE_FORMAT',
      `Invalid date literal [${inner}]: ${problem}`,
      start
    );
    return true;
  }
  emitFrom(state, TOKEN_KINDS.DATE_LIT, start);
  return true;
}

function fractionProblem(
  numerator: string,
  denominator: string
): string | undefined {
  if (numerator === '') return 'missing numerator';
  if (denominator === '') return 'missing denominator';
  if (/^0+$/.test(denominator)) return 'denominator cannot be zero';
  return undefined;
}

function dateProblem(
  year: string,
  month: string,
  day: string
): string | undefined {
  if (!/^\d{4}$/.test(year)) return 'year must have 4 digits';
  if (!/^\d{2}$/.test(month)) return 'month must have 2 digits';
  const m = Number(month);
  if (m < 1 || m > 12) return 'month must be between 01 and 12';
  if (!/^\d{2}$/.test(day)) return 'day must have 2 digits';
  const d = Number(day);
  if (d < 1 || d > 31) return 'day must be between 01 and 31';
  return undefined;
}

// ============================================================
// STRINGS AND CHARACTERS
// ============================================================

/**
 * Quoted literal: STR_DELIM, content pieces, STR_DELIM.
 * An unterminated literal collapses into a single UNKNOWN token.
 */
export function readQuoted(state: LexerState): void {
  const start = currentLocation(state);
  const quote = advance(state);
  const pieces: Token[] = [];
  let runStart: SourceLocation | null = null;

  const flush = (): void => {
    if (runStart !== null) {
      pieces.push(
        makeToken(TOKEN_KINDS.STR_LIT, textFrom(state, runStart), runStart)
      );
      runStart = null;
    }
  };

  for (;;) {
    const ch = peek(state);

    if (ch === '' || ch === '\n') {
      const what = quote === '"' ? 'string' : 'character';
      state.sink.report(
        'UNTERMINATED_STRING',
        `Unterminated ${what} literal`,
        start.line,
        start.column,
        `Add the closing ${quote} before the end of the line`
      );
      emitFrom(state, TOKEN_KINDS.UNKNOWN, start);
      return;
    }

    if (ch === quote) {
      flush();
      const closeStart = currentLocation(state);
      advance(state);
      emit(state, makeToken(TOKEN_KINDS.STR_DELIM, quote, start));
      for (const piece of quote === "'" ? asCharacter(pieces) : pieces) {
        emit(state, piece);
      }
      emit(state, makeToken(TOKEN_KINDS.STR_DELIM, quote, closeStart));
      return;
    }

    if (ch === '\\') {
      flush();
      const escStart = currentLocation(state);
      const next = peek(state, 1);
      if (next === '' || next === '\n') {
        // Lone backslash at end of line: the terminator check reports it
        advance(state);
        continue;
      }
      advanceBy(state, 2);
      const text = textFrom(state, escStart);
      if (ESCAPE_CHARACTERS.has(next)) {
        pieces.push(makeToken(TOKEN_KINDS.ESCAPE_CHAR, text, escStart));
      } else {
        state.sink.report(
          'INVALID_ESCAPE_SEQUENCE',
          `Invalid escape sequence '${text}'`,
          escStart.line,
          escStart.column
        );
        pieces.push(makeToken(TOKEN_KINDS.UNKNOWN, text, escStart));
      }
      continue;
    }

    if (runStart === null) runStart = currentLocation(state);
    advance(state);
  }
}

/** Single-quoted content of exactly one character becomes CHAR_LIT */
function asCharacter(pieces: Token[]): Token[] {
  const [only] = pieces;
  if (
    pieces.length === 1 &&
    only !== undefined &&
    only.kind === TOKEN_KINDS.STR_LIT &&
    [...only.lexeme].length === 1
  ) {
    return [{ ...only, kind: TOKEN_KINDS.CHAR_LIT }];
  }
  return pieces;
}

// ============================================================
// COMPLEX LITERALS
// ============================================================

const COMPLEX_PART = /^-?\d+(\.\d+)?$/;

/** Called on '$': `$(real,imag)` */
export function readComplex(state: LexerState): void {
  const start = currentLocation(state);

  if (peek(state, 1) !== '(') {
    advance(state);
    emitError(
      state,
      'INVALID_COMPLEX_LITERAL',
      "Expected '(' after '$' to start a complex literal",
      start
    );
    return;
  }

  const length = scanAhead(
    state,
    2,
    (ch) => ch !== ')' && ch !== '\n',
    state.maxLookahead
  );
  if (peek(state, 2 + length) !== ')') {
    advanceBy(state, 2);
    emitError(
      state,
      'INVALID_COMPLEX_LITERAL',
      'Unterminated complex literal',
      start,
      'Add closing parenthesis'
    );
    return;
  }

  const body = state.source.slice(state.pos + 2, state.pos + 2 + length);
  advanceBy(state, length + 3);

  const problem = complexProblem(body);
  if (problem !== undefined) {
    emitError(
      state,
      'INVALID_COMPLEX_LITERAL',
      `Invalid complex literal ${textFrom(state, start)}: ${problem}`,
      start
    );
    return;
  }
  emitFrom(state, TOKEN_KINDS.COMP_LIT, start);
}

function complexProblem(body: string): string | undefined {
  const parts = body.split(',');
  if (parts.length !== 2) return 'expected exactly one comma';
  const [real = '', imaginary = ''] = parts;
  if (!COMPLEX_PART.test(real)) return `real part '${real}' is not a number`;
  if (!COMPLEX_PART.test(imaginary)) {
    return `imaginary part '${imaginary}' is not a number`;
  }
  return undefined;
}

// ============================================================
// PERIODS
// ============================================================

/** '.', '..' or '...'; anything longer is diagnosed from the fourth period */
export function readPeriods(state: LexerState): void {
  const start = currentLocation(state);
  const run = scanAhead(state, 0, (ch) => ch === '.', state.maxLookahead + 3);

  if (run <= 3) {
    advanceBy(state, run);
    emitFrom(
      state,
      run === 1 ? TOKEN_KINDS.METHOD_OP : TOKEN_KINDS.LOOP_OP,
      start
    );
    return;
  }

  advanceBy(state, 3);
  emitFrom(state, TOKEN_KINDS.LOOP_OP, start);
  const excessStart = currentLocation(state);
  advanceBy(state, run - 3);
  emitError(
    state,
    'INVALID_OPERATOR',
    `Invalid operator '${'.'.repeat(run)}': at most three consecutive periods are allowed`,
    excessStart
  );
}

// ============================================================
// OBJECT TYPES
// ============================================================

/**
 * Called on '<'. Emits `<`, type name, `>` when a letter or quote follows
 * and a closing '>' is found in bounds; otherwise returns false so '<'
 * scans as an operator.
 */
export function tryReadObjectType(state: LexerState): boolean {
  const next = peek(state, 1);

  if (isIdentifierStart(next)) {
    const length = scanAhead(state, 1, isIdentifierChar, state.maxLookahead);
    if (peek(state, 1 + length) !== '>') return false;

    emitObjectDelimiter(state);
    const nameStart = currentLocation(state);
    advanceBy(state, length);
    emitFrom(state, TOKEN_KINDS.STR_LIT, nameStart);
    emitObjectDelimiter(state);
    return true;
  }

  if (next === '"' || next === "'") {
    const length = scanAhead(
      state,
      2,
      (ch) => ch !== next && ch !== '\n' && ch !== '\\',
      state.maxLookahead
    );
    if (peek(state, 2 + length) !== next || peek(state, 3 + length) !== '>') {
      return false;
    }

    emitObjectDelimiter(state);
    const openQuote = currentLocation(state);
    advance(state);
    emitFrom(state, TOKEN_KINDS.STR_DELIM, openQuote);
    if (length > 0) {
      const nameStart = currentLocation(state);
      advanceBy(state, length);
      emitFrom(state, TOKEN_KINDS.STR_LIT, nameStart);
    }
    const closeQuote = currentLocation(state);
    advance(state);
    emitFrom(state, TOKEN_KINDS.STR_DELIM, closeQuote);
    emitObjectDelimiter(state);
    return true;
  }

  return false;
}

function emitObjectDelimiter(state: LexerState): void {
  const start = currentLocation(state);
  advance(state);
  emitFrom(state, TOKEN_KINDS.OBJ_DELIM, start);
}

// ============================================================
// DELIMITERS
// ============================================================

export function readDelimiter(state: LexerState): void {
  const start = currentLocation(state);
  const ch = advance(state);
  const token = makeToken(TOKEN_KINDS.DELIM, ch, start);

  if (DELIMITER_PAIRS[ch] !== undefined) {
    state.openDelimiters.push(token);
  } else {
    closeDelimiter(state, token);
  }
  emit(state, token);
}

/**
 * Pop the matching opener. A closer with no opener at all is left for the
 * parser to report.
 */
function closeDelimiter(state: LexerState, closer: Token): void {
  const open = state.openDelimiters;
  const top = open[open.length - 1];
  if (top === undefined) return;

  const expected = DELIMITER_PAIRS[top.lexeme];
  if (expected === closer.lexeme) {
    open.pop();
    return;
  }

  state.sink.report(
    'MISMATCHED_DELIMITERS',
    `Mismatched delimiter '${closer.lexeme}': '${top.lexeme}' opened at line ${top.line}, column ${top.column} is still open`,
    closer.line,
    closer.column,
    `Close '${top.lexeme}' with '${expected ?? ''}' first`
  );

  for (let i = open.length - 1; i >= 0; i--) {
    const opener = open[i];
    if (
      opener !== undefined &&
      DELIMITER_PAIRS[opener.lexeme] === closer.lexeme
    ) {
      open.length = i;
      return;
    }
  }
}

// ============================================================
// OPERATORS AND PUNCTUATION
// ============================================================

const OPERATOR_TABLES: ReadonlyArray<readonly [number, OperatorTable]> = [
  [3, THREE_CHAR_OPERATORS],
  [2, TWO_CHAR_OPERATORS],
  [1, SINGLE_CHAR_OPERATORS],
];

/** Longest-match operator or punctuation; false when neither matches */
export function readOperator(state: LexerState): boolean {
  const start = currentLocation(state);

  for (const [length, table] of OPERATOR_TABLES) {
    const text = peekString(state, length);
    const kind = table[text];
    if (kind === undefined) continue;

    advanceBy(state, length);
    const unary = (text === '+' || text === '-') && isUnaryContext(state);
    emitFrom(state, unary ? TOKEN_KINDS.UNARY_OP : kind, start);
    return true;
  }

  if (PUNCTUATION.has(peek(state))) {
    advance(state);
    emitFrom(state, TOKEN_KINDS.PUNC_DELIM, start);
    return true;
  }

  return false;
}

/**
 * '+' and '-' are unary at stream start and after an opening delimiter,
 * punctuation, an object delimiter or any operator.
 */
export function isUnaryContext(state: LexerState): boolean {
  const prev = state.lastSignificant;
  if (prev === null) return true;

  switch (prev.kind) {
    case TOKEN_KINDS.DELIM:
      return !CLOSING_DELIMITERS.has(prev.lexeme);
    case TOKEN_KINDS.PUNC_DELIM:
    case TOKEN_KINDS.OBJ_DELIM:
      return true;
    default:
      return isOperatorKind(prev.kind);
  }
}

export function readInvalidCharacter(state: LexerState): void {
  const start = currentLocation(state);
  const ch = String.fromCodePoint(state.source.codePointAt(state.pos) ?? 0);
  advanceBy(state, ch.length);
  emitError(
    state,
    'INVALID_CHARACTER',
    `Unexpected character '${ch}'`,
    start
  );
}
