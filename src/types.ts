/**
 * X-presso Types
 * Token model, source positions and the error classes thrown outside the
 * diagnostic flow.
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number; // 1-based
  readonly column: number; // 1-based
  readonly offset: number; // 0-based character offset
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_KINDS = {
  // Names
  IDENTIFIER: 'IDENTIFIER',
  KEYWORD: 'KEYWORD',
  RESERVED: 'RESERVED',

  // Literals
  BOOL_LIT: 'BOOL_LIT',
  INT_LIT: 'INT_LIT',
  FLOAT_LIT: 'FLOAT_LIT',
  STR_LIT: 'STR_LIT',
  CHAR_LIT: 'CHAR_LIT',
  DATE_LIT: 'DATE_LIT',
  FRAC_LIT: 'FRAC_LIT',
  COMP_LIT: 'COMP_LIT',

  // Operators
  ARITHMETIC_OP: 'ARITHMETIC_OP',
  ASSIGN_OP: 'ASSIGN_OP',
  REL_OP: 'REL_OP',
  LOG_OP: 'LOG_OP',
  BIT_OP: 'BIT_OP',
  UNARY_OP: 'UNARY_OP',
  METHOD_OP: 'METHOD_OP',
  LOOP_OP: 'LOOP_OP',
  INHERIT_OP: 'INHERIT_OP',

  // Delimiters
  DELIM: 'DELIM',
  PUNC_DELIM: 'PUNC_DELIM',
  STR_DELIM: 'STR_DELIM',
  OBJ_DELIM: 'OBJ_DELIM',

  // Trivia
  COMMENT: 'COMMENT',
  WHITESPACE: 'WHITESPACE',

  ESCAPE_CHAR: 'ESCAPE_CHAR',
  EOF: 'EOF',
  UNKNOWN: 'UNKNOWN',
} as const;

export type TokenKind = (typeof TOKEN_KINDS)[keyof typeof TOKEN_KINDS];

export interface Token {
  readonly kind: TokenKind;
  readonly lexeme: string;
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

const OPERATOR_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  TOKEN_KINDS.ARITHMETIC_OP,
  TOKEN_KINDS.ASSIGN_OP,
  TOKEN_KINDS.REL_OP,
  TOKEN_KINDS.LOG_OP,
  TOKEN_KINDS.BIT_OP,
  TOKEN_KINDS.UNARY_OP,
  TOKEN_KINDS.METHOD_OP,
  TOKEN_KINDS.LOOP_OP,
  TOKEN_KINDS.INHERIT_OP,
]);

/** Whitespace and comments: kept for round-trip, dropped before parsing */
export function isTrivia(token: Token): boolean {
  return (
    token.kind === TOKEN_KINDS.WHITESPACE || token.kind === TOKEN_KINDS.COMMENT
  );
}

export function isOperatorKind(kind: TokenKind): boolean {
  return OPERATOR_KINDS.has(kind);
}

// ============================================================
// ERROR TYPES
// ============================================================

export const XPRESSO_ERROR_CODES = {
  SOURCE_READ: 'SOURCE_READ',
  CONFIG_INVALID: 'CONFIG_INVALID',
  USAGE: 'USAGE',
} as const;

export type XpressoErrorCode =
  (typeof XPRESSO_ERROR_CODES)[keyof typeof XPRESSO_ERROR_CODES];

export interface XpressoErrorData {
  readonly code: XpressoErrorCode;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error for conditions the diagnostic sink cannot absorb.
 * Malformed source never raises one of these.
 */
export class XpressoError extends Error {
  readonly code: XpressoErrorCode;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: XpressoErrorData) {
    super(data.message);
    this.name = 'XpressoError';
    this.code = data.code;
    this.context = data.context;
  }

  toData(): XpressoErrorData {
    return { code: this.code, message: this.message, context: this.context };
  }

  format(formatter?: (data: XpressoErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `${this.code}: ${this.message}`;
  }
}

/** Unrecoverable failure reading a source file */
export class SourceReadError extends XpressoError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super({
      code: XPRESSO_ERROR_CODES.SOURCE_READ,
      message: `Cannot read source file ${path}: ${reason}`,
      context: { path, reason },
    });
    this.name = 'SourceReadError';
    this.path = path;
  }
}

export class ConfigError extends XpressoError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      code: XPRESSO_ERROR_CODES.CONFIG_INVALID,
      message: `Invalid configuration: ${message}`,
      context,
    });
    this.name = 'ConfigError';
  }
}

export class UsageError extends XpressoError {
  constructor(message: string) {
    super({ code: XPRESSO_ERROR_CODES.USAGE, message });
    this.name = 'UsageError';
  }
}
