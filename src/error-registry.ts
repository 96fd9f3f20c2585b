/**
 * Error Registry
 * Catalog of every diagnostic kind the front end can report.
 */

// ============================================================
// ERROR KINDS
// ============================================================

export const LEXICAL_ERROR_KINDS = [
  'INVALID_CHARACTER',
  'UNTERMINATED_STRING',
  'UNTERMINATED_COMMENT',
  'INVALID_ESCAPE_SEQUENCE',
  'INVALID_IDENTIFIER',
  'INVALID_NUMBER_FORMAT',
  'INVALID_DATE_FORMAT',
  'INVALID_FRACTION_FORMAT',
  'INVALID_COMPLEX_LITERAL',
  'MISMATCHED_DELIMITERS',
  'INVALID_OPERATOR',
] as const;

export const SYNTAX_ERROR_KINDS = [
  'UNEXPECTED_TOKEN',
  'MISSING_TOKEN',
  'UNEXPECTED_EOF',
  'INVALID_SYNTAX',
  'DUPLICATE_DECLARATION',
] as const;

export const FATAL_ERROR_KINDS = ['SOURCE_READ_ERROR'] as const;

export type LexicalErrorKind = (typeof LEXICAL_ERROR_KINDS)[number];
export type SyntaxErrorKind = (typeof SYNTAX_ERROR_KINDS)[number];
export type FatalErrorKind = (typeof FATAL_ERROR_KINDS)[number];
export type ErrorKind = LexicalErrorKind | SyntaxErrorKind | FatalErrorKind;

export type DiagnosticPhase = 'lexical' | 'syntax' | 'fatal';

/** Registry entry for a single diagnostic kind */
export interface ErrorDefinition {
  /** Format: XP-{L|S|F}{3-digit} (e.g., XP-L004) */
  readonly code: string;
  readonly kind: ErrorKind;
  readonly phase: DiagnosticPhase;
  /** Human-readable description */
  readonly description: string;
  /** Default suggestion attached when the reporter has no better one */
  readonly resolution: string;
}

// ============================================================
// DEFINITIONS
// ============================================================

const DEFINITIONS: readonly ErrorDefinition[] = [
  {
    code: 'XP-L001',
    kind: 'INVALID_CHARACTER',
    phase: 'lexical',
    description: 'Character not allowed in source',
    resolution: 'Remove the character or place it inside a string literal',
  },
  {
    code: 'XP-L002',
    kind: 'UNTERMINATED_STRING',
    phase: 'lexical',
    description: 'String literal not closed',
    resolution: 'Add the closing quote before the end of the line',
  },
  {
    code: 'XP-L003',
    kind: 'UNTERMINATED_COMMENT',
    phase: 'lexical',
    description: 'Block comment not closed',
    resolution: "Close the comment with '*/'",
  },
  {
    code: 'XP-L004',
    kind: 'INVALID_ESCAPE_SEQUENCE',
    phase: 'lexical',
    description: 'Unknown escape sequence',
    resolution: 'Use one of \\n, \\t, \\r, \\" or \\\\',
  },
  {
    code: 'XP-L005',
    kind: 'INVALID_IDENTIFIER',
    phase: 'lexical',
    description: 'Malformed identifier',
    resolution:
      'Identifiers start with a letter or underscore and contain only letters, digits and underscores',
  },
  {
    code: 'XP-L006',
    kind: 'INVALID_NUMBER_FORMAT',
    phase: 'lexical',
    description: 'Malformed number',
    resolution: "Add digits after the decimal point or remove the '.'",
  },
  {
    code: 'XP-L007',
    kind: 'INVALID_DATE_FORMAT',
    phase: 'lexical',
    description: 'Malformed date literal',
    resolution: 'Write dates as [YYYY|MM|DD] with month 01-12 and day 01-31',
  },
  {
    code: 'XP-L008',
    kind: 'INVALID_FRACTION_FORMAT',
    phase: 'lexical',
    description: 'Malformed fraction literal',
    resolution:
      'Fractions should be in the format [numerator|denominator] with a non-zero denominator',
  },
  {
    code: 'XP-L009',
    kind: 'INVALID_COMPLEX_LITERAL',
    phase: 'lexical',
    description: 'Malformed complex literal',
    resolution: 'Write complex numbers as $(real,imaginary)',
  },
  {
    code: 'XP-L010',
    kind: 'MISMATCHED_DELIMITERS',
    phase: 'lexical',
    description: 'Closing delimiter does not match the open one',
    resolution: 'Check that every bracket is closed by its own kind',
  },
  {
    code: 'XP-L011',
    kind: 'INVALID_OPERATOR',
    phase: 'lexical',
    description: 'Unknown operator',
    resolution: "Use '.', '..' or '...'",
  },
  {
    code: 'XP-S001',
    kind: 'UNEXPECTED_TOKEN',
    phase: 'syntax',
    description: 'Token not allowed here',
    resolution: 'Remove or replace the token',
  },
  {
    code: 'XP-S002',
    kind: 'MISSING_TOKEN',
    phase: 'syntax',
    description: 'Expected token is missing',
    resolution: 'Insert the missing token',
  },
  {
    code: 'XP-S003',
    kind: 'UNEXPECTED_EOF',
    phase: 'syntax',
    description: 'Input ended early',
    resolution: 'Check for an unclosed brace or parenthesis',
  },
  {
    code: 'XP-S004',
    kind: 'INVALID_SYNTAX',
    phase: 'syntax',
    description: 'Construct is not valid here',
    resolution: 'Rewrite the construct',
  },
  {
    code: 'XP-S005',
    kind: 'DUPLICATE_DECLARATION',
    phase: 'syntax',
    description: 'Name already declared in this scope',
    resolution: 'Rename one of the declarations',
  },
  {
    code: 'XP-F001',
    kind: 'SOURCE_READ_ERROR',
    phase: 'fatal',
    description: 'Source file could not be read',
    resolution: 'Check the path and file permissions',
  },
];

// ============================================================
// REGISTRY
// ============================================================

/**
 * Read-only lookup over the definitions, keyed by kind and by code.
 */
export interface ErrorRegistry {
  get(kind: ErrorKind): ErrorDefinition;
  byCode(code: string): ErrorDefinition | undefined;
  readonly size: number;
  entries(): IterableIterator<[ErrorKind, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byKind: ReadonlyMap<ErrorKind, ErrorDefinition>;
  private readonly codes: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const kindMap = new Map<ErrorKind, ErrorDefinition>();
    const codeMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (kindMap.has(def.kind)) {
        throw new Error(`Duplicate error kind: ${def.kind}`);
      }
      kindMap.set(def.kind, def);
      codeMap.set(def.code, def);
    }

    this.byKind = kindMap;
    this.codes = codeMap;
  }

  get(kind: ErrorKind): ErrorDefinition {
    const def = this.byKind.get(kind);
    if (def === undefined) {
      throw new Error(`Unregistered error kind: ${kind}`);
    }
    return def;
  }

  byCode(code: string): ErrorDefinition | undefined {
    return this.codes.get(code);
  }

  get size(): number {
    return this.byKind.size;
  }

  entries(): IterableIterator<[ErrorKind, ErrorDefinition]> {
    return this.byKind.entries();
  }
}

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  DEFINITIONS
);
