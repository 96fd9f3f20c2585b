/**
 * Operator Precedence
 * The seventeen expression levels, tightest first, and the binary levels
 * the precedence climber walks.
 */

import type { NonTerminal } from '../grammar/index.js';
import type { Token, TokenKind } from '../types.js';
import { TOKEN_KINDS } from '../types.js';

export type Associativity = 'left' | 'right' | 'none';

export interface PrecedenceLevel {
  readonly level: number;
  /** Node label for expressions built at this level */
  readonly name: string;
  readonly operators: readonly string[];
  readonly associativity: Associativity;
}

export const PRECEDENCE_LEVELS: readonly PrecedenceLevel[] = [
  { level: 1, name: 'Primary', operators: [], associativity: 'none' },
  {
    level: 2,
    name: 'Access',
    operators: ['.', '::', '()', '[]'],
    associativity: 'left',
  },
  { level: 3, name: 'Postfix', operators: ['++', '--'], associativity: 'left' },
  {
    level: 4,
    name: 'Unary',
    operators: ['+', '-', '++', '--', '!', '~', '<Type>'],
    associativity: 'right',
  },
  { level: 5, name: 'Exponent', operators: ['^'], associativity: 'right' },
  {
    level: 6,
    name: 'Multiplicative',
    operators: ['*', '/', '%'],
    associativity: 'left',
  },
  { level: 7, name: 'Additive', operators: ['+', '-'], associativity: 'left' },
  {
    level: 8,
    name: 'Shift',
    operators: ['<<', '>>', '>>>'],
    associativity: 'left',
  },
  { level: 9, name: 'Range', operators: ['..', '...'], associativity: 'left' },
  {
    level: 10,
    name: 'Relational',
    operators: ['<', '>', '<=', '>='],
    associativity: 'left',
  },
  {
    level: 11,
    name: 'Equality',
    operators: ['==', '!='],
    associativity: 'left',
  },
  { level: 12, name: 'BitwiseAnd', operators: ['&'], associativity: 'left' },
  { level: 13, name: 'BitwiseOr', operators: ['|'], associativity: 'left' },
  { level: 14, name: 'LogicalAnd', operators: ['&&'], associativity: 'left' },
  { level: 15, name: 'LogicalOr', operators: ['||'], associativity: 'left' },
  { level: 16, name: 'Ternary', operators: ['?', ':'], associativity: 'right' },
  {
    level: 17,
    name: 'Assignment',
    operators: ['=', '+=', '-=', '*=', '/=', '%=', '?='],
    associativity: 'right',
  },
];

// ============================================================
// BINARY LEVELS
// ============================================================

export interface BinaryLevel {
  readonly name: string;
  /** Token kinds the operator may arrive as */
  readonly kinds: ReadonlySet<TokenKind>;
  readonly operators: ReadonlySet<string>;
  readonly rightAssociative: boolean;
}

function binaryLevel(name: string, kinds: TokenKind[]): BinaryLevel {
  const level = PRECEDENCE_LEVELS.find((l) => l.name === name);
  if (level === undefined) throw new Error(`Unknown precedence level ${name}`);
  return {
    name,
    kinds: new Set(kinds),
    operators: new Set(level.operators),
    rightAssociative: level.associativity === 'right',
  };
}

/**
 * Levels 15 down to 5, loosest first. Additive also takes `+`/`-` lexed as
 * unary, which happens after a postfix `++`/`--`.
 */
export const BINARY_LEVELS: readonly BinaryLevel[] = [
  binaryLevel('LogicalOr', [TOKEN_KINDS.LOG_OP]),
  binaryLevel('LogicalAnd', [TOKEN_KINDS.LOG_OP]),
  binaryLevel('BitwiseOr', [TOKEN_KINDS.BIT_OP]),
  binaryLevel('BitwiseAnd', [TOKEN_KINDS.BIT_OP]),
  binaryLevel('Equality', [TOKEN_KINDS.REL_OP]),
  binaryLevel('Relational', [TOKEN_KINDS.REL_OP]),
  binaryLevel('Range', [TOKEN_KINDS.LOOP_OP]),
  binaryLevel('Shift', [TOKEN_KINDS.BIT_OP]),
  binaryLevel('Additive', [TOKEN_KINDS.ARITHMETIC_OP, TOKEN_KINDS.UNARY_OP]),
  binaryLevel('Multiplicative', [TOKEN_KINDS.ARITHMETIC_OP]),
  binaryLevel('Exponent', [TOKEN_KINDS.ARITHMETIC_OP]),
];

export function isLevelOperator(level: BinaryLevel, token: Token): boolean {
  return level.kinds.has(token.kind) && level.operators.has(token.lexeme);
}

// ============================================================
// ACCESS SUFFIXES
// ============================================================

/** Word after `.` that starts a data operation, and the rule it parses */
export const DATA_OPERATIONS: Readonly<Partial<Record<string, NonTerminal>>> =
  {
    filter_by: 'FilterExpr',
    validate: 'ValidateExpr',
    modify: 'ModifyExpr',
    export_as: 'ExportExpr',
    toMixed: 'ToMixedExpr',
    before: 'DateFunction',
    after: 'DateFunction',
    today: 'DateFunction',
    year: 'DateFunction',
    month: 'DateFunction',
    day: 'DateFunction',
  };

/** Labels an assignment may target */
export const ASSIGNABLE: ReadonlySet<string> = new Set([
  'MemberAccess',
  'ScopeAccess',
  'Index',
]);
