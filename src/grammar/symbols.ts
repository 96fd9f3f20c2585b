/**
 * Grammar Symbols
 * Terminals, non-terminals and the optional/repeated groups productions
 * are built from.
 */

import { classifySymbol } from '../lexer/operators.js';
import { classifyWord } from '../lexer/vocabulary.js';
import type { TokenKind } from '../types.js';
import { TOKEN_KINDS } from '../types.js';

// ============================================================
// NON-TERMINALS
// ============================================================

export const NON_TERMINALS = [
  // Program structure
  'Program',
  'Class',
  'ClassScope',
  'Modifiers',
  'Modifier',
  'ClassInherit',
  'InterfaceInherit',
  'ClassBody',
  'Member',
  'Field',
  'Method',
  'MethodName',
  'MethodRest',
  'MainMethod',
  'MainRest',
  'Parameters',
  'Parameter',
  'TypeConstraint',

  // Types
  'Type',
  'DataType',
  'ObjectType',
  'TypeName',
  'ArraySuffix',

  // Statements
  'Block',
  'Statement',
  'Declaration',
  'LocalDeclaration',
  'Declarator',
  'AliasDeclaration',
  'ExpressionStatement',
  'IfStatement',
  'ElseClause',
  'ElseBody',
  'SwitchStatement',
  'SwitchKeyword',
  'SwitchCase',
  'CaseClause',
  'DefaultClause',
  'CaseLabel',
  'SignedNumber',
  'NumericLiteral',
  'ForLoop',
  'ForInit',
  'WhileLoop',
  'DoStatement',
  'DoWhileLoop',
  'EnhancedForLoop',
  'LoopVariable',
  'BreakStatement',
  'ExitStatement',
  'ExitWhenStatement',
  'OutputStatement',
  'PrintStatement',
  'InspectBlock',
  'QueryBlock',
  'QueryClause',
  'FromClause',
  'FilterClause',
  'SelectClause',

  // Expressions
  'Expr',
  'Unary',
  'Postfix',
  'Primary',
  'Literal',
  'StringLiteral',
  'StringPiece',
  'Group',
  'ArrayLiteral',
  'Arguments',
  'InputCall',
  'Lambda',
  'LambdaExpr',
  'LambdaBlock',

  // Data operations (receiver prepended by the parser)
  'FilterExpr',
  'ValidateExpr',
  'ModifyExpr',
  'ExportExpr',
  'ToMixedExpr',
  'DateFunction',
  'DateOperation',
] as const;

export type NonTerminal = (typeof NON_TERMINALS)[number];

// ============================================================
// SYMBOLS
// ============================================================

export interface TerminalSymbol {
  readonly type: 'terminal';
  readonly kind: TokenKind;
  /** Exact lexeme; any lexeme of the kind when omitted */
  readonly lexeme?: string | undefined;
}

export interface NonTerminalSymbol {
  readonly type: 'nonterminal';
  readonly name: NonTerminal;
}

export interface OptionalSymbol {
  readonly type: 'optional';
  readonly symbols: readonly GrammarSymbol[];
}

export interface RepeatSymbol {
  readonly type: 'repeat';
  readonly symbols: readonly GrammarSymbol[];
  readonly min: 0 | 1;
  readonly separator?: TerminalSymbol | undefined;
}

export type GrammarSymbol =
  | TerminalSymbol
  | NonTerminalSymbol
  | OptionalSymbol
  | RepeatSymbol;

/** Ordered symbols; empty means nullable */
export type Production = readonly GrammarSymbol[];

/**
 * How a matched non-terminal shows up in the tree:
 * - node: a node labelled with the name
 * - transparent: the single matched child stands in for it
 * - inline: matched children are appended to the enclosing node
 */
export type NodeMode = 'node' | 'transparent' | 'inline';

// ============================================================
// BUILDERS
// ============================================================

export function kind(tokenKind: TokenKind): TerminalSymbol {
  return { type: 'terminal', kind: tokenKind };
}

/** Keyword, reserved word or contextual identifier, classified as lexed */
export function word(lexeme: string): TerminalSymbol {
  return { type: 'terminal', kind: classifyWord(lexeme), lexeme };
}

/** Operator, delimiter or punctuation, classified as lexed */
export function sym(lexeme: string): TerminalSymbol {
  const tokenKind = classifySymbol(lexeme);
  if (tokenKind === undefined) {
    throw new Error(`Not a grammar symbol: ${lexeme}`);
  }
  return { type: 'terminal', kind: tokenKind, lexeme };
}

export function objectDelimiter(lexeme: '<' | '>'): TerminalSymbol {
  return { type: 'terminal', kind: TOKEN_KINDS.OBJ_DELIM, lexeme };
}

export function nt(name: NonTerminal): NonTerminalSymbol {
  return { type: 'nonterminal', name };
}

export function opt(...symbols: GrammarSymbol[]): OptionalSymbol {
  return { type: 'optional', symbols };
}

/** Zero or more */
export function many(...symbols: GrammarSymbol[]): RepeatSymbol {
  return { type: 'repeat', symbols, min: 0 };
}

/** One or more */
export function some(...symbols: GrammarSymbol[]): RepeatSymbol {
  return { type: 'repeat', symbols, min: 1 };
}

/** One or more, separated */
export function sepBy(
  separator: TerminalSymbol,
  ...symbols: GrammarSymbol[]
): RepeatSymbol {
  return { type: 'repeat', symbols, min: 1, separator };
}

// ============================================================
// DESCRIPTIONS
// ============================================================

const KIND_NAMES: Partial<Record<TokenKind, string>> = {
  IDENTIFIER: 'identifier',
  INT_LIT: 'integer',
  FLOAT_LIT: 'float',
  BOOL_LIT: 'boolean',
  STR_LIT: 'string',
  CHAR_LIT: 'character',
  DATE_LIT: 'date',
  FRAC_LIT: 'fraction',
  COMP_LIT: 'complex number',
  STR_DELIM: 'quote',
  UNARY_OP: 'unary operator',
  EOF: 'end of input',
};

const NON_TERMINAL_NAMES: Partial<Record<NonTerminal, string>> = {
  Class: 'class definition',
  Expr: 'expression',
  Unary: 'expression',
  Postfix: 'expression',
  Primary: 'expression',
  Member: 'field or method declaration',
  MethodName: 'method name',
  TypeName: 'type name',
  DataType: 'data type',
  CaseLabel: 'case label',
  Lambda: 'lambda',
  LambdaExpr: 'lambda expression',
  LambdaBlock: 'lambda block',
};

export function describeKind(tokenKind: TokenKind): string {
  return KIND_NAMES[tokenKind] ?? tokenKind.toLowerCase().replace(/_/g, ' ');
}

/** `IfStatement` -> `if statement` */
export function describeNonTerminal(name: NonTerminal): string {
  return (
    NON_TERMINAL_NAMES[name] ??
    name.replace(/([a-z])([A-Z])/g, '$1 $2').toLowerCase()
  );
}

export function describeSymbol(symbol: GrammarSymbol): string {
  switch (symbol.type) {
    case 'terminal':
      return symbol.lexeme !== undefined
        ? `'${symbol.lexeme}'`
        : describeKind(symbol.kind);
    case 'nonterminal':
      return describeNonTerminal(symbol.name);
    case 'optional':
    case 'repeat':
      return symbol.symbols.map(describeSymbol).join(' ');
  }
}
