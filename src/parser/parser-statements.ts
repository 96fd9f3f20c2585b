/**
 * Parser Extension: Statements
 * Statement dispatch, blocks and the lookahead choices the grammar table
 * leaves open
 */

import type { NonTerminal } from '../grammar/index.js';
import { DATA_TYPES, KEYWORDS, RESERVED_WORDS } from '../lexer/vocabulary.js';
import { suggestSimilarNames } from '../suggest.js';
import type { ParseTreeNode } from '../tree.js';
import { TOKEN_KINDS } from '../types.js';
import { isDataType, SCOPE_SHARING_OWNERS } from './helpers.js';
import { Parser } from './parser.js';
import {
  advance,
  check,
  current,
  type Parsed,
  peek,
  pushback,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseStatement(parent: ParseTreeNode): Parsed<ParseTreeNode>;
    statementKind(): NonTerminal;
    declarationKind(): NonTerminal;
    keywordHint(word: string): string | undefined;
    parseBlock(parent: ParseTreeNode): Parsed<ParseTreeNode>;
    parseForInit(parent: ParseTreeNode): Parsed<ParseTreeNode>;
    parseDoStatement(parent: ParseTreeNode): Parsed<ParseTreeNode>;
  }
}

/** Identifiers shorter than this never get a keyword suggestion */
const MIN_TYPO_LENGTH = 3;

// ============================================================
// STATEMENTS
// ============================================================

/**
 * Dispatch one statement. While it is parsed, an identifier that starts
 * it and resembles a statement keyword replaces the usual suggestion.
 */
Parser.prototype.parseStatement = function (
  this: Parser,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  const { state } = this;
  const token = current(state);
  const saved = state.typoHint;
  state.typoHint =
    token.kind === TOKEN_KINDS.IDENTIFIER
      ? this.keywordHint(token.lexeme)
      : undefined;
  try {
    return this.parseNonTerminal(this.statementKind(), parent);
  } finally {
    state.typoHint = saved;
  }
};

Parser.prototype.statementKind = function (this: Parser): NonTerminal {
  const { state } = this;
  const token = current(state);

  if (token.kind === TOKEN_KINDS.IDENTIFIER) {
    advance(state);
    const next = current(state);
    pushback(state);
    const declares =
      next.kind === TOKEN_KINDS.IDENTIFIER ||
      (next.kind === TOKEN_KINDS.OBJ_DELIM && next.lexeme === '<') ||
      (check(state, '[', 1) && check(state, ']', 2));
    return declares ? this.declarationKind() : 'ExpressionStatement';
  }
  if (isDataType(token)) return this.declarationKind();

  const production = this.chooseProduction('Statement');
  const [head] = production ?? [];
  return head !== undefined && head.type === 'nonterminal'
    ? head.name
    : 'ExpressionStatement';
};

/** `Type IDENT = ALIAS ...` is an alias; anything else a declaration */
Parser.prototype.declarationKind = function (this: Parser): NonTerminal {
  const { state } = this;
  const length = this.typeLength(0);
  if (
    length > 0 &&
    peek(state, length).kind === TOKEN_KINDS.IDENTIFIER &&
    check(state, '=', length + 1) &&
    check(state, 'ALIAS', length + 2)
  ) {
    return 'AliasDeclaration';
  }
  return 'Declaration';
};

/** "Did you mean" text for identifiers close to a statement keyword */
Parser.prototype.keywordHint = function (
  this: Parser,
  word: string
): string | undefined {
  if (word.length < MIN_TYPO_LENGTH) return undefined;
  const { grammar } = this.state;
  const statementStart = grammar.first('Statement');
  const expressionStart = grammar.first('Expr');
  const candidates = [...KEYWORDS, ...RESERVED_WORDS].filter(
    (w) =>
      !DATA_TYPES.has(w) &&
      (statementStart.has(TOKEN_KINDS.KEYWORD, w) ||
        statementStart.has(TOKEN_KINDS.RESERVED, w)) &&
      !expressionStart.has(TOKEN_KINDS.KEYWORD, w) &&
      !expressionStart.has(TOKEN_KINDS.RESERVED, w)
  );
  const [best] = suggestSimilarNames(word, candidates);
  return best === undefined ? undefined : `Did you mean '${best}'?`;
};

// ============================================================
// BLOCKS
// ============================================================

/**
 * Method, main and lambda bodies share the scope their owner opened;
 * every other block opens its own.
 */
Parser.prototype.parseBlock = function (
  this: Parser,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  if (SCOPE_SHARING_OWNERS.has(parent.label)) {
    return this.parseRule('Block', parent);
  }
  return this.withScope('block', () => this.parseRule('Block', parent));
};

// ============================================================
// LOOKAHEAD CHOICES
// ============================================================

/** `int i = 0` and `Item x = ...` declare; anything else is an expression */
Parser.prototype.parseForInit = function (
  this: Parser,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  const token = current(this.state);
  const next = peek(this.state, 1);
  const declares =
    isDataType(token) ||
    (token.kind === TOKEN_KINDS.IDENTIFIER &&
      (next.kind === TOKEN_KINDS.IDENTIFIER ||
        (next.kind === TOKEN_KINDS.OBJ_DELIM && next.lexeme === '<')));
  return this.parseNonTerminal(declares ? 'LocalDeclaration' : 'Expr', parent);
};

/** `do for (...)` is the enhanced for; plain `do` the do-while */
Parser.prototype.parseDoStatement = function (
  this: Parser,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  return this.parseNonTerminal(
    check(this.state, 'for', 1) ? 'EnhancedForLoop' : 'DoWhileLoop',
    parent
  );
};
