/**
 * Parser Extension: Grammar Interpreter
 * Walks productions from the grammar table, building tree nodes as
 * terminals match. Rules that need lookahead or scope bookkeeping are
 * routed to handlers in the other extension modules.
 */

import {
  describeNonTerminal,
  describeSymbol,
  type GrammarSymbol,
  type NonTerminal,
  type Production,
  type RepeatSymbol,
  type TerminalSymbol,
} from '../grammar/index.js';
import { ParseTreeNode } from '../tree.js';
import { TOKEN_KINDS } from '../types.js';
import { EOF_HINTS, MISSING_TOKEN_HINTS } from './helpers.js';
import { Parser } from './parser.js';
import type { SyncMode } from './recovery.js';
import {
  advance,
  current,
  type Failure,
  fail,
  matchesTerminal,
  type Parsed,
  succeed,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseNonTerminal(
      name: NonTerminal,
      parent: ParseTreeNode
    ): Parsed<ParseTreeNode>;
    parseRule(name: NonTerminal, parent: ParseTreeNode): Parsed<ParseTreeNode>;
    parseProductionInto(
      name: NonTerminal,
      node: ParseTreeNode
    ): Parsed<ParseTreeNode>;
    chooseProduction(name: NonTerminal): Production | undefined;
    parseSequence(
      symbols: readonly GrammarSymbol[],
      node: ParseTreeNode
    ): Parsed<ParseTreeNode>;
    parseSymbol(
      symbol: GrammarSymbol,
      node: ParseTreeNode
    ): Parsed<ParseTreeNode>;
    parseRepeat(
      group: RepeatSymbol,
      node: ParseTreeNode
    ): Parsed<ParseTreeNode>;
    expectTerminal(
      symbol: TerminalSymbol,
      node: ParseTreeNode
    ): Parsed<ParseTreeNode>;
    expected(what: string, lexeme?: string): Failure;
    expectedRule(name: NonTerminal): Failure;
    withContext<T>(name: NonTerminal, fn: () => T): T;
    contextName(): string | undefined;
  }
}

// ============================================================
// HANDLERS
// ============================================================

type RuleHandler = (
  parser: Parser,
  parent: ParseTreeNode
) => Parsed<ParseTreeNode>;

/** Rules parsed by code instead of plain production matching */
const HANDLERS: Partial<Record<NonTerminal, RuleHandler>> = {
  ClassScope: (p, parent) => p.parseClassScope(parent),
  Member: (p, parent) => p.parseMember(parent),
  MethodRest: (p, parent) => p.parseMethodRest(parent),
  MainRest: (p, parent) => p.parseMainRest(parent),
  Parameter: (p, parent) => p.parseDeclaring('Parameter', parent),
  LoopVariable: (p, parent) => p.parseDeclaring('LoopVariable', parent),
  AliasDeclaration: (p, parent) =>
    p.parseDeclaring('AliasDeclaration', parent),
  Declarator: (p, parent) => p.parseDeclarator(parent),
  Statement: (p, parent) => p.parseStatement(parent),
  Block: (p, parent) => p.parseBlock(parent),
  ForInit: (p, parent) => p.parseForInit(parent),
  DoStatement: (p, parent) => p.parseDoStatement(parent),
  ForLoop: (p, parent) =>
    p.withScope('for', () => p.parseRule('ForLoop', parent)),
  EnhancedForLoop: (p, parent) =>
    p.withScope('for', () => p.parseRule('EnhancedForLoop', parent)),
  Expr: (p, parent) => p.parseExpressionInto(parent),
  Lambda: (p, parent) => p.parseLambda(parent),
};

/** Repeated items that recover from errors item by item */
const RECOVERING_LISTS: Partial<Record<NonTerminal, SyncMode>> = {
  Class: 'program',
  Member: 'member',
  Statement: 'statement',
  SwitchCase: 'statement',
  QueryClause: 'statement',
};

const CASE_BODIES: ReadonlySet<string> = new Set([
  'CaseClause',
  'DefaultClause',
]);

function recoveringList(
  group: RepeatSymbol,
  node: ParseTreeNode
): { item: NonTerminal; mode: SyncMode } | undefined {
  const [only] = group.symbols;
  if (
    group.min !== 0 ||
    group.separator !== undefined ||
    group.symbols.length !== 1 ||
    only === undefined ||
    only.type !== 'nonterminal'
  ) {
    return undefined;
  }
  const mode = RECOVERING_LISTS[only.name];
  if (mode === undefined) return undefined;
  if (mode === 'statement' && CASE_BODIES.has(node.label)) {
    return { item: only.name, mode: 'case' };
  }
  return { item: only.name, mode };
}

// ============================================================
// RULES
// ============================================================

Parser.prototype.parseNonTerminal = function (
  this: Parser,
  name: NonTerminal,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  const handler = HANDLERS[name];
  return this.withContext(name, () =>
    handler !== undefined ? handler(this, parent) : this.parseRule(name, parent)
  );
};

/**
 * Match one production of the rule. Node rules attach a new node to the
 * parent; inline rules append into the parent; transparent rules collapse
 * to their single child.
 */
Parser.prototype.parseRule = function (
  this: Parser,
  name: NonTerminal,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  const mode = this.state.grammar.nodeMode(name);
  if (mode === 'inline') return this.parseProductionInto(name, parent);

  const production = this.chooseProduction(name);
  if (production === undefined) return this.expectedRule(name);

  const node = parent.addChild(ParseTreeNode.nonTerminal(name));
  const result = this.parseSequence(production, node);
  if (!result.ok) return result;

  const only = node.child(0);
  if (mode === 'transparent' && node.children.length === 1 && only) {
    parent.removeChild(node);
    return succeed(parent.addChild(only));
  }
  return succeed(node);
};

Parser.prototype.parseProductionInto = function (
  this: Parser,
  name: NonTerminal,
  node: ParseTreeNode
): Parsed<ParseTreeNode> {
  const production = this.chooseProduction(name);
  if (production === undefined) return this.expectedRule(name);
  return this.parseSequence(production, node);
};

/**
 * First production whose FIRST set holds the current token, else a
 * nullable production. A rule with one production always gets it, so the
 * mismatch is reported at the terminal that failed.
 */
Parser.prototype.chooseProduction = function (
  this: Parser,
  name: NonTerminal
): Production | undefined {
  const { grammar } = this.state;
  const token = current(this.state);
  const productions = grammar.productions(name);
  const [only, ...rest] = productions;
  if (only !== undefined && rest.length === 0) return only;
  return (
    productions.find((p) => grammar.firstOfProduction(p).matches(token)) ??
    productions.find((p) => grammar.productionNullable(p))
  );
};

// ============================================================
// SEQUENCES
// ============================================================

Parser.prototype.parseSequence = function (
  this: Parser,
  symbols: readonly GrammarSymbol[],
  node: ParseTreeNode
): Parsed<ParseTreeNode> {
  for (const symbol of symbols) {
    const result = this.parseSymbol(symbol, node);
    if (!result.ok) return result;
  }
  return succeed(node);
};

Parser.prototype.parseSymbol = function (
  this: Parser,
  symbol: GrammarSymbol,
  node: ParseTreeNode
): Parsed<ParseTreeNode> {
  switch (symbol.type) {
    case 'terminal':
      return this.expectTerminal(symbol, node);
    case 'nonterminal':
      return this.parseNonTerminal(symbol.name, node);
    case 'optional':
      return this.state.grammar
        .firstOfGroup(symbol)
        .matches(current(this.state))
        ? this.parseSequence(symbol.symbols, node)
        : succeed(node);
    case 'repeat':
      return this.parseRepeat(symbol, node);
  }
};

Parser.prototype.parseRepeat = function (
  this: Parser,
  group: RepeatSymbol,
  node: ParseTreeNode
): Parsed<ParseTreeNode> {
  const list = recoveringList(group, node);
  if (list !== undefined) {
    this.parseList(list.item, node, list.mode);
    return succeed(node);
  }

  const { separator } = group;
  if (separator !== undefined) {
    let result = this.parseSequence(group.symbols, node);
    while (result.ok && matchesTerminal(current(this.state), separator)) {
      node.addChild(ParseTreeNode.terminal(advance(this.state)));
      result = this.parseSequence(group.symbols, node);
    }
    return result;
  }

  const first = this.state.grammar.firstOfGroup(group);
  let count = 0;
  while (first.matches(current(this.state))) {
    const result = this.parseSequence(group.symbols, node);
    if (!result.ok) return result;
    count++;
  }
  if (count < group.min) return this.expected(describeSymbol(group));
  return succeed(node);
};

// ============================================================
// TERMINALS AND ERRORS
// ============================================================

Parser.prototype.expectTerminal = function (
  this: Parser,
  symbol: TerminalSymbol,
  node: ParseTreeNode
): Parsed<ParseTreeNode> {
  if (matchesTerminal(current(this.state), symbol)) {
    node.addChild(ParseTreeNode.terminal(advance(this.state)));
    return succeed(node);
  }
  return this.expected(describeSymbol(symbol), symbol.lexeme);
};

/**
 * Report what was expected at the current token. End of input is
 * UNEXPECTED_EOF, a missing closer or separator is MISSING_TOKEN, anything
 * else UNEXPECTED_TOKEN.
 */
Parser.prototype.expected = function (
  this: Parser,
  what: string,
  lexeme?: string
): Failure {
  const { sink } = this.state;
  const token = current(this.state);
  const context = this.contextName();
  const where = context === undefined ? '' : ` in ${context}`;

  if (token.kind === TOKEN_KINDS.EOF) {
    return fail(
      sink.report(
        'UNEXPECTED_EOF',
        `Expected ${what}${where}, found end of input`,
        token.line,
        token.column,
        lexeme === undefined ? undefined : EOF_HINTS[lexeme]
      )
    );
  }

  const hint = lexeme === undefined ? undefined : MISSING_TOKEN_HINTS[lexeme];
  return fail(
    sink.report(
      hint === undefined ? 'UNEXPECTED_TOKEN' : 'MISSING_TOKEN',
      `Expected ${what}${where}, found '${token.lexeme}'`,
      token.line,
      token.column,
      this.state.typoHint ?? hint
    )
  );
};

/**
 * No alternative of the rule fits. Reported against the enclosing rule,
 * since the rule itself never started.
 */
Parser.prototype.expectedRule = function (
  this: Parser,
  name: NonTerminal
): Failure {
  const { contexts } = this.state;
  if (contexts[contexts.length - 1] !== name) {
    return this.expected(describeNonTerminal(name));
  }
  contexts.pop();
  try {
    return this.expected(describeNonTerminal(name));
  } finally {
    contexts.push(name);
  }
};

// ============================================================
// CONTEXT
// ============================================================

Parser.prototype.withContext = function <T>(
  this: Parser,
  name: NonTerminal,
  fn: () => T
): T {
  this.state.contexts.push(name);
  try {
    return fn();
  } finally {
    this.state.contexts.pop();
  }
};

/** Innermost enclosing rule that produces its own node */
Parser.prototype.contextName = function (this: Parser): string | undefined {
  const { contexts, grammar } = this.state;
  for (let i = contexts.length - 1; i >= 0; i--) {
    const name = contexts[i];
    if (name !== undefined && grammar.nodeMode(name) === 'node') {
      return describeNonTerminal(name);
    }
  }
  return undefined;
};
