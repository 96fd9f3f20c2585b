/**
 * Parser Extension: Expression Parsing
 * Precedence climbing over the levels in precedence.ts, access chains,
 * data operations and lambdas
 */

import type { NonTerminal } from '../grammar/index.js';
import { ParseTreeNode } from '../tree.js';
import type { Token, TokenKind } from '../types.js';
import { TOKEN_KINDS } from '../types.js';
import {
  isDelimiter,
  isPunctuation,
  isWordToken,
  makeNode,
  TERMINALS,
} from './helpers.js';
import { Parser } from './parser.js';
import {
  ASSIGNABLE,
  BINARY_LEVELS,
  DATA_OPERATIONS,
  isLevelOperator,
} from './precedence.js';
import {
  advance,
  check,
  current,
  fail,
  type Parsed,
  peek,
  succeed,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpressionInto(parent: ParseTreeNode): Parsed<ParseTreeNode>;
    parseExpression(): Parsed<ParseTreeNode>;
    parseTernary(): Parsed<ParseTreeNode>;
    parseBinary(index: number): Parsed<ParseTreeNode>;
    parseUnary(): Parsed<ParseTreeNode>;
    parsePostfix(): Parsed<ParseTreeNode>;
    parseAccess(): Parsed<ParseTreeNode>;
    parsePrimary(): Parsed<ParseTreeNode>;
    parseDataOperation(
      name: NonTerminal,
      receiver: ParseTreeNode
    ): Parsed<ParseTreeNode>;
    parseLambda(parent: ParseTreeNode): Parsed<ParseTreeNode>;
    parseOperand(
      operator: string,
      parseNext: () => Parsed<ParseTreeNode>
    ): Parsed<ParseTreeNode>;
  }
}

function isOperator(token: Token, kind: TokenKind, lexeme: string): boolean {
  return token.kind === kind && token.lexeme === lexeme;
}

/** Data operation started by the word after `.`, if any */
function dataOperation(token: Token): NonTerminal | undefined {
  const isKeyword =
    token.kind === TOKEN_KINDS.KEYWORD || token.kind === TOKEN_KINDS.RESERVED;
  return isKeyword ? DATA_OPERATIONS[token.lexeme] : undefined;
}

// ============================================================
// ENTRY POINTS
// ============================================================

/** Grammar hook for `Expr`: parse and attach to the parent */
Parser.prototype.parseExpressionInto = function (
  this: Parser,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  const result = this.parseExpression();
  if (!result.ok) return result;
  return succeed(parent.addChild(result.value));
};

/**
 * Assignment (level 17, right-associative). The target must be an
 * identifier, member access, scope access or index.
 */
Parser.prototype.parseExpression = function (
  this: Parser
): Parsed<ParseTreeNode> {
  const target = this.parseTernary();
  if (!target.ok) return target;

  const operator = current(this.state);
  if (operator.kind !== TOKEN_KINDS.ASSIGN_OP) return target;

  const node = target.value;
  const assignable =
    node.token !== undefined
      ? node.token.kind === TOKEN_KINDS.IDENTIFIER
      : ASSIGNABLE.has(node.label);
  if (!assignable) {
    return fail(
      this.state.sink.report(
        'INVALID_SYNTAX',
        'Invalid assignment target',
        operator.line,
        operator.column,
        'Assign to a variable, member, scope access or index'
      )
    );
  }

  advance(this.state);
  const value = this.parseOperand(operator.lexeme, () =>
    this.parseExpression()
  );
  if (!value.ok) return value;
  return succeed(makeNode('Assignment', node, operator, value.value));
};

/** `cond ? then : else` (level 16, right-associative) */
Parser.prototype.parseTernary = function (this: Parser): Parsed<ParseTreeNode> {
  const condition = this.parseBinary(0);
  if (!condition.ok) return condition;
  if (!isPunctuation(current(this.state), '?')) return condition;

  const question = advance(this.state);
  const consequent = this.parseOperand('?', () => this.parseExpression());
  if (!consequent.ok) return consequent;

  const node = makeNode(
    'Ternary',
    condition.value,
    question,
    consequent.value
  );
  const colon = this.expectTerminal(TERMINALS.COLON, node);
  if (!colon.ok) return colon;

  const alternate = this.parseOperand(':', () => this.parseTernary());
  if (!alternate.ok) return alternate;
  node.addChild(alternate.value);
  return succeed(node);
};

// ============================================================
// BINARY LEVELS
// ============================================================

/**
 * One binary level: parse the tighter level, then fold operators of this
 * level. Right-associative levels recurse into themselves for the right
 * operand.
 */
Parser.prototype.parseBinary = function (
  this: Parser,
  index: number
): Parsed<ParseTreeNode> {
  const level = BINARY_LEVELS[index];
  if (level === undefined) return this.parseUnary();

  const first = this.parseBinary(index + 1);
  if (!first.ok) return first;

  let left = first.value;
  while (isLevelOperator(level, current(this.state))) {
    const operator = advance(this.state);
    const right = this.parseOperand(operator.lexeme, () =>
      this.parseBinary(level.rightAssociative ? index : index + 1)
    );
    if (!right.ok) return right;
    left = makeNode(level.name, left, operator, right.value);
  }
  return succeed(left);
};

/**
 * Parse the operand after an operator, reporting a missing one against
 * the operator rather than as a generic expected-expression error.
 */
Parser.prototype.parseOperand = function (
  this: Parser,
  operator: string,
  parseNext: () => Parsed<ParseTreeNode>
): Parsed<ParseTreeNode> {
  const token = current(this.state);
  if (this.state.grammar.first('Expr').matches(token)) return parseNext();

  return fail(
    this.state.sink.report(
      token.kind === TOKEN_KINDS.EOF ? 'UNEXPECTED_EOF' : 'INVALID_SYNTAX',
      `Invalid right operand for '${operator}'`,
      token.line,
      token.column,
      `Provide a valid expression after '${operator}'`
    )
  );
};

// ============================================================
// UNARY AND POSTFIX
// ============================================================

/**
 * Prefix operators and `<Type>` casts (level 4, right-associative). A sign
 * after a keyword such as `exit when` or `in` arrives as ARITHMETIC_OP.
 */
Parser.prototype.parseUnary = function (this: Parser): Parsed<ParseTreeNode> {
  const token = current(this.state);

  if (
    token.kind === TOKEN_KINDS.UNARY_OP ||
    isOperator(token, TOKEN_KINDS.ARITHMETIC_OP, '-') ||
    isOperator(token, TOKEN_KINDS.ARITHMETIC_OP, '+') ||
    isOperator(token, TOKEN_KINDS.LOG_OP, '!') ||
    isOperator(token, TOKEN_KINDS.BIT_OP, '~')
  ) {
    advance(this.state);
    const operand = this.parseOperand(token.lexeme, () => this.parseUnary());
    if (!operand.ok) return operand;
    return succeed(makeNode('Unary', token, operand.value));
  }

  if (isOperator(token, TOKEN_KINDS.OBJ_DELIM, '<')) {
    const node = ParseTreeNode.nonTerminal('Cast');
    const type = this.parseNonTerminal('ObjectType', node);
    if (!type.ok) return type;
    const cast = type.value.text().replace(/ /g, '');
    const operand = this.parseOperand(cast, () => this.parseUnary());
    if (!operand.ok) return operand;
    node.addChild(operand.value);
    return succeed(node);
  }

  return this.parsePostfix();
};

/** `x++`, `x--` (level 3) */
Parser.prototype.parsePostfix = function (this: Parser): Parsed<ParseTreeNode> {
  const operand = this.parseAccess();
  if (!operand.ok) return operand;

  let node = operand.value;
  for (;;) {
    const token = current(this.state);
    const isStep =
      token.kind === TOKEN_KINDS.UNARY_OP &&
      (token.lexeme === '++' || token.lexeme === '--');
    if (!isStep) return succeed(node);
    node = makeNode('Postfix', node, advance(this.state));
  }
};

// ============================================================
// ACCESS CHAINS
// ============================================================

/** Member, scope, call, index and data-operation suffixes (level 2) */
Parser.prototype.parseAccess = function (this: Parser): Parsed<ParseTreeNode> {
  const primary = this.parsePrimary();
  if (!primary.ok) return primary;

  let expr = primary.value;
  for (;;) {
    const token = current(this.state);

    if (isOperator(token, TOKEN_KINDS.METHOD_OP, '.')) {
      const operation = dataOperation(peek(this.state, 1));
      if (operation !== undefined) {
        const result = this.parseDataOperation(operation, expr);
        if (!result.ok) return result;
        expr = result.value;
        continue;
      }
      const node = makeNode('MemberAccess', expr, advance(this.state));
      if (current(this.state).kind !== TOKEN_KINDS.IDENTIFIER) {
        return this.expected('member name');
      }
      node.addChild(ParseTreeNode.terminal(advance(this.state)));
      expr = node;
      continue;
    }

    if (isOperator(token, TOKEN_KINDS.METHOD_OP, '::')) {
      const node = makeNode('ScopeAccess', expr, advance(this.state));
      const name = current(this.state);
      if (!isWordToken(name)) return this.expected('member name');
      node.addChild(ParseTreeNode.terminal(advance(this.state)));
      expr = node;
      continue;
    }

    if (isDelimiter(token, '(')) {
      const node = makeNode('Call', expr);
      const args = this.parseNonTerminal('Arguments', node);
      if (!args.ok) return args;
      expr = node;
      continue;
    }

    if (isDelimiter(token, '[')) {
      const node = makeNode('Index', expr, advance(this.state));
      const index = this.parseNonTerminal('Expr', node);
      if (!index.ok) return index;
      const close = this.expectTerminal(TERMINALS.RBRACKET, node);
      if (!close.ok) return close;
      expr = node;
      continue;
    }

    return succeed(expr);
  }
};

/**
 * `.filter_by(...)` and friends. The receiver becomes the first child and
 * the rest of the node follows the rule's production.
 */
Parser.prototype.parseDataOperation = function (
  this: Parser,
  name: NonTerminal,
  receiver: ParseTreeNode
): Parsed<ParseTreeNode> {
  const node = makeNode(name, receiver);
  const result = this.withContext(name, () =>
    this.parseProductionInto(name, node)
  );
  return result.ok ? succeed(node) : result;
};

// ============================================================
// PRIMARY
// ============================================================

/** Level 1; an identifier followed by `->` starts a lambda */
Parser.prototype.parsePrimary = function (this: Parser): Parsed<ParseTreeNode> {
  const token = current(this.state);
  if (!this.state.grammar.first('Primary').matches(token)) {
    return this.expected('expression');
  }

  // Holder only; the caller re-parents the result
  const holder = ParseTreeNode.nonTerminal('Primary');
  const isLambda =
    token.kind === TOKEN_KINDS.IDENTIFIER && check(this.state, '->', 1);
  return this.parseNonTerminal(isLambda ? 'Lambda' : 'Primary', holder);
};

/**
 * `x -> expr` or `x -> { ... }`. The parameter lives in a lambda scope
 * together with the body.
 */
Parser.prototype.parseLambda = function (
  this: Parser,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  const name = isDelimiter(peek(this.state, 2), '{')
    ? 'LambdaBlock'
    : 'LambdaExpr';
  const node = parent.addChild(ParseTreeNode.nonTerminal(name));

  return this.withContext(name, () => {
    const param = current(this.state);
    const ident = this.expectTerminal(TERMINALS.IDENT, node);
    if (!ident.ok) return ident;
    const arrow = this.expectTerminal(TERMINALS.ARROW, node);
    if (!arrow.ok) return arrow;

    return this.withScope('lambda', () => {
      this.declare(param.lexeme, 'lambda', param);
      const body = this.parseNonTerminal(
        name === 'LambdaBlock' ? 'Block' : 'Expr',
        node
      );
      return body.ok ? succeed(node) : body;
    });
  });
};
