/**
 * Parser Extension: Program Structure
 * Classes, members, methods and the symbol-table scopes they open
 */

import type { NonTerminal } from '../grammar/index.js';
import { CLASS_MODIFIERS } from '../lexer/vocabulary.js';
import { ParseTreeNode } from '../tree.js';
import type { Token } from '../types.js';
import { TOKEN_KINDS } from '../types.js';
import {
  declaredName,
  isDataType,
  isModifier,
  TERMINALS,
  typeText,
} from './helpers.js';
import { Parser } from './parser.js';
import {
  advance,
  check,
  current,
  fail,
  isAtEnd,
  type Parsed,
  peek,
} from './state.js';

/** Tokens a `<...>` type argument may span before giving up */
const MAX_TYPE_TOKENS = 16;

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ParseTreeNode;
    parseClassScope(parent: ParseTreeNode): Parsed<ParseTreeNode>;
    checkClassModifiers(classNode: ParseTreeNode): void;
    parseMember(parent: ParseTreeNode): Parsed<ParseTreeNode>;
    looksLikeMethod(): boolean;
    startsDeclaration(): boolean;
    typeLength(offset: number): number;
    parseMethodRest(parent: ParseTreeNode): Parsed<ParseTreeNode>;
    parseMainRest(parent: ParseTreeNode): Parsed<ParseTreeNode>;
    parseDeclaring(
      name: NonTerminal,
      parent: ParseTreeNode
    ): Parsed<ParseTreeNode>;
    parseDeclarator(parent: ParseTreeNode): Parsed<ParseTreeNode>;
    declare(name: string, type: string, at: Token): void;
    withScope<T>(name: string, fn: () => T): T;
  }
}

// ============================================================
// PROGRAM
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ParseTreeNode {
  const root = ParseTreeNode.nonTerminal('Program');
  this.withContext('Program', () => this.parseProductionInto('Program', root));
  return root;
};

// ============================================================
// CLASSES
// ============================================================

/**
 * `{ ClassBody }` appended to the Class node. The class name goes into
 * the enclosing scope and the body gets a scope named after the class.
 */
Parser.prototype.parseClassScope = function (
  this: Parser,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  const name = declaredName(parent);
  this.checkClassModifiers(parent);
  if (name !== undefined) this.declare(name.lexeme, 'class', name);

  const open = this.expectTerminal(TERMINALS.LBRACE, parent);
  if (!open.ok) return open;

  return this.withScope(name?.lexeme ?? 'class', () => {
    const body = this.parseNonTerminal('ClassBody', parent);
    if (!body.ok) return body;
    if (isAtEnd(this.state)) {
      const eof = current(this.state);
      return fail(
        this.state.sink.report(
          'UNEXPECTED_EOF',
          'Unterminated class body',
          eof.line,
          eof.column,
          "Add '}' to close the class body"
        )
      );
    }
    return this.expectTerminal(TERMINALS.RBRACE, parent);
  });
};

Parser.prototype.checkClassModifiers = function (
  this: Parser,
  classNode: ParseTreeNode
): void {
  const modifiers = classNode.children.find((c) => c.label === 'Modifiers');
  for (const modifier of modifiers?.children ?? []) {
    const token = modifier.token;
    if (token === undefined || CLASS_MODIFIERS.has(token.lexeme)) continue;
    this.state.sink.report(
      'INVALID_SYNTAX',
      `Modifier '${token.lexeme}' is not allowed on a class`,
      token.line,
      token.column,
      `Use one of: ${[...CLASS_MODIFIERS].join(', ')}`
    );
  }
};

// ============================================================
// MEMBERS
// ============================================================

Parser.prototype.parseMember = function (
  this: Parser,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  if (check(this.state, 'main') && check(this.state, '(', 1)) {
    return this.parseNonTerminal('MainMethod', parent);
  }
  return this.parseNonTerminal(
    this.looksLikeMethod() ? 'Method' : 'Field',
    parent
  );
};

/** Modifiers, a type, a name, then `(` */
Parser.prototype.looksLikeMethod = function (this: Parser): boolean {
  let offset = 0;
  while (isModifier(peek(this.state, offset))) offset++;

  const length = this.typeLength(offset);
  if (length === 0) return false;
  offset += length;

  const name = peek(this.state, offset);
  const isName =
    name.kind === TOKEN_KINDS.IDENTIFIER ||
    (name.kind === TOKEN_KINDS.RESERVED && name.lexeme === 'main');
  return isName && check(this.state, '(', offset + 1);
};

/** A type followed by a name at the current token */
Parser.prototype.startsDeclaration = function (this: Parser): boolean {
  const length = this.typeLength(0);
  return (
    length > 0 && peek(this.state, length).kind === TOKEN_KINDS.IDENTIFIER
  );
};

/**
 * Number of tokens a type spans at the offset: a data type or class name,
 * an optional `<...>` argument and an optional `[]`. Zero when no type
 * starts there.
 */
Parser.prototype.typeLength = function (this: Parser, offset: number): number {
  const head = peek(this.state, offset);
  if (head.kind !== TOKEN_KINDS.IDENTIFIER && !isDataType(head)) return 0;

  let i = offset + 1;
  const open = peek(this.state, i);
  if (open.kind === TOKEN_KINDS.OBJ_DELIM && open.lexeme === '<') {
    for (let n = 0; ; n++) {
      i++;
      const token = peek(this.state, i);
      if (token.kind === TOKEN_KINDS.EOF || n > MAX_TYPE_TOKENS) return 0;
      if (token.kind === TOKEN_KINDS.OBJ_DELIM && token.lexeme === '>') break;
    }
    i++;
  }
  if (check(this.state, '[', i) && check(this.state, ']', i + 1)) i += 2;
  return i - offset;
};

/**
 * `( Parameters? ) TypeConstraint? Block` appended to the Method node,
 * inside a scope named after the method.
 */
Parser.prototype.parseMethodRest = function (
  this: Parser,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  const name = parent.child(parent.children.length - 1)?.token;
  if (name !== undefined) this.declare(name.lexeme, typeText(parent), name);

  return this.withScope(name?.lexeme ?? 'method', () =>
    this.parseProductionInto('MethodRest', parent)
  );
};

/** `( args? ) Block` appended to the MainMethod node */
Parser.prototype.parseMainRest = function (
  this: Parser,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  const main = parent.child(0)?.token;
  if (main !== undefined) this.declare(main.lexeme, 'void', main);

  return this.withScope('main', () => {
    const open = this.expectTerminal(TERMINALS.LPAREN, parent);
    if (!open.ok) return open;

    const arg = current(this.state);
    if (arg.kind === TOKEN_KINDS.IDENTIFIER) {
      parent.addChild(ParseTreeNode.terminal(advance(this.state)));
      this.declare(arg.lexeme, 'str[]', arg);
    }

    const close = this.expectTerminal(TERMINALS.RPAREN, parent);
    if (!close.ok) return close;
    return this.parseNonTerminal('Block', parent);
  });
};

// ============================================================
// DECLARATIONS
// ============================================================

/** Parse a `Type IDENT ...` rule, then declare the identifier */
Parser.prototype.parseDeclaring = function (
  this: Parser,
  name: NonTerminal,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  const result = this.parseRule(name, parent);
  if (!result.ok) return result;
  const ident = declaredName(result.value);
  if (ident !== undefined) {
    this.declare(ident.lexeme, typeText(result.value), ident);
  }
  return result;
};

/** Declarators take their type from the enclosing declaration */
Parser.prototype.parseDeclarator = function (
  this: Parser,
  parent: ParseTreeNode
): Parsed<ParseTreeNode> {
  const result = this.parseRule('Declarator', parent);
  if (!result.ok) return result;
  const ident = declaredName(result.value);
  if (ident !== undefined) this.declare(ident.lexeme, typeText(parent), ident);
  return result;
};

/**
 * Insert into the current scope. A duplicate is reported but does not
 * fail the production.
 */
Parser.prototype.declare = function (
  this: Parser,
  name: string,
  type: string,
  at: Token
): void {
  const { symbols, sink, declarations } = this.state;
  if (!symbols.insert(name, type)) {
    sink.report(
      'DUPLICATE_DECLARATION',
      `'${name}' is already declared in this scope`,
      at.line,
      at.column
    );
    return;
  }
  const entry = symbols.lookupLocal(name);
  if (entry !== undefined) declarations.push(entry);
};

Parser.prototype.withScope = function <T>(
  this: Parser,
  name: string,
  fn: () => T
): T {
  this.state.symbols.enterScope(name);
  try {
    return fn();
  } finally {
    this.state.symbols.exitScope();
  }
};
