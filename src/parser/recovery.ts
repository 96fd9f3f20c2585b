/**
 * Parser Extension: Error Recovery
 * Lists that survive a failed item, and panic-mode synchronization
 */

import { describeNonTerminal, type NonTerminal } from '../grammar/index.js';
import type { ParseTreeNode } from '../tree.js';
import type { Token } from '../types.js';
import { TOKEN_KINDS } from '../types.js';
import { isDelimiter, isPunctuation, truncateChildren } from './helpers.js';
import { Parser } from './parser.js';
import { advance, current, isAtEnd } from './state.js';

/**
 * Where a list sits, which decides where synchronization may stop:
 * - program: only before a class start
 * - member, statement: after `;`, before `}` or a statement/member keyword
 * - case: as statement; `case` and `default` also end the list
 */
export type SyncMode = 'program' | 'member' | 'statement' | 'case';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseList(item: NonTerminal, node: ParseTreeNode, mode: SyncMode): void;
    synchronize(mode: SyncMode, start: number): void;
    isSyncPoint(token: Token, mode: SyncMode): boolean;
  }
}

function isCaseStart(token: Token): boolean {
  return (
    token.kind === TOKEN_KINDS.KEYWORD &&
    (token.lexeme === 'case' || token.lexeme === 'default')
  );
}

function isKeywordLike(token: Token): boolean {
  return (
    token.kind === TOKEN_KINDS.KEYWORD || token.kind === TOKEN_KINDS.RESERVED
  );
}

// ============================================================
// LISTS
// ============================================================

/**
 * Parse items until the list's closer. A token that cannot start an item
 * is reported once; a failed item has already reported its diagnostic.
 * Either way the list synchronizes and carries on. Failed members are
 * removed from the class body.
 */
Parser.prototype.parseList = function (
  this: Parser,
  item: NonTerminal,
  node: ParseTreeNode,
  mode: SyncMode
): void {
  const { grammar, sink } = this.state;
  const first = grammar.first(item);

  for (;;) {
    const token = current(this.state);
    if (token.kind === TOKEN_KINDS.EOF) return;
    if (mode !== 'program' && isDelimiter(token, '}')) return;
    if (mode === 'case' && isCaseStart(token)) return;

    const start = this.state.pos;
    if (first.matches(token)) {
      const before = node.children.length;
      if (this.parseNonTerminal(item, node).ok) continue;
      if (mode === 'member') truncateChildren(node, before);
    } else if (mode === 'program') {
      sink.report(
        'UNEXPECTED_TOKEN',
        `Expected class definition, found '${token.lexeme}'`,
        token.line,
        token.column,
        'Start with a class definition'
      );
    } else {
      this.expected(describeNonTerminal(item));
    }
    this.synchronize(mode, start);
  }
};

// ============================================================
// SYNCHRONIZATION
// ============================================================

/**
 * Skip to a safe resumption point. Always moves past at least one token
 * when the failure consumed nothing; braces are skipped as balanced groups.
 */
Parser.prototype.synchronize = function (
  this: Parser,
  mode: SyncMode,
  start: number
): void {
  const { state } = this;
  if (state.pos === start) advance(state);

  let depth = 0;
  while (!isAtEnd(state)) {
    const token = current(state);
    if (depth === 0 && this.isSyncPoint(token, mode)) return;

    if (isDelimiter(token, '{')) depth++;
    else if (isDelimiter(token, '}') && depth > 0) depth--;
    advance(state);

    if (depth === 0 && mode !== 'program' && isPunctuation(token, ';')) {
      return;
    }
  }
};

Parser.prototype.isSyncPoint = function (
  this: Parser,
  token: Token,
  mode: SyncMode
): boolean {
  const { grammar } = this.state;
  if (mode === 'program') return grammar.first('Class').matches(token);

  if (isDelimiter(token, '}')) return true;
  // Members and locals typed by a class name, such as `void total()`
  if (token.kind === TOKEN_KINDS.IDENTIFIER) return this.startsDeclaration();
  if (!isKeywordLike(token)) return false;
  return (
    isCaseStart(token) ||
    grammar.first('Statement').matches(token) ||
    grammar.first('Member').matches(token)
  );
};
