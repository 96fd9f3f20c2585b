/**
 * Parser Helpers
 * Shared terminals, token predicates and hint tables
 * @internal This module contains internal parser utilities
 */

import { kind, type NonTerminal, sym } from '../grammar/index.js';
import { DATA_TYPES, MODIFIERS } from '../lexer/vocabulary.js';
import { ParseTreeNode } from '../tree.js';
import type { Token } from '../types.js';
import { TOKEN_KINDS } from '../types.js';

// ============================================================
// TERMINALS
// ============================================================

/** @internal */
export const TERMINALS = {
  IDENT: kind(TOKEN_KINDS.IDENTIFIER),
  LPAREN: sym('('),
  RPAREN: sym(')'),
  LBRACE: sym('{'),
  RBRACE: sym('}'),
  RBRACKET: sym(']'),
  COLON: sym(':'),
  ARROW: sym('->'),
} as const;

// ============================================================
// TOKEN PREDICATES
// ============================================================

/** @internal */
export function isDelimiter(token: Token, lexeme: string): boolean {
  return token.kind === TOKEN_KINDS.DELIM && token.lexeme === lexeme;
}

/** @internal */
export function isPunctuation(token: Token, lexeme: string): boolean {
  return token.kind === TOKEN_KINDS.PUNC_DELIM && token.lexeme === lexeme;
}

/** @internal */
export function isDataType(token: Token): boolean {
  return token.kind === TOKEN_KINDS.RESERVED && DATA_TYPES.has(token.lexeme);
}

/** @internal */
export function isModifier(token: Token): boolean {
  return token.kind === TOKEN_KINDS.RESERVED && MODIFIERS.has(token.lexeme);
}

/** @internal */
export function isWordToken(token: Token): boolean {
  return (
    token.kind === TOKEN_KINDS.IDENTIFIER ||
    token.kind === TOKEN_KINDS.KEYWORD ||
    token.kind === TOKEN_KINDS.RESERVED
  );
}

// ============================================================
// TREE HELPERS
// ============================================================

/** Type of a declaration: lexemes of its `Type` child, unspaced */
export function typeText(owner: ParseTreeNode): string {
  const type = owner.children.find((c) => c.label === 'Type');
  if (type === undefined) return 'unknown';
  const parts: string[] = [];
  type.walk((node) => {
    if (node.token !== undefined) parts.push(node.token.lexeme);
  });
  return parts.join('');
}

/** First identifier terminal directly under the node */
export function declaredName(owner: ParseTreeNode): Token | undefined {
  return owner.children.find(
    (c) => c.token !== undefined && c.token.kind === TOKEN_KINDS.IDENTIFIER
  )?.token;
}

/** Detach children added after `length`; member recovery rollback */
export function truncateChildren(node: ParseTreeNode, length: number): void {
  while (node.children.length > length) {
    const last = node.child(node.children.length - 1);
    if (last === undefined) return;
    node.removeChild(last);
  }
}

/** Node with the given children appended in order */
export function makeNode(
  label: string,
  ...children: (ParseTreeNode | Token)[]
): ParseTreeNode {
  const node = ParseTreeNode.nonTerminal(label);
  for (const child of children) {
    node.addChild(
      child instanceof ParseTreeNode ? child : ParseTreeNode.terminal(child)
    );
  }
  return node;
}

// ============================================================
// SCOPES
// ============================================================

/** Blocks directly under these reuse the scope their owner opened */
const SHARING: readonly NonTerminal[] = ['Method', 'MainMethod', 'LambdaBlock'];
export const SCOPE_SHARING_OWNERS: ReadonlySet<string> = new Set(SHARING);

// ============================================================
// ERROR HINTS
// ============================================================

/** Expected terminals whose absence is reported as MISSING_TOKEN */
export const MISSING_TOKEN_HINTS: Readonly<Partial<Record<string, string>>> = {
  ';': "Add ';' to end the statement",
  ')': "Add ')' to close the parenthesis",
  ']': "Add ']' to close the bracket",
  '}': "Add '}' to close the block",
  ':': "Add ':' after the case label",
  '{': "Add '{' to open the body",
  '(': "Add '(' before the argument list",
};

/** Suggestions when input ends while a terminal is expected */
export const EOF_HINTS: Readonly<Partial<Record<string, string>>> = {
  ')': 'Check for an unclosed parenthesis',
  ']': 'Check for an unclosed bracket',
  '}': 'Check for an unclosed brace',
};
