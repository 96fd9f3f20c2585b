/**
 * FIRST Sets
 * Immutable sets of terminals, keyed by token kind or by kind plus lexeme.
 */

import type { Token, TokenKind } from '../types.js';
import type { TerminalSymbol } from './symbols.js';

export function terminalKey(symbol: TerminalSymbol): string {
  return symbol.lexeme === undefined
    ? symbol.kind
    : `${symbol.kind} ${symbol.lexeme}`;
}

export class FirstSet {
  static readonly EMPTY = new FirstSet(new Set());

  private readonly keys: ReadonlySet<string>;

  private constructor(keys: ReadonlySet<string>) {
    this.keys = keys;
  }

  static of(keys: Iterable<string>): FirstSet {
    return new FirstSet(new Set(keys));
  }

  /** True when the token is in the set, by kind alone or by kind and lexeme */
  matches(token: Token): boolean {
    return (
      this.keys.has(token.kind) ||
      this.keys.has(`${token.kind} ${token.lexeme}`)
    );
  }

  has(kind: TokenKind, lexeme?: string): boolean {
    return this.keys.has(lexeme === undefined ? kind : `${kind} ${lexeme}`);
  }

  get size(): number {
    return this.keys.size;
  }

  get isEmpty(): boolean {
    return this.keys.size === 0;
  }

  /** Sorted keys, for display and tests */
  toArray(): string[] {
    return [...this.keys].sort();
  }
}
