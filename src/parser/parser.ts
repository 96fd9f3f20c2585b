/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using declaration merging for type
 * safety:
 * - parser-rules.ts: grammar-table interpreter and terminal matching
 * - recovery.ts: recovering lists and synchronization
 * - parser-program.ts: classes, members, methods and scopes
 * - parser-statements.ts: statement dispatch, blocks, loops, declarations
 * - parser-expr.ts: precedence climbing, access chains, lambdas
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens, { grammar, sink, symbols });
 * const tree = parser.parse();
 * ```
 */

import type { ParseTreeNode } from '../tree.js';
import type { Token } from '../types.js';
import {
  createParserState,
  type ParserServices,
  type ParserState,
} from './state.js';

export class Parser {
  /** Token position, services and recovery bookkeeping */
  state: ParserState;

  constructor(tokens: readonly Token[], services: ParserServices) {
    this.state = createParserState(tokens, services);
  }

  /**
   * Parse the whole token sequence into a `Program` tree. Never throws for
   * malformed input; problems are reported to the sink.
   */
  parse(): ParseTreeNode {
    return this.parseProgram();
  }
}
