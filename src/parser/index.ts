/**
 * X-presso Parser
 * Main entry point and re-exports
 */

import { DiagnosticSink, type Diagnostic } from '../diagnostics.js';
import { createGrammar, type Grammar } from '../grammar/index.js';
import { tokenize } from '../lexer/index.js';
import { SymbolTable, type SymbolEntry } from '../symbols.js';
import type { ParseTreeNode } from '../tree.js';
import type { Token } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-rules.js';
import './recovery.js';
import './parser-program.js';
import './parser-statements.js';
import './parser-expr.js';

export interface ParseOptions {
  /** Grammar table; a fresh one is built when omitted */
  readonly grammar?: Grammar | undefined;
  /** Shared sink; a private one is created when omitted */
  readonly sink?: DiagnosticSink | undefined;
  readonly symbols?: SymbolTable | undefined;
  /** Forwarded to the lexer by `parse` */
  readonly maxLookahead?: number | undefined;
}

export interface ParseResult {
  readonly tree: ParseTreeNode;
  /** Every diagnostic in the sink, lexical ones first */
  readonly diagnostics: readonly Diagnostic[];
  readonly symbols: SymbolTable;
  /** Successful declarations in source order, with their scope names */
  readonly declarations: readonly SymbolEntry[];
}

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse an already tokenized source. Whitespace and comments are dropped;
 * a missing EOF is supplied.
 *
 * @example
 * ```typescript
 * const { tree, diagnostics } = parseTokens(tokenize(source).tokens);
 * ```
 */
export function parseTokens(
  tokens: readonly Token[],
  options: ParseOptions = {}
): ParseResult {
  const sink = options.sink ?? new DiagnosticSink();
  const symbols = options.symbols ?? new SymbolTable();
  const grammar = options.grammar ?? createGrammar();

  const parser = new Parser(tokens, { grammar, sink, symbols });
  const tree = parser.parse();

  return {
    tree,
    diagnostics: [...sink.all()],
    symbols,
    declarations: [...parser.state.declarations],
  };
}

/**
 * Tokenize and parse X-presso source. Lexer and parser report to one sink,
 * so `diagnostics` holds both phases.
 *
 * @example
 * ```typescript
 * const result = parse('class Shop { int count = 0; }');
 * if (result.diagnostics.length === 0) console.log(result.tree.label);
 * ```
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const sink = options.sink ?? new DiagnosticSink();
  const { tokens } = tokenize(source, {
    sink,
    maxLookahead: options.maxLookahead,
  });
  return parseTokens(tokens, { ...options, sink });
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export {
  createParserState,
  type Failure,
  type Parsed,
  type ParserServices,
  type ParserState,
  type Success,
} from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';

export {
  PRECEDENCE_LEVELS,
  type Associativity,
  type PrecedenceLevel,
} from './precedence.js';
