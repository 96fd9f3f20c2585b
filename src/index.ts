/**
 * X-presso Front End
 * Exports lexer, grammar, parser, parse tree and diagnostic types
 */

export {
  createLexer,
  DEFAULT_MAX_LOOKAHEAD,
  type LexerOptions,
  type LexResult,
  nextToken,
  significantTokens,
  tokenize,
  tokenStream,
} from './lexer/index.js';
export {
  type ParseOptions,
  type ParseResult,
  parse,
  parseTokens,
  Parser,
  PRECEDENCE_LEVELS,
  type PrecedenceLevel,
} from './parser/index.js';
export {
  createGrammar,
  FirstSet,
  type Grammar,
  type GrammarSymbol,
  NON_TERMINALS,
  type NonTerminal,
  type Production,
} from './grammar/index.js';
export { ParseTreeNode, renderTree } from './tree.js';
export { GLOBAL_SCOPE, type SymbolEntry, SymbolTable } from './symbols.js';
export { type Diagnostic, DiagnosticSink } from './diagnostics.js';
export { readSourceFile } from './source.js';
export {
  createDefaultConfig,
  loadConfig,
  type OutputFormat,
  type XpressoConfig,
} from './config.js';

// ============================================================
// TOKENS AND ERRORS
// ============================================================
export {
  ConfigError,
  isTrivia,
  type SourceLocation,
  SourceReadError,
  type Token,
  TOKEN_KINDS,
  type TokenKind,
  UsageError,
  XpressoError,
  type XpressoErrorCode,
} from './types.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type DiagnosticPhase,
  type ErrorDefinition,
  type ErrorKind,
  ERROR_REGISTRY,
} from './error-registry.js';
