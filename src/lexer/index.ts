/**
 * Lexer
 * Converts source text into tokens
 */

export {
  createLexer,
  nextToken,
  significantTokens,
  tokenize,
  tokenStream,
  type LexResult,
} from './tokenizer.js';
export {
  DEFAULT_MAX_LOOKAHEAD,
  type LexerOptions,
  type LexerState,
} from './state.js';
export { classifySymbol } from './operators.js';
export {
  CLASS_MODIFIERS,
  DATA_TYPES,
  KEYWORDS,
  MODIFIERS,
  RESERVED_WORDS,
} from './vocabulary.js';
