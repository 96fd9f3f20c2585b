/**
 * Grammar
 * Declarative productions consumed by the parser
 */

export { createGrammar, type Grammar } from './grammar.js';
export { FirstSet, terminalKey } from './first.js';
export { defineRules, NODE_MODES, type RuleTable } from './rules.js';
export {
  describeKind,
  describeNonTerminal,
  describeSymbol,
  kind,
  NON_TERMINALS,
  sym,
  word,
  type GrammarSymbol,
  type NodeMode,
  type NonTerminal,
  type NonTerminalSymbol,
  type OptionalSymbol,
  type Production,
  type RepeatSymbol,
  type TerminalSymbol,
} from './symbols.js';
