/**
 * Grammar
 * Immutable grammar value: productions, nullability, FIRST sets and
 * node modes. Built once by createGrammar() and handed to the parser.
 */

import { FirstSet, terminalKey } from './first.js';
import { defineRules, NODE_MODES, type RuleTable } from './rules.js';
import {
  type GrammarSymbol,
  type NodeMode,
  NON_TERMINALS,
  type NonTerminal,
  type OptionalSymbol,
  type Production,
  type RepeatSymbol,
} from './symbols.js';

export interface Grammar {
  readonly nonTerminals: readonly NonTerminal[];
  productions(name: NonTerminal): readonly Production[];
  first(name: NonTerminal): FirstSet;
  /** FIRST set of the sub-sequence inside an optional or repeated group */
  firstOfGroup(group: OptionalSymbol | RepeatSymbol): FirstSet;
  firstOfProduction(production: Production): FirstSet;
  nullable(name: NonTerminal): boolean;
  productionNullable(production: Production): boolean;
  nodeMode(name: NonTerminal): NodeMode;
}

// ============================================================
// ANALYSIS
// ============================================================

/** Mutable working state for the fixed-point passes */
interface Analysis {
  readonly rules: RuleTable;
  readonly nullable: Set<NonTerminal>;
  readonly first: Map<NonTerminal, Set<string>>;
}

function symbolNullable(analysis: Analysis, symbol: GrammarSymbol): boolean {
  switch (symbol.type) {
    case 'terminal':
      return false;
    case 'nonterminal':
      return analysis.nullable.has(symbol.name);
    case 'optional':
      return true;
    case 'repeat':
      return (
        symbol.min === 0 ||
        symbol.symbols.every((s) => symbolNullable(analysis, s))
      );
  }
}

function sequenceNullable(
  analysis: Analysis,
  symbols: readonly GrammarSymbol[]
): boolean {
  return symbols.every((s) => symbolNullable(analysis, s));
}

/** Add FIRST of a sequence into `into`; returns true when `into` grew */
function collectFirst(
  analysis: Analysis,
  symbols: readonly GrammarSymbol[],
  into: Set<string>
): boolean {
  const before = into.size;
  for (const symbol of symbols) {
    switch (symbol.type) {
      case 'terminal':
        into.add(terminalKey(symbol));
        break;
      case 'nonterminal':
        for (const key of analysis.first.get(symbol.name) ?? []) into.add(key);
        break;
      case 'optional':
      case 'repeat':
        collectFirst(analysis, symbol.symbols, into);
        break;
    }
    if (!symbolNullable(analysis, symbol)) break;
  }
  return into.size > before;
}

function computeNullable(analysis: Analysis): void {
  let changed = true;
  while (changed) {
    changed = false;
    for (const name of NON_TERMINALS) {
      if (analysis.nullable.has(name)) continue;
      if (analysis.rules[name].some((p) => sequenceNullable(analysis, p))) {
        analysis.nullable.add(name);
        changed = true;
      }
    }
  }
}

function computeFirst(analysis: Analysis): void {
  let changed = true;
  while (changed) {
    changed = false;
    for (const name of NON_TERMINALS) {
      const set = analysis.first.get(name) ?? new Set<string>();
      analysis.first.set(name, set);
      for (const production of analysis.rules[name]) {
        if (collectFirst(analysis, production, set)) changed = true;
      }
    }
  }
}

function validateRules(rules: RuleTable): void {
  const visit = (owner: NonTerminal, symbols: readonly GrammarSymbol[]) => {
    for (const symbol of symbols) {
      if (symbol.type === 'nonterminal' && rules[symbol.name] === undefined) {
        throw new Error(`${owner} refers to undefined rule ${symbol.name}`);
      }
      if (symbol.type === 'optional' || symbol.type === 'repeat') {
        if (symbol.symbols.length === 0) {
          throw new Error(`${owner} contains an empty group`);
        }
        visit(owner, symbol.symbols);
      }
    }
  };
  for (const name of NON_TERMINALS) {
    const productions = rules[name];
    if (productions.length === 0) {
      throw new Error(`Rule ${name} has no productions`);
    }
    for (const production of productions) visit(name, production);
  }
}

function freezeProduction(symbols: readonly GrammarSymbol[]): void {
  for (const symbol of symbols) {
    if (symbol.type === 'optional' || symbol.type === 'repeat') {
      freezeProduction(symbol.symbols);
    }
    Object.freeze(symbol);
  }
  Object.freeze(symbols);
}

// ============================================================
// FACTORY
// ============================================================

/**
 * Build the grammar. The returned value and every production in it are
 * frozen; FIRST sets are computed eagerly for rules and lazily (then
 * cached) for groups and productions.
 */
export function createGrammar(rules: RuleTable = defineRules()): Grammar {
  validateRules(rules);

  const analysis: Analysis = { rules, nullable: new Set(), first: new Map() };
  computeNullable(analysis);
  computeFirst(analysis);

  for (const name of NON_TERMINALS) {
    for (const production of rules[name]) freezeProduction(production);
    Object.freeze(rules[name]);
  }
  Object.freeze(rules);

  const firstSets = new Map<NonTerminal, FirstSet>();
  for (const name of NON_TERMINALS) {
    firstSets.set(name, FirstSet.of(analysis.first.get(name) ?? []));
  }

  const sequenceCache = new WeakMap<object, FirstSet>();
  const firstOfSequence = (
    key: object,
    symbols: readonly GrammarSymbol[]
  ): FirstSet => {
    const cached = sequenceCache.get(key);
    if (cached !== undefined) return cached;
    const keys = new Set<string>();
    collectFirst(analysis, symbols, keys);
    const set = FirstSet.of(keys);
    sequenceCache.set(key, set);
    return set;
  };

  const grammar: Grammar = {
    nonTerminals: NON_TERMINALS,
    productions: (name) => rules[name],
    first: (name) => firstSets.get(name) ?? FirstSet.EMPTY,
    firstOfGroup: (group) => firstOfSequence(group, group.symbols),
    firstOfProduction: (production) =>
      firstOfSequence(production, production),
    nullable: (name) => analysis.nullable.has(name),
    productionNullable: (production) => sequenceNullable(analysis, production),
    nodeMode: (name) => NODE_MODES[name] ?? 'node',
  };
  return Object.freeze(grammar);
}
