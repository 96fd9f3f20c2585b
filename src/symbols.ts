/**
 * Symbol Table
 * Stack of named scopes over a global scope. Only the parser writes to it.
 */

export interface SymbolEntry {
  readonly name: string;
  readonly type: string;
  readonly scopeId: number;
  /** Qualified scope name, e.g. `Shop.total` */
  readonly scope: string;
}

interface Scope {
  readonly id: number;
  readonly name: string;
  readonly entries: Map<string, SymbolEntry>;
}

export const GLOBAL_SCOPE = 'global';

export class SymbolTable {
  private readonly global: Scope = {
    id: 0,
    name: GLOBAL_SCOPE,
    entries: new Map(),
  };
  private readonly stack: Scope[] = [];
  private nextId = 1;

  /** Push a scope; its qualified name extends the enclosing one */
  enterScope(name: string): void {
    const outer = this.stack[this.stack.length - 1];
    this.stack.push({
      id: this.nextId++,
      name: outer === undefined ? name : `${outer.name}.${name}`,
      entries: new Map(),
    });
  }

  /** Pop the innermost scope, discarding its entries */
  exitScope(): void {
    if (this.stack.pop() === undefined) {
      throw new Error('exitScope called with no open scope');
    }
  }

  /** False when the name already exists in the current scope */
  insert(name: string, type: string): boolean {
    const scope = this.innermost();
    if (scope.entries.has(name)) return false;
    scope.entries.set(name, {
      name,
      type,
      scopeId: scope.id,
      scope: scope.name,
    });
    return true;
  }

  lookup(name: string): SymbolEntry | undefined {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      const entry = this.stack[i]?.entries.get(name);
      if (entry !== undefined) return entry;
    }
    return this.global.entries.get(name);
  }

  /** Entry declared in the current scope only */
  lookupLocal(name: string): SymbolEntry | undefined {
    return this.innermost().entries.get(name);
  }

  get currentScope(): string {
    return this.innermost().name;
  }

  /** Number of open scopes above global */
  get depth(): number {
    return this.stack.length;
  }

  globals(): SymbolEntry[] {
    return [...this.global.entries.values()];
  }

  private innermost(): Scope {
    return this.stack[this.stack.length - 1] ?? this.global;
  }
}
