/**
 * Parse Tree
 * One node type for every construct. Terminal nodes carry their token and
 * are labelled with its lexeme; non-terminal nodes are labelled with the
 * grammar name.
 */

import type { Token } from './types.js';

export class ParseTreeNode {
  readonly label: string;
  readonly token: Token | undefined;
  private readonly childList: ParseTreeNode[] = [];
  private parentNode: ParseTreeNode | null = null;

  private constructor(label: string, token: Token | undefined) {
    this.label = label;
    this.token = token;
  }

  static terminal(token: Token): ParseTreeNode {
    return new ParseTreeNode(token.lexeme, token);
  }

  static nonTerminal(name: string): ParseTreeNode {
    return new ParseTreeNode(name, undefined);
  }

  get isTerminal(): boolean {
    return this.token !== undefined;
  }

  get children(): readonly ParseTreeNode[] {
    return this.childList;
  }

  get parent(): ParseTreeNode | null {
    return this.parentNode;
  }

  addChild(child: ParseTreeNode): ParseTreeNode {
    return this.insertChild(this.childList.length, child);
  }

  insertChild(index: number, child: ParseTreeNode): ParseTreeNode {
    if (this.isTerminal) {
      throw new Error(`Terminal node '${this.label}' cannot have children`);
    }
    if (child.parentNode !== null) {
      child.parentNode.removeChild(child);
    }
    this.childList.splice(index, 0, child);
    child.parentNode = this;
    return child;
  }

  /** Detach a child; used when recovery rolls back a failed construct */
  removeChild(child: ParseTreeNode): boolean {
    const index = this.childList.indexOf(child);
    if (index === -1) return false;
    this.childList.splice(index, 1);
    child.parentNode = null;
    return true;
  }

  child(index: number): ParseTreeNode | undefined {
    return this.childList[index];
  }

  /** First descendant (depth-first, self included) with the label */
  find(label: string): ParseTreeNode | undefined {
    if (this.label === label) return this;
    for (const c of this.childList) {
      const found = c.find(label);
      if (found !== undefined) return found;
    }
    return undefined;
  }

  findAll(label: string): ParseTreeNode[] {
    const found: ParseTreeNode[] = [];
    this.walk((node) => {
      if (node.label === label) found.push(node);
    });
    return found;
  }

  walk(visit: (node: ParseTreeNode, depth: number) => void, depth = 0): void {
    visit(this, depth);
    for (const c of this.childList) c.walk(visit, depth + 1);
  }

  /** Terminal lexemes in order, joined by single spaces */
  text(): string {
    const parts: string[] = [];
    this.walk((node) => {
      if (node.token !== undefined) parts.push(node.token.lexeme);
    });
    return parts.join(' ');
  }

  /**
   * Compact bracketed form: terminals print as their lexeme,
   * non-terminals as `(Label child ...)`.
   */
  toSExpression(): string {
    if (this.isTerminal) return this.label;
    if (this.childList.length === 0) return `(${this.label})`;
    const inner = this.childList.map((c) => c.toSExpression()).join(' ');
    return `(${this.label} ${inner})`;
  }
}

/** Indented outline, one node per line */
export function renderTree(root: ParseTreeNode, indent = '  '): string {
  const lines: string[] = [];
  root.walk((node, depth) => {
    const prefix = indent.repeat(depth);
    if (node.token !== undefined) {
      lines.push(
        `${prefix}${node.token.kind} '${node.label}' ${node.token.line}:${node.token.column}`
      );
    } else {
      lines.push(`${prefix}${node.label}`);
    }
  });
  return lines.join('\n');
}
