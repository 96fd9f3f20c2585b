/**
 * CLI Shared Utilities
 * Version lookup, source snippets and the serialized shapes the CLI prints
 */

import { readFileSync } from 'node:fs';
import type { Diagnostic } from './diagnostics.js';
import type { ParseTreeNode } from './tree.js';
import type { Token, TokenKind } from './types.js';

// ============================================================
// VERSION
// ============================================================

/**
 * Package version from package.json, which sits one level above both
 * src/ and dist/.
 */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const data: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  return '0.0.0';
}

// ============================================================
// SOURCE SNIPPETS
// ============================================================

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

/**
 * Source lines around a 1-based line number. Lines outside the source
 * are clipped; an empty source or an out-of-range line yields none.
 */
export function extractSnippet(
  source: string,
  line: number,
  contextLines: number = 0
): SnippetLine[] {
  if (source === '') return [];
  const lines = source.split('\n');
  if (line < 1 || line > lines.length) return [];

  const first = Math.max(1, line - contextLines);
  const last = Math.min(lines.length, line + contextLines);
  const snippet: SnippetLine[] = [];
  for (let n = first; n <= last; n++) {
    snippet.push({
      lineNumber: n,
      content: (lines[n - 1] ?? '').replace(/\r$/, ''),
      isErrorLine: n === line,
    });
  }
  return snippet;
}

/**
 * Gutter-numbered source lines with a caret under the column:
 *
 * ```
 *   2 |   int = 5;
 *     |       ^
 * ```
 */
export function formatSnippet(
  source: string,
  line: number,
  column: number
): string[] {
  const snippet = extractSnippet(source, line);
  const width = String(line).length;
  const output: string[] = [];
  for (const entry of snippet) {
    const gutter = String(entry.lineNumber).padStart(width);
    output.push(`  ${gutter} | ${entry.content}`);
    if (entry.isErrorLine) {
      const pad = ' '.repeat(Math.max(0, column - 1));
      output.push(`  ${' '.repeat(width)} | ${pad}^`);
    }
  }
  return output;
}

// ============================================================
// SERIALIZED SHAPES
// ============================================================

export interface SerializedDiagnostic {
  readonly type: string;
  readonly message: string;
  readonly line: number;
  readonly column: number;
  readonly suggestion?: string;
}

export interface SerializedToken {
  readonly type: TokenKind;
  readonly lexeme: string;
  readonly line: number;
  readonly column: number;
}

export type SerializedTree =
  | { readonly label: string; readonly children: SerializedTree[] }
  | SerializedToken;

export function serializeDiagnostic(d: Diagnostic): SerializedDiagnostic {
  const base = {
    type: d.kind,
    message: d.message,
    line: d.line,
    column: d.column,
  };
  return d.suggestion === undefined
    ? base
    : { ...base, suggestion: d.suggestion };
}

export function serializeToken(token: Token): SerializedToken {
  return {
    type: token.kind,
    lexeme: token.lexeme,
    line: token.line,
    column: token.column,
  };
}

/** Terminals become tokens; non-terminals keep label and children */
export function serializeTree(node: ParseTreeNode): SerializedTree {
  if (node.token !== undefined) return serializeToken(node.token);
  return {
    label: node.label,
    children: node.children.map((c) => serializeTree(c)),
  };
}

/** One token per line: `line:column KIND "lexeme"` */
export function formatToken(token: Token): string {
  const lexeme = JSON.stringify(token.lexeme);
  return `${token.line}:${token.column} ${token.kind} ${lexeme}`;
}
