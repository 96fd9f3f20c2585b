/**
 * Diagnostic Sink
 * Accumulates lexical and syntax diagnostics. Reporting never interrupts
 * the caller.
 */

import { ERROR_REGISTRY } from './error-registry.js';
import type { DiagnosticPhase, ErrorKind } from './error-registry.js';

export interface Diagnostic {
  readonly kind: ErrorKind;
  readonly phase: DiagnosticPhase;
  readonly code: string;
  readonly message: string;
  readonly line: number;
  readonly column: number;
  readonly suggestion?: string | undefined;
}

export class DiagnosticSink {
  private readonly items: Diagnostic[] = [];

  /**
   * Record a diagnostic. Without an explicit suggestion the registry's
   * resolution text is attached.
   */
  report(
    kind: ErrorKind,
    message: string,
    line: number,
    column: number,
    suggestion?: string
  ): Diagnostic {
    const definition = ERROR_REGISTRY.get(kind);
    const diagnostic: Diagnostic = {
      kind,
      phase: definition.phase,
      code: definition.code,
      message,
      line,
      column,
      suggestion: suggestion ?? definition.resolution,
    };
    this.items.push(diagnostic);
    return diagnostic;
  }

  hasErrors(): boolean {
    return this.items.length > 0;
  }

  all(): readonly Diagnostic[] {
    return this.items;
  }

  get count(): number {
    return this.items.length;
  }

  byPhase(phase: DiagnosticPhase): Diagnostic[] {
    return this.items.filter((d) => d.phase === phase);
  }

  /** Counts per kind, in first-reported order */
  countByKind(): Map<ErrorKind, number> {
    const counts = new Map<ErrorKind, number>();
    for (const d of this.items) {
      counts.set(d.kind, (counts.get(d.kind) ?? 0) + 1);
    }
    return counts;
  }
}
