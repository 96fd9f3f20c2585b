/**
 * Diagnostic Sink and Error Registry Tests
 */

import { describe, expect, it } from 'vitest';
import { ERROR_REGISTRY } from '../src/error-registry.js';
import { DiagnosticSink } from '../src/index.js';
import { levenshteinDistance, suggestSimilarNames } from '../src/suggest.js';

describe('DiagnosticSink', () => {
  it('attaches the registry code, phase and resolution', () => {
    const sink = new DiagnosticSink();
    const d = sink.report(
      'UNTERMINATED_COMMENT',
      'Unterminated block comment',
      3,
      5
    );

    expect(d).toEqual({
      kind: 'UNTERMINATED_COMMENT',
      phase: 'lexical',
      code: 'XP-L003',
      message: 'Unterminated block comment',
      line: 3,
      column: 5,
      suggestion: "Close the comment with '*/'",
    });
  });

  it('keeps an explicit suggestion', () => {
    const sink = new DiagnosticSink();
    const d = sink.report('MISSING_TOKEN', 'Expected ;', 1, 1, 'Add it');

    expect(d.suggestion).toBe('Add it');
  });

  it('keeps diagnostics in report order and counts them', () => {
    const sink = new DiagnosticSink();
    expect(sink.hasErrors()).toBe(false);

    sink.report('INVALID_CHARACTER', 'a', 1, 1);
    sink.report('UNEXPECTED_TOKEN', 'b', 1, 2);
    sink.report('INVALID_CHARACTER', 'c', 1, 3);

    expect(sink.hasErrors()).toBe(true);
    expect(sink.count).toBe(3);
    expect(sink.all().map((d) => d.message)).toEqual(['a', 'b', 'c']);
    expect(sink.byPhase('syntax').map((d) => d.message)).toEqual(['b']);
    expect([...sink.countByKind()]).toEqual([
      ['INVALID_CHARACTER', 2],
      ['UNEXPECTED_TOKEN', 1],
    ]);
  });
});

describe('ERROR_REGISTRY', () => {
  it('registers eleven lexical, five syntax and one fatal kind', () => {
    const phases = [...ERROR_REGISTRY.entries()].map(([, d]) => d.phase);

    expect(ERROR_REGISTRY.size).toBe(17);
    expect(phases.filter((p) => p === 'lexical')).toHaveLength(11);
    expect(phases.filter((p) => p === 'syntax')).toHaveLength(5);
    expect(phases.filter((p) => p === 'fatal')).toHaveLength(1);
  });

  it('looks definitions up by code', () => {
    expect(ERROR_REGISTRY.byCode('XP-S005')?.kind).toBe(
      'DUPLICATE_DECLARATION'
    );
    expect(ERROR_REGISTRY.byCode('XP-Z999')).toBeUndefined();
  });

  it('formats every code by phase letter and number', () => {
    for (const [, definition] of ERROR_REGISTRY.entries()) {
      expect(definition.code).toMatch(/^XP-[LSF]\d{3}$/);
    }
  });
});

describe('name suggestions', () => {
  it('measures edit distance', () => {
    expect(levenshteinDistance('whle', 'while')).toBe(1);
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
  });

  it('ranks close names by distance, then alphabetically', () => {
    expect(
      suggestSimilarNames('fro', ['for', 'from', 'print', 'do', 'fro'])
    ).toEqual(['from', 'do', 'for']);
  });

  it('suggests nothing for an empty name', () => {
    expect(suggestSimilarNames('', ['a'])).toEqual([]);
  });
});
