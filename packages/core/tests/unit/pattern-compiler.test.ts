import { describe, it, expect } from 'vitest';
import {
  compileBlocks,
  compileExpectation,
  compilePattern,
  describePattern,
  escapeRegExp,
  namedGroups,
} from '../../src/pattern-compiler.js';
import type { CompileContext } from '../../src/pattern-compiler.js';

function context(literalMode: 'substring' | 'line' = 'substring'): CompileContext {
  return { path: 'step', literalMode, issues: [] };
}

describe('pattern-compiler', () => {
  it('should escape regex metacharacters', () => {
    expect(escapeRegExp('a.b*(c)')).toBe('a\\.b\\*\\(c\\)');
  });

  it('should list named groups once each', () => {
    expect(namedGroups('(?<a>x)(?<b>y)(?<a>z)|(?:q)')).toEqual(['a', 'b']);
  });

  it('should use the suite literal mode for bare strings', () => {
    const entry = compilePattern('hello', context('line'), 'step');
    expect(entry?.pattern).toEqual({ kind: 'literal', text: 'hello', mode: 'line' });
  });

  it('should let a pattern override the literal mode', () => {
    const entry = compilePattern({ literal: 'hello', mode: 'substring' }, context('line'), 'step');
    expect(entry?.pattern).toEqual({ kind: 'literal', text: 'hello', mode: 'substring' });
  });

  it('should record an issue for an invalid regex', () => {
    const ctx = context();
    expect(compilePattern({ regex: '(unclosed' }, ctx, 'step.expect[0]')).toBeUndefined();
    expect(ctx.issues).toHaveLength(1);
    expect(ctx.issues[0]).toMatch(/^step\.expect\[0\]: invalid regular expression \/\(unclosed\//);
  });

  it('should reject stateful regex flags', () => {
    const ctx = context();
    expect(compilePattern({ regex: 'a', flags: 'g' }, ctx, 'step')).toBeUndefined();
    expect(ctx.issues).toEqual(['step: unsupported regex flags "g" (allowed: i, m, s, u)']);
  });

  it('should compile composites with default slot patterns and lazy gaps', () => {
    const entry = compilePattern(
      { composite: ['id: ', { capture: 'id' }, { wildcard: true }, '.'] },
      context(),
      'step',
    );
    expect(entry?.pattern.kind).toBe('composite');
    if (entry?.pattern.kind !== 'composite') return;
    expect(entry.pattern.regex.source).toBe('^id: (?<id>\\S+).*?\\.$');
    expect(entry.pattern.slots).toEqual(['id']);
    expect(describePattern(entry.pattern)).toBe('id: {id}*.');
  });

  it('should reject duplicate composite slots', () => {
    const ctx = context();
    compilePattern({ composite: [{ capture: 'x' }, ' ', { capture: 'x' }] }, ctx, 'step');
    expect(ctx.issues).toEqual(['step: capture slot(s) declared twice: x']);
  });

  it('should group consecutive patterns sharing a block tag', () => {
    const blocks = compileBlocks(
      ['a', { literal: 'b', block: 'unordered' }, { literal: 'c', block: 'unordered' }, 'd'],
      context(),
    );
    expect(blocks.map((b) => [b.order, b.entries.length])).toEqual([
      ['ordered', 1],
      ['unordered', 2],
      ['ordered', 1],
    ]);
  });

  it('should keep explicit blocks separate from neighbouring patterns', () => {
    const blocks = compileBlocks(['a', { ordered: ['b', 'c'] }, 'd'], context());
    expect(blocks.map((b) => b.entries.map((e) => e.label))).toEqual([['"a"'], ['"b"', '"c"'], ['"d"']]);
  });

  it('should reject adjacent patterns inside unordered blocks', () => {
    const ctx = context();
    compileBlocks([{ unordered: [{ literal: 'a', adjacent: true }] }], ctx);
    expect(ctx.issues).toEqual(['step[0].unordered[0]: "adjacent" only applies to patterns in ordered blocks']);
  });

  it('should reject a wildcard in reject patterns', () => {
    const ctx = context();
    const compiled = compileExpectation({ reject: [{ wildcard: true }] }, ctx);
    expect(compiled.reject).toEqual([]);
    expect(ctx.issues).toEqual(['step.reject[0]: a wildcard would reject every output']);
  });

  it('should default to stdout and exit code 0', () => {
    const compiled = compileExpectation({}, context());
    expect(compiled).toEqual({ stream: 'stdout', blocks: [], reject: [], exitCode: 0 });
  });
});
