/**
 * @module pattern-matcher
 * Verification of captured output against an {@link OutputExpectation}.
 *
 * Output is matched line by line. Blocks share one cursor:
 * - ordered blocks scan forward from the cursor, first match wins
 *   (anchored scan, no backtracking); `adjacent` patterns must match the
 *   line at the cursor itself
 * - unordered blocks assign each pattern a distinct line at or after the
 *   cursor, finding a full assignment whenever one exists; the cursor
 *   then moves past the last line consumed
 *
 * Captured slots must agree with variables already bound in the run
 * (or earlier in the same step) unless the pattern is marked `rebind`.
 */

import type {
  OutputExpectation,
  Pattern,
  PatternBlock,
  PatternEntry,
  PatternOutcome,
  StepFailure,
} from './types.js';

/** Captured process output handed to the matcher */
export interface MatchInput {
  stdout: string;
  stderr: string;
  /** `undefined` skips the exit-code check (e.g. a session still running) */
  exitCode?: number | null;
}

export interface VerificationOutcome {
  passed: boolean;
  /** Variables captured by this step (to be committed when it passed) */
  captures: Record<string, string>;
  matched: PatternOutcome[];
  unmatched: PatternOutcome[];
  failure?: StepFailure;
}

/**
 * Split text into lines. `\r\n` and `\n` both end a line; a trailing line
 * terminator does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/** Select the text a step verifies */
export function selectStream(expect: OutputExpectation, input: MatchInput): string {
  switch (expect.stream) {
    case 'stdout':
      return input.stdout;
    case 'stderr':
      return input.stderr;
    case 'both':
      if (input.stdout === '' || input.stdout.endsWith('\n')) {
        return input.stdout + input.stderr;
      }
      return `${input.stdout}\n${input.stderr}`;
  }
}

/**
 * Match one pattern against one line.
 *
 * @returns The captured slot values (empty when the pattern has no
 *   slots), or `null` when the line does not match
 */
export function matchLine(pattern: Pattern, line: string): Record<string, string> | null {
  switch (pattern.kind) {
    case 'literal':
      if (pattern.mode === 'line') {
        return line === pattern.text ? {} : null;
      }
      return line.includes(pattern.text) ? {} : null;
    case 'wildcard':
      return {};
    case 'regex':
    case 'composite': {
      const match = pattern.regex.exec(line);
      if (!match) return null;
      const captures: Record<string, string> = {};
      for (const slot of pattern.slots) {
        const value = match.groups?.[slot];
        if (value !== undefined) {
          captures[slot] = value;
        }
      }
      return captures;
    }
  }
}

/**
 * Verify output against an expectation.
 *
 * @param expect - Compiled expectation of the step
 * @param input - Captured stdout/stderr and exit code
 * @param bound - Variables bound in the run before this step
 */
export function verifyOutput(
  expect: OutputExpectation,
  input: MatchInput,
  bound: ReadonlyMap<string, string>,
): VerificationOutcome {
  const lines = splitLines(selectStream(expect, input));
  const state: MatchState = {
    lines,
    cursor: 0,
    bound,
    captures: new Map(),
    matched: [],
    unmatched: [],
  };

  if (
    input.exitCode !== undefined &&
    expect.exitCode !== 'any' &&
    input.exitCode !== expect.exitCode
  ) {
    state.failure = {
      kind: 'exit_code',
      message: input.exitCode === null
        ? `Expected exit code ${expect.exitCode}, but the process was terminated by a signal`
        : `Expected exit code ${expect.exitCode}, got ${input.exitCode}`,
    };
  }

  for (const block of expect.blocks) {
    if (block.order === 'ordered') {
      matchOrdered(block, state);
    } else {
      matchUnordered(block, state);
    }
  }

  for (const entry of expect.reject) {
    const index = lines.findIndex((line) => matchLine(entry.pattern, line) !== null);
    if (index >= 0) {
      state.failure ??= {
        kind: 'rejected_output',
        message: `Line ${index + 1} matches rejected pattern ${entry.label}: ${lines[index] ?? ''}`,
      };
    }
  }

  return {
    passed: state.failure === undefined,
    captures: Object.fromEntries(state.captures),
    matched: state.matched,
    unmatched: state.unmatched,
    failure: state.failure,
  };
}

// =====================================================================
// Internal
// =====================================================================

interface MatchState {
  lines: string[];
  cursor: number;
  bound: ReadonlyMap<string, string>;
  captures: Map<string, string>;
  matched: PatternOutcome[];
  unmatched: PatternOutcome[];
  failure?: StepFailure;
}

function matchOrdered(block: PatternBlock, state: MatchState): void {
  for (const entry of block.entries) {
    if (entry.pattern.kind === 'wildcard') {
      state.matched.push({ label: entry.label, optional: entry.optional });
      continue;
    }

    const last = entry.adjacent ? Math.min(state.cursor, state.lines.length - 1) : state.lines.length - 1;
    let hit: { index: number; captures: Record<string, string> } | undefined;
    for (let i = state.cursor; i <= last; i++) {
      const captures = matchLine(entry.pattern, state.lines[i] ?? '');
      if (captures) {
        hit = { index: i, captures };
        break;
      }
    }

    if (!hit) {
      recordMiss(entry, state, entry.adjacent
        ? `Line ${state.cursor + 1} does not match ${entry.label}`
        : `No line ${state.cursor === 0 ? 'in the output' : `after line ${state.cursor}`} matches ${entry.label}`);
      continue;
    }

    recordHit(entry, hit.index, hit.captures, state);
    state.cursor = hit.index + 1;
  }
}

function matchUnordered(block: PatternBlock, state: MatchState): void {
  const entries = block.entries;
  const candidates = entries.map((entry) => {
    const found: Array<{ index: number; captures: Record<string, string> }> = [];
    if (entry.pattern.kind === 'wildcard') return found;
    for (let i = state.cursor; i < state.lines.length; i++) {
      const captures = matchLine(entry.pattern, state.lines[i] ?? '');
      if (captures && (entry.rebind || agreesWith(captures, state.bound))) {
        found.push({ index: i, captures });
      }
    }
    return found;
  });

  // line index -> entry index
  const owner = new Map<number, number>();
  const assign = (e: number, visited: Set<number>): boolean => {
    for (const { index } of candidates[e] ?? []) {
      if (visited.has(index)) continue;
      visited.add(index);
      const holder = owner.get(index);
      if (holder === undefined || assign(holder, visited)) {
        owner.set(index, e);
        return true;
      }
    }
    return false;
  };

  // required patterns claim lines before optional ones
  const byPriority = entries
    .map((entry, e) => ({ entry, e }))
    .filter(({ entry }) => entry.pattern.kind !== 'wildcard')
    .sort((a, b) => Number(a.entry.optional) - Number(b.entry.optional));
  for (const { e } of byPriority) {
    assign(e, new Set());
  }

  // hits are recorded in line order so captures are checked as they appear
  let lastTaken = state.cursor - 1;
  for (const [index, e] of [...owner].sort((a, b) => a[0] - b[0])) {
    const entry = entries[e];
    const hit = candidates[e]?.find((candidate) => candidate.index === index);
    if (!entry || !hit) continue;
    lastTaken = Math.max(lastTaken, index);
    recordHit(entry, index, hit.captures, state);
  }

  const assigned = new Set(owner.values());
  entries.forEach((entry, e) => {
    if (entry.pattern.kind === 'wildcard') {
      state.matched.push({ label: entry.label, optional: entry.optional });
    } else if (!assigned.has(e)) {
      recordMiss(entry, state, `No remaining line ${state.cursor === 0 ? 'in the output' : `after line ${state.cursor}`} matches ${entry.label} (unordered block)`);
    }
  });

  state.cursor = Math.max(state.cursor, lastTaken + 1);
}

function agreesWith(captures: Record<string, string>, bound: ReadonlyMap<string, string>): boolean {
  return Object.entries(captures).every(([name, value]) => {
    const previous = bound.get(name);
    return previous === undefined || previous === value;
  });
}

function recordMiss(entry: PatternEntry, state: MatchState, message: string): void {
  state.unmatched.push({ label: entry.label, optional: entry.optional });
  if (!entry.optional) {
    state.failure ??= { kind: 'pattern_mismatch', message };
  }
}

function recordHit(
  entry: PatternEntry,
  index: number,
  captures: Record<string, string>,
  state: MatchState,
): void {
  const text = state.lines[index] ?? '';
  state.matched.push({ label: entry.label, optional: entry.optional, line: index, text });

  for (const [name, value] of Object.entries(captures)) {
    const previous = state.captures.get(name) ?? state.bound.get(name);
    if (previous !== undefined && previous !== value && !entry.rebind) {
      state.failure ??= {
        kind: 'inconsistent_capture',
        message: `Inconsistent capture for "${name}": previously bound to "${previous}", ${entry.label} captured "${value}" on line ${index + 1}`,
      };
      return;
    }
  }

  for (const [name, value] of Object.entries(captures)) {
    state.captures.set(name, value);
  }
}
