/**
 * @module pattern-compiler
 * Load-time compilation of expected-output specifications.
 *
 * Turns validated pattern specs into {@link Pattern} values with their
 * regular expressions compiled once. Problems are collected as issue
 * strings so a suite load can report all of them together.
 */

import type {
  BlockOrder,
  CompositePart,
  LiteralMode,
  OutputExpectation,
  OutputStream,
  Pattern,
  PatternBlock,
  PatternEntry,
} from './types.js';
import type { BlockSpec, ExpectEntry, PatternSpec } from './suite-schema.js';
import { errorMessage } from './errors.js';

export interface CompileContext {
  /** Location prefix for issues, e.g. `scenarios.create.steps[0].expect` */
  path: string;
  literalMode: LiteralMode;
  issues: string[];
}

const SLOT_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const NAMED_GROUP = /\(\?<([A-Za-z_$][\w$]*)>/g;
const ALLOWED_FLAGS = /^[imsu]*$/;
const DEFAULT_SLOT_PATTERN = '\\S+';

/** Escape a string for literal use inside a regular expression */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Names of the named capture groups declared in a regex source */
export function namedGroups(source: string): string[] {
  const names: string[] = [];
  for (const match of source.matchAll(NAMED_GROUP)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/** Short human-readable description of a pattern */
export function describePattern(pattern: Pattern): string {
  switch (pattern.kind) {
    case 'literal':
      return pattern.mode === 'line' ? `line "${pattern.text}"` : `"${pattern.text}"`;
    case 'regex':
      return `/${pattern.source}/${pattern.regex.flags}`;
    case 'wildcard':
      return '*';
    case 'composite':
      return pattern.parts
        .map((part) => {
          switch (part.kind) {
            case 'text':
              return part.text;
            case 'slot':
              return `{${part.name}}`;
            case 'gap':
              return '*';
          }
        })
        .join('');
  }
}

function compileRegex(source: string, flags: string, ctx: CompileContext, where: string): RegExp | undefined {
  if (!ALLOWED_FLAGS.test(flags)) {
    ctx.issues.push(`${where}: unsupported regex flags "${flags}" (allowed: i, m, s, u)`);
    return undefined;
  }
  try {
    return new RegExp(source, flags);
  } catch (err) {
    ctx.issues.push(`${where}: invalid regular expression /${source}/: ${errorMessage(err)}`);
    return undefined;
  }
}

function checkSlotNames(slots: string[], ctx: CompileContext, where: string): boolean {
  const bad = slots.filter((slot) => !SLOT_NAME.test(slot));
  if (bad.length > 0) {
    ctx.issues.push(`${where}: invalid capture slot name(s): ${bad.join(', ')}`);
    return false;
  }
  return true;
}

/**
 * Compile one pattern spec. Returns `undefined` (and records an issue)
 * when the pattern cannot be compiled.
 */
export function compilePattern(spec: PatternSpec, ctx: CompileContext, where: string): PatternEntry | undefined {
  if (typeof spec === 'string') {
    return makeEntry({ kind: 'literal', text: spec, mode: ctx.literalMode }, {});
  }

  if ('literal' in spec) {
    return makeEntry({ kind: 'literal', text: spec.literal, mode: spec.mode ?? ctx.literalMode }, spec);
  }

  if ('regex' in spec) {
    const regex = compileRegex(spec.regex, spec.flags ?? '', ctx, where);
    if (!regex) return undefined;
    const slots = namedGroups(spec.regex);
    if (!checkSlotNames(slots, ctx, where)) return undefined;
    return makeEntry({ kind: 'regex', source: spec.regex, regex, slots }, spec);
  }

  if ('composite' in spec) {
    const parts = spec.composite.map((part): CompositePart => {
      if (typeof part === 'string') return { kind: 'text', text: part };
      if ('capture' in part) return { kind: 'slot', name: part.capture, pattern: part.pattern ?? DEFAULT_SLOT_PATTERN };
      return { kind: 'gap' };
    });

    const declared = parts.flatMap((part) => (part.kind === 'slot' ? [part.name] : []));
    const duplicates = declared.filter((name, i) => declared.indexOf(name) !== i);
    if (duplicates.length > 0) {
      ctx.issues.push(`${where}: capture slot(s) declared twice: ${[...new Set(duplicates)].join(', ')}`);
      return undefined;
    }
    if (!checkSlotNames(declared, ctx, where)) return undefined;

    const body = parts
      .map((part) => {
        switch (part.kind) {
          case 'text':
            return escapeRegExp(part.text);
          case 'slot':
            return `(?<${part.name}>${part.pattern})`;
          case 'gap':
            return '.*?';
        }
      })
      .join('');
    // a composite describes the whole line
    const source = `^${body}$`;
    const regex = compileRegex(source, '', ctx, where);
    if (!regex) return undefined;
    return makeEntry({ kind: 'composite', parts, regex, slots: namedGroups(source) }, spec);
  }

  return makeEntry({ kind: 'wildcard' }, spec);
}

function makeEntry(
  pattern: Pattern,
  flags: { optional?: boolean; adjacent?: boolean; rebind?: boolean },
): PatternEntry {
  return {
    pattern,
    optional: flags.optional ?? false,
    adjacent: flags.adjacent ?? false,
    rebind: flags.rebind ?? false,
    label: describePattern(pattern),
  };
}

function isBlockSpec(entry: ExpectEntry): entry is BlockSpec {
  return typeof entry !== 'string' && ('ordered' in entry || 'unordered' in entry);
}

function blockTag(spec: PatternSpec): BlockOrder {
  return typeof spec === 'string' ? 'ordered' : spec.block ?? 'ordered';
}

/**
 * Group expect entries into blocks.
 *
 * Explicit `{ ordered: [...] }` / `{ unordered: [...] }` entries each form
 * their own block; consecutive bare patterns sharing a `block` tag
 * (default `ordered`) are grouped together.
 */
export function compileBlocks(entries: ExpectEntry[], ctx: CompileContext): PatternBlock[] {
  const blocks: PatternBlock[] = [];
  let open: PatternBlock | undefined;

  entries.forEach((entry, i) => {
    const where = `${ctx.path}[${i}]`;

    if (isBlockSpec(entry)) {
      const order: BlockOrder = 'ordered' in entry ? 'ordered' : 'unordered';
      const specs = 'ordered' in entry ? entry.ordered : entry.unordered;
      const block: PatternBlock = { order, entries: [] };
      specs.forEach((spec, j) => {
        const compiled = compileBlockMember(spec, order, ctx, `${where}.${order}[${j}]`);
        if (compiled) block.entries.push(compiled);
      });
      blocks.push(block);
      open = undefined;
      return;
    }

    const order = blockTag(entry);
    const compiled = compileBlockMember(entry, order, ctx, where);
    if (!compiled) return;
    if (!open || open.order !== order) {
      open = { order, entries: [] };
      blocks.push(open);
    }
    open.entries.push(compiled);
  });

  return blocks;
}

function compileBlockMember(
  spec: PatternSpec,
  order: BlockOrder,
  ctx: CompileContext,
  where: string,
): PatternEntry | undefined {
  if (typeof spec !== 'string' && spec.block !== undefined && spec.block !== order) {
    ctx.issues.push(`${where}: block tag "${spec.block}" conflicts with enclosing ${order} block`);
    return undefined;
  }
  const compiled = compilePattern(spec, ctx, where);
  if (compiled && compiled.adjacent && order === 'unordered') {
    ctx.issues.push(`${where}: "adjacent" only applies to patterns in ordered blocks`);
    return undefined;
  }
  return compiled;
}

/** Compile the complete output expectation of a step */
export function compileExpectation(
  spec: {
    expect?: ExpectEntry[];
    reject?: PatternSpec[];
    stream?: OutputStream;
    exitCode?: number | 'any';
  },
  ctx: CompileContext,
): OutputExpectation {
  const blocks = compileBlocks(spec.expect ?? [], { ...ctx, path: `${ctx.path}.expect` });
  const reject: PatternEntry[] = [];
  (spec.reject ?? []).forEach((rejectSpec, i) => {
    const compiled = compilePattern(rejectSpec, ctx, `${ctx.path}.reject[${i}]`);
    if (!compiled) return;
    if (compiled.pattern.kind === 'wildcard') {
      ctx.issues.push(`${ctx.path}.reject[${i}]: a wildcard would reject every output`);
      return;
    }
    reject.push(compiled);
  });

  return {
    stream: spec.stream ?? 'stdout',
    blocks,
    reject,
    exitCode: spec.exitCode ?? 0,
  };
}
