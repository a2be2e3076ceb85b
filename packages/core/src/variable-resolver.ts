/**
 * @module variable-resolver
 * Strict `{{…}}` template resolution for step commands, inputs and env.
 *
 * Supported references:
 * - `{{name}}` → placeholder of the active environment
 * - `{{var.name}}` → variable captured earlier in the run
 * - `{{env.NAME}}` → process environment (run overrides first)
 * - `{{environment}}`, `{{scenario}}`, `{{workdir}}`, `{{root}}` → built-ins
 *
 * Unlike a lenient resolver, nothing unresolved survives: every missing
 * reference in a template is collected into one {@link BindingError}.
 */

import { BindingError } from './errors.js';

export const BUILTIN_NAMES = ['environment', 'scenario', 'workdir', 'root'] as const;
export type BuiltinName = (typeof BUILTIN_NAMES)[number];

export type TemplateReference =
  | { kind: 'placeholder'; name: string }
  | { kind: 'variable'; name: string }
  | { kind: 'env'; name: string }
  | { kind: 'builtin'; name: BuiltinName };

/** Values visible to a template */
export interface TemplateScope {
  placeholders: Readonly<Record<string, string>>;
  variables: ReadonlyMap<string, string>;
  env: Readonly<Record<string, string | undefined>>;
  builtins: Readonly<Record<BuiltinName, string>>;
}

const TEMPLATE_REF = /\{\{([^{}]*)\}\}/g;

function isBuiltin(name: string): name is BuiltinName {
  return BUILTIN_NAMES.some((builtin) => builtin === name);
}

/** Classify the expression between `{{` and `}}` */
export function parseReference(expr: string): TemplateReference {
  const trimmed = expr.trim();
  if (trimmed.startsWith('var.')) {
    return { kind: 'variable', name: trimmed.slice(4) };
  }
  if (trimmed.startsWith('env.')) {
    return { kind: 'env', name: trimmed.slice(4) };
  }
  if (isBuiltin(trimmed)) {
    return { kind: 'builtin', name: trimmed };
  }
  return { kind: 'placeholder', name: trimmed };
}

export function formatReference(ref: TemplateReference): string {
  switch (ref.kind) {
    case 'variable':
      return `{{var.${ref.name}}}`;
    case 'env':
      return `{{env.${ref.name}}}`;
    case 'builtin':
    case 'placeholder':
      return `{{${ref.name}}}`;
  }
}

/** All references in a template, in order of appearance */
export function collectReferences(template: string): TemplateReference[] {
  return [...template.matchAll(TEMPLATE_REF)].map((match) => parseReference(match[1] ?? ''));
}

/**
 * Resolve every reference in a template.
 *
 * Placeholder values are templates themselves and are resolved in the same
 * scope; a placeholder that (indirectly) references itself is a cycle.
 *
 * @throws {BindingError} listing every unresolved reference
 */
export function resolveTemplate(template: string, scope: TemplateScope): string {
  const missing = new Set<string>();
  const result = resolveInto(template, scope, missing, []);
  if (missing.size > 0) {
    throw missingError([...missing]);
  }
  return result;
}

/** Resolve every value of a record; keys are left untouched */
export function resolveRecord(
  record: Readonly<Record<string, string>>,
  scope: TemplateScope,
): Record<string, string> {
  const missing = new Set<string>();
  const resolved: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    resolved[key] = resolveInto(value, scope, missing, []);
  }
  if (missing.size > 0) {
    throw missingError([...missing]);
  }
  return resolved;
}

/**
 * Placeholder names a template needs that the given table does not define,
 * following placeholder values transitively. Used for load-time checks.
 */
export function findMissingPlaceholders(
  template: string,
  placeholders: Readonly<Record<string, string>>,
): string[] {
  const missing: string[] = [];
  const visited = new Set<string>();

  const visit = (text: string): void => {
    for (const ref of collectReferences(text)) {
      if (ref.kind !== 'placeholder' || visited.has(ref.name)) continue;
      visited.add(ref.name);
      const value = placeholders[ref.name];
      if (value === undefined) {
        missing.push(ref.name);
      } else {
        visit(value);
      }
    }
  };

  visit(template);
  return missing;
}

function resolveInto(
  template: string,
  scope: TemplateScope,
  missing: Set<string>,
  stack: string[],
): string {
  return template.replace(TEMPLATE_REF, (match, expr: string) => {
    const ref = parseReference(expr);
    const value = lookup(ref, scope, missing, stack);
    if (value === undefined) {
      missing.add(formatReference(ref));
      return match;
    }
    return value;
  });
}

function lookup(
  ref: TemplateReference,
  scope: TemplateScope,
  missing: Set<string>,
  stack: string[],
): string | undefined {
  switch (ref.kind) {
    case 'variable':
      return scope.variables.get(ref.name);
    case 'env':
      return scope.env[ref.name];
    case 'builtin':
      return scope.builtins[ref.name];
    case 'placeholder': {
      const raw = scope.placeholders[ref.name];
      if (raw === undefined) return undefined;
      if (stack.includes(ref.name)) {
        throw new BindingError(
          `Placeholder cycle: ${[...stack, ref.name].join(' -> ')}`,
          [ref.name],
        );
      }
      return resolveInto(raw, scope, missing, [...stack, ref.name]);
    }
  }
}

function missingError(missing: string[]): BindingError {
  return new BindingError(`Unresolved template reference(s): ${missing.join(', ')}`, missing);
}
