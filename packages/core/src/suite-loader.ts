/**
 * @module suite-loader
 * Loads YAML suite documents into a validated, frozen {@link Suite}.
 *
 * A suite may be split over several files and several YAML documents per
 * file. Documents are indexed by their top-level `type`; untyped documents
 * are classified by file name (`*.env.yaml` and `*.environments.yaml`
 * hold environments, any other YAML file is a suite document). Every
 * problem found is collected and reported in one {@link LoadError}.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import { LoadError, errorMessage } from './errors.js';
import { compileExpectation } from './pattern-compiler.js';
import { freezeDeep } from './results.js';
import { parseDelay } from './retry-engine.js';
import { DOCUMENT_TYPES, SuiteDocumentSchema } from './suite-schema.js';
import type {
  DocumentType,
  EnvironmentSpec,
  ScenarioBody,
  StepEntry,
  StepSpec,
  SuiteDocument,
} from './suite-schema.js';
import type {
  CommandTemplate,
  Environment,
  LiteralMode,
  RetryPolicy,
  Scenario,
  Step,
  StepAction,
  Suite,
  SuiteDefaults,
} from './types.js';
import { BUILTIN_NAMES, findMissingPlaceholders } from './variable-resolver.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

/** One YAML source: a file path (or label) and its text */
export interface SuiteSource {
  source: string;
  content: string;
}

export interface ParseSuiteOptions {
  /** Directory relative paths are resolved against */
  baseDir: string;
  /** Suite name when no document declares one */
  name?: string;
}

/**
 * Parse a time string like "5s", "100ms", "2m", "1h" (or a plain number
 * of milliseconds) into milliseconds.
 */
export function parseTime(time: string | number): number {
  if (typeof time === 'number') return time;
  try {
    return parseDelay(time);
  } catch {
    throw new LoadError(`Invalid time format: "${time}". Expected format like "5s", "100ms", "2m", "1h"`);
  }
}

// =====================================================================
// Document indexing
// =====================================================================

interface IndexedDocument {
  type: DocumentType;
  where: string;
  /** Directory of the defining file */
  dir: string;
  doc: SuiteDocument;
}

function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((type) => type === value);
}

/** Type of a document without a `type` field, derived from its file name */
export function classifyByFilename(source: string): DocumentType {
  return /\.(env|environments)\.ya?ml$/i.test(source) ? 'environments' : 'suite';
}

function indexDocuments(sources: readonly SuiteSource[], baseDir: string, issues: string[]): IndexedDocument[] {
  const indexed: IndexedDocument[] = [];

  for (const { source, content } of sources) {
    let docs: unknown[];
    try {
      docs = yaml.loadAll(content, undefined, { filename: source });
    } catch (err) {
      issues.push(`${source}: YAML syntax error: ${errorMessage(err)}`);
      continue;
    }

    const dir = path.dirname(path.resolve(baseDir, source));
    docs.forEach((raw, i) => {
      if (raw === null || raw === undefined) return;
      const where = docs.length > 1 ? `${source}#${i + 1}` : source;
      const parsed = SuiteDocumentSchema.safeParse(raw);
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          const at = issue.path.length > 0 ? issue.path.join('.') : '(root)';
          issues.push(`${where}: ${at}: ${issue.message}`);
        }
        return;
      }

      const doc = parsed.data;
      let type: DocumentType;
      if (doc.type === undefined) {
        type = classifyByFilename(source);
      } else if (isDocumentType(doc.type)) {
        type = doc.type;
      } else {
        issues.push(`${where}: unknown document type "${doc.type}" (expected ${DOCUMENT_TYPES.join(', ')})`);
        return;
      }

      if (type === 'environments' && doc.scenarios !== undefined) {
        issues.push(`${where}: an environments document cannot define scenarios`);
      }
      if (type === 'scenarios' && doc.environments !== undefined) {
        issues.push(`${where}: a scenarios document cannot define environments`);
      }
      indexed.push({ type, where, dir, doc });
    });
  }
  return indexed;
}

// =====================================================================
// Steps
// =====================================================================

interface StepContext {
  path: string;
  literalMode: LiteralMode;
  issues: string[];
}

function commandTemplate(command: string | string[]): CommandTemplate {
  return typeof command === 'string' ? { kind: 'shell', template: command } : { kind: 'argv', templates: command };
}

function compileAction(spec: StepSpec, ctx: StepContext): StepAction | undefined {
  const kinds = [spec.run, spec.argv, spec.session].filter((value) => value !== undefined).length;
  if (kinds !== 1) {
    ctx.issues.push(`${ctx.path}: a step needs exactly one of "run", "argv" or "session"`);
    return undefined;
  }

  if (spec.run !== undefined) {
    return { kind: 'exec', command: commandTemplate(spec.run), input: spec.input };
  }
  if (spec.argv !== undefined) {
    return { kind: 'exec', command: commandTemplate(spec.argv), input: spec.input };
  }
  if (spec.session === undefined) return undefined;

  const session = spec.session;
  if (spec.input !== undefined) {
    ctx.issues.push(`${ctx.path}: session steps write input with "session.send"`);
    return undefined;
  }
  if (session.start !== undefined) {
    if (session.send !== undefined || session.close) {
      ctx.issues.push(`${ctx.path}: "session.start" cannot be combined with "send" or "close"`);
      return undefined;
    }
    return { kind: 'session-start', session: session.name, command: commandTemplate(session.start) };
  }
  if (session.close) {
    return { kind: 'session-close', session: session.name, input: session.send };
  }
  if (session.send !== undefined) {
    return { kind: 'session-send', session: session.name, input: session.send };
  }
  ctx.issues.push(`${ctx.path}: session step needs "start", "send" or "close"`);
  return undefined;
}

function defaultStepName(spec: StepSpec, index: number): string {
  if (spec.run !== undefined) return spec.run;
  if (spec.argv !== undefined) return spec.argv.join(' ');
  if (spec.session !== undefined) {
    const verb = spec.session.start !== undefined ? 'start' : spec.session.close ? 'close' : 'send';
    return `${verb} ${spec.session.name}`;
  }
  return `step ${index + 1}`;
}

function compileTimeout(value: string | number | undefined, where: string, issues: string[]): number | undefined {
  if (value === undefined) return undefined;
  try {
    return parseTime(value);
  } catch (err) {
    issues.push(`${where}: ${errorMessage(err)}`);
    return undefined;
  }
}

function compileRetry(retry: RetryPolicy | undefined, where: string, issues: string[]): RetryPolicy | undefined {
  if (retry === undefined) return undefined;
  try {
    parseDelay(retry.delay);
  } catch (err) {
    issues.push(`${where}.delay: ${errorMessage(err)}`);
    return undefined;
  }
  return retry;
}

function compileStep(entry: StepEntry, index: number, ctx: StepContext): Step | undefined {
  const spec: StepSpec = typeof entry === 'string' ? { run: entry } : entry;
  const action = compileAction(spec, ctx);
  const expect = compileExpectation(spec, { path: ctx.path, literalMode: ctx.literalMode, issues: ctx.issues });
  const timeoutMs = compileTimeout(spec.timeout, `${ctx.path}.timeout`, ctx.issues);
  if (!action) return undefined;

  return {
    name: spec.name ?? defaultStepName(spec, index),
    action,
    expect,
    timeoutMs,
    continueOnFailure: spec.continueOnFailure,
    retry: compileRetry(spec.retry, `${ctx.path}.retry`, ctx.issues),
    cwd: spec.cwd,
    chdir: spec.chdir,
    env: spec.env ?? {},
    setEnv: spec.setEnv ?? {},
  };
}

function compileSteps(entries: readonly StepEntry[], ctx: StepContext): Step[] {
  const steps: Step[] = [];
  entries.forEach((entry, i) => {
    const step = compileStep(entry, i, { ...ctx, path: `${ctx.path}[${i}]` });
    if (step) steps.push(step);
  });
  return steps;
}

/** Every template string a step resolves at run time */
export function stepTemplates(step: Step): string[] {
  const templates: string[] = [];
  const addCommand = (command: CommandTemplate): void => {
    if (command.kind === 'shell') templates.push(command.template);
    else templates.push(...command.templates);
  };

  const { action } = step;
  switch (action.kind) {
    case 'exec':
      addCommand(action.command);
      if (action.input !== undefined) templates.push(action.input);
      break;
    case 'session-start':
      addCommand(action.command);
      break;
    case 'session-send':
      templates.push(action.input);
      break;
    case 'session-close':
      if (action.input !== undefined) templates.push(action.input);
      break;
  }
  if (step.cwd !== undefined) templates.push(step.cwd);
  if (step.chdir !== undefined) templates.push(step.chdir);
  templates.push(...Object.values(step.env), ...Object.values(step.setEnv));
  return templates;
}

function checkPlaceholders(
  steps: readonly Step[],
  environment: Environment,
  where: string,
  issues: string[],
): void {
  for (const step of steps) {
    const missing = new Set(stepTemplates(step).flatMap((t) => findMissingPlaceholders(t, environment.placeholders)));
    for (const name of missing) {
      issues.push(`${where} step "${step.name}": placeholder "${name}" is not defined by environment "${environment.name}"`);
    }
  }
}

// =====================================================================
// Environments & Scenarios
// =====================================================================

function compileEnvironment(
  name: string,
  spec: EnvironmentSpec,
  dir: string,
  literalMode: LiteralMode,
  issues: string[],
): Environment {
  const where = `environments.${name}`;

  for (const placeholder of Object.keys(spec.placeholders)) {
    if (BUILTIN_NAMES.some((builtin) => builtin === placeholder) || /^(var|env)\./.test(placeholder)) {
      issues.push(`${where}.placeholders: "${placeholder}" is reserved`);
    }
  }

  const setup = compileSteps(spec.setup, { path: `${where}.setup`, literalMode, issues });
  const teardown = compileSteps(spec.teardown, { path: `${where}.teardown`, literalMode, issues });
  if ((spec.setup.length > 0 || spec.teardown.length > 0) && spec.scope === undefined) {
    issues.push(`${where}: "scope" (shared or isolated) is required when setup or teardown is present`);
  }
  if (spec.scope === 'shared' && setup.some((step) => step.action.kind !== 'exec')) {
    issues.push(`${where}.setup: shared setup cannot use sessions`);
  }

  const workdir = typeof spec.workdir === 'string'
    ? { root: spec.workdir, mode: 'shared' as const }
    : spec.workdir ?? { root: '.', mode: 'shared' as const };

  const environment: Environment = {
    name,
    description: spec.description,
    placeholders: spec.placeholders,
    env: spec.env,
    workdir: { root: path.resolve(dir, workdir.root), mode: workdir.mode },
    setup,
    teardown,
    scope: spec.scope,
  };

  checkPlaceholders([...setup, ...teardown], environment, where, issues);
  for (const [key, value] of Object.entries(spec.env)) {
    for (const missing of findMissingPlaceholders(value, spec.placeholders)) {
      issues.push(`${where}.env.${key}: placeholder "${missing}" is not defined`);
    }
  }
  return environment;
}

function scenarioEntries(doc: SuiteDocument): Array<{ name: string; body: ScenarioBody }> {
  const scenarios = doc.scenarios;
  if (scenarios === undefined) return [];
  if (Array.isArray(scenarios)) {
    return scenarios.map(({ name, ...body }) => ({ name, body }));
  }
  return Object.entries(scenarios).map(([name, value]) => ({
    name,
    body: Array.isArray(value) ? { steps: value } : value,
  }));
}

function compileScenario(name: string, body: ScenarioBody, literalMode: LiteralMode, issues: string[]): Scenario {
  const where = `scenarios.${name}`;
  const skip = body.skip === true ? 'Skipped' : typeof body.skip === 'string' ? body.skip : undefined;
  return {
    name,
    description: body.description,
    steps: compileSteps(body.steps, { path: `${where}.steps`, literalMode, issues }),
    continueOnFailure: body.continueOnFailure,
    retry: compileRetry(body.retry, `${where}.retry`, issues),
    timeoutMs: compileTimeout(body.timeout, `${where}.timeout`, issues),
    skip,
    skipIn: body.skipIn ?? [],
    only: body.only,
  };
}

// =====================================================================
// Public API
// =====================================================================

/**
 * Parse and merge suite documents.
 *
 * @throws {LoadError} listing every problem found
 */
export function parseSuiteSources(sources: readonly SuiteSource[], options: ParseSuiteOptions): Suite {
  const issues: string[] = [];
  const documents = indexDocuments(sources, options.baseDir, issues);

  let name = options.name;
  let description: string | undefined;
  const defaultSpecs: NonNullable<SuiteDocument['defaults']>[] = [];
  for (const { doc } of documents) {
    name ??= doc.name;
    description ??= doc.description;
    if (doc.defaults) defaultSpecs.push(doc.defaults);
  }
  const mergedDefaults = defaultSpecs.reduce<NonNullable<SuiteDocument['defaults']>>(
    (merged, spec) => ({ ...merged, ...spec }),
    {},
  );
  const defaults: SuiteDefaults = {
    timeoutMs: compileTimeout(mergedDefaults.timeout, 'defaults.timeout', issues) ?? DEFAULT_TIMEOUT_MS,
    continueOnFailure: mergedDefaults.continueOnFailure ?? false,
    literalMode: mergedDefaults.literalMode ?? 'substring',
    retry: compileRetry(mergedDefaults.retry, 'defaults.retry', issues),
  };

  const environments: Environment[] = [];
  const envOrigin = new Map<string, string>();
  const scenarios: Scenario[] = [];
  const scenarioOrigin = new Map<string, string>();

  for (const { doc, where, dir } of documents) {
    for (const [envName, spec] of Object.entries(doc.environments ?? {})) {
      const previous = envOrigin.get(envName);
      if (previous !== undefined) {
        issues.push(`${where}: environment "${envName}" is already defined in ${previous}`);
        continue;
      }
      envOrigin.set(envName, where);
      environments.push(compileEnvironment(envName, spec, dir, defaults.literalMode, issues));
    }
    for (const { name: scenarioName, body } of scenarioEntries(doc)) {
      const previous = scenarioOrigin.get(scenarioName);
      if (previous !== undefined) {
        issues.push(`${where}: scenario "${scenarioName}" is already defined in ${previous}`);
        continue;
      }
      scenarioOrigin.set(scenarioName, where);
      scenarios.push(compileScenario(scenarioName, body, defaults.literalMode, issues));
    }
  }

  if (documents.length > 0 && environments.length === 0) {
    issues.push('The suite defines no environments');
  }

  for (const scenario of scenarios) {
    for (const envName of [...scenario.skipIn, ...(scenario.only ?? [])]) {
      if (!envOrigin.has(envName)) {
        issues.push(`scenarios.${scenario.name}: unknown environment "${envName}" in skipIn/only`);
      }
    }
    for (const environment of environments) {
      if (scenario.skip !== undefined || scenario.skipIn.includes(environment.name)) continue;
      if (scenario.only && !scenario.only.includes(environment.name)) continue;
      checkPlaceholders(scenario.steps, environment, `scenarios.${scenario.name}`, issues);
    }
  }

  if (documents.length === 0 && issues.length === 0) {
    issues.push('No suite documents found');
  }
  if (issues.length > 0) {
    throw new LoadError(`Invalid suite (${issues.length} problem${issues.length === 1 ? '' : 's'})`, issues);
  }

  const firstSource = sources[0]?.source;
  return freezeDeep({
    name: name ?? (firstSource ? path.basename(firstSource).replace(/(\.(env|environments|scenarios))?\.ya?ml$/i, '') : 'suite'),
    description,
    baseDir: options.baseDir,
    defaults,
    environments,
    scenarios,
  });
}

async function expandPath(target: string): Promise<string[]> {
  const stat = await fs.stat(target);
  if (!stat.isDirectory()) return [target];
  const entries = await fs.readdir(target);
  return entries
    .filter((entry) => /\.ya?ml$/i.test(entry))
    .sort()
    .map((entry) => path.join(target, entry));
}

/**
 * Load a suite from files or directories (every `*.yaml`/`*.yml` in a
 * directory, in name order).
 *
 * @throws {LoadError} when a file cannot be read or the suite is invalid
 */
export async function loadSuite(
  paths: readonly string[],
  options: { baseDir?: string; name?: string } = {},
): Promise<Suite> {
  const baseDir = path.resolve(options.baseDir ?? process.cwd());
  const sources: SuiteSource[] = [];
  const issues: string[] = [];

  for (const target of paths) {
    let files: string[];
    try {
      files = await expandPath(path.resolve(baseDir, target));
    } catch (err) {
      issues.push(`${target}: ${errorMessage(err)}`);
      continue;
    }
    for (const file of files) {
      try {
        sources.push({ source: file, content: await fs.readFile(file, 'utf-8') });
      } catch (err) {
        issues.push(`${file}: ${errorMessage(err)}`);
      }
    }
  }

  if (issues.length > 0) {
    throw new LoadError('Failed to read suite files', issues);
  }
  return parseSuiteSources(sources, { baseDir, name: options.name });
}
