/**
 * @module suite-scheduler
 * Fans a suite out over (scenario × environment) runs.
 *
 * Runs are submitted in scenario-major order and executed through a
 * bounded FIFO {@link Semaphore}; results come back in submission order.
 * Each run settles independently (`Promise.allSettled`), so one run never
 * halts another. Shared-scope environments are activated lazily, once,
 * by their first run that actually executes, and torn down after every
 * run has settled.
 */

import { LoadError, SchedulingError, errorMessage, toStepFailure } from './errors.js';
import { createRunEmitter } from './events.js';
import type { RunEmitter } from './events.js';
import {
  createExecutionContext,
  disposeExecutionContext,
  snapshotVariables,
} from './execution-context.js';
import type { ExecutionContext } from './execution-context.js';
import {
  createActivationResult,
  createScenarioResult,
  createSuiteResult,
  skippedStep,
} from './results.js';
import { firstFailure, runPhase, runScenario, skipReasonFor } from './scenario-runner.js';
import type { ActivationSeed, StepSettings } from './scenario-runner.js';
import { Semaphore } from './semaphore.js';
import type { SpawnFn } from './step-executor.js';
import type {
  ActivationResult,
  Environment,
  MessageBus,
  RunEvent,
  Scenario,
  ScenarioResult,
  StepFailure,
  StepResult,
  Suite,
  SuiteResult,
} from './types.js';

export const DEFAULT_CONCURRENCY = 4;

export interface RunSuiteOptions {
  /** Maximum number of runs executing at once (default 4) */
  concurrency?: number;
  /** Overrides the suite's default step timeout */
  defaultTimeoutMs?: number;
  /** Environment names to run (default: all) */
  environments?: readonly string[];
  /** Scenario names to run (default: all) */
  scenarios?: readonly string[];
  signal?: AbortSignal;
  keepWorkdirs?: boolean;
  spawn?: SpawnFn;
  killGraceMs?: number;
  onEvent?: (event: RunEvent) => void;
  bus?: MessageBus;
}

interface Job {
  index: number;
  scenario: Scenario;
  environment: Environment;
}

interface Activation {
  environment: Environment;
  ctx?: ExecutionContext;
  setup: StepResult[];
  seed: ActivationSeed;
}

/**
 * Pick the named items, keeping suite order.
 *
 * @throws {LoadError} when a name does not exist in the suite
 */
function select<T extends { name: string }>(items: readonly T[], names: readonly string[] | undefined, what: string): T[] {
  if (!names || names.length === 0) return [...items];
  const known = new Set(items.map((item) => item.name));
  const unknown = names.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new LoadError(`Unknown ${what}(s) selected`, unknown.map((name) => `${what} "${name}" is not defined`));
  }
  return items.filter((item) => names.includes(item.name));
}

function needsActivation(environment: Environment): boolean {
  return environment.scope === 'shared' && (environment.setup.length > 0 || environment.teardown.length > 0);
}

async function activate(
  environment: Environment,
  settings: StepSettings,
  signal: AbortSignal,
  emitter: RunEmitter,
): Promise<Activation> {
  emitter.log('info', `Activating environment "${environment.name}"`);
  let ctx: ExecutionContext;
  try {
    ctx = await createExecutionContext({ scenario: 'setup', environment, signal, useRoot: true });
  } catch (err) {
    return {
      environment,
      setup: [],
      seed: { variables: {}, env: {}, failure: toStepFailure(err, 'setup_failed') },
    };
  }

  const setup = await runPhase(environment.setup, 'setup', ctx, settings, true);
  const failed = firstFailure(setup);
  let failure: StepFailure | undefined;
  if (failed) {
    failure = failed.status === 'cancelled'
      ? { kind: 'cancelled', message: 'Cancelled during environment setup' }
      : { kind: 'setup_failed', message: `Setup step "${failed.name}" of environment "${environment.name}" ${failed.status}: ${failed.failure?.message ?? ''}` };
    emitter.log('error', failure.message);
  }

  return {
    environment,
    ctx,
    setup,
    seed: { variables: snapshotVariables(ctx), env: { ...ctx.env }, failure },
  };
}

async function deactivate(activation: Activation, settings: StepSettings, emitter: RunEmitter): Promise<ActivationResult> {
  const { environment, ctx, seed } = activation;
  let teardown: StepResult[] = [];

  if (ctx) {
    const teardownCtx: ExecutionContext = { ...ctx, signal: new AbortController().signal };
    teardown = await runPhase(environment.teardown, 'teardown', teardownCtx, settings, false);
    for (const result of teardown) {
      if (result.failure) {
        emitter.log('warn', `[${environment.name}] teardown step "${result.name}" ${result.status}: ${result.failure.message}`);
      }
    }
    for (const problem of await disposeExecutionContext(ctx)) {
      emitter.log('warn', `[${environment.name}] ${problem}`);
    }
  }

  return createActivationResult({
    environment: environment.name,
    status: seed.failure ? (seed.failure.kind === 'cancelled' ? 'cancelled' : 'errored') : 'passed',
    setup: activation.setup,
    teardown,
    failure: seed.failure,
  });
}

function rejectedRun(job: Job, reason: unknown): ScenarioResult {
  return createScenarioResult({
    scenario: job.scenario.name,
    environment: job.environment.name,
    index: job.index,
    status: 'errored',
    startedAt: Date.now(),
    steps: job.scenario.steps.map((step, i) => skippedStep(step, i, 'step', 'Run could not be scheduled')),
    failure: { kind: 'scheduling', message: `Run failed unexpectedly: ${errorMessage(reason)}` },
  });
}

/** Resource exhaustion anywhere in a run, reported at suite level */
function schedulingProblems(run: ScenarioResult): StepFailure[] {
  const problems: StepFailure[] = [];
  if (run.failure?.kind === 'scheduling') {
    problems.push({ kind: 'scheduling', message: `[${run.environment}/${run.scenario}] ${run.failure.message}` });
  }
  for (const step of [...run.setup, ...run.steps, ...run.teardown]) {
    if (step.failure?.kind === 'resource_exhausted') {
      problems.push({
        kind: 'scheduling',
        message: `[${run.environment}/${run.scenario}] step "${step.name}": ${step.failure.message}`,
      });
    }
  }
  return problems;
}

/**
 * Run every selected scenario against every selected environment.
 *
 * @throws {LoadError} when a selected environment or scenario does not exist
 * @throws {SchedulingError} when the concurrency limit is invalid
 */
export async function runSuite(suite: Suite, options: RunSuiteOptions = {}): Promise<SuiteResult> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new SchedulingError(`Concurrency must be a positive integer, got ${concurrency}`, { concurrency });
  }
  const environments = select(suite.environments, options.environments, 'environment');
  const scenarios = select(suite.scenarios, options.scenarios, 'scenario');

  const defaults = options.defaultTimeoutMs !== undefined
    ? { ...suite.defaults, timeoutMs: options.defaultTimeoutMs }
    : suite.defaults;
  const signal = options.signal ?? new AbortController().signal;
  const emitter = createRunEmitter(options);
  const settings: StepSettings = { defaults, spawn: options.spawn, killGraceMs: options.killGraceMs, emitter };
  const startedAt = Date.now();

  const jobs: Job[] = scenarios.flatMap((scenario) => environments.map((environment) => ({ scenario, environment })))
    .map((job, index) => ({ ...job, index }));

  emitter.emit({ type: 'suite_start', suite: suite.name, runs: jobs.length, timestamp: startedAt });

  const semaphore = new Semaphore(concurrency);
  const activations = new Map<string, Promise<Activation>>();

  const activationFor = (environment: Environment): Promise<Activation> => {
    let activation = activations.get(environment.name);
    if (!activation) {
      activation = activate(environment, settings, signal, emitter);
      activations.set(environment.name, activation);
    }
    return activation;
  };

  const tasks = jobs.map((job) =>
    semaphore.use(async () => {
      const runs = needsActivation(job.environment)
        && !signal.aborted
        && skipReasonFor(job.scenario, job.environment) === undefined;
      const activation = runs ? await activationFor(job.environment) : undefined;
      return runScenario(job.scenario, job.environment, {
        defaults,
        index: job.index,
        signal,
        spawn: options.spawn,
        killGraceMs: options.killGraceMs,
        keepWorkdirs: options.keepWorkdirs,
        activation: activation?.seed,
        emitter,
      });
    }),
  );

  const settled = await Promise.allSettled(tasks);
  const runs = jobs.map((job, i): ScenarioResult => {
    const outcome = settled[i];
    if (outcome?.status === 'fulfilled') return outcome.value;
    const reason: unknown = outcome?.status === 'rejected' ? outcome.reason : 'run did not settle';
    emitter.log('error', `Run ${job.scenario.name} × ${job.environment.name} rejected: ${errorMessage(reason)}`);
    return rejectedRun(job, reason);
  });

  const activationResults: ActivationResult[] = [];
  for (const [name, pending] of activations) {
    try {
      activationResults.push(await deactivate(await pending, settings, emitter));
    } catch (err) {
      emitter.log('error', `Environment "${name}" could not be released: ${errorMessage(err)}`);
      activationResults.push(createActivationResult({
        environment: name,
        status: 'errored',
        failure: { kind: 'scheduling', message: errorMessage(err) },
      }));
    }
  }

  const result = createSuiteResult({
    suite: suite.name,
    runs,
    activations: activationResults,
    schedulingErrors: runs.flatMap(schedulingProblems),
    startedAt,
  });
  emitter.emit({ type: 'suite_end', result, timestamp: Date.now() });
  return result;
}
