/**
 * @module scenario-runner
 * Runs one scenario against one environment.
 *
 * Each step goes through bind → execute → verify → record. Runs stop at
 * the first failing step unless continue-on-failure applies (step, then
 * scenario, then suite default); binding errors and cancellation always
 * stop the run. Setup, teardown and context disposal are handled here for
 * isolated environments; shared environments are activated by the
 * scheduler and only seed the run's variables and env.
 */

import { bindSetEnv, bindStep } from './environment-binder.js';
import type { BoundStep } from './environment-binder.js';
import { statusForFailure, toStepFailure } from './errors.js';
import type { RunEmitter } from './events.js';
import {
  createExecutionContext,
  disposeExecutionContext,
  snapshotVariables,
} from './execution-context.js';
import type { ExecutionContext } from './execution-context.js';
import { verifyOutput } from './pattern-matcher.js';
import type { VerificationOutcome } from './pattern-matcher.js';
import {
  cancelledStep,
  createScenarioResult,
  createStepResult,
  skippedStep,
  worstStatus,
} from './results.js';
import { RetryExecutor, resolveRetryPolicy } from './retry-engine.js';
import { InteractiveSession } from './session.js';
import type { OutputWindow, SessionRead } from './session.js';
import { executeCommand } from './step-executor.js';
import type { SpawnFn } from './step-executor.js';
import type {
  Environment,
  RunStatus,
  Scenario,
  ScenarioResult,
  Step,
  StepFailure,
  StepPhase,
  StepResult,
  SuiteDefaults,
} from './types.js';

// =====================================================================
// Options
// =====================================================================

/** Execution settings shared by every step of a run */
export interface StepSettings {
  defaults: SuiteDefaults;
  /** Scenario-level overrides, absent for environment setup/teardown */
  scenario?: Scenario;
  spawn?: SpawnFn;
  killGraceMs?: number;
  /** Receives pipe problems and other notes seen while steps run */
  emitter?: RunEmitter;
}

/** State handed over from a shared environment activation */
export interface ActivationSeed {
  variables: Readonly<Record<string, string>>;
  env: Readonly<Record<string, string>>;
  /** Set when the shared setup failed; the run is then not executed */
  failure?: StepFailure;
}

export interface RunScenarioOptions {
  defaults: SuiteDefaults;
  /** Submission index within the suite */
  index: number;
  signal?: AbortSignal;
  spawn?: SpawnFn;
  killGraceMs?: number;
  keepWorkdirs?: boolean;
  activation?: ActivationSeed;
  emitter?: RunEmitter;
}

// =====================================================================
// Steps
// =====================================================================

interface AttemptOutcome {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  verification?: VerificationOutcome;
  failure?: StepFailure;
}

function effectiveTimeout(step: Step, settings: StepSettings): number {
  return step.timeoutMs ?? settings.scenario?.timeoutMs ?? settings.defaults.timeoutMs;
}

function continuesOnFailure(step: Step, settings: StepSettings): boolean {
  return step.continueOnFailure ?? settings.scenario?.continueOnFailure ?? settings.defaults.continueOnFailure;
}

function hasPatterns(step: Step): boolean {
  return step.expect.blocks.some((block) => block.entries.length > 0);
}

/** Verification of a session window; exit code only once the process exited */
function verifySession(step: Step, read: SessionRead, ctx: ExecutionContext, timeoutMs: number): AttemptOutcome {
  if (read.cancelled) {
    return { ...read, failure: { kind: 'cancelled', message: 'Cancelled while waiting for session output' } };
  }
  const verification = verifyOutput(
    step.expect,
    { stdout: read.stdout, stderr: read.stderr, exitCode: read.exited ? read.exitCode : undefined },
    ctx.variables,
  );
  let failure = verification.failure;
  if (failure && read.timedOut) {
    failure = { ...failure, message: `${failure.message} (no matching output within ${timeoutMs}ms)` };
  }
  return { stdout: read.stdout, stderr: read.stderr, exitCode: read.exitCode, verification, failure };
}

function sessionUntil(step: Step, ctx: ExecutionContext): (window: OutputWindow) => boolean {
  if (!hasPatterns(step)) return () => true;
  return (window) => verifyOutput(step.expect, window, ctx.variables).passed;
}

function logNotes(notes: readonly string[], level: 'debug' | 'warn', step: Step, ctx: ExecutionContext, settings: StepSettings): void {
  for (const note of notes) {
    settings.emitter?.log(level, `[${ctx.environment.name}/${ctx.scenario}] step "${step.name}": ${note}`);
  }
}

function bindingFailure(message: string): AttemptOutcome {
  return { stdout: '', stderr: '', exitCode: null, failure: { kind: 'binding', message } };
}

function missingSession(name: string): AttemptOutcome {
  return bindingFailure(`No session named "${name}" is running`);
}

async function attemptStep(
  step: Step,
  bound: BoundStep,
  ctx: ExecutionContext,
  settings: StepSettings,
): Promise<AttemptOutcome> {
  const timeoutMs = effectiveTimeout(step, settings);
  const { action } = step;

  switch (action.kind) {
    case 'exec': {
      if (!bound.command) return bindingFailure(`Step "${step.name}" has no command`);
      const outcome = await executeCommand(bound.command, {
        timeoutMs,
        signal: ctx.signal,
        spawn: settings.spawn,
        killGraceMs: settings.killGraceMs,
      });
      logNotes(outcome.notes, 'debug', step, ctx, settings);
      if (outcome.failure) {
        return { stdout: outcome.stdout, stderr: outcome.stderr, exitCode: outcome.exitCode, failure: outcome.failure };
      }
      const verification = verifyOutput(step.expect, outcome, ctx.variables);
      return {
        stdout: outcome.stdout,
        stderr: outcome.stderr,
        exitCode: outcome.exitCode,
        verification,
        failure: verification.failure,
      };
    }

    case 'session-start': {
      if (!bound.command) return bindingFailure(`Step "${step.name}" has no command`);
      if (ctx.sessions.has(action.session)) {
        return bindingFailure(`Session "${action.session}" is already running`);
      }
      let session: InteractiveSession;
      try {
        session = await InteractiveSession.start(action.session, bound.command, {
          spawn: settings.spawn,
          signal: ctx.signal,
        });
      } catch (err) {
        return { stdout: '', stderr: '', exitCode: null, failure: toStepFailure(err, 'spawn_failed') };
      }
      ctx.sessions.set(action.session, session);
      const read = await session.read(sessionUntil(step, ctx), { timeoutMs, signal: ctx.signal });
      logNotes(session.drainProblems(), 'warn', step, ctx, settings);
      return verifySession(step, read, ctx, timeoutMs);
    }

    case 'session-send': {
      const session = ctx.sessions.get(action.session);
      if (!session) return missingSession(action.session);
      const read = await session.read(sessionUntil(step, ctx), {
        input: bound.input,
        timeoutMs,
        signal: ctx.signal,
      });
      logNotes(session.drainProblems(), 'warn', step, ctx, settings);
      return verifySession(step, read, ctx, timeoutMs);
    }

    case 'session-close': {
      const session = ctx.sessions.get(action.session);
      if (!session) return missingSession(action.session);
      const read = await session.close({ input: bound.input, timeoutMs, signal: ctx.signal });
      logNotes(session.drainProblems(), 'warn', step, ctx, settings);
      ctx.sessions.delete(action.session);
      if (read.timedOut) {
        return {
          ...read,
          failure: { kind: 'timeout', message: `Session "${action.session}" did not exit within ${timeoutMs}ms; killed` },
        };
      }
      return verifySession(step, read, ctx, timeoutMs);
    }
  }
}

function describeAction(step: Step, bound: BoundStep): string {
  if (bound.command) return bound.command.display;
  switch (step.action.kind) {
    case 'session-send':
      return `send to session ${step.action.session}`;
    case 'session-close':
      return `close session ${step.action.session}`;
    case 'exec':
    case 'session-start':
      return step.name;
  }
}

const retryExecutor = new RetryExecutor();

/**
 * Bind, execute and verify one step, retrying per its policy.
 * Captures, `setEnv` and `chdir` are committed to the context only when
 * the step passes.
 */
export async function runStep(
  step: Step,
  index: number,
  phase: StepPhase,
  ctx: ExecutionContext,
  settings: StepSettings,
): Promise<StepResult> {
  const started = Date.now();

  let bound: BoundStep;
  try {
    bound = await bindStep(step, ctx);
  } catch (err) {
    return createStepResult({
      name: step.name,
      index,
      phase,
      status: 'errored',
      failure: toStepFailure(err, 'binding'),
      durationMs: Date.now() - started,
    });
  }

  // Session steps keep process state between attempts; only plain commands retry.
  const policy = step.action.kind === 'exec'
    ? resolveRetryPolicy(step.retry, settings.scenario?.retry, settings.defaults.retry)
    : undefined;

  const retry = await retryExecutor.execute(
    () => attemptStep(step, bound, ctx, settings),
    (outcome) => ({
      passed: outcome.failure === undefined,
      error: outcome.failure?.message,
      retryable: outcome.failure !== undefined && outcome.failure.kind !== 'binding' && outcome.failure.kind !== 'cancelled',
    }),
    policy,
    ctx.signal,
  );

  const outcome = retry.value;
  let failure = outcome.failure;
  const captures = outcome.verification?.captures ?? {};

  if (!failure) {
    try {
      const setEnv = bindSetEnv(step, ctx, captures);
      for (const [name, value] of Object.entries(captures)) {
        ctx.variables.set(name, value);
      }
      Object.assign(ctx.env, setEnv);
      if (bound.nextCwd !== undefined) {
        ctx.cwd = bound.nextCwd;
      }
    } catch (err) {
      failure = toStepFailure(err, 'binding');
    }
  }

  return createStepResult({
    name: step.name,
    index,
    phase,
    status: failure ? statusForFailure(failure.kind) : 'passed',
    command: describeAction(step, bound),
    stdout: outcome.stdout,
    stderr: outcome.stderr,
    exitCode: outcome.exitCode,
    matched: outcome.verification?.matched ?? [],
    unmatched: outcome.verification?.unmatched ?? [],
    captures: failure ? {} : captures,
    failure,
    attempts: retry.attempts,
    durationMs: Date.now() - started,
  });
}

/**
 * Run a list of steps in order.
 *
 * @param stopOnFailure - Skip the remaining steps after one fails
 *   (setup); when false every step runs (teardown)
 */
export async function runPhase(
  steps: readonly Step[],
  phase: StepPhase,
  ctx: ExecutionContext,
  settings: StepSettings,
  stopOnFailure: boolean,
): Promise<StepResult[]> {
  const results: StepResult[] = [];
  let stopReason: string | undefined;

  for (const [index, step] of steps.entries()) {
    if (stopReason !== undefined) {
      results.push(skippedStep(step, index, phase, stopReason));
      continue;
    }
    const result = await runStep(step, index, phase, ctx, settings);
    results.push(result);
    if (stopOnFailure && result.status !== 'passed') {
      stopReason = `${phase} step "${step.name}" ${result.status}`;
    }
  }
  return results;
}

/** First recorded failure among a list of steps */
export function firstFailure(steps: readonly StepResult[]): StepResult | undefined {
  return steps.find((step) => step.status !== 'passed' && step.status !== 'skipped');
}

// =====================================================================
// Scenario
// =====================================================================

/** Reason a scenario does not run in an environment, if any */
export function skipReasonFor(scenario: Scenario, environment: Environment): string | undefined {
  if (scenario.skip !== undefined) return scenario.skip;
  if (scenario.skipIn.includes(environment.name)) return `Skipped in environment "${environment.name}"`;
  if (scenario.only && !scenario.only.includes(environment.name)) {
    return `Only runs in: ${scenario.only.join(', ')}`;
  }
  return undefined;
}

/**
 * Run one scenario against one environment.
 *
 * Never rejects for problems of the run itself: every outcome, including
 * setup failure and cancellation, is a {@link ScenarioResult}.
 */
export async function runScenario(
  scenario: Scenario,
  environment: Environment,
  options: RunScenarioOptions,
): Promise<ScenarioResult> {
  const startedAt = Date.now();
  const { emitter } = options;
  emitter?.emit({
    type: 'run_start',
    scenario: scenario.name,
    environment: environment.name,
    index: options.index,
    timestamp: startedAt,
  });

  const result = await executeScenario(scenario, environment, options, startedAt);

  emitter?.emit({ type: 'run_end', result, timestamp: Date.now() });
  return result;
}

async function executeScenario(
  scenario: Scenario,
  environment: Environment,
  options: RunScenarioOptions,
  startedAt: number,
): Promise<ScenarioResult> {
  const base = {
    scenario: scenario.name,
    environment: environment.name,
    index: options.index,
    startedAt,
  };
  const notRun = (status: RunStatus, reason: string, failure?: StepFailure): ScenarioResult =>
    createScenarioResult({
      ...base,
      status,
      steps: scenario.steps.map((step, i) => skippedStep(step, i, 'step', reason)),
      failure,
      skipReason: status === 'skipped' ? reason : undefined,
      durationMs: Date.now() - startedAt,
    });

  const skipReason = skipReasonFor(scenario, environment);
  if (skipReason !== undefined) {
    return notRun('skipped', skipReason);
  }
  if (options.signal?.aborted) {
    return notRun('cancelled', 'Run cancelled', { kind: 'cancelled', message: 'Cancelled before the run started' });
  }
  if (options.activation?.failure) {
    return notRun('errored', 'Environment setup failed', options.activation.failure);
  }

  const signal = options.signal ?? new AbortController().signal;
  let ctx: ExecutionContext;
  try {
    ctx = await createExecutionContext({
      scenario: scenario.name,
      environment,
      signal,
      keepWorkdirs: options.keepWorkdirs,
      seedVariables: options.activation?.variables,
      seedEnv: options.activation?.env,
    });
  } catch (err) {
    const failure = toStepFailure(err, 'setup_failed');
    return notRun('errored', 'Run context could not be created', failure);
  }

  const settings: StepSettings = {
    defaults: options.defaults,
    scenario,
    spawn: options.spawn,
    killGraceMs: options.killGraceMs,
    emitter: options.emitter,
  };
  const environmentSettings: StepSettings = { ...settings, scenario: undefined };
  const isolated = environment.scope === 'isolated';

  let setup: StepResult[] = [];
  const steps: StepResult[] = [];
  let teardown: StepResult[] = [];
  let failure: StepFailure | undefined;
  let status: RunStatus = 'errored';

  try {
    if (isolated && environment.setup.length > 0) {
      setup = await runPhase(environment.setup, 'setup', ctx, environmentSettings, true);
    }
    const setupFailed = firstFailure(setup);

    if (setupFailed) {
      const cancelled = setupFailed.status === 'cancelled';
      failure = cancelled
        ? { kind: 'cancelled', message: 'Cancelled during setup' }
        : { kind: 'setup_failed', message: `Setup step "${setupFailed.name}" ${setupFailed.status}: ${setupFailed.failure?.message ?? ''}` };
      for (const [i, step] of scenario.steps.entries()) {
        steps.push(skippedStep(step, i, 'step', 'Environment setup failed'));
      }
      status = cancelled ? 'cancelled' : 'errored';
    } else {
      await runSteps(scenario, ctx, settings, steps, options.emitter);
      failure = firstFailure(steps)?.failure;
      status = worstStatus(steps.map((step) => step.status));
    }
  } finally {
    if (isolated && environment.teardown.length > 0) {
      const teardownCtx: ExecutionContext = { ...ctx, signal: new AbortController().signal };
      teardown = await runPhase(environment.teardown, 'teardown', teardownCtx, environmentSettings, false);
      for (const result of teardown) {
        if (result.failure) {
          options.emitter?.log(
            'warn',
            `[${environment.name}/${scenario.name}] teardown step "${result.name}" ${result.status}: ${result.failure.message}`,
          );
        }
      }
    }
    for (const problem of await disposeExecutionContext(ctx)) {
      options.emitter?.log('warn', `[${environment.name}/${scenario.name}] ${problem}`);
    }
  }

  return createScenarioResult({
    ...base,
    status,
    setup,
    steps,
    teardown,
    variables: snapshotVariables(ctx),
    failure,
    durationMs: Date.now() - startedAt,
  });
}

async function runSteps(
  scenario: Scenario,
  ctx: ExecutionContext,
  settings: StepSettings,
  results: StepResult[],
  emitter?: RunEmitter,
): Promise<void> {
  let stopReason: string | undefined;

  for (const [index, step] of scenario.steps.entries()) {
    if (stopReason !== undefined) {
      results.push(skippedStep(step, index, 'step', stopReason));
      continue;
    }
    if (ctx.signal.aborted) {
      results.push(cancelledStep(step, index, 'step'));
      stopReason = 'Run cancelled';
      continue;
    }

    const result = await runStep(step, index, 'step', ctx, settings);
    results.push(result);
    emitter?.emit({
      type: 'step_end',
      scenario: scenario.name,
      environment: ctx.environment.name,
      step: result,
      timestamp: Date.now(),
    });

    if (result.status === 'passed') continue;
    if (result.status === 'cancelled') {
      stopReason = 'Run cancelled';
    } else if (result.failure?.kind === 'binding') {
      stopReason = `Binding error in step "${step.name}"`;
    } else if (!continuesOnFailure(step, settings)) {
      stopReason = `Step "${step.name}" ${result.status}`;
    }
  }
}
