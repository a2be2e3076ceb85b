/**
 * @module results
 * Builders for the immutable result records.
 */

import type {
  ActivationResult,
  RunStatus,
  ScenarioResult,
  Step,
  StepFailure,
  StepPhase,
  StepResult,
  SuiteResult,
} from './types.js';

export const RUN_STATUSES: readonly RunStatus[] = ['passed', 'failed', 'errored', 'skipped', 'cancelled'];

/** Higher is worse */
export const STATUS_SEVERITY: Readonly<Record<RunStatus, number>> = {
  passed: 0,
  skipped: 1,
  failed: 2,
  errored: 3,
  cancelled: 4,
};

/**
 * Worst of a set of statuses. An empty set, or one containing only
 * passed and skipped steps, counts as passed.
 */
export function worstStatus(statuses: readonly RunStatus[]): RunStatus {
  let worst: RunStatus = 'passed';
  for (const status of statuses) {
    if (STATUS_SEVERITY[status] > STATUS_SEVERITY[worst]) worst = status;
  }
  return worst === 'skipped' ? 'passed' : worst;
}

export function emptyTotals(): Record<RunStatus, number> {
  return { passed: 0, failed: 0, errored: 0, skipped: 0, cancelled: 0 };
}

/** Recursively freeze a plain data tree; compiled regexes are left as they are */
export function freezeDeep<T>(value: T): T {
  if (value instanceof RegExp) return value;
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      freezeDeep(child);
    }
  }
  return value;
}

export function createStepResult(
  init: Pick<StepResult, 'name' | 'index' | 'phase' | 'status'> & Partial<StepResult>,
): StepResult {
  return freezeDeep({
    stdout: '',
    stderr: '',
    exitCode: null,
    matched: [],
    unmatched: [],
    captures: {},
    attempts: [],
    durationMs: 0,
    ...init,
  });
}

/** A step that never ran */
export function skippedStep(step: Step, index: number, phase: StepPhase, reason: string): StepResult {
  return createStepResult({ name: step.name, index, phase, status: 'skipped', skipReason: reason });
}

/** A step that could not run because the run was cancelled */
export function cancelledStep(step: Step, index: number, phase: StepPhase): StepResult {
  return createStepResult({
    name: step.name,
    index,
    phase,
    status: 'cancelled',
    failure: { kind: 'cancelled', message: 'Run cancelled' },
  });
}

export function createScenarioResult(
  init: Pick<ScenarioResult, 'scenario' | 'environment' | 'index' | 'status' | 'startedAt'> & Partial<ScenarioResult>,
): ScenarioResult {
  return freezeDeep({
    setup: [],
    steps: [],
    teardown: [],
    variables: {},
    durationMs: 0,
    ...init,
  });
}

export function createActivationResult(
  init: Pick<ActivationResult, 'environment' | 'status'> & Partial<ActivationResult>,
): ActivationResult {
  return freezeDeep({ setup: [], teardown: [], ...init });
}

/** Per-status counts and overall verdict of a set of runs */
export function summarizeSuite(
  runs: readonly ScenarioResult[],
  schedulingErrors: readonly StepFailure[] = [],
): { status: RunStatus; passed: boolean; totals: Record<RunStatus, number> } {
  const totals = emptyTotals();
  for (const run of runs) {
    totals[run.status]++;
  }
  let status = worstStatus(runs.map((run) => run.status));
  if (schedulingErrors.length > 0 && STATUS_SEVERITY[status] < STATUS_SEVERITY.errored) {
    status = 'errored';
  }
  return { status, passed: status === 'passed', totals };
}

export function createSuiteResult(init: {
  suite: string;
  runs: ScenarioResult[];
  activations: ActivationResult[];
  schedulingErrors: StepFailure[];
  startedAt: number;
}): SuiteResult {
  const runs = [...init.runs].sort((a, b) => a.index - b.index);
  const summary = summarizeSuite(runs, init.schedulingErrors);
  return freezeDeep({
    ...init,
    runs,
    ...summary,
    durationMs: Date.now() - init.startedAt,
  });
}
