// ==================== Patterns ====================

/** How a literal pattern is compared with a line of output */
export type LiteralMode = 'substring' | 'line';

/** One piece of a composite pattern */
export type CompositePart =
  | { kind: 'text'; text: string }
  | { kind: 'slot'; name: string; pattern: string }
  | { kind: 'gap' };

/**
 * Expected-output matching rule. Closed variant: every consumer switches
 * over `kind` exhaustively.
 */
export type Pattern =
  | { kind: 'literal'; text: string; mode: LiteralMode }
  | { kind: 'regex'; source: string; regex: RegExp; slots: string[] }
  | { kind: 'wildcard' }
  | { kind: 'composite'; parts: CompositePart[]; regex: RegExp; slots: string[] };

export type BlockOrder = 'ordered' | 'unordered';

/** A pattern together with its per-entry matching flags */
export interface PatternEntry {
  pattern: Pattern;
  /** A failed optional pattern does not fail the step and binds nothing */
  optional: boolean;
  /** Must match the line directly after the previous match */
  adjacent: boolean;
  /** Allows captured slots to overwrite a previously bound variable */
  rebind: boolean;
  /** Human-readable description used in results */
  label: string;
}

export interface PatternBlock {
  order: BlockOrder;
  entries: PatternEntry[];
}

/** Which captured stream(s) a step verifies */
export type OutputStream = 'stdout' | 'stderr' | 'both';

/** Everything a step checks about its process output */
export interface OutputExpectation {
  stream: OutputStream;
  blocks: PatternBlock[];
  /** Patterns that must not match any line */
  reject: PatternEntry[];
  /** Expected exit code; `'any'` disables the check */
  exitCode: number | 'any';
}

// ==================== Steps ====================

export type CommandTemplate =
  | { kind: 'shell'; template: string }
  | { kind: 'argv'; templates: string[] };

/** What a step does when it runs */
export type StepAction =
  | { kind: 'exec'; command: CommandTemplate; input?: string }
  | { kind: 'session-start'; session: string; command: CommandTemplate }
  | { kind: 'session-send'; session: string; input: string }
  | { kind: 'session-close'; session: string; input?: string };

/** Retry configuration for a step, opted into explicitly */
export interface RetryPolicy {
  maxAttempts: number;
  delay: string;
  backoff?: 'linear' | 'exponential';
  backoffMultiplier?: number;
}

export interface Step {
  name: string;
  action: StepAction;
  expect: OutputExpectation;
  timeoutMs?: number;
  continueOnFailure?: boolean;
  retry?: RetryPolicy;
  /** Working directory for this step only, relative to the context cwd */
  cwd?: string;
  /** Changes the context cwd for this and every later step */
  chdir?: string;
  /** Extra process environment for this step only */
  env: Record<string, string>;
  /** Process environment added to the context after the step passes */
  setEnv: Record<string, string>;
}

// ==================== Suite ====================

export type WorkdirMode = 'shared' | 'fresh' | 'copy';

/** Whether environment setup runs once for all runs or once per run */
export type SetupScope = 'shared' | 'isolated';

export interface Environment {
  name: string;
  description?: string;
  /** Logical placeholder name → concrete string (may itself be a template) */
  placeholders: Readonly<Record<string, string>>;
  /** Process environment applied to every command of this environment */
  env: Readonly<Record<string, string>>;
  workdir: { root: string; mode: WorkdirMode };
  setup: readonly Step[];
  teardown: readonly Step[];
  scope?: SetupScope;
}

export interface Scenario {
  name: string;
  description?: string;
  steps: readonly Step[];
  continueOnFailure?: boolean;
  retry?: RetryPolicy;
  timeoutMs?: number;
  /** Skip reason; when set every run of this scenario is skipped */
  skip?: string;
  /** Environments this scenario is skipped in */
  skipIn: readonly string[];
  /** When set, the scenario is skipped in every other environment */
  only?: readonly string[];
}

export interface SuiteDefaults {
  timeoutMs: number;
  continueOnFailure: boolean;
  literalMode: LiteralMode;
  retry?: RetryPolicy;
}

export interface Suite {
  name: string;
  description?: string;
  /** Directory relative paths in the suite are resolved against */
  baseDir: string;
  defaults: SuiteDefaults;
  environments: readonly Environment[];
  scenarios: readonly Scenario[];
}

// ==================== Results ====================

export type RunStatus = 'passed' | 'failed' | 'errored' | 'skipped' | 'cancelled';

export type FailureKind =
  // binding
  | 'binding'
  // execution
  | 'spawn_failed'
  | 'timeout'
  | 'cancelled'
  | 'resource_exhausted'
  // verification
  | 'pattern_mismatch'
  | 'inconsistent_capture'
  | 'rejected_output'
  | 'exit_code'
  // run / suite level
  | 'setup_failed'
  | 'scheduling';

export interface StepFailure {
  kind: FailureKind;
  message: string;
}

export interface PatternOutcome {
  label: string;
  optional: boolean;
  /** 0-based line index of the match */
  line?: number;
  text?: string;
}

export type StepPhase = 'setup' | 'step' | 'teardown';

export interface AttemptResult {
  attempt: number;
  passed: boolean;
  error?: string;
  duration: number;
  timestamp: number;
}

export interface StepResult {
  name: string;
  index: number;
  phase: StepPhase;
  status: RunStatus;
  /** The bound command line, when binding succeeded */
  command?: string;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  matched: PatternOutcome[];
  unmatched: PatternOutcome[];
  captures: Record<string, string>;
  failure?: StepFailure;
  skipReason?: string;
  attempts: AttemptResult[];
  durationMs: number;
}

export interface ScenarioResult {
  scenario: string;
  environment: string;
  /** Submission order within the suite */
  index: number;
  status: RunStatus;
  setup: StepResult[];
  steps: StepResult[];
  teardown: StepResult[];
  variables: Record<string, string>;
  failure?: StepFailure;
  skipReason?: string;
  startedAt: number;
  durationMs: number;
}

/** Outcome of a shared environment activation */
export interface ActivationResult {
  environment: string;
  status: RunStatus;
  setup: StepResult[];
  teardown: StepResult[];
  failure?: StepFailure;
}

export interface SuiteResult {
  suite: string;
  status: RunStatus;
  passed: boolean;
  runs: ScenarioResult[];
  activations: ActivationResult[];
  totals: Record<RunStatus, number>;
  /** Resource and scheduling problems surfaced at suite level */
  schedulingErrors: StepFailure[];
  startedAt: number;
  durationMs: number;
}

// ==================== Events ====================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type RunEvent =
  | { type: 'suite_start'; suite: string; runs: number; timestamp: number }
  | { type: 'run_start'; scenario: string; environment: string; index: number; timestamp: number }
  | { type: 'step_end'; scenario: string; environment: string; step: StepResult; timestamp: number }
  | { type: 'run_end'; result: ScenarioResult; timestamp: number }
  | { type: 'suite_end'; result: SuiteResult; timestamp: number }
  | { type: 'log'; level: LogLevel; message: string; timestamp: number };

export type RunEventChannel = 'run' | 'log';

export interface BusMessage {
  event: RunEvent['type'];
  data: RunEvent;
}

export interface MessageBus {
  emit(channel: RunEventChannel, message: BusMessage): void;
  subscribe(channel: RunEventChannel, handler: (msg: BusMessage) => void): () => void;
}

// ==================== Reporter ====================

export interface Reporter {
  id: string;
  onEvent(event: RunEvent): void;
  render(result: SuiteResult): string;
}
