// crosscheck-core - sample test engine

// Types
export * from './types.js';

// Errors
export {
  CrosscheckError,
  LoadError,
  BindingError,
  ExecutionError,
  SchedulingError,
  ERROR_METADATA,
  statusForFailure,
  toStepFailure,
  errorMessage,
  systemErrorCode,
} from './errors.js';
export type { CrosscheckErrorCode } from './errors.js';

// Config Loader
export {
  loadConfig,
  substituteEnv,
  ProjectConfigSchema,
  CONFIG_FILENAMES,
  REPORTER_IDS,
} from './config-loader.js';
export type { ProjectConfig, LoadedConfig, ReporterId } from './config-loader.js';

// Suite Loader
export {
  loadSuite,
  parseSuiteSources,
  parseTime,
  classifyByFilename,
  stepTemplates,
  DEFAULT_TIMEOUT_MS,
} from './suite-loader.js';
export type { SuiteSource, ParseSuiteOptions } from './suite-loader.js';
export { SuiteDocumentSchema, DOCUMENT_TYPES } from './suite-schema.js';
export type { DocumentType, SuiteDocument, StepSpec, EnvironmentSpec, PatternSpec } from './suite-schema.js';

// Pattern Matcher
export { compilePattern, compileBlocks, compileExpectation, describePattern, escapeRegExp } from './pattern-compiler.js';
export { verifyOutput, matchLine, selectStream, splitLines } from './pattern-matcher.js';
export type { MatchInput, VerificationOutcome } from './pattern-matcher.js';

// Variable Resolver
export {
  resolveTemplate,
  resolveRecord,
  parseReference,
  formatReference,
  collectReferences,
  findMissingPlaceholders,
  BUILTIN_NAMES,
} from './variable-resolver.js';
export type { TemplateScope, TemplateReference, BuiltinName } from './variable-resolver.js';

// Environment Binder
export { bindCommand, bindStep, bindSetEnv, templateScope, prepareWorkdir, releaseWorkdir } from './environment-binder.js';
export type { BoundStep, PreparedWorkdir } from './environment-binder.js';
export { createExecutionContext, disposeExecutionContext, snapshotVariables } from './execution-context.js';
export type { ExecutionContext, CreateContextOptions } from './execution-context.js';

// Step Executor
export { executeCommand, killProcessGroup, spawnFailure } from './step-executor.js';
export type { BoundCommand, SpawnFn, ExecuteOptions, ExecutionOutcome } from './step-executor.js';
export { InteractiveSession } from './session.js';
export type { SessionRead, ReadOptions, SessionStartOptions } from './session.js';
export { RetryExecutor, parseDelay, computeBackoffDelay, resolveRetryPolicy } from './retry-engine.js';
export type { AttemptVerdict, RetryResult } from './retry-engine.js';

// Scenario Runner
export { runScenario, runStep, runPhase, skipReasonFor } from './scenario-runner.js';
export type { RunScenarioOptions, StepSettings, ActivationSeed } from './scenario-runner.js';

// Suite Scheduler
export { runSuite, DEFAULT_CONCURRENCY } from './suite-scheduler.js';
export type { RunSuiteOptions } from './suite-scheduler.js';
export { Semaphore } from './semaphore.js';

// Results
export {
  RUN_STATUSES,
  STATUS_SEVERITY,
  worstStatus,
  summarizeSuite,
  freezeDeep,
} from './results.js';

// Events
export { EventBus, createEventBus, createRunEmitter } from './events.js';
export type { RunEmitter } from './events.js';

// Reporter
export {
  ConsoleReporter,
  JSONReporter,
  JUnitReporter,
  createReporter,
  formatTotals,
  describeRunFailure,
  escapeXML,
} from './reporter.js';
export type { ReporterOptions } from './reporter.js';
