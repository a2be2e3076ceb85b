/**
 * @module errors
 * Error taxonomy of the engine.
 *
 * Every thrown error carries a machine-readable code from
 * {@link ERROR_METADATA}. Step-level problems, verification failures
 * included, are recorded as {@link StepFailure} values; the classes here
 * are thrown only where a scope cannot continue (suite load, a single
 * binding, a session start, scheduler setup).
 */

import type { FailureKind, RunStatus, StepFailure } from './types.js';

// =====================================================================
// Error Codes
// =====================================================================

export type CrosscheckErrorCode =
  | 'LOAD_ERROR'
  | 'BINDING_ERROR'
  | 'EXECUTION_ERROR'
  | 'SCHEDULING_ERROR';

interface ErrorMetadataEntry {
  /** Fatal errors abort their whole scope and are never retried */
  fatal: boolean;
}

export const ERROR_METADATA: ReadonlyMap<CrosscheckErrorCode, ErrorMetadataEntry> = new Map<CrosscheckErrorCode, ErrorMetadataEntry>([
  ['LOAD_ERROR', { fatal: true }],
  ['BINDING_ERROR', { fatal: true }],
  ['EXECUTION_ERROR', { fatal: false }],
  ['SCHEDULING_ERROR', { fatal: true }],
]);

// =====================================================================
// Error Classes
// =====================================================================

export class CrosscheckError extends Error {
  public readonly code: CrosscheckErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(code: CrosscheckErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'CrosscheckError';
    this.code = code;
    this.details = details;
  }

  get fatal(): boolean {
    return ERROR_METADATA.get(this.code)?.fatal ?? true;
  }
}

/** Malformed suite document, bad regex or unresolved environment reference */
export class LoadError extends CrosscheckError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('LOAD_ERROR', issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message, { issues });
    this.name = 'LoadError';
    this.issues = issues;
  }
}

/** A template references an unknown placeholder or an uncaptured variable */
export class BindingError extends CrosscheckError {
  public readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super('BINDING_ERROR', message, { missing });
    this.name = 'BindingError';
    this.missing = missing;
  }
}

/** A process could not be started, timed out or was cancelled */
export class ExecutionError extends CrosscheckError {
  public readonly kind: Extract<FailureKind, 'spawn_failed' | 'timeout' | 'cancelled' | 'resource_exhausted'>;

  constructor(kind: ExecutionError['kind'], message: string) {
    super('EXECUTION_ERROR', message, { kind });
    this.name = 'ExecutionError';
    this.kind = kind;
  }
}

/** Resource exhaustion or an invalid scheduler configuration */
export class SchedulingError extends CrosscheckError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('SCHEDULING_ERROR', message, details);
    this.name = 'SchedulingError';
  }
}

// =====================================================================
// Helpers
// =====================================================================

/** Terminal status a failure of the given kind gives its step */
export function statusForFailure(kind: FailureKind): RunStatus {
  switch (kind) {
    case 'pattern_mismatch':
    case 'inconsistent_capture':
    case 'rejected_output':
    case 'exit_code':
      return 'failed';
    case 'cancelled':
      return 'cancelled';
    case 'binding':
    case 'spawn_failed':
    case 'timeout':
    case 'resource_exhausted':
    case 'setup_failed':
    case 'scheduling':
      return 'errored';
  }
}

/** Convert a thrown value into a recordable {@link StepFailure} */
export function toStepFailure(err: unknown, fallback: FailureKind): StepFailure {
  if (err instanceof BindingError) {
    return { kind: 'binding', message: err.message };
  }
  if (err instanceof ExecutionError) {
    return { kind: err.kind, message: err.message };
  }
  if (err instanceof SchedulingError) {
    return { kind: 'scheduling', message: err.message };
  }
  return { kind: fallback, message: errorMessage(err) };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The `code` property of a Node.js system error, if any */
export function systemErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
