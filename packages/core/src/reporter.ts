/**
 * @module reporter
 * Suite result reporters.
 *
 * Provides three built-in {@link Reporter} implementations:
 * - {@link ConsoleReporter} streams coloured progress and renders a summary
 * - {@link JSONReporter} renders the full {@link SuiteResult} as JSON
 * - {@link JUnitReporter} renders JUnit XML, one testsuite per environment
 */

import type { Reporter, RunEvent, RunStatus, ScenarioResult, StepResult, SuiteResult } from './types.js';
import { RUN_STATUSES } from './results.js';

// =====================================================================
// ANSI helpers (no external dependency)
// =====================================================================

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const MAGENTA = '\x1b[35m';
const GRAY = '\x1b[90m';

const STATUS_ICON: Readonly<Record<RunStatus, string>> = {
  passed: '✓',
  failed: '✗',
  errored: '!',
  skipped: '○',
  cancelled: '-',
};

const STATUS_COLOUR: Readonly<Record<RunStatus, string>> = {
  passed: GREEN,
  failed: RED,
  errored: MAGENTA,
  skipped: YELLOW,
  cancelled: GRAY,
};

export interface ReporterOptions {
  /** Print every step and debug/info logs */
  verbose?: boolean;
  /** Use ANSI colours (default: stdout is a TTY) */
  color?: boolean;
  /** Line sink for streamed output (default: console.log) */
  write?: (line: string) => void;
}

/** `2 passed, 1 failed`; passed is always listed, zero counts are not */
export function formatTotals(totals: Readonly<Record<RunStatus, number>>): string {
  return RUN_STATUSES
    .filter((status) => status === 'passed' || totals[status] > 0)
    .map((status) => `${totals[status]} ${status}`)
    .join(', ');
}

/** The first step that did not pass, setup before main steps */
export function firstFailedStep(run: ScenarioResult): StepResult | undefined {
  return [...run.setup, ...run.steps].find((step) => step.failure !== undefined && step.status !== 'passed');
}

/** One-line reason a run did not pass, if it did not */
export function describeRunFailure(run: ScenarioResult): string | undefined {
  if (run.status === 'passed') return undefined;
  if (run.status === 'skipped') return run.skipReason ?? 'Skipped';
  const step = firstFailedStep(run);
  if (step?.failure) return `${step.phase} "${step.name}": ${step.failure.message}`;
  return run.failure?.message;
}

function indent(text: string, prefix: string): string {
  return text.replace(/\n$/, '').split('\n').map((line) => prefix + line).join('\n');
}

// =====================================================================
// Console Reporter
// =====================================================================

/**
 * Reporter that streams coloured run results as they finish.
 */
export class ConsoleReporter implements Reporter {
  id = 'console';
  private readonly verbose: boolean;
  private readonly color: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ReporterOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.color = options.color ?? process.stdout.isTTY === true;
    this.write = options.write ?? ((line) => console.log(line));
  }

  private paint(colour: string, text: string): string {
    return this.color ? `${colour}${text}${RESET}` : text;
  }

  private statusMark(status: RunStatus): string {
    return this.paint(STATUS_COLOUR[status], STATUS_ICON[status]);
  }

  /**
   * Handle an incoming run event.
   * Prints a human-readable line immediately.
   */
  onEvent(event: RunEvent): void {
    switch (event.type) {
      case 'suite_start':
        this.write(this.paint(BOLD, `Suite: ${event.suite} (${event.runs} run${event.runs === 1 ? '' : 's'})`));
        break;
      case 'run_start':
        break;
      case 'step_end':
        if (this.verbose) {
          const step = event.step;
          this.write(
            `    ${this.statusMark(step.status)} [${event.environment}/${event.scenario}] ${step.phase} "${step.name}" `
              + this.paint(GRAY, `(${step.durationMs}ms)`),
          );
          if (step.command) this.write(this.paint(GRAY, `      $ ${step.command}`));
        }
        break;
      case 'run_end': {
        const run = event.result;
        const suffix = run.status === 'skipped' ? '' : ' ' + this.paint(GRAY, `(${run.durationMs}ms)`);
        this.write(`  ${this.statusMark(run.status)} ${run.scenario} [${run.environment}]${suffix}`);
        const reason = describeRunFailure(run);
        if (reason) this.write(this.paint(STATUS_COLOUR[run.status], indent(reason, '      ')));
        break;
      }
      case 'suite_end':
        break;
      case 'log':
        if (this.verbose || event.level === 'warn' || event.level === 'error') {
          const colour = event.level === 'error' ? RED : event.level === 'warn' ? YELLOW : GRAY;
          this.write(`  ${this.paint(colour, `[${event.level}]`)} ${event.message}`);
        }
        break;
    }
  }

  /**
   * Failure details of every run that did not pass, then the totals.
   */
  render(result: SuiteResult): string {
    const lines: string[] = [];
    const problems = result.runs.filter((run) => run.status !== 'passed' && run.status !== 'skipped');

    if (problems.length > 0) {
      lines.push('', this.paint(BOLD, 'Failures:'));
      for (const run of problems) {
        lines.push('', `  ${this.statusMark(run.status)} ${run.scenario} [${run.environment}] ${run.status}`);
        const step = firstFailedStep(run);
        if (step?.failure) {
          lines.push(`    ${step.phase} "${step.name}" (${step.failure.kind}): ${step.failure.message}`);
          if (step.command) lines.push(`    $ ${step.command}`);
          if (step.stdout) lines.push('    stdout:', indent(step.stdout, '      '));
          if (step.stderr) lines.push('    stderr:', indent(step.stderr, '      '));
        } else if (run.failure) {
          lines.push(`    ${run.failure.kind}: ${run.failure.message}`);
        }
      }
    }

    for (const failure of result.schedulingErrors) {
      lines.push(this.paint(MAGENTA, `  [${failure.kind}] ${failure.message}`));
    }

    const summary = `${formatTotals(result.totals)} (${result.durationMs}ms)`;
    lines.push('', `${this.statusMark(result.status)} ${result.suite}: ${summary}`);
    return lines.join('\n');
  }
}

// =====================================================================
// JSON Reporter
// =====================================================================

/**
 * Reporter that stays silent while running and renders the full result.
 */
export class JSONReporter implements Reporter {
  id = 'json';

  onEvent(_event: RunEvent): void {
    // Nothing streams; the result carries everything.
  }

  render(result: SuiteResult): string {
    return JSON.stringify(result, null, 2);
  }
}

// =====================================================================
// JUnit Reporter
// =====================================================================

/** Escape XML special characters and drop characters XML 1.0 cannot carry */
export function escapeXML(str: string): string {
  return str
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

function testcase(suite: string, run: ScenarioResult): string {
  const open = `    <testcase name="${escapeXML(run.scenario)}" classname="${escapeXML(`${suite}.${run.environment}`)}" time="${seconds(run.durationMs)}"`;
  if (run.status === 'passed') return `${open}/>`;

  let body: string;
  if (run.status === 'skipped') {
    body = `      <skipped message="${escapeXML(run.skipReason ?? 'Skipped')}"/>`;
  } else {
    const step = firstFailedStep(run);
    const failure = step?.failure ?? run.failure ?? { kind: run.status, message: run.status };
    const tag = run.status === 'failed' ? 'failure' : 'error';
    const detail = step ? [describeRunFailure(run) ?? '', step.stdout, step.stderr].filter(Boolean).join('\n') : failure.message;
    body = `      <${tag} message="${escapeXML(failure.message)}" type="${escapeXML(failure.kind)}">${escapeXML(detail)}</${tag}>`;
  }
  return `${open}>\n${body}\n    </testcase>`;
}

/**
 * Reporter that renders JUnit XML: one `<testsuite>` per environment and
 * one `<testcase>` per scenario. Errored and cancelled runs map to
 * `<error>`.
 */
export class JUnitReporter implements Reporter {
  id = 'junit';

  onEvent(_event: RunEvent): void {
    // Nothing streams.
  }

  render(result: SuiteResult): string {
    const byEnvironment = new Map<string, ScenarioResult[]>();
    for (const run of result.runs) {
      const runs = byEnvironment.get(run.environment) ?? [];
      runs.push(run);
      byEnvironment.set(run.environment, runs);
    }

    const count = (runs: readonly ScenarioResult[], ...statuses: RunStatus[]): number =>
      runs.filter((run) => statuses.includes(run.status)).length;

    const suites = [...byEnvironment].map(([environment, runs]) => {
      const time = runs.reduce((sum, run) => sum + run.durationMs, 0);
      const header = `  <testsuite name="${escapeXML(environment)}" tests="${runs.length}" failures="${count(runs, 'failed')}" errors="${count(runs, 'errored', 'cancelled')}" skipped="${count(runs, 'skipped')}" time="${seconds(time)}">`;
      return [header, ...runs.map((run) => testcase(result.suite, run)), '  </testsuite>'].join('\n');
    });

    const runs = result.runs;
    return [
      '<?xml version="1.0" encoding="UTF-8"?>',
      `<testsuites name="${escapeXML(result.suite)}" tests="${runs.length}" failures="${count(runs, 'failed')}" errors="${count(runs, 'errored', 'cancelled')}" skipped="${count(runs, 'skipped')}" time="${seconds(result.durationMs)}">`,
      ...suites,
      '</testsuites>',
      '',
    ].join('\n');
  }
}

/**
 * Create a reporter by id.
 */
export function createReporter(id: 'console' | 'json' | 'junit', options: ReporterOptions = {}): Reporter {
  switch (id) {
    case 'console':
      return new ConsoleReporter(options);
    case 'json':
      return new JSONReporter();
    case 'junit':
      return new JUnitReporter();
  }
}
