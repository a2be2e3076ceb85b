/**
 * @module commands/run
 * `crosscheck run`: execute a suite.
 *
 * Steps:
 * 1. Load crosscheck.yaml (if any) and the suite files
 * 2. Merge command-line flags over the config
 * 3. Run every selected scenario in every selected environment
 * 4. Output report (console/json/junit)
 *
 * Exits 0 when every run passed, 1 otherwise, 2 on load or usage errors.
 * Ctrl-C cancels the in-flight runs and still reports.
 */

import { Command, InvalidArgumentError } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';
import { REPORTER_IDS, createReporter, errorMessage, parseTime, runSuite } from 'crosscheck-core';
import type { ReporterId, SuiteResult } from 'crosscheck-core';
import { EXIT_FAILED, EXIT_PASSED, GRAY, loadProject, paint, processIO, reportError } from './shared.js';
import type { CliIO, GlobalOptions } from './shared.js';

export interface RunCommandOptions extends GlobalOptions {
  environment?: string[];
  scenario?: string[];
  concurrency?: number;
  /** Default step timeout in milliseconds */
  timeout?: number;
  reporter?: ReporterId;
  output?: string;
  keepWorkdirs?: boolean;
  signal?: AbortSignal;
}

// ── Option parsers ────────────────────────────────────────────────────

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parseConcurrency(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

export function parseTimeout(value: string): number {
  try {
    return parseTime(value);
  } catch (err) {
    throw new InvalidArgumentError(errorMessage(err));
  }
}

export function parseReporter(value: string): ReporterId {
  const id = REPORTER_IDS.find((candidate) => candidate === value);
  if (!id) {
    throw new InvalidArgumentError(`Expected one of: ${REPORTER_IDS.join(', ')}.`);
  }
  return id;
}

// ── Command ───────────────────────────────────────────────────────────

/**
 * Run a suite and report it. Returns the process exit code.
 */
export async function runCommand(paths: readonly string[], opts: RunCommandOptions, io: CliIO): Promise<number> {
  let result: SuiteResult;
  let rendered: string;
  let output: string | undefined;

  try {
    const { config, suite } = await loadProject(paths, opts.config, io);
    const reporter = createReporter(opts.reporter ?? config.reporter, {
      verbose: opts.verbose ?? config.verbose,
      color: io.color && opts.color !== false,
      write: (line) => io.out(line),
    });

    result = await runSuite(suite, {
      concurrency: opts.concurrency ?? config.concurrency,
      defaultTimeoutMs: opts.timeout ?? (config.timeout !== undefined ? parseTime(config.timeout) : undefined),
      environments: opts.environment ?? config.environments,
      scenarios: opts.scenario ?? config.scenarios,
      keepWorkdirs: opts.keepWorkdirs ?? config.keepWorkdirs,
      signal: opts.signal,
      onEvent: (event) => reporter.onEvent(event),
    });

    rendered = reporter.render(result);
    if (opts.output) {
      output = path.resolve(io.cwd, opts.output);
    } else if (config.output) {
      output = path.resolve(config.configDir, config.output);
    }
  } catch (err) {
    return reportError(err, io);
  }

  if (output) {
    try {
      await fs.writeFile(output, rendered, 'utf-8');
    } catch (err) {
      return reportError(err, io);
    }
    io.out(paint(io, GRAY, `Report written to ${output}`));
  } else {
    io.out(rendered);
  }

  return result.passed ? EXIT_PASSED : EXIT_FAILED;
}

export function registerRun(program: Command): void {
  program
    .command('run')
    .description('Run a suite: every scenario in every environment')
    .argument('[paths...]', 'suite files or directories (default: "suites" from crosscheck.yaml)')
    .option('-e, --environment <name>', 'run only this environment (repeatable)', collect)
    .option('-s, --scenario <name>', 'run only this scenario (repeatable)', collect)
    .option('-j, --concurrency <n>', 'maximum concurrent runs (default: 4)', parseConcurrency)
    .option('-t, --timeout <time>', 'default step timeout, e.g. "30s"', parseTimeout)
    .option('-r, --reporter <type>', `report format (${REPORTER_IDS.join('|')})`, parseReporter)
    .option('-o, --output <file>', 'write the report to a file')
    .option('--keep-workdirs', 'keep temporary run directories')
    .action(async (paths: string[], opts: RunCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const io = processIO(globalOpts);
      const controller = new AbortController();
      const onSigint = (): void => {
        io.err('Interrupted, cancelling runs...');
        controller.abort();
      };
      process.once('SIGINT', onSigint);

      try {
        process.exitCode = await runCommand(paths, { ...globalOpts, ...opts, signal: controller.signal }, io);
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
}
