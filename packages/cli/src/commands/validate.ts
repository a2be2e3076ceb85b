/**
 * @module commands/validate
 * `crosscheck validate`: load and check a suite without running anything.
 */

import { Command } from 'commander';
import { skipReasonFor } from 'crosscheck-core';
import { EXIT_PASSED, GREEN, loadProject, paint, processIO, reportError } from './shared.js';
import type { CliIO, GlobalOptions } from './shared.js';

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

/**
 * Validate the suite. Returns the process exit code.
 */
export async function validateCommand(paths: readonly string[], opts: GlobalOptions, io: CliIO): Promise<number> {
  try {
    const { suite } = await loadProject(paths, opts.config, io);

    let runs = 0;
    let skipped = 0;
    for (const scenario of suite.scenarios) {
      for (const environment of suite.environments) {
        runs++;
        if (skipReasonFor(scenario, environment) !== undefined) skipped++;
      }
    }

    io.out(
      `${paint(io, GREEN, '✓')} Suite "${suite.name}" is valid: `
        + `${plural(suite.environments.length, 'environment')}, `
        + `${plural(suite.scenarios.length, 'scenario')}, `
        + `${plural(runs, 'run')}${skipped > 0 ? ` (${skipped} skipped)` : ''}`,
    );
    return EXIT_PASSED;
  } catch (err) {
    return reportError(err, io);
  }
}

export function registerValidate(program: Command): void {
  program
    .command('validate')
    .description('Check suite files without running them')
    .argument('[paths...]', 'suite files or directories (default: "suites" from crosscheck.yaml)')
    .action(async (paths: string[]) => {
      const opts = program.opts<GlobalOptions>();
      process.exitCode = await validateCommand(paths, opts, processIO(opts));
    });
}
