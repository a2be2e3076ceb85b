/**
 * @module commands/list
 * `crosscheck list`: show the environments, scenarios and the run matrix
 * of a suite.
 */

import { Command } from 'commander';
import { skipReasonFor } from 'crosscheck-core';
import { BOLD, EXIT_PASSED, GRAY, loadProject, paint, processIO, reportError } from './shared.js';
import type { CliIO, GlobalOptions } from './shared.js';

/**
 * List the suite contents. Returns the process exit code.
 */
export async function listCommand(paths: readonly string[], opts: GlobalOptions, io: CliIO): Promise<number> {
  try {
    const { suite } = await loadProject(paths, opts.config, io);

    io.out(paint(io, BOLD, 'Environments:'));
    for (const environment of suite.environments) {
      const scope = environment.scope ? ` ${paint(io, GRAY, `[${environment.scope}]`)}` : '';
      const description = environment.description ? ` ${paint(io, GRAY, environment.description)}` : '';
      io.out(`  ${environment.name}${scope}${description}`);
    }

    io.out(paint(io, BOLD, 'Scenarios:'));
    for (const scenario of suite.scenarios) {
      const description = scenario.description ? ` ${paint(io, GRAY, scenario.description)}` : '';
      io.out(`  ${scenario.name} (${scenario.steps.length} step${scenario.steps.length === 1 ? '' : 's'})${description}`);
      for (const environment of suite.environments) {
        const reason = skipReasonFor(scenario, environment);
        if (reason !== undefined) {
          io.out(`    ${paint(io, GRAY, `○ ${environment.name}: ${reason}`)}`);
        }
      }
    }
    return EXIT_PASSED;
  } catch (err) {
    return reportError(err, io);
  }
}

export function registerList(program: Command): void {
  program
    .command('list')
    .description('List environments and scenarios of a suite')
    .argument('[paths...]', 'suite files or directories (default: "suites" from crosscheck.yaml)')
    .action(async (paths: string[]) => {
      const opts = program.opts<GlobalOptions>();
      process.exitCode = await listCommand(paths, opts, processIO(opts));
    });
}
