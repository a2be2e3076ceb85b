/**
 * @module commands/shared
 * Plumbing shared by the sub-commands: output sinks, exit codes and
 * locating the suite from arguments or the project config.
 */

import path from 'node:path';
import { CrosscheckError, LoadError, errorMessage, loadConfig, loadSuite } from 'crosscheck-core';
import type { LoadedConfig, Suite } from 'crosscheck-core';

// ── ANSI colours ──────────────────────────────────────────────────────
export const RED = '\x1b[31m';
export const GREEN = '\x1b[32m';
export const GRAY = '\x1b[90m';
export const BOLD = '\x1b[1m';
export const RESET = '\x1b[0m';

/** Every suite run passed */
export const EXIT_PASSED = 0;
/** At least one run failed, errored or was cancelled */
export const EXIT_FAILED = 1;
/** The suite or config could not be loaded, or the arguments were wrong */
export const EXIT_USAGE = 2;

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  cwd: string;
  /** Emit ANSI colour codes */
  color: boolean;
}

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  /** `false` when --no-color was given */
  color?: boolean;
}

export function processIO(opts: GlobalOptions = {}): CliIO {
  return {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    cwd: process.cwd(),
    color: opts.color !== false && process.stdout.isTTY === true,
  };
}

export function paint(io: CliIO, colour: string, text: string): string {
  return io.color ? `${colour}${text}${RESET}` : text;
}

export interface LoadedProject {
  config: LoadedConfig;
  suite: Suite;
}

/**
 * Load the project config, then the suite named on the command line or,
 * without arguments, the suites the config lists.
 *
 * @throws {LoadError}
 */
export async function loadProject(paths: readonly string[], configPath: string | undefined, io: CliIO): Promise<LoadedProject> {
  const config = await loadConfig(configPath, io.cwd);
  const targets = paths.length > 0
    ? paths.map((p) => path.resolve(io.cwd, p))
    : config.suites.map((p) => path.resolve(config.configDir, p));
  if (targets.length === 0) {
    throw new LoadError('No suite files given', ['pass suite files or directories, or list them under "suites" in crosscheck.yaml']);
  }
  const suite = await loadSuite(targets, { baseDir: config.configDir });
  return { config, suite };
}

/**
 * Print an error and return the exit code for it: fatal engine errors
 * (load, binding, scheduling) exit with {@link EXIT_USAGE}, anything else
 * with {@link EXIT_FAILED}.
 */
export function reportError(err: unknown, io: CliIO): number {
  if (err instanceof CrosscheckError) {
    io.err(paint(io, RED, `${err.name}: ${err.message}`));
    return err.fatal ? EXIT_USAGE : EXIT_FAILED;
  }
  io.err(paint(io, RED, `Unexpected error: ${errorMessage(err)}`));
  return EXIT_FAILED;
}
