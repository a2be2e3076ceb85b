/**
 * @module config-loader
 * Project configuration loader.
 *
 * Loads `crosscheck.yaml` project files, validates them with Zod schemas,
 * supports `.env` file loading and `{{env.XXX}}` substitution. Command-line
 * flags override what the file sets.
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import { LoadError, errorMessage, systemErrorCode } from './errors.js';
import { DurationSchema } from './suite-schema.js';

export const CONFIG_FILENAMES = ['crosscheck.yaml', 'crosscheck.yml'] as const;

export const REPORTER_IDS = ['console', 'json', 'junit'] as const;
export type ReporterId = (typeof REPORTER_IDS)[number];

// =====================================================================
// Zod Schema
// =====================================================================

export const ProjectConfigSchema = z.object({
  suites: z.array(z.string()).default([]).describe('Suite files or directories (relative to the config file)'),
  concurrency: z.number().int().min(1).optional().describe('Maximum concurrent runs'),
  timeout: DurationSchema.optional().describe('Default step timeout, e.g. "30s"'),
  keepWorkdirs: z.boolean().default(false).describe('Keep temporary run directories for inspection'),
  environments: z.array(z.string()).optional().describe('Environments to run (default: all)'),
  scenarios: z.array(z.string()).optional().describe('Scenarios to run (default: all)'),
  reporter: z.enum(REPORTER_IDS).default('console').describe('Result output format'),
  output: z.string().optional().describe('Write the report to this file instead of stdout'),
  verbose: z.boolean().default(false).describe('Show output of every step'),
}).strict().describe('Project configuration');

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export interface LoadedConfig extends ProjectConfig {
  /** Directory relative paths in the config are resolved against */
  configDir: string;
  /** Path of the file the config was read from, if any */
  configPath?: string;
}

// =====================================================================
// Config Loader
// =====================================================================

/**
 * Load and validate a project configuration file.
 *
 * Steps:
 * 1. Locate the file (explicit path, or `crosscheck.yaml`/`crosscheck.yml` in `cwd`)
 * 2. Load `.env` from the config file's directory
 * 3. Parse YAML content
 * 4. Substitute `{{env.XXX}}` variables
 * 5. Validate with Zod schema
 *
 * Without an explicit path and without a file in `cwd`, the defaults apply.
 *
 * @throws {LoadError} If an explicit file is missing, on YAML syntax errors
 *   or when validation fails
 */
export async function loadConfig(configPath?: string, cwd: string = process.cwd()): Promise<LoadedConfig> {
  const resolvedPath = await resolveConfigPath(configPath, cwd);
  if (!resolvedPath) {
    return { ...ProjectConfigSchema.parse({}), configDir: cwd };
  }

  const configDir = path.dirname(resolvedPath);
  dotenv.config({ path: path.resolve(configDir, '.env') });

  let rawContent: string;
  try {
    rawContent = await fs.readFile(resolvedPath, 'utf-8');
  } catch (err) {
    if (systemErrorCode(err) === 'ENOENT') {
      throw new LoadError(`Configuration file not found: ${resolvedPath}`);
    }
    throw new LoadError(`Cannot read configuration file ${resolvedPath}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(rawContent);
  } catch (err) {
    throw new LoadError(`YAML syntax error in ${resolvedPath}: ${errorMessage(err)}`);
  }

  if (parsed === null || parsed === undefined) {
    parsed = {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new LoadError(`Configuration file is not a mapping: ${resolvedPath}`);
  }

  const resolved = substituteEnv(parsed, process.env);

  const result = ProjectConfigSchema.safeParse(resolved);
  if (!result.success) {
    throw new LoadError(
      `Configuration validation failed: ${resolvedPath}`,
      result.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`),
    );
  }

  return { ...result.data, configDir, configPath: resolvedPath };
}

/**
 * Replace `{{env.XXX}}` in every string of a parsed YAML value.
 * Unknown variables are left in place.
 */
export function substituteEnv(value: unknown, env: Readonly<Record<string, string | undefined>>): unknown {
  if (typeof value === 'string') {
    return value.replace(/\{\{\s*env\.([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g, (match, name: string) => env[name] ?? match);
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteEnv(item, env));
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteEnv(item, env);
    }
    return result;
  }
  return value;
}

// =====================================================================
// Internal Helpers
// =====================================================================

async function resolveConfigPath(configPath: string | undefined, cwd: string): Promise<string | undefined> {
  if (configPath) {
    return path.resolve(cwd, configPath);
  }

  for (const name of CONFIG_FILENAMES) {
    const candidate = path.resolve(cwd, name);
    try {
      await fs.access(candidate);
      return candidate;
    } catch (err) {
      if (systemErrorCode(err) !== 'ENOENT') {
        throw new LoadError(`Cannot access ${candidate}: ${errorMessage(err)}`);
      }
    }
  }
  return undefined;
}
