/**
 * @module suite-schema
 * Zod schemas for suite documents.
 *
 * A suite document is YAML with up to three sections: `defaults`,
 * `environments` and `scenarios`. Several documents (optionally tagged
 * with a top-level `type`) merge into one suite, see {@link parseSuiteSources}.
 */

import { z } from 'zod';

// =====================================================================
// Scalars
// =====================================================================

/** YAML scalars used as strings (`port: 8080` reads as a number) */
const StringValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const StringMapSchema = z.record(StringValueSchema);

/** "5s", "100ms", "2m", "1h" or a plain number of milliseconds */
export const DurationSchema = z.union([z.string(), z.number().nonnegative()]).describe('Duration such as "5s" or 500');

export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).describe('Maximum attempts including the first one'),
  delay: z.string().default('0').describe('Delay between attempts, e.g. "2s", "500ms"'),
  backoff: z.enum(['linear', 'exponential']).optional().describe('Backoff strategy'),
  backoffMultiplier: z.number().positive().optional().describe('Multiplier for the backoff strategy'),
}).strict().describe('Explicit retry policy for failed steps');

// =====================================================================
// Patterns
// =====================================================================

const BlockOrderSchema = z.enum(['ordered', 'unordered']);

const PatternFlagsShape = {
  optional: z.boolean().optional().describe('A failed optional pattern does not fail the step'),
  adjacent: z.boolean().optional().describe('Must match the line right after the previous match'),
  rebind: z.boolean().optional().describe('Allow captures to overwrite previously bound variables'),
  block: BlockOrderSchema.optional().describe('Grouping tag; consecutive equal tags form one block'),
};

export const LiteralPatternSchema = z.object({
  literal: StringValueSchema,
  mode: z.enum(['substring', 'line']).optional().describe('Substring containment or whole-line equality'),
  ...PatternFlagsShape,
}).strict();

export const RegexPatternSchema = z.object({
  regex: z.string().describe('Regular expression; named groups are capture slots'),
  flags: z.string().optional().describe('RegExp flags (i, m, s, u)'),
  ...PatternFlagsShape,
}).strict();

export const WildcardPatternSchema = z.object({
  wildcard: z.literal(true),
  ...PatternFlagsShape,
}).strict();

export const CompositePartSchema = z.union([
  z.string(),
  z.object({
    capture: z.string().describe('Variable the slot binds'),
    pattern: z.string().optional().describe('Sub-pattern of the slot (default \\S+)'),
  }).strict(),
  z.object({ wildcard: z.literal(true) }).strict(),
]);

export const CompositePatternSchema = z.object({
  composite: z.array(CompositePartSchema).min(1),
  ...PatternFlagsShape,
}).strict();

/** A bare string is a literal pattern */
export const PatternSpecSchema = z.union([
  z.string(),
  LiteralPatternSchema,
  RegexPatternSchema,
  WildcardPatternSchema,
  CompositePatternSchema,
]);

export const BlockSpecSchema = z.union([
  z.object({ ordered: z.array(PatternSpecSchema) }).strict(),
  z.object({ unordered: z.array(PatternSpecSchema) }).strict(),
]);

export const ExpectEntrySchema = z.union([PatternSpecSchema, BlockSpecSchema]);

// =====================================================================
// Steps
// =====================================================================

export const SessionSpecSchema = z.object({
  name: z.string().min(1).describe('Session identifier, unique within a run'),
  start: z.union([z.string(), z.array(z.string()).min(1)]).optional().describe('Command starting the session'),
  send: z.string().optional().describe('Text written to the session stdin'),
  close: z.boolean().optional().describe('End stdin and wait for the session to exit'),
}).strict();

export const StepSpecSchema = z.object({
  name: z.string().optional(),
  run: z.string().optional().describe('Shell command template'),
  argv: z.array(z.string()).min(1).optional().describe('Argument vector templates, spawned without a shell'),
  session: SessionSpecSchema.optional(),
  input: z.string().optional().describe('Text written to stdin of a run/argv command'),
  stream: z.enum(['stdout', 'stderr', 'both']).optional(),
  expect: z.array(ExpectEntrySchema).optional(),
  reject: z.array(PatternSpecSchema).optional().describe('Patterns no output line may match'),
  exitCode: z.union([z.number().int(), z.literal('any')]).optional(),
  timeout: DurationSchema.optional(),
  continueOnFailure: z.boolean().optional(),
  retry: RetryPolicySchema.optional(),
  cwd: z.string().optional(),
  chdir: z.string().optional(),
  env: StringMapSchema.optional(),
  setEnv: StringMapSchema.optional(),
}).strict();

/** A bare string is a shell command step */
export const StepEntrySchema = z.union([z.string(), StepSpecSchema]);

// =====================================================================
// Environments & Scenarios
// =====================================================================

export const WorkdirSpecSchema = z.union([
  z.string(),
  z.object({
    root: z.string().default('.'),
    mode: z.enum(['shared', 'fresh', 'copy']).default('shared'),
  }).strict(),
]);

export const EnvironmentSpecSchema = z.object({
  description: z.string().optional(),
  placeholders: StringMapSchema.default({}),
  env: StringMapSchema.default({}),
  workdir: WorkdirSpecSchema.optional(),
  scope: z.enum(['shared', 'isolated']).optional().describe('Required when setup or teardown is present'),
  setup: z.array(StepEntrySchema).default([]),
  teardown: z.array(StepEntrySchema).default([]),
}).strict();

export const ScenarioBodySchema = z.object({
  description: z.string().optional(),
  steps: z.array(StepEntrySchema),
  continueOnFailure: z.boolean().optional(),
  retry: RetryPolicySchema.optional(),
  timeout: DurationSchema.optional(),
  skip: z.union([z.boolean(), z.string()]).optional(),
  skipIn: z.array(z.string()).optional(),
  only: z.array(z.string()).optional(),
}).strict();

export const ScenarioSpecSchema = ScenarioBodySchema.extend({ name: z.string().min(1) });

/** Either a list of named scenarios or a key-ordered mapping name → body */
export const ScenariosSchema = z.union([
  z.array(ScenarioSpecSchema),
  z.record(z.union([z.array(StepEntrySchema), ScenarioBodySchema])),
]);

export const DefaultsSchema = z.object({
  timeout: DurationSchema.optional(),
  continueOnFailure: z.boolean().optional(),
  literalMode: z.enum(['substring', 'line']).optional(),
  retry: RetryPolicySchema.optional(),
}).strict();

export const DOCUMENT_TYPES = ['suite', 'environments', 'scenarios'] as const;
export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export const SuiteDocumentSchema = z.object({
  type: z.string().optional().describe('Document type: suite, environments or scenarios'),
  name: z.string().optional(),
  description: z.string().optional(),
  defaults: DefaultsSchema.optional(),
  environments: z.record(EnvironmentSpecSchema).optional(),
  scenarios: ScenariosSchema.optional(),
}).strict();

export type PatternSpec = z.infer<typeof PatternSpecSchema>;
export type BlockSpec = z.infer<typeof BlockSpecSchema>;
export type ExpectEntry = z.infer<typeof ExpectEntrySchema>;
export type StepSpec = z.infer<typeof StepSpecSchema>;
export type StepEntry = z.infer<typeof StepEntrySchema>;
export type EnvironmentSpec = z.infer<typeof EnvironmentSpecSchema>;
export type ScenarioBody = z.infer<typeof ScenarioBodySchema>;
export type SuiteDocument = z.infer<typeof SuiteDocumentSchema>;
