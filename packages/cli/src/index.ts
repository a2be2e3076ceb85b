#!/usr/bin/env tsx
/**
 * @module crosscheck/bin
 * CLI entry point: parses process.argv via Commander.js.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
