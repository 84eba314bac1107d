/**
 * minidev
 *
 * CLI entry point.
 */

import { createProgram } from './program';

await createProgram().parseAsync();
