#!/usr/bin/env tsx
/**
 * Faultline CLI
 *
 * Command-line interface for injecting and reverting faults from templates.
 * @module @faultline/cli
 */

import { wrapError } from '@faultline/shared';
import { failure } from './output.js';
import { createProgram } from './program.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    failure(wrapError(err));
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
