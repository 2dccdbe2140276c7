#!/usr/bin/env node
/**
 * syntree-comments - CLI Entry Point
 *
 * Usage:
 *   syntree-comments annotate src/lib.rs             # Print the annotated JSON tree
 *   syntree-comments annotate src/lib.rs lib.json    # Write it to a file
 *   syntree-comments comments src/lib.rs             # List extracted comments
 *   syntree-comments spans src/lib.rs                # List declaration and body spans
 *   syntree-comments init                            # Write a default config file
 *   syntree-comments --help                          # Show help
 */

import { runCLI } from './cli/commands.js';

process.on('unhandledRejection', (reason) => {
  console.error('syntree-comments crashed:', reason);
  process.exit(1);
});

runCLI(process.argv).catch((error: unknown) => {
  console.error('syntree-comments crashed:', error);
  process.exit(1);
});
