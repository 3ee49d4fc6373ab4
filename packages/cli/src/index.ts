#!/usr/bin/env tsx
import { createProgram, reportError } from './program';
import type { GlobalOptions } from './options';

async function main() {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    process.exit(reportError(e, program.opts<GlobalOptions>()));
  }
}

void main();
