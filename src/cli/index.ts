#!/usr/bin/env node
import { createHandlers } from './handlers.js';
import { buildProgram } from './program.js';

async function run(): Promise<void> {
  const program = buildProgram(createHandlers(), (code) => process.exit(code));

  if (!process.argv.slice(2).length) {
    program.outputHelp();
    process.exit(0);
  }

  await program.parseAsync(process.argv);
}

run().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exit(1);
});
