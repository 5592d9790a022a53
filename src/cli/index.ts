#!/usr/bin/env node
import { createHandlers } from './handlers.js';
import { createProgram } from './program.js';

function run(): void {
  const program = createProgram(createHandlers(), (code) => process.exit(code));

  if (!process.argv.slice(2).length) {
    program.outputHelp();
    process.exit(0);
  }

  program.parseAsync(process.argv).catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  });
}

run();
