/**
 * Activities CLI - Entry Point
 */

import { createCli } from './cli';

const program = createCli();

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
