/**
 * CLI Configuration
 */

import { Command } from 'commander';
import { createClient } from '@activity-signup/activities-client';
import { registerActivityCommands } from './commands/activities';
import {
  parseOutputFormat,
  setOutputFormat,
  setQuietMode,
  setVerboseMode,
  verbose,
} from './utils/output';

export const DEFAULT_API_URL = 'http://localhost:3000';

export interface CliOptions {
  /** fetch used by the API client (defaults to global fetch) */
  fetch?: typeof fetch;
  env?: NodeJS.ProcessEnv;
}

type GlobalOptions = {
  apiUrl?: string;
  output: string;
  quiet?: boolean;
  verbose?: boolean;
};

export function createCli(cliOptions: CliOptions = {}): Command {
  const env = cliOptions.env ?? process.env;
  const program = new Command();

  program
    .name('activities')
    .description('CLI for the school activities API - list activities and manage signups')
    .version('0.1.0');

  // Global options
  program
    .option('--api-url <url>', `API base URL (default: $ACTIVITIES_API_URL or ${DEFAULT_API_URL})`)
    .option('-o, --output <format>', 'Output format: json or table', 'json')
    .option('-q, --quiet', 'Quiet mode - minimal output')
    .option('-v, --verbose', 'Verbose mode - detailed output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<GlobalOptions>();
      setOutputFormat(parseOutputFormat(opts.output));
      setQuietMode(opts.quiet || false);
      setVerboseMode(opts.verbose || false);
    });

  registerActivityCommands(program, (command) => {
    const opts = command.optsWithGlobals<GlobalOptions>();
    return createClient({
      baseUrl: opts.apiUrl || env.ACTIVITIES_API_URL || DEFAULT_API_URL,
      fetch: cliOptions.fetch,
      onRequest: ({ method, url, status, body }) => {
        verbose(`Request: ${method} ${url}`);
        verbose(`Response: ${status}`);
        verbose(`Body: ${body.substring(0, 200)}${body.length > 200 ? '...' : ''}`);
      },
    });
  });

  return program;
}
