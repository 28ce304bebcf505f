/**
 * Activities CLI Tests
 */

import chalk from 'chalk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createCli } from './cli';

const catalog = {
  'Chess Club': {
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays',
    max_participants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
  },
  'Art Studio': {
    description: 'Painting and drawing',
    schedule: 'Wednesdays',
    max_participants: 1,
    participants: ['ava@mergington.edu'],
  },
};

function mockFetch(status: number, body: unknown) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
  );
}

async function run(args: string[], fetch: ReturnType<typeof mockFetch>, env: NodeJS.ProcessEnv = {}) {
  const program = createCli({ fetch, env });
  program.exitOverride();
  await program.parseAsync(['node', 'activities', ...args]);
}

describe('Activities CLI', () => {
  let logs: string[];
  let errors: string[];

  beforeEach(() => {
    chalk.level = 0;
    process.exitCode = undefined;
    logs = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(args.join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('should create CLI with all commands', () => {
    const program = createCli();

    expect(program.name()).toBe('activities');
    expect(program.commands.map((cmd) => cmd.name())).toEqual(['list', 'show', 'signup', 'remove']);
  });

  it('should have global options', () => {
    const optionNames = createCli().options.map((opt) => opt.long);

    expect(optionNames).toContain('--api-url');
    expect(optionNames).toContain('--output');
    expect(optionNames).toContain('--quiet');
    expect(optionNames).toContain('--verbose');
  });

  it('should print activities as JSON by default', async () => {
    const fetch = mockFetch(200, catalog);

    await run(['list'], fetch);

    expect(fetch.mock.calls[0][0]).toBe('http://localhost:3000/activities');
    expect(logs).toEqual([JSON.stringify(catalog, null, 2)]);
  });

  it('should print activities as a table', async () => {
    await run(['-o', 'table', 'list'], mockFetch(200, catalog));

    expect(logs).toEqual([
      'ACTIVITY    SCHEDULE    ENROLLED  SPOTS LEFT',
      '----------  ----------  --------  ----------',
      'Chess Club  Fridays     2/12      10',
      'Art Studio  Wednesdays  1/1       0',
    ]);
  });

  it('should use --api-url over the environment', async () => {
    const fetch = mockFetch(200, catalog);

    await run(['--api-url', 'http://example.test:8000/', 'list'], fetch, {
      ACTIVITIES_API_URL: 'http://ignored.test',
    });

    expect(fetch.mock.calls[0][0]).toBe('http://example.test:8000/activities');
  });

  it('should read the API URL from the environment', async () => {
    const fetch = mockFetch(200, catalog);

    await run(['list'], fetch, { ACTIVITIES_API_URL: 'http://env.test' });

    expect(fetch.mock.calls[0][0]).toBe('http://env.test/activities');
  });

  it('should sign up a student', async () => {
    const fetch = mockFetch(200, { message: 'new@mergington.edu signed up for Chess Club' });

    await run(['-o', 'table', 'signup', 'Chess Club', 'new@mergington.edu'], fetch);

    expect(fetch.mock.calls[0][0]).toBe(
      'http://localhost:3000/activities/Chess%20Club/signup?email=new%40mergington.edu'
    );
    expect(logs).toEqual(['✓ new@mergington.edu signed up for Chess Club']);
  });

  it('should remove a student', async () => {
    const fetch = mockFetch(200, { message: 'Removed ava@mergington.edu from Art Studio' });

    await run(['remove', 'Art Studio', 'ava@mergington.edu'], fetch);

    expect(fetch.mock.calls[0][1]?.method).toBe('DELETE');
    expect(logs).toEqual([JSON.stringify({ message: 'Removed ava@mergington.edu from Art Studio' }, null, 2)]);
  });

  it('should show one activity', async () => {
    await run(['-o', 'table', 'show', 'Art Studio'], mockFetch(200, catalog));

    expect(logs).toEqual([
      'Art Studio',
      '  Painting and drawing',
      '  Schedule: Wednesdays',
      '  Spots left: 0 of 1',
      '  - ava@mergington.edu',
    ]);
  });

  it('should report API errors and set the exit code', async () => {
    await run(
      ['signup', 'Chess Club', 'michael@mergington.edu'],
      mockFetch(400, { detail: 'Student is already signed up for this activity' })
    );

    expect(errors).toEqual(['✗ Student is already signed up for this activity']);
    expect(process.exitCode).toBe(1);
  });

  it('should log requests in verbose mode', async () => {
    await run(['-v', '-q', 'signup', 'Chess Club', 'x@y.edu'], mockFetch(200, { message: 'ok' }));

    expect(logs[0]).toBe('▸ Request: POST http://localhost:3000/activities/Chess%20Club/signup?email=x%40y.edu');
    expect(logs[1]).toBe('▸ Response: 200');
  });
});
