import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import type * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createActivitiesHandler } from '@activity-signup/activities-api';
import { createDefaultRegistry } from '@activity-signup/activities-core';
import { createHttpGateway } from './http-gateway';
import type { GatewayConfig } from './types';

function listen(server: http.Server): Promise<string> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const { port } = server.address() as AddressInfo;
      resolve(`http://127.0.0.1:${port}`);
    });
  });
}

function close(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

describe('HTTP gateway', () => {
  let server: http.Server;
  let baseUrl: string;
  let config: GatewayConfig;

  beforeEach(async () => {
    const staticDir = mkdtempSync(join(tmpdir(), 'gateway-static-'));
    writeFileSync(join(staticDir, 'index.html'), '<h1>Activities</h1>');
    config = {
      port: 0,
      staticDir,
      enforceCapacity: true,
      timingLogFile: join(staticDir, '..', `${Date.now()}-timing.log`),
    };
    server = createHttpGateway(config, createActivitiesHandler(createDefaultRegistry()));
    baseUrl = await listen(server);
  });

  afterEach(async () => {
    await close(server);
  });

  it('should redirect / to the front-end', async () => {
    const response = await fetch(`${baseUrl}/`, { redirect: 'manual' });

    expect(response.status).toBe(307);
    expect(response.headers.get('location')).toBe('/static/index.html');
  });

  it('should serve static files', async () => {
    const response = await fetch(`${baseUrl}/static/index.html`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await response.text()).toBe('<h1>Activities</h1>');
  });

  it('should return 404 for missing static files', async () => {
    const response = await fetch(`${baseUrl}/static/missing.js`);

    expect(response.status).toBe(404);
  });

  it('should proxy the activities API', async () => {
    const response = await fetch(`${baseUrl}/activities`);
    const data = (await response.json()) as Record<string, unknown>;

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('application/json');
    expect(response.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
    expect(Object.keys(data)).toHaveLength(9);
  });

  it('should sign up and remove through encoded URLs', async () => {
    const signup = await fetch(
      `${baseUrl}/activities/Soccer%20Team/signup?email=${encodeURIComponent('new@mergington.edu')}`,
      { method: 'POST' }
    );
    expect(signup.status).toBe(200);
    expect(await signup.json()).toEqual({ message: 'new@mergington.edu signed up for Soccer Team' });

    const removal = await fetch(`${baseUrl}/activities/Soccer%20Team/participants/new%40mergington.edu`, {
      method: 'DELETE',
    });
    expect(removal.status).toBe(200);
    expect(await removal.json()).toEqual({ message: 'Removed new@mergington.edu from Soccer Team' });
  });

  it('should forward an empty email and odd query keys to the handler', async () => {
    const response = await fetch(`${baseUrl}/activities/Chess%20Club/signup?__proto__=x&email=`, { method: 'POST' });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ message: ' signed up for Chess Club' });
  });

  it('should pass API errors through', async () => {
    const response = await fetch(`${baseUrl}/activities/Nonexistent/participants/a%40b.edu`, {
      method: 'DELETE',
    });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ detail: 'Activity not found' });
  });

  it('should append timings to the configured log file', async () => {
    await fetch(`${baseUrl}/activities`);

    const log = readFileSync(config.timingLogFile ?? '', 'utf-8');
    expect(log).toContain('GET /activities -> 200');
  });
});
