/**
 * worker-health command tests.
 *
 * Config loading is replaced with the defaults and fetch is stubbed, so
 * no worker or config file is needed.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../config.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../config.js')>();
  return {
    ...actual,
    loadConfig: vi.fn(() => actual.getDefaultConfig()),
  };
});

import { ConfigLoadError, loadConfig } from '../config.js';
import { workerHealth } from './worker-health.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('worker-health command', () => {
  beforeEach(() => {
    process.exitCode = undefined;
    vi.spyOn(globalThis, 'fetch');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('probes the configured URL and prints the diagnostics', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({ status: 'healthy', primary_detector: 'nrclex' }));

    await workerHealth([]);

    expect(fetch).toHaveBeenCalledWith('http://127.0.0.1:8001/health', expect.objectContaining({ method: 'GET' }));
    expect(console.log).toHaveBeenCalledWith(
      JSON.stringify({ status: 'healthy', primary_detector: 'nrclex' }, null, 2),
    );
    expect(process.exitCode).toBeUndefined();
  });

  it('uses --url when given', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({}));

    await workerHealth(['--url', 'http://127.0.0.1:9001/health']);

    expect(fetch).toHaveBeenCalledWith('http://127.0.0.1:9001/health', expect.anything());
  });

  it('exits 1 and prints the failure when the worker is unhealthy', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({ error: 'loading' }, 503));

    await workerHealth([]);

    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith('  Health check failed with status 503\n');
  });

  it('exits 1 without probing when the config cannot be loaded', async () => {
    vi.mocked(loadConfig).mockImplementationOnce(() => {
      throw new ConfigLoadError('Invalid config: server.port must be a number', 'server.port');
    });

    await workerHealth([]);

    expect(process.exitCode).toBe(1);
    expect(fetch).not.toHaveBeenCalled();
  });
});
