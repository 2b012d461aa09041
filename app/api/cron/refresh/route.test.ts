import { NextRequest } from 'next/server';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { GET } from './route';

function request(token?: string) {
  return new NextRequest('http://localhost/api/cron/refresh', {
    headers: token ? { authorization: `Bearer ${token}` } : {},
  });
}

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('GET /api/cron/refresh', () => {
  it('rejects a request without the cron secret', async () => {
    vi.stubEnv('CRON_SECRET', 'test-secret');
    const res = await GET(request());

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: 'Unauthorized' });
  });

  it('answers with a JSON error when the configuration is invalid', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.stubEnv('CRON_SECRET', 'test-secret');
    vi.stubEnv('CACHE_TTL_SECONDS', 'abc');
    const res = await GET(request('test-secret'));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'CACHE_TTL_SECONDS must be a positive integer (got "abc")',
    });
  });
});
