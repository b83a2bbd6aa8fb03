import { afterEach, describe, expect, it } from 'vitest';
import { buildApp } from '../src/server';
import { MemoryItemStorageBackend } from '../src/storage/memoryItemStorage';

type AppInstance = Awaited<ReturnType<typeof buildApp>>;
let app: AppInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

async function appWithChecks(healthChecks: Record<string, () => Promise<boolean>>) {
  app = await buildApp({
    memoryBackend: new MemoryItemStorageBackend(),
    dbBackend: new MemoryItemStorageBackend(),
    healthChecks,
    version: '1.2.3',
  });
  return app;
}

describe('root routes', () => {
  it('GET / returns the greeting', async () => {
    const instance = await appWithChecks({});
    const res = await instance.inject({ method: 'GET', url: '/' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ message: 'Hello from the items API!' });
  });

  it('reports ok when every check passes', async () => {
    const instance = await appWithChecks({ mongodb: async () => true });
    const res = await instance.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', mongodb: 'ok', uptime_seconds: 0, version: '1.2.3' });
  });

  it('reports degraded when a check fails', async () => {
    const instance = await appWithChecks({ mongodb: async () => false });
    const res = await instance.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'degraded', mongodb: 'error' });
  });

  it('treats a throwing check as an error', async () => {
    const instance = await appWithChecks({
      mongodb: async () => {
        throw new Error('ping timeout');
      },
      cache: async () => true,
    });
    const res = await instance.inject({ method: 'GET', url: '/health' });

    expect(res.json()).toMatchObject({ status: 'degraded', mongodb: 'error', cache: 'ok' });
  });

  it('is ok with no checks registered', async () => {
    const instance = await appWithChecks({});
    const res = await instance.inject({ method: 'GET', url: '/health' });

    expect(res.json()).toMatchObject({ status: 'ok', version: '1.2.3' });
  });
});
