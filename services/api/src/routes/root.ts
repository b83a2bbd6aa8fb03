// src/routes/root.ts
import { FastifyInstance } from 'fastify';

export interface RootRouteOptions {
  version: string;
  startedAt: number;
  /** Liveness probes reported by /health, keyed by component name. */
  healthChecks: Record<string, () => Promise<boolean>>;
}

export async function registerRootRoutes(app: FastifyInstance, options: RootRouteOptions) {
  app.get('/', async () => ({ message: 'Hello from the items API!' }));

  app.get('/health', async (req) => {
    const components: Record<string, 'ok' | 'error'> = {};
    let healthy = true;

    for (const [name, check] of Object.entries(options.healthChecks)) {
      let ok = false;
      try {
        ok = await check();
      } catch (err) {
        req.log.error({ err, component: name }, 'Health check failed');
      }
      components[name] = ok ? 'ok' : 'error';
      if (!ok) healthy = false;
    }

    return {
      status: healthy ? 'ok' : 'degraded',
      ...components,
      uptime_seconds: Math.floor((Date.now() - options.startedAt) / 1000),
      version: options.version,
    };
  });
}
