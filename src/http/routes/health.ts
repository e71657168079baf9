import type { HttpBindings } from '@hono/node-server';
import { Hono } from 'hono';
import type { Services } from '../../core/services.ts';
import { collectHealth } from '../../shared/tools/health.ts';

export function healthRoutes(services: Services) {
  const app = new Hono<{ Bindings: HttpBindings }>();

  app.get('/health', async (c) => c.json(await collectHealth(services)));

  return app;
}
