import type { HttpBindings } from '@hono/node-server';
import { Hono } from 'hono';
import type { Services } from '../core/services.ts';
import { errorMessage } from '../core/errors.ts';
import { logger } from '../utils/logger.ts';
import { corsMiddleware } from './middlewares/cors.ts';
import { buildAuthRoutes } from './routes/auth.ts';
import { healthRoutes } from './routes/health.ts';
import { buildMcpRoutes } from './routes/mcp.ts';

export function buildHttpApp(services: Services): Hono<{ Bindings: HttpBindings }> {
  const app = new Hono<{ Bindings: HttpBindings }>();

  app.use('*', corsMiddleware({ allowedOrigins: services.config.ALLOWED_ORIGINS }));

  app.route('/', healthRoutes(services));
  app.route('/auth', buildAuthRoutes({ services }));
  app.route('/mcp', buildMcpRoutes({ services }));

  app.onError((error, c) => {
    void logger.error('http', {
      message: 'Unhandled route error',
      path: c.req.path,
      error: errorMessage(error),
    });
    return c.json({ error: 'internal_error' }, 500);
  });

  return app;
}
