import { serve } from '@hono/node-server';
import { loadConfig } from './config/env.ts';
import { errorMessage } from './core/errors.ts';
import { createServices } from './core/services.ts';
import { buildHttpApp } from './http/app.ts';
import { logger } from './utils/logger.ts';

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    logger.setLevel(config.LOG_LEVEL);

    const services = createServices(config);
    const app = buildHttpApp(services);
    const server = serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST });

    await logger.info('server', {
      message: `MCP server started on http://${config.HOST}:${config.PORT}/mcp`,
      environment: config.NODE_ENV,
      spotifyConfigured: Boolean(config.SPOTIFY_CLIENT_ID && config.SPOTIFY_CLIENT_SECRET),
      loginUrl: services.loginUrl,
    });

    const shutdown = (signal: string) => {
      void logger.info('server', { message: `Received ${signal}, shutting down` });
      services.close();
      server.close(() => process.exit(0));
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    console.error('Failed to start server:', error);
    await logger.error('server', {
      message: 'Server startup failed',
      error: errorMessage(error),
    });
    process.exit(1);
  }
}

void main();
