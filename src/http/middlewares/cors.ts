import type { HttpBindings } from '@hono/node-server';
import type { MiddlewareHandler } from 'hono';

export type CorsOptions = {
  /** Exact origins allowed in addition to loopback ones. */
  allowedOrigins: readonly string[];
};

function isLoopbackOrigin(origin: string): boolean {
  let url: URL;
  try {
    url = new URL(origin);
  } catch {
    return false;
  }
  const host = url.hostname.toLowerCase();
  return host === 'localhost' || host === '127.0.0.1' || host === '[::1]';
}

export function isAllowedOrigin(origin: string, allowed: readonly string[]): boolean {
  return isLoopbackOrigin(origin) || allowed.includes(origin);
}

/** Reflects the request origin only for loopback or configured origins. */
export function corsMiddleware(options: CorsOptions): MiddlewareHandler<{
  Bindings: HttpBindings;
}> {
  return async (c, next) => {
    const origin = c.req.header('Origin');
    if (origin && isAllowedOrigin(origin, options.allowedOrigins)) {
      c.header('Access-Control-Allow-Origin', origin);
      c.header('Vary', 'Origin');
      c.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
      c.header(
        'Access-Control-Allow-Headers',
        'Content-Type, Mcp-Session-Id, Mcp-Protocol-Version, Last-Event-ID',
      );
      c.header('Access-Control-Expose-Headers', 'Mcp-Session-Id');
    }

    if (c.req.method === 'OPTIONS') {
      return c.body(null, 204);
    }

    await next();
  };
}
