import type { HttpBindings } from '@hono/node-server';
import { Hono } from 'hono';
import { html } from 'hono/html';
import { describeError } from '../../core/errors.ts';
import type { Services } from '../../core/services.ts';
import { generateOpaqueToken } from '../../core/tokens.ts';
import { logger } from '../../utils/logger.ts';

const STATE_TTL_MS = 10 * 60 * 1000;

/** One-time OAuth `state` values issued by /auth/login. */
export class LoginStates {
  private readonly states = new Map<string, number>();
  private readonly now: () => number;

  constructor(now: () => number = () => Date.now()) {
    this.now = now;
  }

  issue(): string {
    this.sweep();
    const state = generateOpaqueToken();
    this.states.set(state, this.now() + STATE_TTL_MS);
    return state;
  }

  /** True at most once per issued state, and only before it expires. */
  consume(state: string): boolean {
    const expiresAt = this.states.get(state);
    this.states.delete(state);
    return expiresAt !== undefined && expiresAt > this.now();
  }

  private sweep(): void {
    const now = this.now();
    for (const [state, expiresAt] of this.states) {
      if (expiresAt <= now) {
        this.states.delete(state);
      }
    }
  }
}

function page(title: string, body: string) {
  return html`<!doctype html>
    <html>
      <head><meta charset="utf-8" /><title>${title}</title></head>
      <body><h1>${title}</h1><p>${body}</p></body>
    </html>`;
}

export function buildAuthRoutes(params: { services: Services; states?: LoginStates }) {
  const { services } = params;
  const states = params.states ?? new LoginStates(services.now);
  const app = new Hono<{ Bindings: HttpBindings }>();

  app.get('/login', (c) => {
    const url = services.tokens.buildAuthorizeUrl(states.issue());
    if (!url.ok) {
      return c.text(url.error.message, 500);
    }
    return c.redirect(url.value, 302);
  });

  app.get('/callback', async (c) => {
    const providerError = c.req.query('error');
    if (providerError) {
      void logger.warning('auth', { message: 'Authorization denied', error: providerError });
      return c.html(page('Spotify sign-in cancelled', `Spotify returned: ${providerError}`), 400);
    }

    const code = c.req.query('code');
    const state = c.req.query('state');
    if (!code || !state) {
      return c.text('invalid_callback', 400);
    }
    if (!states.consume(state)) {
      void logger.warning('auth', { message: 'Unknown or expired OAuth state' });
      return c.text('invalid_state', 400);
    }

    const result = await services.tokens.completeAuthorization(code);
    if (!result.ok) {
      return c.html(page('Spotify sign-in failed', describeError(result.error)), 502);
    }
    void logger.info('auth', { message: 'Spotify account connected' });
    return c.html(
      page('Spotify connected', 'You can close this window and return to your assistant.'),
    );
  });

  app.get('/status', async (c) => {
    const status = await services.tokens.getStatus();
    return c.json({ ...status, login_url: services.loginUrl });
  });

  app.post('/disconnect', async (c) => {
    await services.tokens.disconnect();
    await services.cache.clearAll();
    return c.json({ ok: true });
  });

  return app;
}
