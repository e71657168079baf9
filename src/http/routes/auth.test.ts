import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import type { CredentialRecord } from '../../auth/token-manager.ts';
import { loadConfig } from '../../config/env.ts';
import { createServices, type Services } from '../../core/services.ts';
import type { CacheEntry } from '../../services/cache/response-cache.ts';
import { MemoryKeyValueStore } from '../../shared/storage/memory.ts';
import { buildAuthRoutes, LoginStates } from './auth.ts';

describe('LoginStates', () => {
  it('accepts an issued state exactly once', () => {
    const states = new LoginStates(() => 0);
    const state = states.issue();

    expect(states.consume(state)).toBe(true);
    expect(states.consume(state)).toBe(false);
    expect(states.consume('never-issued')).toBe(false);
  });

  it('rejects a state after ten minutes', () => {
    let clock = 0;
    const states = new LoginStates(() => clock);
    const state = states.issue();
    clock = 10 * 60 * 1000;

    expect(states.consume(state)).toBe(false);
  });
});

describe('auth routes', () => {
  let fetchMock: Mock<typeof fetch>;
  let services: Services;
  let states: LoginStates;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>(
      async () =>
        new Response(
          JSON.stringify({
            access_token: 'access-1',
            refresh_token: 'refresh-1',
            expires_in: 3600,
            scope: 'user-read-playback-state',
          }),
          { headers: { 'content-type': 'application/json' } },
        ),
    );
    services = createServices(
      loadConfig({ SPOTIFY_CLIENT_ID: 'test-client', SPOTIFY_CLIENT_SECRET: 'test-secret' }),
      {
        credentialStore: new MemoryKeyValueStore<CredentialRecord>(),
        cacheStore: new MemoryKeyValueStore<CacheEntry>(),
        fetch: fetchMock,
      },
    );
    states = new LoginStates();
  });

  afterEach(() => {
    services.close();
  });

  it('redirects to the Spotify consent page with a fresh state', async () => {
    const app = buildAuthRoutes({ services, states });

    const res = await app.request('/login');

    expect(res.status).toBe(302);
    const location = new URL(res.headers.get('location') ?? '');
    expect(location.origin + location.pathname).toBe('https://accounts.spotify.com/authorize');
    expect(location.searchParams.get('client_id')).toBe('test-client');
    expect(states.consume(location.searchParams.get('state') ?? '')).toBe(true);
  });

  it('stores credentials after a valid callback', async () => {
    const app = buildAuthRoutes({ services, states });
    const state = states.issue();

    const res = await app.request(`/callback?code=code-1&state=${state}`);
    const status = await app.request('/status');

    expect(res.status).toBe(200);
    expect(await res.text()).toContain('Spotify connected');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(await status.json()).toMatchObject({
      authenticated: true,
      scopes: ['user-read-playback-state'],
      login_url: 'http://127.0.0.1:3000/auth/login',
    });
  });

  it('refuses a callback with an unknown state', async () => {
    const app = buildAuthRoutes({ services, states });

    const res = await app.request('/callback?code=code-1&state=forged');

    expect(res.status).toBe(400);
    expect(await res.text()).toBe('invalid_state');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('refuses a callback without a code', async () => {
    const app = buildAuthRoutes({ services, states });

    const res = await app.request(`/callback?state=${states.issue()}`);

    expect(res.status).toBe(400);
    expect(await res.text()).toBe('invalid_callback');
  });

  it('escapes the provider error on the cancellation page', async () => {
    const app = buildAuthRoutes({ services, states });

    const res = await app.request('/callback?error=%3Cscript%3E');

    expect(res.status).toBe(400);
    expect(await res.text()).toContain('Spotify returned: &lt;script&gt;');
  });

  it('forgets the account on disconnect', async () => {
    const app = buildAuthRoutes({ services, states });
    await app.request(`/callback?code=code-1&state=${states.issue()}`);

    const res = await app.request('/disconnect', { method: 'POST' });
    const status = await app.request('/status');

    expect(await res.json()).toEqual({ ok: true });
    expect(await status.json()).toEqual({
      authenticated: false,
      scopes: [],
      login_url: 'http://127.0.0.1:3000/auth/login',
    });
  });
});
