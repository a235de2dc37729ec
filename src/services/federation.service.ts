import { env } from '../config/env.js';
import { UpstreamError } from '../middleware/errorHandler.js';
import { logger } from '../utils/logger.js';

export interface ResolveResult {
  ok: boolean;
  status: number;
  /** The upstream `error` field when the object was refused. */
  error: string | null;
}

let jwt: string | null = null;

function apiUrl(path: string): URL {
  return new URL(path, env.FEDERATION_API_URL);
}

function hasCredentials(): boolean {
  return Boolean(env.FEDERATION_USERNAME && env.FEDERATION_PASSWORD);
}

async function readJson(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json().catch(() => null);
  return body !== null && typeof body === 'object' && !Array.isArray(body) ? { ...body } : {};
}

async function request(url: URL, init: { method: 'GET' | 'POST'; body?: string }): Promise<Response> {
  try {
    return await fetch(url, {
      ...init,
      headers: {
        'User-Agent': 'fedivotes',
        'Content-Type': 'application/json',
        ...(jwt ? { Authorization: `Bearer ${jwt}` } : {}),
      },
      signal: AbortSignal.timeout(env.FEDERATION_TIMEOUT_MS),
    });
  } catch (err) {
    logger.error({ err, path: url.pathname }, 'Federation API request failed');
    throw new UpstreamError(502, 'Federation API is unreachable', 'UPSTREAM_UNAVAILABLE', err);
  }
}

export const federationService = {
  /** Logs in with the configured account and keeps the session token. */
  async login(): Promise<void> {
    if (!hasCredentials()) {
      logger.warn('Federation credentials not configured, resolving objects anonymously');
      return;
    }

    const res = await request(apiUrl('/api/v3/user/login'), {
      method: 'POST',
      body: JSON.stringify({
        username_or_email: env.FEDERATION_USERNAME,
        password: env.FEDERATION_PASSWORD,
        totp_2fa_token: null,
      }),
    });
    const body = await readJson(res);

    if (!res.ok || typeof body.jwt !== 'string') {
      const reason = typeof body.error === 'string' ? body.error : `status ${res.status}`;
      throw new UpstreamError(502, `Federation login failed: ${reason}`, 'UPSTREAM_AUTH_FAILED');
    }

    jwt = body.jwt;
    logger.info({ instance: apiUrl('/').host }, 'Logged in to federation API');
  },

  isAuthenticated(): boolean {
    return jwt !== null;
  },

  /**
   * Asks the upstream instance to resolve `objectUrl`, which also makes it
   * fetch objects it has not federated yet.
   */
  async resolveObject(objectUrl: string): Promise<ResolveResult> {
    if (jwt === null && hasCredentials()) {
      await this.login();
    }

    const url = apiUrl('/api/v3/resolve_object');
    url.searchParams.set('q', objectUrl);

    const res = await request(url, { method: 'GET' });
    if (res.ok) {
      return { ok: true, status: res.status, error: null };
    }

    const body = await readJson(res);
    if (res.status === 401) {
      jwt = null;
    }
    return {
      ok: false,
      status: res.status,
      error: typeof body.error === 'string' ? body.error : null,
    };
  },

  reset(): void {
    jwt = null;
  },
};
