import axios, { type AxiosInstance } from 'axios';
import crypto from 'crypto';
import { Router } from 'express';
import type { OAuthConfig } from '../config/appConfig';
import { resetGoogleAccessToken } from '../services/googleTokenProvider';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export class OAuthStateStore {
  private readonly states = new Map<string, number>();

  constructor(private readonly ttlMs: number, private readonly now: () => number = Date.now) {}

  issue(): string {
    this.sweep();
    const state = crypto.randomBytes(16).toString('hex');
    this.states.set(state, this.now() + this.ttlMs);
    return state;
  }

  // single use: a state is forgotten as soon as it is checked
  consume(state: string): boolean {
    const exp = this.states.get(state);
    this.states.delete(state);
    return exp !== undefined && exp >= this.now();
  }

  private sweep(): void {
    const now = this.now();
    for (const [state, exp] of this.states) {
      if (exp < now) this.states.delete(state);
    }
  }
}

export function validateOAuthConfig(config: OAuthConfig): string | null {
  if (!config.clientId) return 'GOOGLE_CLIENT_ID is not set';
  if (!config.clientSecret) return 'GOOGLE_CLIENT_SECRET is not set';
  if (!config.redirectUri) return 'GOOGLE_REDIRECT_URI is not set';
  return null;
}

export function buildAuthUrl(config: OAuthConfig, state: string): string {
  const params = new URLSearchParams({
    client_id: config.clientId,
    redirect_uri: config.redirectUri,
    response_type: 'code',
    scope: config.scopes,
    access_type: 'offline',
    prompt: 'consent',
    include_granted_scopes: 'true',
    state,
  });
  return `https://accounts.google.com/o/oauth2/v2/auth?${params.toString()}`;
}

export type AuthorizedAccount = { email: string; refreshToken: string };

export async function exchangeAuthorizationCode(
  config: OAuthConfig,
  code: string,
  http: AxiosInstance = axios,
): Promise<AuthorizedAccount> {
  const params = new URLSearchParams({
    code,
    client_id: config.clientId,
    client_secret: config.clientSecret,
    redirect_uri: config.redirectUri,
    grant_type: 'authorization_code',
  });
  const tokenResp = await http.post<{ refresh_token?: string; access_token?: string }>(
    'https://oauth2.googleapis.com/token',
    params.toString(),
    { headers: { 'Content-Type': 'application/x-www-form-urlencoded' }, timeout: 10000 },
  );
  const refreshToken = tokenResp.data?.refresh_token;
  const accessToken = tokenResp.data?.access_token;
  // Google only returns a refresh token on the first consent unless prompt=consent is honoured
  if (!refreshToken) throw new Error('no refresh_token returned (consent may need to be granted again)');
  if (!accessToken) throw new Error('no access_token returned');

  const userInfo = await http.get<{ email?: string }>('https://openidconnect.googleapis.com/v1/userinfo', {
    headers: { Authorization: `Bearer ${accessToken}` },
    timeout: 10000,
  });
  const email = String(userInfo.data?.email || '').trim();
  if (!email) throw new Error('could not read the account e-mail address');
  return { email, refreshToken };
}

export type AuthRouterDeps = {
  config: OAuthConfig;
  saveCredential: (email: string, refreshToken: string) => void;
  http?: AxiosInstance;
};

export function createAuthRouter(deps: AuthRouterDeps): Router {
  const router = Router();
  const states = new OAuthStateStore(deps.config.stateTtlMs);

  router.get('/auth/start', (_req, res) => {
    const err = validateOAuthConfig(deps.config);
    if (err) {
      res.status(500).json({ error: err });
      return;
    }
    res.redirect(buildAuthUrl(deps.config, states.issue()));
  });

  router.get('/auth/callback', async (req, res) => {
    const err = validateOAuthConfig(deps.config);
    if (err) {
      res.status(500).json({ error: err });
      return;
    }
    const { code, state, error } = req.query;
    if (typeof error === 'string' && error) {
      res.status(400).json({ error: `OAuth error: ${error}` });
      return;
    }
    if (typeof code !== 'string' || typeof state !== 'string' || !code || !state) {
      res.status(400).json({ error: 'missing code or state' });
      return;
    }
    if (!states.consume(state)) {
      res.status(400).json({ error: 'invalid or expired state' });
      return;
    }
    try {
      const account = await exchangeAuthorizationCode(deps.config, code, deps.http);
      deps.saveCredential(account.email, account.refreshToken);
      resetGoogleAccessToken();
      logger.info('🔐 [auth] credentials stored', { email: account.email });
      res.status(200).json({ status: 'ok', message: `Credentials stored for ${account.email}.` });
    } catch (e) {
      const message = describeError(e);
      logger.error('❌ [auth] callback failed', message);
      res.status(500).json({ error: `OAuth callback failed: ${message}` });
    }
  });

  return router;
}
