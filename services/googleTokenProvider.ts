import axios from 'axios';
import { Mutex } from 'async-mutex';
import { getGmailApiTimeoutMs } from '../config/appConfig';
import { getEnvironmentVariable } from '../config/environment';
import { getLatestGoogleCredential } from '../db/sqlite';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

type TokenInfo = { access_token: string; expires_at: number };

let cached: TokenInfo | null = null;
const mutex = new Mutex();

function isValid(t: TokenInfo | null): t is TokenInfo {
  // 30s margin so a token does not expire mid-request
  return Boolean(t?.access_token) && (t?.expires_at ?? 0) - 30000 > Date.now();
}

function resolveRefreshToken(): string | null {
  const fromEnv = getEnvironmentVariable('GOOGLE_REFRESH_TOKEN');
  if (fromEnv) return fromEnv;
  return getLatestGoogleCredential()?.refresh_token ?? null;
}

async function exchangeRefreshToken(refresh: string): Promise<TokenInfo> {
  const cid = getEnvironmentVariable('GOOGLE_CLIENT_ID');
  const secret = getEnvironmentVariable('GOOGLE_CLIENT_SECRET');
  if (!cid || !secret) throw new Error('GOOGLE_CLIENT_ID / GOOGLE_CLIENT_SECRET are not set');
  const params = new URLSearchParams();
  params.set('client_id', cid);
  params.set('client_secret', secret);
  params.set('refresh_token', refresh);
  params.set('grant_type', 'refresh_token');
  try {
    const r = await axios.post<{ access_token?: unknown; expires_in?: unknown }>(
      'https://oauth2.googleapis.com/token',
      params.toString(),
      {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        timeout: getGmailApiTimeoutMs(),
      },
    );
    const d = r.data;
    if (typeof d?.access_token !== 'string') throw new Error('token endpoint returned no access_token');
    const expiresIn = typeof d.expires_in === 'number' ? d.expires_in : 3600;
    return { access_token: d.access_token, expires_at: Date.now() + expiresIn * 1000 };
  } catch (e) {
    logger.warn('[googleToken] refresh-token flow failed', describeError(e));
    throw e;
  }
}

// A newly stored refresh token may belong to another account
export function resetGoogleAccessToken(): void {
  cached = null;
}

/** Access token for the Gmail API, refreshed under a lock so concurrent callers share one exchange. */
export async function getGoogleAccessToken(): Promise<string> {
  return await mutex.runExclusive(async () => {
    if (isValid(cached)) return cached.access_token;
    const refresh = resolveRefreshToken();
    if (!refresh) {
      throw new Error('Gmail is not authorised yet: open /gmail/auth/start or set GOOGLE_REFRESH_TOKEN');
    }
    cached = await exchangeRefreshToken(refresh);
    logger.debug('[googleToken] access token refreshed');
    return cached.access_token;
  });
}
