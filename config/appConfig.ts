import { getEnvironmentVariable } from './environment';

export function boolEnv(name: string, def: boolean): boolean {
  const v = process.env[name];
  if (v === undefined) return def;
  return /^(1|true|on|yes)$/i.test(v);
}

export function intEnv(name: string, def: number): number {
  const v = Number(process.env[name] || '');
  return Number.isFinite(v) && v > 0 ? v : def;
}

export function getBackendPort(): number {
  return intEnv('PORT', 8000);
}

export function getGmailApiTimeoutMs(): number {
  return intEnv('GMAIL_API_TIMEOUT_MS', 8000);
}

export function getCredentialDbPath(): string {
  return getEnvironmentVariable('CREDENTIAL_DB_PATH', 'data/credentials.db');
}

export type OAuthConfig = {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes: string;
  stateTtlMs: number;
};

export function getOAuthConfig(): OAuthConfig {
  return {
    clientId: getEnvironmentVariable('GOOGLE_CLIENT_ID'),
    clientSecret: getEnvironmentVariable('GOOGLE_CLIENT_SECRET'),
    redirectUri: getEnvironmentVariable('GOOGLE_REDIRECT_URI'),
    scopes: getEnvironmentVariable('OAUTH_SCOPES', 'openid email https://www.googleapis.com/auth/gmail.modify'),
    stateTtlMs: intEnv('OAUTH_STATE_TTL_SEC', 600) * 1000,
  };
}

// Chat side
export function getBackendBaseUrl(): string {
  const raw = getEnvironmentVariable('BACKEND_BASE_URL', 'http://127.0.0.1:8000/gmail/');
  return raw.endsWith('/') ? raw : `${raw}/`;
}

export type ChatTimeouts = { listMs: number; sendMs: number; summaryMs: number };

// Summaries wait on the completion API as well, so they get the longest budget
export function getChatTimeouts(): ChatTimeouts {
  return {
    listMs: intEnv('CHAT_LIST_TIMEOUT_MS', 10000),
    sendMs: intEnv('CHAT_SEND_TIMEOUT_MS', 15000),
    summaryMs: intEnv('CHAT_SUMMARY_TIMEOUT_MS', 30000),
  };
}

export function getSessionIdleMs(): number {
  return intEnv('SESSION_IDLE_MINUTES', 60) * 60 * 1000;
}
