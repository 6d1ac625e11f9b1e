import { afterEach, describe, expect, it } from 'vitest';
import { closeDb, getLatestGoogleCredential, initDb, saveGoogleCredential } from '../db/sqlite';

afterEach(() => closeDb());

describe('credential store', () => {
  it('returns null before anything is stored', () => {
    initDb(':memory:');
    expect(getLatestGoogleCredential()).toBeNull();
  });

  it('upserts by e-mail and returns the most recent account', () => {
    initDb(':memory:');
    saveGoogleCredential('a@example.com', 'refresh-a', 100);
    saveGoogleCredential('b@example.com', 'refresh-b', 200);
    saveGoogleCredential('a@example.com', 'refresh-a2', 300);
    expect(getLatestGoogleCredential()).toEqual({ email: 'a@example.com', refresh_token: 'refresh-a2', updated_at: 300 });
  });

  it('refuses writes before initDb', () => {
    expect(() => saveGoogleCredential('a@example.com', 'x')).toThrow('credential_db_not_initialized');
  });
});
