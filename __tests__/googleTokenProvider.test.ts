import axios, { AxiosHeaders } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getGoogleAccessToken, resetGoogleAccessToken } from '../services/googleTokenProvider';

const defaultAdapter = axios.defaults.adapter;
let exchanges = 0;

beforeEach(() => {
  exchanges = 0;
  resetGoogleAccessToken();
  vi.stubEnv('GOOGLE_REFRESH_TOKEN', 'test-refresh');
  vi.stubEnv('GOOGLE_CLIENT_ID', 'test-client');
  vi.stubEnv('GOOGLE_CLIENT_SECRET', 'test-secret');
  axios.defaults.adapter = async (config) => {
    exchanges += 1;
    return {
      data: { access_token: `test-access-${exchanges}`, expires_in: 3600 },
      status: 200,
      statusText: 'OK',
      headers: new AxiosHeaders(),
      config,
    };
  };
});

afterEach(() => {
  axios.defaults.adapter = defaultAdapter;
  vi.unstubAllEnvs();
});

describe('getGoogleAccessToken', () => {
  it('reuses the cached token until it is reset', async () => {
    expect(await getGoogleAccessToken()).toBe('test-access-1');
    expect(await getGoogleAccessToken()).toBe('test-access-1');
    expect(exchanges).toBe(1);

    resetGoogleAccessToken();
    expect(await getGoogleAccessToken()).toBe('test-access-2');
    expect(exchanges).toBe(2);
  });

  it('shares one exchange between concurrent callers', async () => {
    const tokens = await Promise.all([getGoogleAccessToken(), getGoogleAccessToken()]);
    expect(tokens).toEqual(['test-access-1', 'test-access-1']);
    expect(exchanges).toBe(1);
  });
});
