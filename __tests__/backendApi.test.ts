import { AxiosError } from 'axios';
import { describe, expect, it } from 'vitest';
import { HttpMailBackend } from '../services/backendApi';
import { stubHttp, type StubRoute } from './fakes';

const timeouts = { listMs: 10000, sendMs: 15000, summaryMs: 30000 };

function backend(route: StubRoute): HttpMailBackend {
  return new HttpMailBackend({ http: stubHttp(route), timeouts });
}

describe('HttpMailBackend', () => {
  it('lists emails with the list timeout and fills missing fields', async () => {
    let seen: { url?: string; params?: unknown; timeout?: number } = {};
    const api = backend((config) => {
      seen = { url: config.url, params: config.params, timeout: config.timeout };
      return { status: 200, data: [{ id: 'm1', subject: 'Hi', time: 1770379200000 }] };
    });
    const res = await api.listEmails(3);
    expect(seen).toEqual({ url: 'list/', params: { limit: 3 }, timeout: 10000 });
    expect(res).toEqual({
      ok: true,
      data: [{ id: 'm1', threadId: null, from: null, to: null, subject: 'Hi', snippet: null, time: '1770379200000', body: '' }],
    });
  });

  it('uses the longer timeout for summaries', async () => {
    let timeout: number | undefined;
    const api = backend((config) => {
      timeout = config.timeout;
      return { status: 200, data: { snippets: ['a'], summary: null, warning: 'no key' } };
    });
    expect(await api.summarizeEmails(5)).toEqual({ ok: true, data: { snippets: ['a'], summary: null, warning: 'no key' } });
    expect(timeout).toBe(30000);
  });

  it('posts the send payload', async () => {
    let body: unknown;
    const api = backend((config) => {
      body = JSON.parse(String(config.data));
      return { status: 200, data: { ok: true, message_id: 'x1' } };
    });
    expect(await api.sendEmail('a@b.com', 'Hi', 'Hello')).toEqual({ ok: true, data: { ok: true, message_id: 'x1' } });
    expect(body).toEqual({ to: 'a@b.com', subject: 'Hi', body: 'Hello' });
  });

  it('surfaces the backend {error} body of a failed call', async () => {
    const api = backend(() => ({ status: 500, data: { error: 'Invalid Credentials' } }));
    expect(await api.listEmails(3)).toEqual({ ok: false, error: 'Invalid Credentials' });
  });

  it('treats an {error} body as a failure even with status 200', async () => {
    const api = backend(() => ({ status: 200, data: { error: 'upstream said no' } }));
    expect(await api.summarizeEmails(5)).toEqual({ ok: false, error: 'upstream said no' });
  });

  it('reports timeouts like any other failure', async () => {
    const api = backend((config) => new AxiosError('timeout of 15000ms exceeded', 'ECONNABORTED', config));
    expect(await api.sendEmail('a@b.com', 'Hi', 'Hello')).toEqual({ ok: false, error: 'timeout of 15000ms exceeded' });
  });

  it('rejects a response of the wrong shape', async () => {
    const api = backend(() => ({ status: 200, data: { unexpected: true } }));
    expect(await api.listEmails(3)).toEqual({ ok: false, error: 'unexpected response from the mail backend' });
  });
});
