import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { getBackendBaseUrl, getChatTimeouts, type ChatTimeouts } from '../config/appConfig';
import type { SendResponse, SummaryResponse } from '../types/api';
import type { EmailSummary } from '../types/email';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export type BackendResult<T> = { ok: true; data: T } | { ok: false; error: string };

/** What the chat side needs from the mail backend. */
export interface MailBackend {
  listEmails(limit: number): Promise<BackendResult<EmailSummary[]>>;
  summarizeEmails(limit: number): Promise<BackendResult<SummaryResponse>>;
  sendEmail(to: string, subject: string, body: string): Promise<BackendResult<SendResponse>>;
}

const nullableText = z.union([z.string(), z.number()]).nullable().optional().transform((v) => (v === undefined || v === null ? null : String(v)));

const emailSummarySchema = z.object({
  id: nullableText,
  threadId: nullableText,
  from: nullableText,
  to: nullableText,
  subject: nullableText,
  snippet: nullableText,
  time: nullableText,
  body: z.string().nullable().optional().transform((v) => v ?? ''),
});

const listSchema = z.array(emailSummarySchema);

const summarySchema = z.object({
  snippets: z.array(z.string()).default([]),
  summary: z.string().nullable().default(null),
  warning: z.string().optional(),
});

const sendSchema = z.object({ ok: z.literal(true) }).passthrough();

function errorOf(data: unknown): string | null {
  if (typeof data !== 'object' || data === null || Array.isArray(data) || !('error' in data)) return null;
  const { error } = data;
  return typeof error === 'string' ? error : JSON.stringify(error);
}

export type HttpMailBackendOptions = {
  baseUrl?: string;
  timeouts?: ChatTimeouts;
  http?: AxiosInstance;
};

/**
 * axios client for the backend REST API. Never throws: transport failures,
 * timeouts and `{error}` bodies all come back as `{ ok: false, error }`.
 */
export class HttpMailBackend implements MailBackend {
  private readonly http: AxiosInstance;
  private readonly timeouts: ChatTimeouts;

  constructor(options: HttpMailBackendOptions = {}) {
    this.timeouts = options.timeouts ?? getChatTimeouts();
    this.http = options.http ?? axios.create({ baseURL: options.baseUrl ?? getBackendBaseUrl() });
  }

  private async call<S extends z.ZodTypeAny>(
    label: string,
    schema: S,
    request: () => Promise<{ data: unknown }>,
  ): Promise<BackendResult<z.output<S>>> {
    try {
      const res = await request();
      const reported = errorOf(res.data);
      if (reported !== null) return { ok: false, error: reported };
      const parsed = schema.safeParse(res.data);
      if (!parsed.success) {
        logger.warn(`[backend] ${label}: unexpected response shape`, parsed.error.issues.slice(0, 3));
        return { ok: false, error: 'unexpected response from the mail backend' };
      }
      return { ok: true, data: parsed.data };
    } catch (e) {
      const error = describeError(e);
      logger.warn(`[backend] ${label} failed`, error);
      return { ok: false, error };
    }
  }

  async listEmails(limit: number): Promise<BackendResult<EmailSummary[]>> {
    return this.call('list', listSchema, () =>
      this.http.get('list/', { params: { limit }, timeout: this.timeouts.listMs }));
  }

  async summarizeEmails(limit: number): Promise<BackendResult<SummaryResponse>> {
    return this.call('summary', summarySchema, () =>
      this.http.get('summary/', { params: { limit }, timeout: this.timeouts.summaryMs }));
  }

  async sendEmail(to: string, subject: string, body: string): Promise<BackendResult<SendResponse>> {
    return this.call('send', sendSchema, () =>
      this.http.post('send/', { to, subject, body }, { timeout: this.timeouts.sendMs }));
  }
}
