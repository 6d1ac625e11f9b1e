import axios, { type AxiosInstance } from 'axios';
import { getGmailApiTimeoutMs } from '../config/appConfig';
import type { LabelChange, MailLabel, RawMailMessage } from '../types/email';
import { decodeBase64Url, decodeMimeWords, encodeBase64Url, encodeHeaderUtf8 } from '../utils/mime';
import { logger } from '../utils/logger';
import { getGoogleAccessToken } from './googleTokenProvider';

/** The mailbox operations the backend delegates to. */
export interface MailClient {
  sendMessage(to: string, subject: string, body: string): Promise<unknown>;
  listMessages(query: string | undefined, maxResults: number): Promise<RawMailMessage[]>;
  listLabels(): Promise<MailLabel[]>;
  createLabel(name: string): Promise<MailLabel>;
  modifyMessageLabels(messageId: string, change: LabelChange): Promise<unknown>;
}

type GmailHeader = { name?: string; value?: string };

type GmailPart = {
  mimeType?: string;
  headers?: GmailHeader[];
  body?: { data?: string; size?: number };
  parts?: GmailPart[];
};

type GmailMessage = {
  id: string;
  threadId?: string;
  snippet?: string;
  internalDate?: string;
  labelIds?: string[];
  payload?: GmailPart;
};

type GmailListResponse = { messages?: Array<{ id: string; threadId?: string }> };

function parseHeader(headers: GmailHeader[], key: string): string | undefined {
  const h = headers.find((x) => x.name?.toLowerCase() === key.toLowerCase());
  return h?.value;
}

// Depth-first, first text/plain part wins
export function extractPlainText(part: GmailPart | undefined): string {
  if (!part) return '';
  if (part.mimeType === 'text/plain' && part.body?.data) return decodeBase64Url(part.body.data);
  for (const child of part.parts ?? []) {
    const text = extractPlainText(child);
    if (text) return text;
  }
  if (!part.parts?.length && !part.mimeType?.startsWith('multipart/') && part.body?.data && part.mimeType !== 'text/html') {
    return decodeBase64Url(part.body.data);
  }
  return '';
}

export function toRawMailMessage(m: GmailMessage): RawMailMessage {
  const headers = m.payload?.headers ?? [];
  const header = (key: string) => {
    const raw = parseHeader(headers, key);
    return raw === undefined ? undefined : decodeMimeWords(raw);
  };
  return {
    id: m.id,
    threadId: m.threadId,
    from: header('From'),
    to: header('To'),
    subject: header('Subject'),
    date: parseHeader(headers, 'Date'),
    internalDate: m.internalDate,
    snippet: m.snippet,
    body: extractPlainText(m.payload),
  };
}

export function buildRawMessage(to: string, subject: string, body: string): string {
  if (/[\r\n]/.test(to)) throw new Error('recipient must not contain line breaks');
  const lines = [
    `To: ${to}`,
    `Subject: ${encodeHeaderUtf8(subject)}`,
    'Content-Type: text/plain; charset=UTF-8',
    'Content-Transfer-Encoding: 8bit',
    'MIME-Version: 1.0',
    '',
    body,
  ];
  return encodeBase64Url(lines.join('\r\n'));
}

export type GmailApiClientOptions = {
  getAccessToken?: () => Promise<string>;
  http?: AxiosInstance;
  timeoutMs?: number;
  concurrency?: number;
};

/** Gmail REST v1 client for the signed-in user ("me"). */
export class GmailApiClient implements MailClient {
  private readonly http: AxiosInstance;
  private readonly getAccessToken: () => Promise<string>;
  private readonly concurrency: number;

  constructor(options: GmailApiClientOptions = {}) {
    this.getAccessToken = options.getAccessToken ?? getGoogleAccessToken;
    this.concurrency = Math.max(1, options.concurrency ?? 5);
    this.http = options.http ?? axios.create({
      baseURL: 'https://gmail.googleapis.com/gmail/v1/users/me',
      timeout: options.timeoutMs ?? getGmailApiTimeoutMs(),
    });
  }

  private async authHeaders(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${await this.getAccessToken()}` };
  }

  async sendMessage(to: string, subject: string, body: string): Promise<unknown> {
    const headers = await this.authHeaders();
    const res = await this.http.post('/messages/send', { raw: buildRawMessage(to, subject, body) }, { headers });
    logger.info('[gmail] message sent', { to });
    return res.data;
  }

  async listMessages(query: string | undefined, maxResults: number): Promise<RawMailMessage[]> {
    const headers = await this.authHeaders();
    const params: Record<string, string | number> = { maxResults };
    if (query) params.q = query;
    const listResp = await this.http.get<GmailListResponse>('/messages', { headers, params });
    const ids = (listResp.data?.messages ?? []).slice(0, maxResults);
    if (ids.length === 0) return [];

    // fixed-size worker pool, results written by index so mailbox order is kept
    const out: RawMailMessage[] = new Array(ids.length);
    let next = 0;
    const worker = async () => {
      while (next < ids.length) {
        const i = next++;
        const r = await this.http.get<GmailMessage>(`/messages/${encodeURIComponent(ids[i].id)}`, {
          headers,
          params: { format: 'full' },
        });
        out[i] = toRawMailMessage(r.data);
      }
    };
    await Promise.all(Array.from({ length: Math.min(this.concurrency, ids.length) }, () => worker()));
    logger.debug(`[gmail] listed ${out.length} messages q=${query ?? ''}`);
    return out;
  }

  async listLabels(): Promise<MailLabel[]> {
    const headers = await this.authHeaders();
    const res = await this.http.get<{ labels?: MailLabel[] }>('/labels', { headers });
    return res.data?.labels ?? [];
  }

  async createLabel(name: string): Promise<MailLabel> {
    const headers = await this.authHeaders();
    const res = await this.http.post<MailLabel>(
      '/labels',
      { name, labelListVisibility: 'labelShow', messageListVisibility: 'show' },
      { headers },
    );
    logger.info('[gmail] label created', { name, id: res.data?.id });
    return res.data;
  }

  async modifyMessageLabels(messageId: string, change: LabelChange): Promise<unknown> {
    const headers = await this.authHeaders();
    const res = await this.http.post(
      `/messages/${encodeURIComponent(messageId)}/modify`,
      { addLabelIds: change.add ?? [], removeLabelIds: change.remove ?? [] },
      { headers },
    );
    return res.data;
  }
}
