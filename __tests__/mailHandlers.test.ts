import { beforeEach, describe, expect, it } from 'vitest';
import {
  handleLabels,
  handleList,
  handleSend,
  handleSpam,
  handleSummary,
  MISSING_OPENAI_KEY_WARNING,
  normalizeMessage,
  parseLimit,
  toSendResponse,
  type MailHandlerDeps,
} from '../handlers/mailHandlers';
import { buildSummaryPrompt } from '../services/summaryService';
import { FakeCompletionClient, FakeMailClient } from './fakes';

let mail: FakeMailClient;
let completion: FakeCompletionClient;
let deps: MailHandlerDeps;

beforeEach(() => {
  mail = new FakeMailClient();
  completion = new FakeCompletionClient();
  deps = { mail, completion, summaryModel: 'test-model' };
});

describe('handleSend', () => {
  it('delegates once and exposes the sent id as message_id', async () => {
    const res = await handleSend({ to: 'a@b.com', subject: 'Hi', body: 'Hello there' }, deps);
    expect(mail.sendMessage).toHaveBeenCalledTimes(1);
    expect(mail.sendMessage).toHaveBeenCalledWith('a@b.com', 'Hi', 'Hello there');
    expect(res).toEqual({
      status: 200,
      body: { ok: true, message_id: 'sent-1', id: 'sent-1', threadId: 'thread-1', labelIds: ['SENT'] },
    });
  });

  it('omits message_id when the result has no id', async () => {
    mail.sendResult = { threadId: 'thread-9' };
    const res = await handleSend({ to: 'a@b.com', subject: 'Hi', body: 'x' }, deps);
    expect(res).toEqual({ status: 200, body: { ok: true, threadId: 'thread-9' } });
  });

  it('wraps a non-object result', async () => {
    mail.sendResult = 'queued';
    const res = await handleSend({ to: 'a@b.com', subject: 'Hi', body: 'x' }, deps);
    expect(res).toEqual({ status: 200, body: { ok: true, result: 'queued' } });
  });

  it('rejects missing and blank fields with per-field messages', async () => {
    const res = await handleSend({ to: '  ', body: 'x' }, deps);
    expect(res).toEqual({
      status: 400,
      body: {
        error: 'invalid send request',
        fields: { to: ['This field may not be blank.'], subject: ['This field is required.'] },
      },
    });
    expect(mail.sendMessage).not.toHaveBeenCalled();
  });

  it('trims the fields it sends', async () => {
    await handleSend({ to: ' a@b.com ', subject: ' Hi ', body: ' x ' }, deps);
    expect(mail.sendMessage).toHaveBeenCalledWith('a@b.com', 'Hi', 'x');
  });

  it('rejects a recipient carrying extra header lines', async () => {
    const res = await handleSend({ to: 'a@b.com\r\nBcc: other@example.com', subject: 'Hi', body: 'x' }, deps);
    expect(res).toEqual({
      status: 400,
      body: { error: 'invalid send request', fields: { to: ['Enter a valid email address.'] } },
    });
    expect(mail.sendMessage).not.toHaveBeenCalled();
  });

  it('turns a client exception into a 500 with its message', async () => {
    mail.failWith = new Error('Invalid To header');
    const res = await handleSend({ to: 'a@b.com', subject: 'Hi', body: 'x' }, deps);
    expect(res).toEqual({ status: 500, body: { error: 'Invalid To header' } });
  });
});

describe('toSendResponse', () => {
  it('never lets upstream fields overwrite ok', () => {
    expect(toSendResponse({ id: 'x', ok: false })).toEqual({ ok: true, message_id: 'x', id: 'x' });
  });
});

describe('parseLimit', () => {
  it('parses integers and falls back on anything else', () => {
    expect(parseLimit('7', 10)).toBe(7);
    expect(parseLimit(' 3 ', 10)).toBe(3);
    expect(parseLimit('abc', 10)).toBe(10);
    expect(parseLimit('2.5', 5)).toBe(5);
    expect(parseLimit(undefined, 5)).toBe(5);
    expect(parseLimit(['4'], 5)).toBe(5);
    expect(parseLimit('0', 10)).toBe(10);
  });
});

describe('normalizeMessage', () => {
  it('uses the first non-empty fallback field', () => {
    const out = normalizeMessage({ id: 'm1', sender: 'bob@example.com', title: 'T', internalDate: 1770379200000 });
    expect(out).toEqual({
      id: 'm1',
      threadId: null,
      from: 'bob@example.com',
      to: null,
      subject: 'T',
      snippet: null,
      time: '1770379200000',
      body: '',
    });
  });

  it('prefers from over sender and skips empty strings', () => {
    expect(normalizeMessage({ from: 'a@x.io', sender: 'b@x.io' }).from).toBe('a@x.io');
    expect(normalizeMessage({ from: '', emailFrom: 'c@x.io' }).from).toBe('c@x.io');
    expect(normalizeMessage({ subject: null, header_subject: 'H' }).subject).toBe('H');
    expect(normalizeMessage({ date: 'Fri, 06 Feb 2026', internalDate: '1' }).time).toBe('Fri, 06 Feb 2026');
  });

  it('truncates the body to 2000 characters', () => {
    const out = normalizeMessage({ body: 'x'.repeat(2500) });
    expect(out.body).toHaveLength(2000);
  });
});

describe('handleList', () => {
  it('passes query and default limit 10', async () => {
    mail.messages = [{ id: 'm1', from: 'a@x.io', subject: 'S', snippet: 'sn', date: 'D', body: 'B' }];
    const res = await handleList({ q: 'is:unread' }, deps);
    expect(mail.listMessages).toHaveBeenCalledWith('is:unread', 10);
    expect(res).toEqual({
      status: 200,
      body: [{ id: 'm1', threadId: null, from: 'a@x.io', to: null, subject: 'S', snippet: 'sn', time: 'D', body: 'B' }],
    });
  });

  it('falls back to 10 for a non-numeric limit', async () => {
    await handleList({ limit: 'lots' }, deps);
    expect(mail.listMessages).toHaveBeenCalledWith(undefined, 10);
  });

  it('reports client failures as 500', async () => {
    mail.failWith = new Error('insufficient permission');
    expect(await handleList({ limit: '3' }, deps)).toEqual({ status: 500, body: { error: 'insufficient permission' } });
  });
});

describe('handleSummary', () => {
  beforeEach(() => {
    mail.messages = [
      { id: 'm1', body: 'Invoice 42 is due Friday', snippet: 'Invoice 42' },
      { id: 'm2', snippet: 'Team lunch moved' },
      { id: 'm3' },
    ];
  });

  it('returns snippets and a null summary without a completion client', async () => {
    const res = await handleSummary({}, { ...deps, completion: null });
    expect(res).toEqual({
      status: 200,
      body: {
        snippets: ['Invoice 42 is due Friday', 'Team lunch moved', ''],
        summary: null,
        warning: MISSING_OPENAI_KEY_WARNING,
      },
    });
    expect(completion.createChatCompletion).not.toHaveBeenCalled();
  });

  it('defaults to 5 messages when limit is not a number', async () => {
    await handleSummary({ limit: 'x' }, deps);
    expect(mail.listMessages).toHaveBeenCalledWith(undefined, 5);
  });

  it('asks the completion API with the fixed prompt and parameters', async () => {
    const res = await handleSummary({ limit: '3' }, deps);
    expect(completion.createChatCompletion).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'Summarize emails concisely and list action items.' },
        { role: 'user', content: buildSummaryPrompt(['Invoice 42 is due Friday', 'Team lunch moved', '']) },
      ],
      max_tokens: 400,
      temperature: 0.25,
    });
    expect(res).toEqual({
      status: 200,
      body: { snippets: ['Invoice 42 is due Friday', 'Team lunch moved', ''], summary: 'Two invoices are due.' },
    });
  });

  it('stringifies a response it cannot read', async () => {
    completion.response = { output: 'odd' };
    const res = await handleSummary({}, deps);
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ summary: '{"output":"odd"}' });
  });

  it('fails with 500 when the completion call throws', async () => {
    completion.createChatCompletion.mockRejectedValueOnce(new Error('rate limited'));
    expect(await handleSummary({}, deps)).toEqual({ status: 500, body: { error: 'rate limited' } });
  });
});

describe('buildSummaryPrompt', () => {
  it('enumerates each snippet', () => {
    expect(buildSummaryPrompt(['a', 'b'])).toBe(
      "You are an assistant who summarizes a user's recent emails. Summarize the main topics briefly and list any clear action items.\n\n"
      + 'Email 1:\na\n\nEmail 2:\nb\n\n',
    );
  });
});

describe('handleSpam', () => {
  it('adds SPAM for mark_spam', async () => {
    const res = await handleSpam({ message_id: 'm1', action: 'mark_spam' }, deps);
    expect(mail.modifyMessageLabels).toHaveBeenCalledWith('m1', { add: ['SPAM'] });
    expect(res).toEqual({ status: 200, body: { ok: true, result: { id: 'm1', labelIds: ['SPAM'] } } });
  });

  it('removes SPAM for unspam and unmark_spam', async () => {
    await handleSpam({ message_id: 'm1', action: 'unspam' }, deps);
    await handleSpam({ message_id: 'm2', action: 'unmark_spam' }, deps);
    expect(mail.modifyMessageLabels).toHaveBeenNthCalledWith(1, 'm1', { remove: ['SPAM'] });
    expect(mail.modifyMessageLabels).toHaveBeenNthCalledWith(2, 'm2', { remove: ['SPAM'] });
  });

  it('rejects an unknown action without touching labels', async () => {
    const res = await handleSpam({ message_id: 'm1', action: 'archive' }, deps);
    expect(res).toEqual({ status: 400, body: { error: 'unknown action' } });
    expect(mail.modifyMessageLabels).not.toHaveBeenCalled();
  });

  it('requires both fields', async () => {
    const res = await handleSpam({ message_id: 'm1' }, deps);
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: 'message_id and action required' });
  });
});

describe('handleLabels', () => {
  it('reuses an existing label id', async () => {
    mail.labels = [{ id: 'Label_7', name: 'Receipts' }];
    const res = await handleLabels({ message_id: 'm1', label: 'Receipts' }, deps);
    expect(mail.createLabel).not.toHaveBeenCalled();
    expect(mail.modifyMessageLabels).toHaveBeenCalledWith('m1', { add: ['Label_7'] });
    expect(res.status).toBe(200);
  });

  it('creates a missing label first', async () => {
    mail.labels = [{ id: 'INBOX', name: 'INBOX' }];
    await handleLabels({ message_id: 'm1', label: 'Travel' }, deps);
    expect(mail.createLabel).toHaveBeenCalledWith('Travel');
    expect(mail.modifyMessageLabels).toHaveBeenCalledWith('m1', { add: ['Label_2'] });
  });

  it('requires message_id and label', async () => {
    const res = await handleLabels({ label: 'Travel' }, deps);
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: 'message_id and label required' });
    expect(mail.listLabels).not.toHaveBeenCalled();
  });

  it('reports a failing label listing as 500', async () => {
    mail.failWith = new Error('quota exceeded');
    expect(await handleLabels({ message_id: 'm1', label: 'X' }, deps)).toEqual({ status: 500, body: { error: 'quota exceeded' } });
  });
});
