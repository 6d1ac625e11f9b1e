import type { SummaryResponse } from '../types/api';
import type { EmailSummary } from '../types/email';
import { truncate } from '../utils/text';
import { formatNow, formatTime } from '../utils/time';
import type { BackendResult } from './backendApi';

export const SNIPPET_PREVIEW_CHARS = 200;

export const HELP_TEXT = [
  '⚠️ I can:',
  '- `List my last 3 emails`',
  '- `Summarize my recent emails`',
  '- `Send an email to someone@example.com saying Hi`',
].join('\n');

export function formatFailure(what: string, error: string): string {
  return `⚠️ Failed to ${what}: ${error}`;
}

export function formatEmailList(result: BackendResult<EmailSummary[]>): string {
  if (!result.ok) return formatFailure('fetch emails', result.error);
  let reply = '📩 **Latest Emails:**\n\n';
  result.data.forEach((e, i) => {
    reply += `**${i + 1}. ${e.subject || '(No subject)'}**\n`;
    reply += `- From: ${e.from ?? ''}\n`;
    reply += `- Time: ${formatTime(e.time)}\n`;
    reply += `- Body: ${e.body}\n\n`;
  });
  return reply;
}

// Without a summary (no OpenAI key on the backend) the raw snippets are shown instead
export function formatSummary(result: BackendResult<SummaryResponse>): string {
  if (!result.ok) return formatFailure('summarize emails', result.error);
  let reply = '📝 **Inbox Summary:**\n\n';
  const { summary, warning, snippets } = result.data;
  if (summary !== null) return reply + summary;
  reply += `⚠️ ${warning || 'No summary available.'}\n\n`;
  snippets.forEach((s, i) => {
    reply += `${i + 1}. ${truncate(s.replace(/\s+/g, ' ').trim(), SNIPPET_PREVIEW_CHARS)}\n`;
  });
  return reply;
}

export type SentEmail = { recipient: string; subject: string; body: string };

export function formatSendConfirmation(result: BackendResult<unknown>, sent: SentEmail, now: Date = new Date()): string {
  if (!result.ok) return formatFailure('send email', result.error);
  return [
    '✅ **Email Sent**',
    '',
    `- To: ${sent.recipient}  `,
    `- Subject: ${sent.subject}  `,
    `- Body: ${sent.body}  `,
    `- Time: ${formatNow(now)}  `,
    '',
  ].join('\n');
}

/** Compact one-line-per-mail view for the `inbox` command. */
export function formatInbox(result: BackendResult<EmailSummary[]>): string {
  if (!result.ok) return `⚠️ ${result.error}`;
  if (result.data.length === 0) return '📥 Inbox is empty.';
  const lines = result.data.map((e, i) => {
    const time = formatTime(e.time);
    return `${i + 1}. ${e.subject || '(No subject)'} (${e.from ?? 'unknown sender'})${time ? ` · ${time}` : ''}`;
  });
  return ['📥 **Inbox**', '', ...lines].join('\n');
}

// Slack mrkdwn: **bold** → *bold*
export function toSlackMrkdwn(markdown: string): string {
  return markdown.replace(/\*\*([^*\n]+)\*\*/g, '*$1*');
}
