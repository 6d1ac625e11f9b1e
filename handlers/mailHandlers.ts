import { z } from 'zod';
import type {
  ErrorEnvelope,
  HandlerResult,
  LabelResponse,
  ListResponse,
  SendResponse,
  SummaryResponse,
} from '../types/api';
import type { EmailSummary, LabelChange, RawMailMessage, SpamAction } from '../types/email';
import type { MailClient } from '../services/gmailClient';
import {
  buildSummaryPrompt,
  extractCompletionText,
  stringifyResponse,
  SUMMARY_SYSTEM_PROMPT,
  type CompletionClient,
} from '../services/summaryService';
import { UpstreamError, ValidationError, type FieldErrors } from '../utils/errors';
import { logger } from '../utils/logger';
import { truncate } from '../utils/text';

export const LIST_DEFAULT_LIMIT = 10;
export const SUMMARY_DEFAULT_LIMIT = 5;
export const BODY_CHAR_CAP = 2000;
export const SPAM_LABEL = 'SPAM';
export const SUMMARY_MAX_TOKENS = 400;
export const SUMMARY_TEMPERATURE = 0.25;
export const MISSING_OPENAI_KEY_WARNING = 'OPENAI_API_KEY is not set; returning raw snippets without a summary.';

// First non-empty value wins
export const FROM_FIELDS = ['from', 'sender', 'emailFrom'] as const;
export const SUBJECT_FIELDS = ['subject', 'title', 'header_subject'] as const;
export const TIME_FIELDS = ['time', 'date', 'internalDate'] as const;
export const SNIPPET_SOURCE_FIELDS = ['body', 'snippet'] as const;

export interface MailHandlerDeps {
  mail: MailClient;
  /** null when no OpenAI key is configured */
  completion: CompletionClient | null;
  summaryModel: string;
}

export type QueryInput = Record<string, unknown>;

const requiredText = z
  .string({ required_error: 'This field is required.', invalid_type_error: 'Not a valid string.' })
  .trim()
  .min(1, 'This field may not be blank.');

// A line break in To would start a new header in the raw message
const recipientText = requiredText.regex(/^[^\r\n]+$/, 'Enter a valid email address.');

const sendSchema = z.object({ to: recipientText, subject: requiredText, body: requiredText });
const spamSchema = z.object({ message_id: requiredText, action: requiredText });
const labelSchema = z.object({ message_id: requiredText, label: requiredText });

function toFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.join('.') || 'non_field_errors';
    (fields[key] ??= []).push(issue.message);
  }
  return fields;
}

function validate<S extends z.ZodTypeAny>(schema: S, payload: unknown, message: string): z.infer<S> {
  const parsed = schema.safeParse(payload ?? {});
  if (!parsed.success) throw new ValidationError(message, toFieldErrors(parsed.error));
  return parsed.data;
}

function clientError(err: ValidationError): { status: 400; body: ErrorEnvelope } {
  return { status: 400, body: err.fields ? { error: err.message, fields: err.fields } : { error: err.message } };
}

/**
 * Shared boundary for every endpoint: validation problems become 400, anything
 * else thrown by the mail or completion client becomes 500 with its message.
 */
async function runHandler<T>(operation: string, fn: () => Promise<T>): Promise<HandlerResult<T>> {
  try {
    return { status: 200, body: await fn() };
  } catch (e) {
    if (e instanceof ValidationError) return clientError(e);
    const upstream = e instanceof UpstreamError ? e : new UpstreamError(operation, e);
    logger.error(`❌ [${operation}] failed`, upstream.message);
    return { status: 500, body: { error: upstream.message } };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Integer query parameter; missing, non-integer or non-positive values use the fallback. */
export function parseLimit(raw: unknown, fallback: number): number {
  if (typeof raw !== 'string' || !/^\s*[+-]?\d+\s*$/.test(raw)) return fallback;
  const n = Number(raw.trim());
  return Number.isSafeInteger(n) && n >= 1 ? n : fallback;
}

export function pickFirst(m: RawMailMessage, fields: readonly string[]): string | null {
  for (const f of fields) {
    const v = m[f];
    if (v !== undefined && v !== null && v !== '') return String(v);
  }
  return null;
}

export function normalizeMessage(m: RawMailMessage): EmailSummary {
  return {
    id: pickFirst(m, ['id']),
    threadId: pickFirst(m, ['threadId']),
    from: pickFirst(m, FROM_FIELDS),
    to: pickFirst(m, ['to']),
    subject: pickFirst(m, SUBJECT_FIELDS),
    snippet: pickFirst(m, ['snippet']),
    time: pickFirst(m, TIME_FIELDS),
    body: truncate(pickFirst(m, ['body']) ?? '', BODY_CHAR_CAP),
  };
}

export function toSendResponse(sent: unknown): SendResponse {
  const result: SendResponse = { ok: true };
  if (!isRecord(sent)) {
    result.result = sent;
    return result;
  }
  if ('id' in sent) result.message_id = sent.id;
  for (const [k, v] of Object.entries(sent)) {
    if (!(k in result)) result[k] = v;
  }
  return result;
}

export async function handleSend(payload: unknown, deps: MailHandlerDeps): Promise<HandlerResult<SendResponse>> {
  return runHandler('send', async () => {
    const req = validate(sendSchema, payload, 'invalid send request');
    const sent = await deps.mail.sendMessage(req.to, req.subject, req.body);
    return toSendResponse(sent);
  });
}

export async function handleList(query: QueryInput, deps: MailHandlerDeps): Promise<HandlerResult<ListResponse>> {
  const q = typeof query.q === 'string' && query.q ? query.q : undefined;
  const limit = parseLimit(query.limit, LIST_DEFAULT_LIMIT);
  return runHandler('list', async () => {
    const msgs = await deps.mail.listMessages(q, limit);
    return msgs.map(normalizeMessage);
  });
}

export async function handleSummary(query: QueryInput, deps: MailHandlerDeps): Promise<HandlerResult<SummaryResponse>> {
  const limit = parseLimit(query.limit, SUMMARY_DEFAULT_LIMIT);
  return runHandler('summary', async () => {
    const msgs = await deps.mail.listMessages(undefined, limit);
    const snippets = msgs.map((m) => pickFirst(m, SNIPPET_SOURCE_FIELDS) ?? '');
    if (!deps.completion) {
      logger.warn('[summary] OPENAI_API_KEY not set, returning snippets only');
      return { snippets, summary: null, warning: MISSING_OPENAI_KEY_WARNING };
    }
    const resp = await deps.completion.createChatCompletion({
      model: deps.summaryModel,
      messages: [
        { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
        { role: 'user', content: buildSummaryPrompt(snippets) },
      ],
      max_tokens: SUMMARY_MAX_TOKENS,
      temperature: SUMMARY_TEMPERATURE,
    });
    const summary = extractCompletionText(resp) ?? stringifyResponse(resp);
    return { snippets, summary };
  });
}

const SPAM_CHANGES: Record<SpamAction, LabelChange> = {
  mark_spam: { add: [SPAM_LABEL] },
  unspam: { remove: [SPAM_LABEL] },
  unmark_spam: { remove: [SPAM_LABEL] },
};

function isSpamAction(action: string): action is SpamAction {
  return Object.prototype.hasOwnProperty.call(SPAM_CHANGES, action);
}

export function spamLabelChange(action: string): LabelChange | null {
  return isSpamAction(action) ? SPAM_CHANGES[action] : null;
}

export async function handleSpam(payload: unknown, deps: MailHandlerDeps): Promise<HandlerResult<LabelResponse>> {
  return runHandler('spam', async () => {
    const op = validate(spamSchema, payload, 'message_id and action required');
    const change = spamLabelChange(op.action);
    if (!change) throw new ValidationError('unknown action');
    const result = await deps.mail.modifyMessageLabels(op.message_id, change);
    return { ok: true, result };
  });
}

export async function handleLabels(payload: unknown, deps: MailHandlerDeps): Promise<HandlerResult<LabelResponse>> {
  return runHandler('labels', async () => {
    const op = validate(labelSchema, payload, 'message_id and label required');
    const labels = await deps.mail.listLabels();
    const labelMap = new Map(labels.map((lab) => [lab.name, lab.id]));
    let labelId = labelMap.get(op.label);
    if (!labelId) {
      const created = await deps.mail.createLabel(op.label);
      if (!created?.id) throw new Error(`label "${op.label}" was created without an id`);
      labelId = created.id;
    }
    const result = await deps.mail.modifyMessageLabels(op.message_id, { add: [labelId] });
    return { ok: true, result };
  });
}
