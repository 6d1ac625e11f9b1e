import { truncate } from '../utils/text';

export const SEND_PHRASE = 'send an email to';
export const BODY_DELIMITER = 'saying';
const BODY_DELIMITER_RE = new RegExp(BODY_DELIMITER, 'i');
export const FALLBACK_RECIPIENT = 'unknown@example.com';
export const DEFAULT_BODY = 'Hello!';
export const FALLBACK_SUBJECT = 'No subject';
export const SUBJECT_MAX_CHARS = 30;

export type SendParams =
  | { kind: 'parsed'; recipient: string; body: string; subject: string }
  | { kind: 'fallback'; reason: 'missing_send_phrase' | 'empty_recipient'; recipient: string; body: string; subject: string };

export function deriveSubject(body: string): string {
  return truncate(body, SUBJECT_MAX_CHARS) || FALLBACK_SUBJECT;
}

function fallback(reason: 'missing_send_phrase' | 'empty_recipient'): SendParams {
  return { kind: 'fallback', reason, recipient: FALLBACK_RECIPIENT, body: DEFAULT_BODY, subject: deriveSubject(DEFAULT_BODY) };
}

/**
 * "send an email to <recipient> saying <body>". Phrases match case-insensitively
 * and the user's casing is kept; the body ends at a second "saying". An
 * unparseable request never blocks the chat: it falls back to the placeholder
 * recipient and body.
 */
export function extractSendParams(text: string): SendParams {
  const src = text || '';
  const lower = src.toLowerCase();
  const at = lower.indexOf(SEND_PHRASE);
  if (at < 0) return fallback('missing_send_phrase');

  const rest = src.slice(at + SEND_PHRASE.length);
  const [head, segment] = rest.split(BODY_DELIMITER_RE);
  const recipient = head.trim();
  const body = segment === undefined ? DEFAULT_BODY : segment.trim();
  if (!recipient) return fallback('empty_recipient');
  return { kind: 'parsed', recipient, body, subject: deriveSubject(body) };
}
