import type { ChatIntent } from '../types/chat';

type IntentRule = { intent: ChatIntent; matches: (s: string) => boolean };

// Checked top to bottom; the first hit wins, so "list my emails and summarize" is a list
const RULES: IntentRule[] = [
  { intent: 'list_emails', matches: (s) => s.includes('list') && s.includes('email') },
  { intent: 'summarize', matches: (s) => s.includes('summarize') },
  { intent: 'send_email', matches: (s) => s.includes('send an email to') },
];

export function normalizeUtterance(text: string): string {
  return (text || '').toLowerCase().trim();
}

export function classifyIntent(text: string): ChatIntent {
  const s = normalizeUtterance(text);
  const hit = RULES.find((r) => r.matches(s));
  return hit ? hit.intent : 'unknown';
}
