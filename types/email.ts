/**
 * A message as the mail client hands it over. Field names vary between
 * client versions, so everything is optional and looked up by fallback lists.
 */
export type RawMailMessage = {
  id?: string;
  threadId?: string;
  [field: string]: string | number | null | undefined;
};

/** Fixed-shape record returned by GET /list. */
export interface EmailSummary {
  id: string | null;
  threadId: string | null;
  from: string | null;
  to: string | null;
  subject: string | null;
  snippet: string | null;
  time: string | null;
  body: string;
}

export interface SendRequest {
  to: string;
  subject: string;
  body: string;
}

export type SpamAction = 'mark_spam' | 'unspam' | 'unmark_spam';

export interface SpamOperation {
  message_id: string;
  action: string;
}

export interface LabelOperation {
  message_id: string;
  label: string;
}

export interface MailLabel {
  id: string;
  name: string;
  type?: string;
}

export type LabelChange = { add?: string[]; remove?: string[] };
