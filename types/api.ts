import type { FieldErrors } from '../utils/errors';
import type { EmailSummary } from './email';

export interface ErrorEnvelope {
  error: string;
  fields?: FieldErrors;
}

export type SendResponse = {
  ok: true;
  message_id?: unknown;
  result?: unknown;
  [extra: string]: unknown;
};

export type ListResponse = EmailSummary[];

export interface SummaryResponse {
  snippets: string[];
  summary: string | null;
  warning?: string;
}

export interface LabelResponse {
  ok: true;
  result: unknown;
}

export type HandlerResult<T> =
  | { status: 200; body: T }
  | { status: 400 | 500; body: ErrorEnvelope };
