import axios from 'axios';

export type FieldErrors = Record<string, string[]>;

export class ValidationError extends Error {
  readonly fields?: FieldErrors;

  constructor(message: string, fields?: FieldErrors) {
    super(message);
    this.name = 'ValidationError';
    this.fields = fields;
  }
}

/** Wraps anything thrown by the Gmail or OpenAI client. */
export class UpstreamError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(describeError(cause));
    this.name = 'UpstreamError';
    this.operation = operation;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Best human-readable message for an unknown thrown value. Google and OpenAI put
 * the useful part under `response.data.error(.message)`, so axios errors look there first.
 */
export function describeError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const data: unknown = err.response?.data;
    if (isRecord(data)) {
      const inner = data.error;
      if (typeof inner === 'string' && inner) return inner;
      if (isRecord(inner) && typeof inner.message === 'string' && inner.message) return inner.message;
      if (typeof data.error_description === 'string' && data.error_description) return data.error_description;
    }
    return err.message || err.code || 'request failed';
  }
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
