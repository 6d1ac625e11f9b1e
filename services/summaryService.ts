import OpenAI from 'openai';
import { getOpenAIKey } from '../config/models';

export type CompletionMessage = { role: 'system' | 'user'; content: string };

export type CompletionRequest = {
  model: string;
  messages: CompletionMessage[];
  max_tokens: number;
  temperature: number;
};

/** Returns the provider's raw response; callers read the text out of it themselves. */
export interface CompletionClient {
  createChatCompletion(request: CompletionRequest): Promise<unknown>;
}

export const SUMMARY_SYSTEM_PROMPT = 'Summarize emails concisely and list action items.';

export function buildSummaryPrompt(snippets: string[]): string {
  let prompt = "You are an assistant who summarizes a user's recent emails. "
    + 'Summarize the main topics briefly and list any clear action items.\n\n';
  snippets.forEach((s, i) => {
    prompt += `Email ${i + 1}:\n${s}\n\n`;
  });
  return prompt;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** choices[0].message.content, trimmed; null when the response does not have that shape. */
export function extractCompletionText(resp: unknown): string | null {
  if (!isRecord(resp) || !Array.isArray(resp.choices)) return null;
  const first: unknown = resp.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return null;
  const content = first.message.content;
  return typeof content === 'string' ? content.trim() : null;
}

export function stringifyResponse(resp: unknown): string {
  if (typeof resp === 'string') return resp;
  try {
    return JSON.stringify(resp) ?? String(resp);
  } catch {
    return String(resp);
  }
}

export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(apiKey: string) {
    this.client = new OpenAI({ apiKey });
  }

  async createChatCompletion(request: CompletionRequest): Promise<unknown> {
    return await this.client.chat.completions.create(request);
  }
}

// null when OPENAI_API_KEY is unset
export function createCompletionClientFromEnv(): CompletionClient | null {
  const key = getOpenAIKey();
  return key ? new OpenAICompletionClient(key) : null;
}
