import { getEnvironmentVariable } from './environment';

export function getSummaryModel(): string {
  return getEnvironmentVariable('OPENAI_MODEL', 'gpt-3.5-turbo');
}

// Absence is not an error: the summary endpoint degrades to raw snippets
export function getOpenAIKey(): string | null {
  const key = getEnvironmentVariable('OPENAI_API_KEY');
  return key || null;
}
