export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ConversationThread {
  name: string;
  messages: ChatMessage[];
}

export type ChatIntent = 'list_emails' | 'summarize' | 'send_email' | 'unknown';
