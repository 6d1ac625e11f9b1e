import type { ChatMessage, ChatRole, ConversationThread } from './types/chat';

export const WELCOME_GREETING = 'Hi 👋, I’m your Gmail AI assistant.\n\nHow can I help you today?';
export const NEW_CHAT_GREETING = 'New chat started. Hi 👋, how can I help you?';
export const CLEARED_GREETING = 'Chat cleared. Hi 👋, how can I help you now?';

/**
 * Named chat threads of one user. Lives only as long as the session: nothing
 * here is written to disk.
 */
export class ConversationSession {
  private readonly threads = new Map<string, ChatMessage[]>();
  private current: string;

  constructor() {
    this.current = 'Chat 1';
    this.threads.set(this.current, [{ role: 'assistant', content: WELCOME_GREETING }]);
  }

  get currentThreadName(): string {
    return this.current;
  }

  threadNames(): string[] {
    return [...this.threads.keys()];
  }

  currentMessages(): ChatMessage[] {
    return [...this.messagesOf(this.current)];
  }

  getThread(name: string): ConversationThread | undefined {
    const messages = this.threads.get(name);
    return messages ? { name, messages: [...messages] } : undefined;
  }

  append(role: ChatRole, content: string): void {
    this.appendTo(this.current, role, content);
  }

  appendTo(name: string, role: ChatRole, content: string): void {
    this.messagesOf(name).push({ role, content });
  }

  /** Opens `Chat N+1` and makes it the active thread. */
  newThread(): string {
    // threads are never removed, so size+1 is always free
    const name = `Chat ${this.threads.size + 1}`;
    this.threads.set(name, [{ role: 'assistant', content: NEW_CHAT_GREETING }]);
    this.current = name;
    return name;
  }

  switchTo(name: string): boolean {
    const match = this.threadNames().find((n) => n.toLowerCase() === name.trim().toLowerCase());
    if (!match) return false;
    this.current = match;
    return true;
  }

  clearCurrent(): void {
    const messages = this.messagesOf(this.current);
    messages.length = 0;
    messages.push({ role: 'assistant', content: CLEARED_GREETING });
  }

  private messagesOf(name: string): ChatMessage[] {
    const messages = this.threads.get(name);
    if (!messages) throw new Error(`unknown chat thread: ${name}`);
    return messages;
  }
}

type SessionEntry = { session: ConversationSession; lastSeen: number };

/** One ConversationSession per user, dropped on `end session` or when idle too long. */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  get(userId: string): ConversationSession {
    let entry = this.sessions.get(userId);
    if (!entry) {
      entry = { session: new ConversationSession(), lastSeen: this.now() };
      this.sessions.set(userId, entry);
    }
    entry.lastSeen = this.now();
    return entry.session;
  }

  has(userId: string): boolean {
    return this.sessions.has(userId);
  }

  end(userId: string): boolean {
    return this.sessions.delete(userId);
  }

  size(): number {
    return this.sessions.size;
  }

  sweepIdle(idleMs: number): number {
    const cutoff = this.now() - idleMs;
    let removed = 0;
    for (const [userId, entry] of this.sessions) {
      if (entry.lastSeen < cutoff) {
        this.sessions.delete(userId);
        removed += 1;
      }
    }
    return removed;
  }
}
