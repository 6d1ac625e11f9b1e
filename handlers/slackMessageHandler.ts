import { CLEARED_GREETING, NEW_CHAT_GREETING, type ConversationSession, type SessionRegistry } from '../conversationStore';
import type { MailBackend } from '../services/backendApi';
import { respondToUtterance } from '../services/chatAssistant';
import { formatInbox, toSlackMrkdwn } from '../services/replyFormatter';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { unwrapSlackLinks } from '../utils/text';

export const INBOX_LIMIT = 5;

export type IncomingChatMessage = { user?: string; text?: string; subtype?: string };

export type ReplyFn = (text: string) => Promise<unknown>;

export type ChatHandlerDeps = {
  registry: SessionRegistry;
  backend: MailBackend;
  now?: () => Date;
};

type ControlContext = { session: ConversationSession; userId: string; deps: ChatHandlerDeps };

type ChatControl = { pattern: RegExp; run: (ctx: ControlContext, match: RegExpMatchArray) => Promise<string> | string };

function describeThreads(session: ConversationSession): string {
  const lines = session.threadNames().map((n) => (n === session.currentThreadName ? `• *${n}* (active)` : `• ${n}`));
  return ['💬 Your chats:', ...lines].join('\n');
}

// Sidebar-style actions; they act on the session and are not written into the thread history
const CONTROLS: ChatControl[] = [
  {
    pattern: /^new chat$/i,
    run: ({ session }) => `➕ *${session.newThread()}*\n${NEW_CHAT_GREETING}`,
  },
  {
    pattern: /^clear chat$/i,
    run: ({ session }) => {
      session.clearCurrent();
      return `🗑️ ${CLEARED_GREETING}`;
    },
  },
  {
    pattern: /^(?:chats|list chats)$/i,
    run: ({ session }) => describeThreads(session),
  },
  {
    pattern: /^switch to (.+)$/i,
    run: ({ session }, m) =>
      session.switchTo(m[1]) ? `↪️ Switched to *${session.currentThreadName}*` : `⚠️ No chat named "${m[1].trim()}".\n${describeThreads(session)}`,
  },
  {
    pattern: /^history$/i,
    run: ({ session }) => {
      const lines = session.currentMessages().map((msg) => `${msg.role === 'user' ? '*You:*' : '*Assistant:*'} ${msg.content}`);
      return [`🧾 *${session.currentThreadName}*`, ...lines].join('\n');
    },
  },
  {
    pattern: /^inbox$/i,
    run: async ({ deps }) => formatInbox(await deps.backend.listEmails(INBOX_LIMIT)),
  },
  {
    pattern: /^end session$/i,
    run: ({ deps, userId }) => {
      deps.registry.end(userId);
      return '👋 Session ended. Your chats have been discarded.';
    },
  },
];

export function preprocessMessage(text: string | undefined): string {
  return unwrapSlackLinks(text ?? '').trim();
}

/**
 * Entry point for every Slack message: chat controls first, everything else
 * goes through intent routing on the user's active thread.
 */
export async function handleSlackMessage(message: IncomingChatMessage, say: ReplyFn, deps: ChatHandlerDeps): Promise<void> {
  const userId = message.user;
  if (!userId || message.subtype === 'bot_message') return;
  const text = preprocessMessage(message.text);
  if (!text) return;

  const session = deps.registry.get(userId);
  let reply: string;
  try {
    const control = CONTROLS.map((c) => ({ c, m: text.match(c.pattern) })).find((x) => x.m !== null);
    if (control?.m) {
      reply = await control.c.run({ session, userId, deps }, control.m);
    } else {
      reply = (await respondToUtterance(session, text, { backend: deps.backend, now: deps.now })).reply;
    }
  } catch (e) {
    // a failed exchange must not take the bot down
    logger.error('❌ [chat] message handling failed', describeError(e));
    reply = `⚠️ Something went wrong: ${describeError(e)}`;
  }
  await say(toSlackMrkdwn(reply));
}
