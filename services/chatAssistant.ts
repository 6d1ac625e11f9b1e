import type { ConversationSession } from '../conversationStore';
import type { ChatIntent } from '../types/chat';
import { cleanEmailLike } from '../utils/text';
import { logger } from '../utils/logger';
import type { MailBackend } from './backendApi';
import { classifyIntent } from './intentRouter';
import { formatEmailList, formatSendConfirmation, formatSummary, HELP_TEXT } from './replyFormatter';
import { extractSendParams } from './sendParamsExtractor';

export const CHAT_LIST_LIMIT = 3;
export const CHAT_SUMMARY_LIMIT = 5;

export type AssistantDeps = {
  backend: MailBackend;
  now?: () => Date;
};

export type AssistantReply = { intent: ChatIntent; reply: string };

async function replyFor(intent: ChatIntent, text: string, deps: AssistantDeps): Promise<string> {
  switch (intent) {
    case 'list_emails':
      return formatEmailList(await deps.backend.listEmails(CHAT_LIST_LIMIT));
    case 'summarize':
      return formatSummary(await deps.backend.summarizeEmails(CHAT_SUMMARY_LIMIT));
    case 'send_email': {
      const params = extractSendParams(text);
      if (params.kind === 'fallback') {
        logger.info(`[chat] send request not understood (${params.reason}), using placeholders`);
      }
      const recipient = cleanEmailLike(params.recipient) ?? params.recipient;
      const result = await deps.backend.sendEmail(recipient, params.subject, params.body);
      return formatSendConfirmation(
        result,
        { recipient, subject: params.subject, body: params.body },
        deps.now ? deps.now() : new Date(),
      );
    }
    case 'unknown':
      return HELP_TEXT;
  }
}

/**
 * One chat exchange on the session's active thread: record the user's text,
 * run the matching backend call, record and return the formatted reply.
 */
export async function respondToUtterance(
  session: ConversationSession,
  text: string,
  deps: AssistantDeps,
): Promise<AssistantReply> {
  // the user may switch threads while the backend call is in flight
  const thread = session.currentThreadName;
  session.appendTo(thread, 'user', text);
  const intent = classifyIntent(text);
  logger.debug(`[chat] intent=${intent} thread=${thread}`);
  const reply = await replyFor(intent, text, deps);
  session.appendTo(thread, 'assistant', reply);
  return { intent, reply };
}
