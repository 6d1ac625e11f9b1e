// Slack front end. Talks to the backend over HTTP only (BACKEND_BASE_URL).
import { initializeEnvironment } from './config/environment';

initializeEnvironment();

import { App, LogLevel } from '@slack/bolt';
import { getBackendBaseUrl, getChatTimeouts, getSessionIdleMs } from './config/appConfig';
import { SessionRegistry } from './conversationStore';
import { handleSlackMessage } from './handlers/slackMessageHandler';
import { HttpMailBackend } from './services/backendApi';
import { isDebug, logger } from './utils/logger';

const requiredEnvVars = ['SLACK_BOT_TOKEN', 'SLACK_SIGNING_SECRET', 'SLACK_APP_TOKEN'];
const missingVars = requiredEnvVars.filter((key) => !process.env[key]);
if (missingVars.length > 0) {
  logger.error(`❌ Missing required environment variables: ${missingVars.join(', ')}`);
  process.exit(1);
}

const timeouts = getChatTimeouts();
logger.info(`🔗 Backend: ${getBackendBaseUrl()} (timeouts list=${timeouts.listMs}ms send=${timeouts.sendMs}ms summary=${timeouts.summaryMs}ms)`);

const app = new App({
  token: process.env.SLACK_BOT_TOKEN,
  signingSecret: process.env.SLACK_SIGNING_SECRET,
  socketMode: true,
  appToken: process.env.SLACK_APP_TOKEN,
  logLevel: isDebug() ? LogLevel.DEBUG : LogLevel.INFO,
});

const registry = new SessionRegistry();
const backend = new HttpMailBackend({ timeouts });

app.message(async ({ message, say }) => {
  if (message.subtype !== undefined) return;
  await handleSlackMessage({ user: message.user, text: message.text }, say, { registry, backend });
});

// Idle sessions end on their own; their chats are discarded with them
function startSessionSweeper() {
  const idleMs = getSessionIdleMs();
  const timer = setInterval(() => {
    const removed = registry.sweepIdle(idleMs);
    if (removed > 0) logger.debug(`[session.sweep] ended=${removed} active=${registry.size()}`);
  }, Math.min(idleMs, 5 * 60 * 1000));
  timer.unref();
  logger.info(`🧹 Session sweeper: idle limit ${Math.round(idleMs / 60000)} min`);
}
startSessionSweeper();

(async () => {
  try {
    await app.start();
    logger.info('⚡️ Gmail chat assistant is running (socket mode)');
  } catch (error) {
    logger.error('❌ Failed to start the Slack app:', error);
    process.exit(1);
  }
})();
