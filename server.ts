import { initializeEnvironment } from './config/environment';

initializeEnvironment();

import { createApp } from './app';
import { getBackendPort, getCredentialDbPath, getOAuthConfig } from './config/appConfig';
import { getSummaryModel } from './config/models';
import { initDb, saveGoogleCredential } from './db/sqlite';
import { GmailApiClient } from './services/gmailClient';
import { createCompletionClientFromEnv } from './services/summaryService';
import { logger } from './utils/logger';

initDb(getCredentialDbPath());

const completion = createCompletionClientFromEnv();
const app = createApp({
  mail: { mail: new GmailApiClient(), completion, summaryModel: getSummaryModel() },
  auth: { config: getOAuthConfig(), saveCredential: saveGoogleCredential },
});

const port = getBackendPort();
logger.info(`🤖 OpenAI summaries: ${completion ? `enabled (model=${getSummaryModel()})` : 'disabled (OPENAI_API_KEY not set)'}`);
app.listen(port, () => {
  logger.info(`📬 Gmail backend listening on port ${port}`);
});
