import express, { type ErrorRequestHandler } from 'express';
import type { MailHandlerDeps } from './handlers/mailHandlers';
import { createAuthRouter, type AuthRouterDeps } from './routes/authRouter';
import { createGmailRouter } from './routes/gmailRouter';
import { generateTraceId } from './utils/ids';
import { logger } from './utils/logger';

export type AppDeps = { mail: MailHandlerDeps; auth: AuthRouterDeps };

export const API_PREFIX = '/gmail';

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.use((req, res, next) => {
    const traceId = generateTraceId();
    const started = Date.now();
    res.setHeader('x-trace-id', traceId);
    res.on('finish', () => {
      logger.info(`[http] ${req.method} ${req.originalUrl} -> ${res.statusCode} ${Date.now() - started}ms trace_id=${traceId}`);
    });
    next();
  });

  app.get('/', (_req, res) => {
    res.status(200).send('Mail chat assistant backend');
  });

  app.use(API_PREFIX, createGmailRouter(deps.mail));
  app.use(API_PREFIX, createAuthRouter(deps.auth));

  app.use((_req, res) => {
    res.status(404).json({ error: 'not found' });
  });

  // Malformed JSON bodies land here; keep the {error} envelope
  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    const status = typeof err?.status === 'number' && err.status >= 400 && err.status < 500 ? err.status : 500;
    logger.warn('[http] request failed before reaching a handler', err?.message ?? err);
    res.status(status).json({ error: String(err?.message ?? 'internal error') });
  };
  app.use(onError);

  return app;
}
